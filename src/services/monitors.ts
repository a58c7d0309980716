/*
 * Copyright (C) 2026 Jagrit Gumber
 *
 * This program is free software; you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation; either version 2 of the License, or
 * (at your option) any later version.
 */

import { execFile } from "child_process";
import { promisify } from "util";

import { Monitor } from "../models/screen";

const run = promisify(execFile);

export interface MonitorSource {
    detect(): Promise<Monitor[]>;
}

const outputPattern = /^(\S+) connected(?: primary)? (\d+)x(\d+)\+(\d+)\+(\d+)/;

/** Connected outputs with an active mode, in the order xrandr lists them. */
export const parseXrandr = (output: string): Monitor[] => {
    const monitors: Monitor[] = [];
    for(const line of output.split("\n")){
        const match = line.match(outputPattern);
        if(!match){
            continue;
        }
        monitors.push({
            index: monitors.length,
            name: match[1],
            width: +match[2],
            height: +match[3],
            x: +match[4],
            y: +match[5]
        });
    }
    return monitors;
};

export class XrandrMonitors implements MonitorSource {

    public constructor(private readonly command: string = "xrandr"){ }

    public async detect(): Promise<Monitor[]> {
        const {stdout} = await run(this.command, ["-q"], {encoding: "utf-8"});
        return parseXrandr(stdout);
    }
}

/** A fixed number of screens, for setups where xrandr is not available. */
export class VirtualMonitors implements MonitorSource {

    public constructor(private readonly count: number, private readonly width: number = 1920, private readonly height: number = 1080){ }

    public async detect(): Promise<Monitor[]> {
        return Array.from({length: this.count}, (_, index) => ({
            index,
            name: `virtual-${index + 1}`,
            width: this.width,
            height: this.height,
            x: index * this.width,
            y: 0
        }));
    }
}
