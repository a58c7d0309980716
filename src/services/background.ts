/*
 * Copyright (C) 2026 Jagrit Gumber
 *
 * This program is free software; you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation; either version 2 of the License, or
 * (at your option) any later version.
 */

import { spawn } from "child_process";

export interface BackgroundRenderer {
    apply(paths: readonly string[]): Promise<void>;
}

/** Splits a command line on whitespace, honouring single and double quotes. */
export const splitCommand = (command: string): string[] => {
    const parts: string[] = [];
    const pattern = /"([^"]*)"|'([^']*)'|(\S+)/g;
    let match: RegExpExecArray | null;
    while((match = pattern.exec(command)) !== null){
        parts.push(match[1] ?? match[2] ?? match[3]);
    }
    return parts;
};

/** Paints one image per monitor by running an external program, `feh` unless configured otherwise. */
export class CommandRenderer implements BackgroundRenderer {

    private readonly program: string;
    private readonly args: string[];

    public constructor(command: string = "feh --bg-fill --no-fehbg"){
        const [program, ...args] = splitCommand(command);
        if(!program){
            throw new Error("Background command is empty");
        }
        this.program = program;
        this.args = args;
    }

    public apply(paths: readonly string[]): Promise<void> {
        return new Promise((resolve, reject) => {
            const child = spawn(this.program, [...this.args, ...paths], {stdio: ["ignore", "ignore", "pipe"]});
            const errors: Buffer[] = [];

            child.stderr?.on("data", (chunk: Buffer) => errors.push(chunk));
            child.on("error", reject);
            child.on("close", (code) => {
                if(code === 0){
                    resolve();
                    return;
                }
                const detail = Buffer.concat(errors).toString("utf-8").trim();
                reject(new Error(`${this.program} exited with code ${code ?? "unknown"}${detail ? `: ${detail}` : ""}`));
            });
        });
    }
}
