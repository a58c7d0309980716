/*
 * Copyright (C) 2026 Jagrit Gumber
 *
 * This program is free software; you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation; either version 2 of the License, or
 * (at your option) any later version.
 */

import { Screen } from "../models/screen";
import { Wallpaper } from "../models/wallpaper";
import { headerLine, screenLines } from "./format";

export interface Display {
    open(): void;
    close(): void;
    screenChanged(screen: Screen): void;
    wallpaperChanged(wallpaper: Wallpaper): void;
    intervalChanged(ms: number): void;
    status(message: string): void;
    prompt(text: string | null): void;
    /** Draws whatever changed since the last call. */
    refresh(): void;
}

export type TerminalOutput = {
    write(chunk: string): unknown,
    columns?: number
};

const ESC = "\x1b";
const CSI = `${ESC}[`;

const T = {
    clear: `${CSI}2J${CSI}H`,
    clearLine: `${CSI}2K`,
    pos: (row: number, column: number) => `${CSI}${row};${column}H`,
    hideCursor: `${CSI}?25l`,
    showCursor: `${CSI}?25h`,
    altOn: `${ESC}[?1049h`,
    altOff: `${ESC}[?1049l`,
    reset: `${CSI}0m`,
    bold: `${CSI}1m`,
    reverse: `${CSI}7m`
};

const fit = (text: string, columns: number | undefined): string => {
    if(!columns){
        return text;
    }
    const chars = [...text];
    return chars.length > columns ? chars.slice(0, columns - 1).join("") + "…" : text;
};

/**
 * Full screen view on an ANSI terminal: header, two lines per screen, status.
 * Notifications only mark the view stale; `refresh` redraws it in one write.
 */
export class TerminalDisplay implements Display {

    private stale = true;
    private isOpen = false;
    private statusText = "";
    private promptText: string | null = null;

    public constructor(
        private readonly screens: readonly Screen[],
        private readonly wallpaperCount: number,
        private intervalMs: number,
        private readonly output: TerminalOutput = process.stdout
    ){ }

    public open(): void {
        this.output.write(T.altOn + T.hideCursor);
        this.isOpen = true;
        this.stale = true;
        this.refresh();
    }

    public close(): void {
        if(!this.isOpen){
            return;
        }
        this.isOpen = false;
        this.output.write(T.showCursor + T.altOff + T.reset);
    }

    public screenChanged(_screen: Screen): void {
        this.stale = true;
    }

    public wallpaperChanged(wallpaper: Wallpaper): void {
        if(this.screens.some(screen => screen.currentWallpaper === wallpaper)){
            this.stale = true;
        }
    }

    public intervalChanged(ms: number): void {
        this.intervalMs = ms;
        this.stale = true;
    }

    public status(message: string): void {
        this.statusText = message;
        this.stale = true;
    }

    public prompt(text: string | null): void {
        this.promptText = text;
        this.stale = true;
    }

    public refresh(): void {
        if(!this.isOpen || !this.stale){
            return;
        }
        this.stale = false;
        this.output.write(this.frame());
    }

    /** Lines of the current view, without escape codes. */
    public lines(): string[] {
        const lines = [headerLine(this.wallpaperCount, this.intervalMs, this.screens.length), ""];
        for(const screen of this.screens){
            lines.push(...screenLines(screen));
        }
        lines.push("");
        lines.push(this.promptText === null ? this.statusText : `tag: ${this.promptText}`);
        return lines;
    }

    private frame(): string {
        const columns = this.output.columns;
        const lines = this.lines();
        let frame = T.clear;
        lines.forEach((line, index) => {
            const text = fit(line, columns);
            const styled = index === 0 ? T.bold + text + T.reset
                : index === lines.length - 1 && this.promptText !== null ? T.reverse + text + T.reset
                : text;
            frame += T.pos(index + 1, 1) + T.clearLine + styled;
        });
        return frame;
    }
}
