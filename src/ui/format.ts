/*
 * Copyright (C) 2026 Jagrit Gumber
 *
 * This program is free software; you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation; either version 2 of the License, or
 * (at your option) any later version.
 */

import { Screen } from "../models/screen";

export type ScaleSymbols = {
    positive: string,
    negative: string,
    positiveBackground: string,
    negativeBackground: string
};

const ratingSymbols: ScaleSymbols = {positive: "★", negative: "-", positiveBackground: "☆", negativeBackground: " "};
const puritySymbols: ScaleSymbols = {positive: "~", negative: "♥", positiveBackground: "♡", negativeBackground: "♡"};

const padRight = (text: string, length: number, fill: string): string =>
    text + fill.repeat(Math.max(0, length - [...text].length));

/**
 * Fixed width picture of a signed value. Tries, in order: one symbol per
 * point ("★★★☆☆"), symbol and number ("★12"), symbol and infinity ("★∞"),
 * the bare symbol, and finally nothing.
 */
export const scaleString = (value: number, symbols: ScaleSymbols, length: number = 5): string => {
    const negative = value < 0;
    const symbol = negative ? symbols.negative : symbols.positive;
    const background = negative ? symbols.negativeBackground : symbols.positiveBackground;
    const magnitude = Math.abs(value);

    const options: [string, string][] = [
        [symbol.repeat(magnitude), background],
        [symbol + magnitude, " "],
        [symbol + "∞", " "],
        [symbol, " "],
        ["", ""]
    ];
    const [text, fill] = options.find(([candidate]) => [...candidate].length <= length) ?? ["", ""];
    return padRight(text, length, fill);
};

export const ratingString = (rating: number, length?: number): string => scaleString(rating, ratingSymbols, length);

export const purityString = (purity: number, length?: number): string => scaleString(purity, puritySymbols, length);

/** Whole seconds as H:MM:SS. */
export const formatDuration = (seconds: number): string => {
    const total = Math.max(0, Math.floor(seconds));
    const hours = Math.floor(total / 3600);
    const minutes = Math.floor(total / 60) % 60;
    const rest = total % 60;
    return `${hours}:${String(minutes).padStart(2, "0")}:${String(rest).padStart(2, "0")}`;
};

/** Milliseconds as seconds with at most two decimals. */
export const formatSeconds = (ms: number): string => String(Math.round(ms / 10) / 100);

export const headerLine = (count: number, intervalMs: number, screens: number): string => {
    const total = screens > 0 ? count * intervalMs / 1000 / screens : 0;
    return `${count} wallpapers, every ${formatSeconds(intervalMs)}s on ${screens} screens (${formatDuration(total)} total)`;
};

/** The two lines describing a screen: its state and wallpaper, then the file shown. */
export const screenLines = (screen: Screen): [string, string] => {
    const wallpaper = screen.currentWallpaper;
    const parts = [
        `${screen.isSelected ? "»" : " "} ${screen.index + 1}${screen.isCurrent ? "*" : " "}`,
        `[${ratingString(wallpaper.rating)}][${purityString(wallpaper.purity)}]`,
        wallpaper.format,
        `${wallpaper.width}×${wallpaper.height}`
    ];
    if(screen.isPaused){
        parts.push("paused");
    }
    if(wallpaper.tags.length > 0){
        parts.push(wallpaper.tags.map(tag => `#${tag}`).join(" "));
    }
    return [parts.join(" "), `    ${wallpaper.path ?? "(no file)"}`];
};
