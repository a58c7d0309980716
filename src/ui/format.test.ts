/*
 * Copyright (C) 2026 Jagrit Gumber
 *
 * This program is free software; you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation; either version 2 of the License, or
 * (at your option) any later version.
 */

import { describe, expect, it } from "vitest";

import { CyclicPartition } from "../lib/cyclic";
import { Playlist } from "../models/playlist";
import { Screen } from "../models/screen";
import { Wallpaper } from "../models/wallpaper";
import { formatDuration, formatSeconds, headerLine, purityString, ratingString, screenLines } from "./format";

describe("ratingString", () => {
    it("draws one star per point on an empty background", () => {
        expect(ratingString(0)).toBe("☆☆☆☆☆");
        expect(ratingString(3)).toBe("★★★☆☆");
    });

    it("falls back to a number, then infinity", () => {
        expect(ratingString(7)).toBe("★7   ");
        expect(ratingString(123456)).toBe("★∞   ");
    });

    it("shows negative ratings with dashes", () => {
        expect(ratingString(-2)).toBe("--   ");
    });

    it("fits narrow widths", () => {
        expect(ratingString(3, 1)).toBe("★");
        expect(ratingString(3, 0)).toBe("");
    });
});

describe("purityString", () => {
    it("uses hearts and tildes", () => {
        expect(purityString(0)).toBe("♡♡♡♡♡");
        expect(purityString(2)).toBe("~~♡♡♡");
        expect(purityString(-1)).toBe("♥♡♡♡♡");
    });
});

describe("durations", () => {
    it("formats hours, minutes and seconds", () => {
        expect(formatDuration(3725)).toBe("1:02:05");
        expect(formatDuration(59.9)).toBe("0:00:59");
    });

    it("formats intervals in seconds", () => {
        expect(formatSeconds(2250)).toBe("2.25");
        expect(formatSeconds(2000)).toBe("2");
    });
});

describe("headerLine", () => {
    it("shows how long a full rotation takes", () => {
        expect(headerLine(120, 2000, 2)).toBe("120 wallpapers, every 2s on 2 screens (0:02:00 total)");
    });
});

describe("screenLines", () => {
    const wallpaper = new Wallpaper("h", {
        paths: ["/w/a.jpg"],
        format: "JPEG",
        width: 2560,
        height: 1440,
        rating: 2,
        purity: 0,
        tags: ["night", "city"],
        added: "",
        modified: ""
    });
    const screen = (index: number): Screen =>
        new Screen(index, {index, name: "out", width: 1, height: 1, x: 0, y: 0}, new Playlist(new CyclicPartition([wallpaper])));

    it("marks the selected, current and paused screen", () => {
        const first = screen(0);
        first.isSelected = true;
        first.isCurrent = true;
        first.isPaused = true;

        expect(screenLines(first)).toEqual([
            "» 1* [★★☆☆☆][♡♡♡♡♡] JPEG 2560×1440 paused #city #night",
            "    /w/a.jpg"
        ]);
    });

    it("leaves the markers blank otherwise", () => {
        expect(screenLines(screen(1))[0]).toBe("  2  [★★☆☆☆][♡♡♡♡♡] JPEG 2560×1440 #city #night");
    });
});
