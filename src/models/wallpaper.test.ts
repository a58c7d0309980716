/*
 * Copyright (C) 2026 Jagrit Gumber
 *
 * This program is free software; you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation; either version 2 of the License, or
 * (at your option) any later version.
 */

import { describe, expect, it } from "vitest";

import { DirtySet } from "../state/dirty";
import { WallpaperRecord } from "../state/types";
import { Wallpaper, WallpaperChange } from "./wallpaper";

const clock = () => new Date("2026-03-01T12:00:00.000Z");

const record = (overrides: Partial<WallpaperRecord> = {}): WallpaperRecord => ({
    paths: ["/pictures/lake.png"],
    format: "PNG",
    width: 1920,
    height: 1080,
    rating: 0,
    purity: 0,
    tags: [],
    added: "2026-01-01T00:00:00.000Z",
    modified: "2026-01-01T00:00:00.000Z",
    ...overrides
});

describe("Wallpaper", () => {
    it("normalizes tags from the record", () => {
        const wallpaper = new Wallpaper("h1", record({tags: [" Night", "city", "night", ""]}));
        expect(wallpaper.tags).toEqual(["city", "night"]);
    });

    it("reports rating changes and stamps the modification time", () => {
        const wallpaper = new Wallpaper("h1", record(), clock);
        const changes: WallpaperChange[] = [];
        wallpaper.onDidChange(change => changes.push(change));

        wallpaper.rating += 1;
        wallpaper.rating = 1;

        expect(wallpaper.rating).toBe(1);
        expect(changes).toEqual([{wallpaper, attribute: "rating"}]);
        expect(wallpaper.modified).toBe("2026-03-01T12:00:00.000Z");
    });

    it("truncates ratings and purities to integers", () => {
        const wallpaper = new Wallpaper("h1", record());
        wallpaper.rating = 2.7;
        wallpaper.purity = -1.2;
        expect(wallpaper.rating).toBe(2);
        expect(wallpaper.purity).toBe(-1);
    });

    it("toggles tags in both directions", () => {
        const wallpaper = new Wallpaper("h1", record({tags: ["sea"]}));

        expect(wallpaper.toggleTag("Forest")).toBe(true);
        expect(wallpaper.tags).toEqual(["forest", "sea"]);
        expect(wallpaper.toggleTag("sea")).toBe(false);
        expect(wallpaper.tags).toEqual(["forest"]);
    });

    it("ignores an empty tag", () => {
        const wallpaper = new Wallpaper("h1", record());
        const changes: WallpaperChange[] = [];
        wallpaper.onDidChange(change => changes.push(change));

        expect(wallpaper.toggleTag("   ")).toBe(false);
        expect(changes).toEqual([]);
    });

    it("keeps the first path as the primary one", () => {
        const wallpaper = new Wallpaper("h1", record({paths: ["/b/one.png"]}));
        wallpaper.addPath("/a/copy.png");
        wallpaper.addPath("/b/one.png");

        expect(wallpaper.paths).toEqual(["/b/one.png", "/a/copy.png"]);
        expect(wallpaper.path).toBe("/b/one.png");
        expect(wallpaper.url).toBe("file:///b/one.png");
    });

    it("becomes unavailable once every path is invalidated", () => {
        const wallpaper = new Wallpaper("h1", record({paths: ["/x.png", "/y.png"]}));
        wallpaper.invalidatePath("/x.png");
        expect(wallpaper.path).toBe("/y.png");
        wallpaper.invalidatePath("/y.png");

        expect(wallpaper.isAvailable).toBe(false);
        expect(wallpaper.path).toBeNull();
        expect(wallpaper.toString()).toBe("<h1>");
    });

    it("round-trips through its record", () => {
        const original = record({rating: 3, purity: -1, tags: ["a"]});
        expect(new Wallpaper("h1", original).toRecord()).toEqual(original);
    });
});

describe("DirtySet", () => {
    it("marks exactly the wallpaper that changed", () => {
        const dirty = new DirtySet();
        const first = new Wallpaper("h1", record());
        const second = new Wallpaper("h2", record());
        dirty.track(first);
        dirty.track(second);

        first.rating += 1;

        expect(dirty.size).toBe(1);
        expect(dirty.has("h1")).toBe(true);
        expect(dirty.has(second)).toBe(false);
    });

    it("stops tracking once disposed", () => {
        const dirty = new DirtySet();
        const wallpaper = new Wallpaper("h1", record());
        const subscription = dirty.track(wallpaper);

        subscription.dispose();
        wallpaper.purity = 2;

        expect(dirty.size).toBe(0);
    });

    it("holds each wallpaper once", () => {
        const dirty = new DirtySet();
        const wallpaper = new Wallpaper("h1", record());
        dirty.track(wallpaper);

        wallpaper.rating = 1;
        wallpaper.rating = 2;
        wallpaper.toggleTag("x");

        expect(dirty.values()).toEqual([wallpaper]);
        dirty.delete(wallpaper);
        expect(dirty.size).toBe(0);
    });
});
