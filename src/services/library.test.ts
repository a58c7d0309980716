/*
 * Copyright (C) 2026 Jagrit Gumber
 *
 * This program is free software; you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation; either version 2 of the License, or
 * (at your option) any later version.
 */

import { describe, expect, it, vi } from "vitest";

import { parseQuery } from "../filter/query";
import { StoreSnapshot, WallpaperRecord } from "../state/types";
import { ProbedImage } from "./discovery";
import { WallpaperLibrary, shuffle } from "./library";

const record = (paths: string[], rating: number = 0, tags: string[] = []): WallpaperRecord => ({
    paths,
    format: "PNG",
    width: 100,
    height: 100,
    rating,
    purity: 0,
    tags,
    added: "2026-01-01T00:00:00.000Z",
    modified: "2026-01-01T00:00:00.000Z"
});

const snapshot = (wallpapers: Record<string, WallpaperRecord>): StoreSnapshot => ({modified: "t0", wallpapers, extra: {}});

const image = (path: string, hash: string): ProbedImage => ({format: "JPEG", width: 1280, height: 720, path, hash});

const now = () => new Date("2026-03-01T12:00:00.000Z");

describe("shuffle", () => {
    it("permutes in place with the given random source", () => {
        const items = [1, 2, 3, 4];
        expect(shuffle(items, () => 0)).toEqual([2, 3, 4, 1]);
        expect(items).toEqual([2, 3, 4, 1]);
    });
});

describe("WallpaperLibrary", () => {
    it("uses every stored wallpaper when no sources are given", () => {
        const library = WallpaperLibrary.load(snapshot({
            h1: record(["/p/b.png"], 1),
            h2: record(["/p/a.png"], -1),
            h3: record([], 5)
        }), {sources: [], query: parseQuery("r >= 0"), shuffle: false});

        expect(library.all()).toHaveLength(3);
        expect(library.pool.map(wallpaper => wallpaper.hash)).toEqual(["h1"]);
        expect(library.dirty.size).toBe(0);
    });

    it("sorts the pool by path", () => {
        const library = WallpaperLibrary.load(snapshot({
            h1: record(["/p/c.png"]),
            h2: record(["/p/a.png"]),
            h3: record(["/p/b.png"])
        }), {sources: [], query: parseQuery(""), shuffle: false});

        expect(library.pool.map(wallpaper => wallpaper.path)).toEqual(["/p/a.png", "/p/b.png", "/p/c.png"]);
    });

    it("reuses known paths and probes only new files", () => {
        const probe = vi.fn((path: string) => path === "/new/dup.png" ? image(path, "h1") : image(path, "fresh"));
        const library = WallpaperLibrary.load(snapshot({
            h1: record(["/old/one.png"], 2),
            h9: record(["/elsewhere/nine.png"], 3)
        }), {
            sources: ["/anything"],
            query: parseQuery("r >= 0"),
            shuffle: false,
            now,
            find: () => ["/new/dup.png", "/new/fresh.png", "/old/one.png"],
            probe
        });

        expect(probe.mock.calls.map(([path]) => path)).toEqual(["/new/dup.png", "/new/fresh.png"]);
        expect(library.all().find(wallpaper => wallpaper.hash === "h1")?.paths).toEqual(["/old/one.png", "/new/dup.png"]);

        const fresh = library.all().find(wallpaper => wallpaper.hash === "fresh");
        expect(fresh?.toRecord()).toEqual({
            paths: ["/new/fresh.png"],
            format: "JPEG",
            width: 1280,
            height: 720,
            rating: 0,
            purity: 0,
            tags: [],
            added: "2026-03-01T12:00:00.000Z",
            modified: "2026-03-01T12:00:00.000Z"
        });
        expect(library.dirty.values().map(wallpaper => wallpaper.hash).sort()).toEqual(["fresh", "h1"]);
        expect(library.pool.map(wallpaper => wallpaper.hash)).toEqual(["fresh", "h1"]);
    });

    it("adds new wallpapers to the pool only when the default record matches", () => {
        const library = WallpaperLibrary.load(snapshot({}), {
            sources: ["/anything"],
            query: parseQuery("r >= 1"),
            shuffle: false,
            find: () => ["/new/a.png"],
            probe: (path) => image(path, "ha")
        });

        expect(library.all()).toHaveLength(1);
        expect(library.pool).toEqual([]);
        expect(library.dirty.has("ha")).toBe(true);
    });

    it("skips files that cannot be probed", () => {
        const library = WallpaperLibrary.load(snapshot({}), {
            sources: ["/anything"],
            query: parseQuery(""),
            shuffle: false,
            find: () => ["/new/broken.png"],
            probe: () => null
        });
        expect(library.all()).toHaveLength(0);
    });

    it("marks edited wallpapers dirty until disposed", () => {
        const library = WallpaperLibrary.load(snapshot({h1: record(["/p/a.png"])}), {sources: [], query: parseQuery(""), shuffle: false});
        const wallpaper = library.pool[0];

        wallpaper.rating = 4;
        expect(library.dirty.has(wallpaper)).toBe(true);

        library.dirty.clear();
        library.dispose();
        wallpaper.rating = 5;
        expect(library.dirty.size).toBe(0);
    });
});
