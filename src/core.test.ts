/*
 * Copyright (C) 2026 Jagrit Gumber
 *
 * This program is free software; you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation; either version 2 of the License, or
 * (at your option) any later version.
 */

import { EventEmitter } from "events";
import { describe, expect, it, vi } from "vitest";

import { loadConfig } from "./config";
import { CoreServices, KeyInput, runMaintenance, runRotation } from "./core";
import { StartupError, UsageError } from "./lib/errors";
import { onLogMessage } from "./lib/log";
import { Screen } from "./models/screen";
import { Wallpaper } from "./models/wallpaper";
import { BackgroundRenderer } from "./services/background";
import { VirtualMonitors } from "./services/monitors";
import { StoreSnapshot, WallpaperRecord, WallpaperStore } from "./state/types";
import { Display } from "./ui/display";

class MemoryStore implements WallpaperStore {

    public readonly path = "memory.json";
    public writes: StoreSnapshot[] = [];

    public constructor(private snapshot: StoreSnapshot){ }

    public readAll(): StoreSnapshot {
        return structuredClone(this.snapshot);
    }

    public writeAll(snapshot: StoreSnapshot): void {
        this.snapshot = structuredClone(snapshot);
        this.writes.push(snapshot);
    }
}

class RecordingRenderer implements BackgroundRenderer {

    public applied: string[][] = [];

    public async apply(paths: readonly string[]): Promise<void> {
        this.applied.push([...paths]);
    }
}

class FakeDisplay implements Display {

    public opened = false;
    public closed = false;

    public open(): void {
        this.opened = true;
    }

    public close(): void {
        this.closed = true;
    }

    public screenChanged(_screen: Screen): void { }
    public wallpaperChanged(_wallpaper: Wallpaper): void { }
    public intervalChanged(_ms: number): void { }
    public status(_message: string): void { }
    public prompt(_text: string | null): void { }
    public refresh(): void { }
}

class FakeInput extends EventEmitter implements KeyInput {

    public paused = true;

    public resume(): void {
        this.paused = false;
    }

    public pause(): void {
        this.paused = true;
    }
}

const record = (path: string, rating: number): WallpaperRecord => ({
    paths: [path],
    format: "PNG",
    width: 4,
    height: 3,
    rating,
    purity: 0,
    tags: [],
    added: "2026-01-01T00:00:00.000Z",
    modified: "2026-01-01T00:00:00.000Z"
});

const snapshot = (rating: number = 0): StoreSnapshot => ({
    modified: "2026-01-01T00:00:00.000Z",
    wallpapers: {
        h1: record("/w/one.png", rating),
        h2: record("/w/two.png", rating),
        h3: record("/w/three.png", rating)
    },
    extra: {}
});

const config = loadConfig(["--screens", "2"], {}, "/home/tester");

const services = (store: WallpaperStore, screens: number = 2) => {
    const renderer = new RecordingRenderer();
    const display = new FakeDisplay();
    const input = new FakeInput();
    const bundle: CoreServices = {
        store,
        monitors: new VirtualMonitors(screens),
        renderer,
        input,
        output: {write: () => true},
        display,
        pathExists: () => true
    };
    return {bundle, renderer, display, input};
};

describe("runRotation", () => {
    it("shows wallpapers, applies keys and saves on quit", async () => {
        const store = new MemoryStore(snapshot());
        const {bundle, renderer, display, input} = services(store);
        const messages: string[] = [];
        const subscription = onLogMessage(({message}) => messages.push(message));

        const running = runRotation(config, bundle);
        await vi.waitFor(() => expect(input.listenerCount("data")).toBe(1));
        expect(input.paused).toBe(false);

        input.emit("data", Buffer.from("w"));
        input.emit("data", Buffer.from("q"));
        await running;
        subscription.dispose();

        expect(display.opened).toBe(true);
        expect(display.closed).toBe(true);
        expect(renderer.applied[0]).toHaveLength(2);
        expect(messages[0]).toBe("3 wallpapers matching rating >= 0 on 2 screens");
        expect(input.listenerCount("data")).toBe(0);
        expect(input.paused).toBe(true);

        expect(store.writes).toHaveLength(1);
        const ratings = Object.values(store.writes[0].wallpapers).map(wallpaper => wallpaper.rating).sort();
        expect(ratings).toEqual([0, 0, 1]);
    });

    it("refuses to start without sources and wallpapers", async () => {
        const store = new MemoryStore({modified: null, wallpapers: {}, extra: {}});
        await expect(runRotation(config, services(store).bundle)).rejects.toThrow(UsageError);
    });

    it("refuses to start when nothing matches the query", async () => {
        const store = new MemoryStore(snapshot(-1));
        await expect(runRotation(config, services(store).bundle)).rejects.toThrow("No wallpapers match 'r >= 0'");
    });

    it("refuses to start without screens", async () => {
        const store = new MemoryStore(snapshot());
        await expect(runRotation(config, services(store, 0).bundle)).rejects.toThrow(StartupError);
    });
});

describe("runMaintenance", () => {
    it("drops paths that are gone", () => {
        const store = new MemoryStore(snapshot());

        const result = runMaintenance(config, store, path => path !== "/w/two.png");

        expect(result).toEqual({checked: 3, removedPaths: 1, dead: 1, saved: 1});
        expect(store.readAll().wallpapers.h2.paths).toEqual([]);
        expect(store.readAll().wallpapers.h1.paths).toEqual(["/w/one.png"]);
    });
});
