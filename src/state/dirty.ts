/*
 * Copyright (C) 2026 Jagrit Gumber
 *
 * This program is free software; you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation; either version 2 of the License, or
 * (at your option) any later version.
 */

import { Disposable } from "../lib/emitter";
import { Wallpaper } from "../models/wallpaper";

/** Wallpapers edited in memory since the last successful save, keyed by hash. */
export class DirtySet {

    private readonly items = new Map<string, Wallpaper>();

    public get size(): number {
        return this.items.size;
    }

    public add(wallpaper: Wallpaper): void {
        this.items.set(wallpaper.hash, wallpaper);
    }

    public has(wallpaper: Wallpaper | string): boolean {
        return this.items.has(typeof wallpaper === "string" ? wallpaper : wallpaper.hash);
    }

    public values(): Wallpaper[] {
        return [...this.items.values()];
    }

    public delete(wallpaper: Wallpaper): void {
        this.items.delete(wallpaper.hash);
    }

    public clear(): void {
        this.items.clear();
    }

    /** Marks the wallpaper dirty on every change until disposed. */
    public track(wallpaper: Wallpaper): Disposable {
        return wallpaper.onDidChange(({wallpaper: changed}) => this.add(changed));
    }
}
