/*
 * Copyright (C) 2026 Jagrit Gumber
 *
 * This program is free software; you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation; either version 2 of the License, or
 * (at your option) any later version.
 */

export type WallpaperRecord = {
    paths: string[],
    format: string,
    width: number,
    height: number,
    rating: number,
    purity: number,
    tags: string[],
    added: string,
    modified: string
};

export type StoreSnapshot = {
    modified: string | null,
    wallpapers: Record<string, WallpaperRecord>,
    extra: Record<string, unknown>
};

export interface WallpaperStore {
    readonly path: string;
    readAll(): StoreSnapshot;
    writeAll(snapshot: StoreSnapshot): void;
}

export const emptySnapshot = (): StoreSnapshot => ({
    modified: null,
    wallpapers: {},
    extra: {}
});
