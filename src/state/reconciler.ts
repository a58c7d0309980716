/*
 * Copyright (C) 2026 Jagrit Gumber
 *
 * This program is free software; you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation; either version 2 of the License, or
 * (at your option) any later version.
 */

import { StoreError } from "../lib/errors";
import { logInfo } from "../lib/log";
import { DirtySet } from "./dirty";
import { StoreSnapshot, WallpaperStore } from "./types";

export type SaveResult = {
    saved: number,
    externalChange: boolean
};

/**
 * Flushes dirty wallpapers into the store. Every save reads the file again,
 * so records written by another process since the last read survive unless
 * this process edited the same wallpaper.
 */
export class PersistenceReconciler {

    private lastSeenModified: string | null = null;

    public constructor(private readonly now: () => Date = () => new Date()){ }

    /** Remembers the store's `modified` stamp as read at startup. */
    public observe(snapshot: StoreSnapshot): void {
        this.lastSeenModified = snapshot.modified;
    }

    public save(dirty: DirtySet, store: WallpaperStore): SaveResult {
        const pending = dirty.values();
        if(pending.length === 0){
            return {saved: 0, externalChange: false};
        }

        let fresh: StoreSnapshot;
        try{
            fresh = store.readAll();
        }catch(error){
            throw error instanceof StoreError ? error : new StoreError(`Cannot read store '${store.path}'`, store.path, {cause: error});
        }

        const externalChange = fresh.modified !== this.lastSeenModified;
        if(externalChange){
            logInfo("save", `${store.path} changed on disk since it was last read, merging`);
        }

        const merged: StoreSnapshot = {
            modified: this.now().toISOString(),
            wallpapers: {...fresh.wallpapers},
            extra: fresh.extra
        };
        for(const wallpaper of pending){
            merged.wallpapers[wallpaper.hash] = wallpaper.toRecord();
        }

        try{
            store.writeAll(merged);
        }catch(error){
            throw error instanceof StoreError ? error : new StoreError(`Cannot write store '${store.path}'`, store.path, {cause: error});
        }

        this.lastSeenModified = merged.modified;
        for(const wallpaper of pending){
            dirty.delete(wallpaper);
        }
        return {saved: pending.length, externalChange};
    }
}
