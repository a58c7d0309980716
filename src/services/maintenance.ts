/*
 * Copyright (C) 2026 Jagrit Gumber
 *
 * This program is free software; you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation; either version 2 of the License, or
 * (at your option) any later version.
 */

import { statSync } from "fs";

import { logInfo } from "../lib/log";
import { Wallpaper } from "../models/wallpaper";
import { DirtySet } from "../state/dirty";
import { PersistenceReconciler } from "../state/reconciler";
import { WallpaperStore } from "../state/types";

export type SweepResult = {
    checked: number,
    removedPaths: number,
    dead: number,
    saved: number
};

export const isFile = (path: string): boolean => {
    const stats = statSync(path, {throwIfNoEntry: false});
    return stats?.isFile() ?? false;
};

/** Drops every stored path that is no longer a file and saves what changed. */
export const sweepInvalidPaths = (
    wallpapers: readonly Wallpaper[],
    dirty: DirtySet,
    store: WallpaperStore,
    reconciler: PersistenceReconciler,
    exists: (path: string) => boolean = isFile
): SweepResult => {
    let removedPaths = 0;
    let dead = 0;

    for(const wallpaper of wallpapers){
        for(const path of [...wallpaper.paths]){
            if(!exists(path)){
                wallpaper.invalidatePath(path);
                removedPaths++;
            }
        }
        if(!wallpaper.isAvailable){
            dead++;
        }
    }

    logInfo("maintenance", `Checked a total of ${wallpapers.length} wallpapers`);
    logInfo("maintenance", `${dead} wallpapers have no path left`);

    const {saved} = reconciler.save(dirty, store);
    return {checked: wallpapers.length, removedPaths, dead, saved};
};
