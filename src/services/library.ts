/*
 * Copyright (C) 2026 Jagrit Gumber
 *
 * This program is free software; you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation; either version 2 of the License, or
 * (at your option) any later version.
 */

import { Predicate, matches } from "../filter/query";
import { Disposable, disposeAll } from "../lib/emitter";
import { logInfo } from "../lib/log";
import { Wallpaper } from "../models/wallpaper";
import { DirtySet } from "../state/dirty";
import { StoreSnapshot } from "../state/types";
import { ProbedImage, findImages, probeImage } from "./discovery";

export type LibraryOptions = {
    sources: readonly string[],
    query: Predicate,
    shuffle: boolean,
    random?: () => number,
    now?: () => Date,
    find?: (sources: readonly string[]) => string[],
    probe?: (path: string) => ProbedImage | null
};

export const shuffle = <T>(items: T[], random: () => number = Math.random): T[] => {
    for(let i = items.length - 1; i > 0; i--){
        const j = Math.floor(random() * (i + 1));
        [items[i], items[j]] = [items[j], items[i]];
    }
    return items;
};

const byPath = (a: Wallpaper, b: Wallpaper): number => {
    const left = a.path ?? "";
    const right = b.path ?? "";
    return left < right ? -1 : left > right ? 1 : 0;
};

/**
 * Every wallpaper known to the store or found in the sources, and the pool of
 * those that take part in rotation. Each wallpaper is tracked, so any change
 * to it lands in `dirty`.
 */
export class WallpaperLibrary implements Disposable {

    public readonly dirty = new DirtySet();
    public readonly pool: Wallpaper[];

    private readonly wallpapers = new Map<string, Wallpaper>();
    private readonly subscriptions: Disposable[] = [];

    private constructor(snapshot: StoreSnapshot, options: LibraryOptions){
        const now = options.now ?? (() => new Date());
        const pathIndex = new Map<string, Wallpaper>();

        for(const [hash, record] of Object.entries(snapshot.wallpapers)){
            const wallpaper = this.adopt(new Wallpaper(hash, record, now));
            for(const path of wallpaper.paths){
                pathIndex.set(path, wallpaper);
            }
        }

        let candidates: Wallpaper[];
        if(options.sources.length > 0){
            const found = new Set<Wallpaper>();
            const paths = (options.find ?? findImages)(options.sources);
            const probe = options.probe ?? probeImage;
            let created = 0;

            for(const path of paths){
                const known = pathIndex.get(path);
                if(known){
                    found.add(known);
                    continue;
                }

                const image = probe(path);
                if(!image){
                    continue;
                }
                const existing = this.wallpapers.get(image.hash);
                if(existing){
                    existing.addPath(path);
                    pathIndex.set(path, existing);
                    found.add(existing);
                    continue;
                }

                const stamp = now().toISOString();
                const wallpaper = this.adopt(new Wallpaper(image.hash, {
                    paths: [path],
                    format: image.format,
                    width: image.width,
                    height: image.height,
                    rating: 0,
                    purity: 0,
                    tags: [],
                    added: stamp,
                    modified: stamp
                }, now));
                this.dirty.add(wallpaper);
                pathIndex.set(path, wallpaper);
                found.add(wallpaper);
                created++;
            }
            logInfo("library", `Found ${paths.length} image files, ${created} new`);
            candidates = [...found];
        }else{
            candidates = [...this.wallpapers.values()];
        }

        const pool = candidates.filter(wallpaper => wallpaper.isAvailable && matches(options.query, wallpaper));
        this.pool = options.shuffle ? shuffle(pool, options.random) : pool.sort(byPath);
    }

    public static load(snapshot: StoreSnapshot, options: LibraryOptions): WallpaperLibrary {
        return new WallpaperLibrary(snapshot, options);
    }

    public all(): Wallpaper[] {
        return [...this.wallpapers.values()];
    }

    public dispose(): void {
        disposeAll(this.subscriptions);
    }

    private adopt(wallpaper: Wallpaper): Wallpaper {
        this.wallpapers.set(wallpaper.hash, wallpaper);
        this.subscriptions.push(this.dirty.track(wallpaper));
        return wallpaper;
    }
}
