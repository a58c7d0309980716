/*
 * Copyright (C) 2026 Jagrit Gumber
 *
 * This program is free software; you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation; either version 2 of the License, or
 * (at your option) any later version.
 */

import { Emitter } from "../lib/emitter";
import { WallpaperRecord } from "../state/types";

export type WallpaperAttribute = "rating" | "purity" | "tags" | "paths";

export type WallpaperChange = {
    wallpaper: Wallpaper,
    attribute: WallpaperAttribute
};

export const normalizeTag = (tag: string): string => tag.trim().toLowerCase();

const normalizeTags = (tags: readonly string[]): string[] =>
    [...new Set(tags.map(normalizeTag).filter(Boolean))].sort();

/**
 * One image, identified by the hash of its content. Dimensions and format are
 * fixed; rating, purity, tags and the list of paths change through the methods
 * below, each of which notifies `onDidChange` once the change is in place.
 */
export class Wallpaper {

    private readonly changed = new Emitter<WallpaperChange>();

    public readonly onDidChange = this.changed.event;

    private _paths: string[];
    private _rating: number;
    private _purity: number;
    private _tags: string[];
    private _modified: string;

    public readonly format: string;
    public readonly width: number;
    public readonly height: number;
    public readonly added: string;

    public constructor(public readonly hash: string, record: WallpaperRecord, private readonly clock: () => Date = () => new Date()){
        this._paths = [...new Set(record.paths)];
        this._rating = Math.trunc(record.rating);
        this._purity = Math.trunc(record.purity);
        this._tags = normalizeTags(record.tags);
        this._modified = record.modified;
        this.format = record.format;
        this.width = record.width;
        this.height = record.height;
        this.added = record.added;
    }

    public get paths(): readonly string[] {
        return this._paths;
    }

    /** First known path, or null once every path has been invalidated. */
    public get path(): string | null {
        return this._paths[0] ?? null;
    }

    public get isAvailable(): boolean {
        return this._paths.length > 0;
    }

    public get rating(): number {
        return this._rating;
    }

    public set rating(rating: number) {
        const value = Math.trunc(rating);
        if(value !== this._rating){
            this._rating = value;
            this.touch("rating");
        }
    }

    public get purity(): number {
        return this._purity;
    }

    public set purity(purity: number) {
        const value = Math.trunc(purity);
        if(value !== this._purity){
            this._purity = value;
            this.touch("purity");
        }
    }

    public get tags(): readonly string[] {
        return this._tags;
    }

    public get modified(): string {
        return this._modified;
    }

    /** Adds the tag, or removes it when already present. Returns whether it is now set. */
    public toggleTag(tag: string): boolean {
        const normalized = normalizeTag(tag);
        if(!normalized){
            return false;
        }
        const present = this._tags.includes(normalized);
        this._tags = present
            ? this._tags.filter(current => current !== normalized)
            : normalizeTags([...this._tags, normalized]);
        this.touch("tags");
        return !present;
    }

    public addPath(path: string): void {
        if(!this._paths.includes(path)){
            this._paths = [...this._paths, path];
            this.touch("paths");
        }
    }

    public invalidatePath(path: string): void {
        if(this._paths.includes(path)){
            this._paths = this._paths.filter(current => current !== path);
            this.touch("paths");
        }
    }

    public toRecord(): WallpaperRecord {
        return {
            paths: [...this._paths],
            format: this.format,
            width: this.width,
            height: this.height,
            rating: this._rating,
            purity: this._purity,
            tags: [...this._tags],
            added: this.added,
            modified: this._modified
        };
    }

    public toString(): string {
        return this.path ?? `<${this.hash}>`;
    }

    private touch(attribute: WallpaperAttribute): void {
        this._modified = this.clock().toISOString();
        this.changed.fire({wallpaper: this, attribute});
    }
}
