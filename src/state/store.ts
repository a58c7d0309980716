/*
 * Copyright (C) 2026 Jagrit Gumber
 *
 * This program is free software; you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation; either version 2 of the License, or
 * (at your option) any later version.
 */

import { dirname } from "path";
import { gunzipSync, gzipSync } from "zlib";
import { copyFileSync, existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "fs";

import { StoreError } from "../lib/errors";
import { logError, logInfo } from "../lib/log";
import { StoreSnapshot, WallpaperRecord, WallpaperStore, emptySnapshot } from "./types";

export type StoreOptions = {
    backups?: boolean,
    now?: () => Date
};

export const localDate = (now: Date): string => {
    const month = `${now.getMonth() + 1}`.padStart(2, "0");
    const day = `${now.getDate()}`.padStart(2, "0");
    return `${now.getFullYear()}-${month}-${day}`;
};

const isObject = (value: unknown): value is Record<string, unknown> =>
    typeof value === "object" && value !== null && !Array.isArray(value);

const toStrings = (value: unknown): string[] =>
    Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : [];

const toInteger = (value: unknown): number =>
    typeof value === "number" && Number.isFinite(value) ? Math.trunc(value) : 0;

const toText = (value: unknown, fallback: string): string =>
    typeof value === "string" ? value : fallback;

export const parseRecord = (value: unknown): WallpaperRecord | null => {
    if(!isObject(value)){
        return null;
    }
    const added = toText(value.added, "");
    return {
        paths: toStrings(value.paths),
        format: toText(value.format, ""),
        width: toInteger(value.width),
        height: toInteger(value.height),
        rating: toInteger(value.rating),
        purity: toInteger(value.purity),
        tags: toStrings(value.tags),
        added,
        modified: toText(value.modified, added)
    };
};

export const parseSnapshot = (data: unknown, path: string): StoreSnapshot => {
    if(!isObject(data)){
        throw new StoreError(`Store '${path}' does not contain a JSON object`, path);
    }
    const {modified, wallpapers, ...extra} = data;
    const records: Record<string, WallpaperRecord> = {};
    if(isObject(wallpapers)){
        for(const [hash, value] of Object.entries(wallpapers)){
            const record = parseRecord(value);
            if(record){
                records[hash] = record;
            }
        }
    }
    return {
        modified: typeof modified === "string" ? modified : null,
        wallpapers: records,
        extra
    };
};

const sortKeys = <T>(items: Record<string, T>): Record<string, T> =>
    Object.fromEntries(Object.entries(items).sort(([a], [b]) => a < b ? -1 : a > b ? 1 : 0));

/**
 * Wallpaper records in one JSON file, gzip-compressed when the name ends in
 * `.gz`. Writes go to a temporary file that is renamed over the store, so a
 * concurrent reader sees either the old or the new content.
 */
export class JsonFileStore implements WallpaperStore {

    private backedUp = false;
    private readonly now: () => Date;
    private readonly backups: boolean;

    public constructor(public readonly path: string, options: StoreOptions = {}){
        this.now = options.now ?? (() => new Date());
        this.backups = options.backups ?? true;
    }

    public get compressed(): boolean {
        return this.path.endsWith(".gz");
    }

    public get backupPath(): string {
        return `${this.path}.${localDate(this.now())}.bak`;
    }

    public readAll(): StoreSnapshot {
        if(!existsSync(this.path)){
            return emptySnapshot();
        }

        let content: string;
        try{
            const raw = readFileSync(this.path);
            content = raw.length === 0 ? "" : (this.compressed ? gunzipSync(raw) : raw).toString("utf-8");
        }catch(error){
            throw new StoreError(`Cannot read store '${this.path}'`, this.path, {cause: error});
        }

        if(content.trim() === ""){
            return emptySnapshot();
        }

        let data: unknown;
        try{
            data = JSON.parse(content);
        }catch(error){
            throw new StoreError(`Store '${this.path}' is not valid JSON`, this.path, {cause: error});
        }
        return parseSnapshot(data, this.path);
    }

    public writeAll(snapshot: StoreSnapshot): void {
        const body = {
            ...snapshot.extra,
            modified: snapshot.modified,
            wallpapers: sortKeys(snapshot.wallpapers)
        };
        const data = this.compressed
            ? gzipSync(JSON.stringify(body))
            : Buffer.from(`${JSON.stringify(body, null, "\t")}\n`, "utf-8");
        const temporary = `${this.path}.${process.pid}.tmp`;

        try{
            mkdirSync(dirname(this.path), {recursive: true});
            this.backup();
            writeFileSync(temporary, data);
            renameSync(temporary, this.path);
        }catch(error){
            if(existsSync(temporary)){
                rmSync(temporary, {force: true});
            }
            throw new StoreError(`Cannot write store '${this.path}'`, this.path, {cause: error});
        }
    }

    /** Copies the store aside once per process run, and at most once per day. */
    private backup(): void {
        if(!this.backups || this.backedUp){
            return;
        }
        this.backedUp = true;

        const target = this.backupPath;
        if(!existsSync(this.path) || existsSync(target)){
            return;
        }
        try{
            copyFileSync(this.path, target);
            logInfo("store", `Backed up ${this.path} to ${target}`);
        }catch(error){
            logError("store", `Failed to back up ${this.path}`, error);
        }
    }
}
