/*
 * Copyright (C) 2026 Jagrit Gumber
 *
 * This program is free software; you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation; either version 2 of the License, or
 * (at your option) any later version.
 */

import { homedir } from "os";
import { createHash } from "crypto";
import { Dirent, existsSync, readFileSync, readdirSync, realpathSync, statSync } from "fs";
import { extname, join, parse, resolve, sep } from "path";

import { logError } from "../lib/log";
import { ImageHeader, readImageHeader } from "./imageHeader";

export const imageExtensions = [".jpg", ".jpeg", ".png", ".gif", ".bmp"];

export type ProbedImage = ImageHeader & {
    path: string,
    hash: string
};

export type DirectoryReader = (directory: string) => Dirent[];

const readDirectory: DirectoryReader = (directory: string) => readdirSync(directory, {withFileTypes: true});

/** Entries of a directory, or none when it cannot be read. */
const listDirectory = (directory: string, read: DirectoryReader): Dirent[] => {
    try{
        return read(directory);
    }catch(error){
        logError("discovery", `Cannot read ${directory}`, error);
        return [];
    }
};

export const hashContent = (data: Buffer): string =>
    createHash("sha256").update(data).digest("hex");

export const isImagePath = (path: string): boolean =>
    imageExtensions.includes(extname(path).toLowerCase());

export const expandHome = (pattern: string): string =>
    pattern === "~" || pattern.startsWith(`~${sep}`) || pattern.startsWith("~/")
        ? join(homedir(), pattern.slice(1))
        : pattern;

const hasWildcard = (segment: string): boolean => /[*?]/.test(segment);

const wildcardToRegExp = (segment: string): RegExp =>
    new RegExp(`^${segment.replace(/[.+^${}()|[\]\\]/g, "\\$&").replace(/\*/g, ".*").replace(/\?/g, ".")}$`);

const isDirectory = (path: string): boolean => {
    try{
        return statSync(path).isDirectory();
    }catch(_){
        return false;
    }
};

/** Matches `*` and `?` within single path segments. */
export const expandPattern = (pattern: string, read: DirectoryReader = readDirectory): string[] => {
    const absolute = resolve(expandHome(pattern));
    if(!hasWildcard(absolute)){
        return existsSync(absolute) ? [absolute] : [];
    }

    const segments = absolute.split(sep).filter(Boolean);
    let matches: string[] = [parse(absolute).root];

    for(const segment of segments){
        const next: string[] = [];
        for(const base of matches){
            if(!hasWildcard(segment)){
                const candidate = join(base, segment);
                if(existsSync(candidate)){
                    next.push(candidate);
                }
                continue;
            }
            if(!isDirectory(base)){
                continue;
            }
            const matcher = wildcardToRegExp(segment);
            for(const entry of listDirectory(base, read).map(dirent => dirent.name).sort()){
                if(matcher.test(entry) && (segment.startsWith(".") || !entry.startsWith("."))){
                    next.push(join(base, entry));
                }
            }
        }
        matches = next;
    }
    return matches;
};

const walk = (directory: string, read: DirectoryReader): string[] => {
    const files: string[] = [];
    for(const entry of listDirectory(directory, read)){
        const path = join(directory, entry.name);
        if(entry.isDirectory()){
            files.push(...walk(path, read));
        }else if(entry.isFile() || entry.isSymbolicLink()){
            files.push(path);
        }
    }
    return files;
};

/**
 * Files named by the sources, with directories walked recursively. Paths are
 * resolved to their real location, deduplicated and sorted.
 */
export const findImages = (sources: readonly string[], read: DirectoryReader = readDirectory): string[] => {
    const found = new Set<string>();
    for(const source of sources){
        for(const match of expandPattern(source, read)){
            const files = isDirectory(match) ? walk(match, read) : [match];
            for(const file of files){
                if(!isImagePath(file)){
                    continue;
                }
                try{
                    found.add(realpathSync(file));
                }catch(error){
                    logError("discovery", `Skipping ${file}`, error);
                }
            }
        }
    }
    return [...found].sort();
};

/** Hash and header of an image file, or null when it cannot be read as an image. */
export const probeImage = (path: string): ProbedImage | null => {
    let data: Buffer;
    try{
        data = readFileSync(path);
    }catch(error){
        logError("discovery", `Cannot read ${path}`, error);
        return null;
    }
    const header = readImageHeader(data);
    if(!header){
        return null;
    }
    return {
        ...header,
        path,
        hash: hashContent(data)
    };
};
