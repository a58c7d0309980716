/*
 * Copyright (C) 2026 Jagrit Gumber
 *
 * This program is free software; you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation; either version 2 of the License, or
 * (at your option) any later version.
 */

import { homedir } from "os";
import { join } from "path";
import { parseArgs } from "util";

import { Predicate, parseQuery } from "./filter/query";
import { UsageError } from "./lib/errors";
import { expandHome } from "./services/discovery";

export type AppConfig = Readonly<{
    store: string,
    sources: readonly string[],
    intervalMs: number,
    queryText: string,
    query: Predicate,
    shuffle: boolean,
    screens: number | null,
    renderer: string,
    logFile: string,
    maintenance: boolean,
    help: boolean
}>;

export const defaultInterval = 2;
export const defaultQuery = "r >= 0";
export const defaultRenderer = "feh --bg-fill --no-fehbg";

export const usage = `Usage: wallcycle [options] [SOURCE...]

Rotate wallpapers across all monitors, rate and tag them as they pass.
SOURCE is an image file, a directory or a pattern with * and ? wildcards.

Options:
  -c, --store FILE      wallpaper store (JSON, .gz for compressed)
  -i, --interval SEC    seconds between rotations (default ${defaultInterval})
  -q, --query EXPR      filter expression (default "${defaultQuery}")
  -s, --shuffle         random order (default)
  -S, --sort            order by path
      --screens N       use N virtual screens instead of xrandr
      --renderer CMD    background command (default "${defaultRenderer}")
      --log FILE        log file
      --maintenance     sweep invalid paths in the store and exit
  -h, --help            show this help

Environment:
  WALLCYCLE_STORE       default store file (~/.wallcycle.json)
  WALLCYCLE_LOG         default log file (~/.cache/wallcycle/wallcycle.log)
`;

const parseInterval = (text: string | undefined): number => {
    if(text === undefined){
        return defaultInterval * 1000;
    }
    const seconds = Number(text);
    if(text.trim() === "" || !Number.isFinite(seconds) || seconds <= 0){
        throw new UsageError(`Invalid interval '${text}', expected a positive number of seconds`);
    }
    return Math.round(seconds * 1000);
};

const parseScreens = (text: string | undefined): number | null => {
    if(text === undefined){
        return null;
    }
    const count = Number(text);
    if(!Number.isInteger(count) || count < 1){
        throw new UsageError(`Invalid screen count '${text}', expected a positive integer`);
    }
    return count;
};

const parseArguments = (argv: readonly string[]) => {
    try{
        return parseArgs({
            args: [...argv],
            allowPositionals: true,
            strict: true,
            options: {
                store: {type: "string", short: "c"},
                interval: {type: "string", short: "i"},
                query: {type: "string", short: "q"},
                shuffle: {type: "boolean", short: "s"},
                sort: {type: "boolean", short: "S"},
                screens: {type: "string"},
                renderer: {type: "string"},
                log: {type: "string"},
                maintenance: {type: "boolean"},
                help: {type: "boolean", short: "h"}
            }
        });
    }catch(error){
        throw new UsageError(error instanceof Error ? error.message : String(error));
    }
};

export const loadConfig = (argv: readonly string[], env: NodeJS.ProcessEnv = process.env, home: string = homedir()): AppConfig => {
    const {values, positionals} = parseArguments(argv);

    const queryText = values.query ?? defaultQuery;
    const renderer = values.renderer ?? defaultRenderer;
    if(renderer.trim() === ""){
        throw new UsageError("The background command must not be empty");
    }

    return Object.freeze({
        store: expandHome(values.store ?? env.WALLCYCLE_STORE ?? join(home, ".wallcycle.json")),
        sources: Object.freeze([...positionals]),
        intervalMs: parseInterval(values.interval),
        queryText,
        query: parseQuery(queryText),
        shuffle: values.sort !== true,
        screens: parseScreens(values.screens),
        renderer,
        logFile: expandHome(values.log ?? env.WALLCYCLE_LOG ?? join(home, ".cache", "wallcycle", "wallcycle.log")),
        maintenance: values.maintenance === true,
        help: values.help === true
    });
};
