/*
 * Copyright (C) 2026 Jagrit Gumber
 *
 * This program is free software; you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation; either version 2 of the License, or
 * (at your option) any later version.
 */

import { dirname } from "path";
import { appendFileSync, mkdirSync } from "fs";

import { Emitter } from "./emitter";
import { describeError } from "./errors";

export type LogMessage = {
    level: "info" | "error",
    scope: string,
    message: string
};

const messages = new Emitter<LogMessage>();

let logFile: string | null = null;

const now = (): string => new Date().toISOString();

const writeLine = (line: string): void => {
    if(logFile){
        appendFileSync(logFile, `${line}\n`, "utf-8");
    }
};

/** Everything logged, as it is logged. The terminal display shows these in its status line. */
export const onLogMessage = messages.event;

export const setLogFile = (path: string | null): void => {
    if(path){
        mkdirSync(dirname(path), {recursive: true});
    }
    logFile = path;
};

export const getLogFile = (): string | null => logFile;

export const logInfo = (scope: string, message: string): void => {
    writeLine(`[${now()}] [${scope}] ${message}`);
    messages.fire({level: "info", scope, message});
};

export const logError = (scope: string, message: string, error?: unknown): void => {
    const detail = describeError(error);
    writeLine(`[${now()}] [${scope}] ERROR ${message}${detail ? ` | ${detail}` : ""}`);
    messages.fire({level: "error", scope, message: detail ? `${message}: ${detail}` : message});
};
