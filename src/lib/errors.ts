/*
 * Copyright (C) 2026 Jagrit Gumber
 *
 * This program is free software; you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation; either version 2 of the License, or
 * (at your option) any later version.
 */

export class EmptyPoolError extends Error {

    public constructor(){
        super("Cannot index into an empty pool");
        this.name = "EmptyPoolError";
    }
}

/** The process cannot reach a usable initial state and must exit. */
export class StartupError extends Error {

    public constructor(message: string, options?: ErrorOptions){
        super(message, options);
        this.name = "StartupError";
    }
}

export class StoreError extends Error {

    public constructor(message: string, public readonly path: string, options?: ErrorOptions){
        super(message, options);
        this.name = "StoreError";
    }
}

export class UsageError extends Error {

    public constructor(message: string){
        super(message);
        this.name = "UsageError";
    }
}

export class QueryError extends UsageError {

    public constructor(message: string, public readonly position: number){
        super(`${message} (at ${position})`);
        this.name = "QueryError";
    }
}

export const describeError = (error: unknown): string => {
    if(error instanceof Error){
        return `${error.name}: ${error.message}`;
    }
    return error === undefined || error === null ? "" : String(error);
};
