/*
 * Copyright (C) 2026 Jagrit Gumber
 *
 * This program is free software; you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation; either version 2 of the License, or
 * (at your option) any later version.
 */

import { CyclicPartition } from "../lib/cyclic";

/** A slice of the pool together with how far a screen has advanced through it. */
export class Playlist<T> {

    public constructor(public readonly partition: CyclicPartition<T>, private _position: number = 0){ }

    public get position(): number {
        return this._position;
    }

    public get current(): T {
        return this.partition.get(this._position);
    }

    public move(step: number): T {
        this._position += step;
        return this.current;
    }
}
