/*
 * Copyright (C) 2026 Jagrit Gumber
 *
 * This program is free software; you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation; either version 2 of the License, or
 * (at your option) any later version.
 */

import { EmptyPoolError } from "./errors";

export const mod = (value: number, modulus: number): number => ((value % modulus) + modulus) % modulus;

const gcd = (a: number, b: number): number => b === 0 ? a : gcd(b, a % b);

/**
 * Every `stride`th element of a shared pool, starting at `offset` and wrapping
 * around indefinitely. N screens with stride N and offsets 0..N-1 interleave
 * over one pool without copying it.
 */
export class CyclicPartition<T> {

    public constructor(private readonly pool: readonly T[], public readonly stride: number = 1, public readonly offset: number = 0){
        if(!Number.isInteger(stride) || stride < 1){
            throw new RangeError(`Stride must be a positive integer, got ${stride}`);
        }
        if(!Number.isInteger(offset) || offset < 0){
            throw new RangeError(`Offset must be a non-negative integer, got ${offset}`);
        }
    }

    public get poolSize(): number {
        return this.pool.length;
    }

    /** Pool elements that belong to this slice. */
    public get length(): number {
        const size = this.pool.length;
        const start = this.offset % this.stride;
        return start < size ? Math.floor((size - 1 - start) / this.stride) + 1 : 0;
    }

    /** Advances until `get` starts repeating. */
    public get period(): number {
        const size = this.pool.length;
        return size === 0 ? 0 : size / gcd(size, this.stride);
    }

    public indexOf(i: number): number {
        if(this.pool.length === 0){
            throw new EmptyPoolError();
        }
        return mod(i * this.stride + this.offset, this.pool.length);
    }

    public get(i: number): T {
        return this.pool[this.indexOf(i)];
    }

    public indexes(): number[] {
        return Array.from({length: this.length}, (_, i) => this.indexOf(i));
    }

    public toArray(): T[] {
        return this.indexes().map(index => this.pool[index]);
    }
}
