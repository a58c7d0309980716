/*
 * Copyright (C) 2026 Jagrit Gumber
 *
 * This program is free software; you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation; either version 2 of the License, or
 * (at your option) any later version.
 */

export type TimeoutName = "rotate" | "save";

/** Named deadlines in epoch milliseconds. At most one per name. */
export class Timeouts {

    private readonly deadlines = new Map<TimeoutName, number>();

    public set(name: TimeoutName, at: number): void {
        this.deadlines.set(name, at);
    }

    /** Moves the deadline to `at` only when that is later; sets it when missing. */
    public extend(name: TimeoutName, at: number): void {
        const deadline = this.deadlines.get(name);
        if(deadline === undefined || deadline < at){
            this.deadlines.set(name, at);
        }
    }

    public get(name: TimeoutName): number | undefined {
        return this.deadlines.get(name);
    }

    /** Removes and returns the earliest deadline that is not after `now`. */
    public takeDue(now: number): TimeoutName | null {
        let due: TimeoutName | null = null;
        let earliest = Infinity;
        for(const [name, at] of this.deadlines){
            if(at <= now && at < earliest){
                due = name;
                earliest = at;
            }
        }
        if(due !== null){
            this.deadlines.delete(due);
        }
        return due;
    }

    public nextDeadline(): number | null {
        let earliest: number | null = null;
        for(const at of this.deadlines.values()){
            if(earliest === null || at < earliest){
                earliest = at;
            }
        }
        return earliest;
    }
}
