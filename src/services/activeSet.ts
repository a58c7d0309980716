/*
 * Copyright (C) 2026 Jagrit Gumber
 *
 * This program is free software; you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation; either version 2 of the License, or
 * (at your option) any later version.
 */

import { CyclicPartition } from "../lib/cyclic";
import { Screen } from "../models/screen";

/**
 * The screens taking part in automatic rotation. The cursor survives
 * recomputation unchanged and is read modulo the current number of members,
 * so pausing and unpausing the same screen lands on the same screen again.
 */
export class ActiveSetTracker {

    private view: CyclicPartition<Screen> | null = null;
    private cursor = 0;

    public recompute(screens: readonly Screen[]): void {
        const active = screens.filter(screen => !screen.isPaused);
        this.view = active.length > 0 ? new CyclicPartition(active) : null;
    }

    public current(): Screen | null {
        return this.view ? this.view.get(this.cursor) : null;
    }

    public advance(step: number): Screen | null {
        if(!this.view){
            return null;
        }
        this.cursor += step;
        return this.current();
    }

    public members(): Screen[] {
        return this.view ? this.view.toArray() : [];
    }
}
