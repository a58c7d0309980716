/*
 * Copyright (C) 2026 Jagrit Gumber
 *
 * This program is free software; you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation; either version 2 of the License, or
 * (at your option) any later version.
 */

import { Disposable } from "../lib/emitter";
import { logError, logInfo } from "../lib/log";
import { Wallpaper } from "../models/wallpaper";
import { DirtySet } from "../state/dirty";
import { PersistenceReconciler } from "../state/reconciler";
import { WallpaperStore } from "../state/types";
import { Command } from "../ui/keys";
import { Display } from "../ui/display";
import { formatSeconds } from "../ui/format";
import { ScreenController } from "./screens";
import { TimeoutName, Timeouts } from "./timeouts";

export const gracePeriod = 3000;
export const saveDelay = 10000;
export const saveRetryDelay = 10000;
export const initialSaveDelay = 2000;
export const minimumInterval = 250;

export type RotationLoopOptions = {
    controller: ScreenController,
    dirty: DirtySet,
    store: WallpaperStore,
    reconciler: PersistenceReconciler,
    display: Display,
    intervalMs: number,
    clock?: () => number
};

/**
 * The only place rotation state changes. Key presses are queued with `push`,
 * timeouts are kept by name, and each iteration applies one of them.
 */
export class RotationLoop implements Disposable {

    private readonly queue: Command[] = [];
    private readonly timeouts = new Timeouts();
    private readonly clock: () => number;
    private stopped = false;
    private wake: (() => void) | null = null;
    private _intervalMs: number;

    public constructor(private readonly options: RotationLoopOptions){
        this.clock = options.clock ?? Date.now;
        this._intervalMs = Math.max(minimumInterval, options.intervalMs);
    }

    public get intervalMs(): number {
        return this._intervalMs;
    }

    public get isStopped(): boolean {
        return this.stopped;
    }

    /** Deadline of a pending timeout, in clock milliseconds. */
    public deadline(name: TimeoutName): number | undefined {
        return this.timeouts.get(name);
    }

    public push(command: Command): void {
        this.queue.push(command);
        this.notify();
    }

    public stop(): void {
        this.stopped = true;
        this.notify();
    }

    /** Arms the rotation and the first save. `run` calls this itself. */
    public start(): void {
        const now = this.clock();
        this.timeouts.set("rotate", now + this._intervalMs);
        this.timeouts.set("save", now + initialSaveDelay);
        this.options.display.refresh();
    }

    public async run(): Promise<void> {
        this.start();
        while(!this.stopped){
            if(!this.step()){
                await this.sleep();
            }
        }
        this.save();
    }

    /** Applies a queued command, or else the earliest due timeout. False when there was nothing to do. */
    public step(): boolean {
        const command = this.queue.shift();
        if(command){
            this.guard(command.type, () => this.dispatch(command));
            this.options.display.refresh();
            return true;
        }

        const due = this.timeouts.takeDue(this.clock());
        if(due){
            this.guard(due, () => this.timeout(due));
            this.options.display.refresh();
            return true;
        }
        return false;
    }

    /** Flushes dirty wallpapers. On failure the save is retried later. */
    public save(): number {
        const {dirty, store, reconciler} = this.options;
        try{
            const {saved} = reconciler.save(dirty, store);
            if(saved > 0){
                logInfo("save", `Saved ${saved} wallpaper${saved === 1 ? "" : "s"} to ${store.path}`);
            }
            return saved;
        }catch(error){
            logError("save", `Failed to save ${dirty.size} wallpaper${dirty.size === 1 ? "" : "s"}`, error);
            this.timeouts.set("save", this.clock() + saveRetryDelay);
            return 0;
        }
    }

    public dispose(): void {
        this.stop();
        this.queue.length = 0;
    }

    private dispatch(command: Command): void {
        const {controller, display} = this.options;
        switch(command.type){
            case "quit":
                this.stopped = true;
                break;
            case "save":
                this.save();
                break;
            case "next":
                controller.next();
                this.resetRotation();
                break;
            case "prev":
                controller.prev();
                this.resetRotation();
                break;
            case "cycleScreens":
                controller.cycleScreens();
                this.resetRotation();
                break;
            case "interval":
                this._intervalMs = Math.max(minimumInterval, this._intervalMs + command.delta);
                display.intervalChanged(this._intervalMs);
                logInfo("rotation", `Interval is now ${formatSeconds(this._intervalMs)}s`);
                this.resetRotation();
                break;
            case "select":
                if(command.step < 0){
                    controller.selectPrev();
                }else{
                    controller.selectNext();
                }
                break;
            case "selectScreen":
                controller.select(command.index);
                break;
            case "togglePause":
                controller.togglePause();
                break;
            case "stepSelected":
                if(command.step < 0){
                    controller.prevOnSelected();
                }else{
                    controller.nextOnSelected();
                }
                this.resetRotation();
                break;
            case "rating":
                this.edited(controller.adjustRating(command.delta));
                break;
            case "purity":
                this.edited(controller.adjustPurity(command.delta));
                break;
            case "toggleTag":
                this.edited(controller.toggleTag(command.tag));
                break;
            case "prompt":
                display.prompt(command.text);
                break;
        }
    }

    private timeout(name: TimeoutName): void {
        if(name === "rotate"){
            this.options.controller.next();
            this.resetRotation();
            return;
        }
        this.save();
    }

    private resetRotation(): void {
        this.timeouts.set("rotate", this.clock() + this._intervalMs);
    }

    private edited(wallpaper: Wallpaper | null): void {
        if(!wallpaper){
            return;
        }
        const now = this.clock();
        this.timeouts.extend("rotate", now + gracePeriod);
        this.timeouts.set("save", now + saveDelay);
    }

    private guard(name: string, handler: () => void): void {
        try{
            handler();
        }catch(error){
            logError("rotation", `Failed to handle ${name}`, error);
        }
    }

    private notify(): void {
        this.wake?.();
    }

    private sleep(): Promise<void> {
        return new Promise((resolve) => {
            const deadline = this.timeouts.nextDeadline();
            let timer: NodeJS.Timeout | null = null;
            this.wake = () => {
                if(timer){
                    clearTimeout(timer);
                }
                this.wake = null;
                resolve();
            };
            if(deadline !== null){
                timer = setTimeout(() => this.notify(), Math.max(0, deadline - this.clock()));
            }
        });
    }
}
