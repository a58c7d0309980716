/*
 * Copyright (C) 2026 Jagrit Gumber
 *
 * This program is free software; you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation; either version 2 of the License, or
 * (at your option) any later version.
 */

import { Disposable, Emitter } from "../lib/emitter";
import { Playlist } from "./playlist";
import { Wallpaper } from "./wallpaper";

export type Monitor = {
    index: number,
    name: string,
    width: number,
    height: number,
    x: number,
    y: number
};

export type ScreenAttribute = "current" | "selected" | "paused" | "position" | "playlist" | "wallpaper";

export type ScreenChange = {
    screen: Screen,
    attribute: ScreenAttribute
};

/**
 * Rotation state of one physical monitor. Changes to the flags, to the cursor
 * and to the wallpaper currently shown are all reported through `onDidChange`.
 */
export class Screen implements Disposable {

    private readonly changed = new Emitter<ScreenChange>();
    private wallpaperSubscription: Disposable | null = null;
    private _playlist: Playlist<Wallpaper>;
    private _isCurrent = false;
    private _isSelected = false;
    private _isPaused = false;

    public readonly onDidChange = this.changed.event;

    public constructor(public readonly index: number, public readonly monitor: Monitor, playlist: Playlist<Wallpaper>){
        this._playlist = playlist;
        this.follow();
    }

    public get playlist(): Playlist<Wallpaper> {
        return this._playlist;
    }

    public get currentWallpaper(): Wallpaper {
        return this._playlist.current;
    }

    public get isCurrent(): boolean {
        return this._isCurrent;
    }

    public set isCurrent(value: boolean) {
        if(value !== this._isCurrent){
            this._isCurrent = value;
            this.changed.fire({screen: this, attribute: "current"});
        }
    }

    public get isSelected(): boolean {
        return this._isSelected;
    }

    public set isSelected(value: boolean) {
        if(value !== this._isSelected){
            this._isSelected = value;
            this.changed.fire({screen: this, attribute: "selected"});
        }
    }

    public get isPaused(): boolean {
        return this._isPaused;
    }

    public set isPaused(value: boolean) {
        if(value !== this._isPaused){
            this._isPaused = value;
            this.changed.fire({screen: this, attribute: "paused"});
        }
    }

    /**
     * Moves the cursor by `step`, then keeps moving in the same direction past
     * wallpapers that have no path left, for at most one full period.
     */
    public cycleWallpaper(step: number): Wallpaper {
        this._playlist.move(step);
        this.skipUnavailable(step < 0 ? -1 : 1, false);
        this.follow();
        this.changed.fire({screen: this, attribute: "position"});
        return this.currentWallpaper;
    }

    public nextWallpaper(): Wallpaper {
        return this.cycleWallpaper(1);
    }

    public prevWallpaper(): Wallpaper {
        return this.cycleWallpaper(-1);
    }

    /** Returns false when the whole period is unavailable. */
    public skipUnavailable(direction: 1 | -1, notify: boolean = true): boolean {
        const limit = this._playlist.partition.period;
        let moved = false;
        for(let attempt = 0; attempt < limit && !this.currentWallpaper.isAvailable; attempt++){
            this._playlist.move(direction);
            moved = true;
        }
        if(moved && notify){
            this.follow();
            this.changed.fire({screen: this, attribute: "position"});
        }
        return this.currentWallpaper.isAvailable;
    }

    public assign(playlist: Playlist<Wallpaper>): void {
        if(playlist !== this._playlist){
            this._playlist = playlist;
            this.follow();
            this.changed.fire({screen: this, attribute: "playlist"});
        }
    }

    public dispose(): void {
        this.wallpaperSubscription?.dispose();
        this.wallpaperSubscription = null;
        this.changed.dispose();
    }

    public toString(): string {
        return `screen:${this.index}`;
    }

    private follow(): void {
        this.wallpaperSubscription?.dispose();
        this.wallpaperSubscription = this.currentWallpaper.onDidChange(() =>
            this.changed.fire({screen: this, attribute: "wallpaper"})
        );
    }
}
