/*
 * Copyright (C) 2026 Jagrit Gumber
 *
 * This program is free software; you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation; either version 2 of the License, or
 * (at your option) any later version.
 */

import { existsSync } from "fs";

import { CyclicPartition, mod } from "../lib/cyclic";
import { Disposable } from "../lib/emitter";
import { StartupError } from "../lib/errors";
import { logError, logInfo } from "../lib/log";
import { Playlist } from "../models/playlist";
import { Monitor, Screen } from "../models/screen";
import { Wallpaper } from "../models/wallpaper";
import { ActiveSetTracker } from "./activeSet";
import { BackgroundRenderer } from "./background";

export type ScreenControllerOptions = {
    renderer: BackgroundRenderer,
    pathExists?: (path: string) => boolean
};

/**
 * Drives rotation across all screens: which screen advances next, which one
 * the user is editing, which are paused, and what each monitor shows.
 */
export class ScreenController implements Disposable {

    public readonly screens: readonly Screen[];

    private readonly activeSet = new ActiveSetTracker();
    private readonly renderer: BackgroundRenderer;
    private readonly pathExists: (path: string) => boolean;
    private selection: number | null = null;
    private _livePaths: readonly string[] = [];
    private pendingPaths: readonly string[] | null = null;
    private isRendering = false;
    private rendering: Promise<void> = Promise.resolve();

    public constructor(monitors: readonly Monitor[], pool: readonly Wallpaper[], options: ScreenControllerOptions){
        if(monitors.length === 0){
            throw new StartupError("No screens found.");
        }
        if(pool.length === 0){
            throw new StartupError("No wallpapers found.");
        }
        this.renderer = options.renderer;
        this.pathExists = options.pathExists ?? existsSync;

        this.screens = monitors.map((monitor, index) =>
            new Screen(index, monitor, new Playlist(new CyclicPartition(pool, monitors.length, index)))
        );

        this.updateActiveScreens();
        this.select(0);
    }

    /** The screen that advanced last. */
    public get currentScreen(): Screen | null {
        return this.activeSet.current();
    }

    public get selectedScreen(): Screen | null {
        return this.selection === null ? null : this.screens[this.selection];
    }

    public get activeScreens(): Screen[] {
        return this.activeSet.members();
    }

    /** Image paths on the monitors right now, one per screen in monitor order. */
    public get livePaths(): readonly string[] {
        return this._livePaths;
    }

    /** Advances the next active screen. No-op while every screen is paused. */
    public next(): boolean {
        const current = this.activeSet.current();
        if(!current){
            return false;
        }
        current.isCurrent = false;
        const next = this.activeSet.advance(1);
        if(next){
            next.isCurrent = true;
            next.nextWallpaper();
        }
        this.showWallpapers(1);
        return true;
    }

    /** Undoes `next`: the current screen steps back, then the previous screen becomes current. */
    public prev(): boolean {
        const current = this.activeSet.current();
        if(!current){
            return false;
        }
        current.prevWallpaper();
        current.isCurrent = false;
        const previous = this.activeSet.advance(-1);
        if(previous){
            previous.isCurrent = true;
        }
        this.showWallpapers(-1);
        return true;
    }

    public select(index: number): boolean {
        if(!Number.isInteger(index) || index < 0 || index >= this.screens.length){
            return false;
        }
        const previous = this.selectedScreen;
        if(previous){
            previous.isSelected = false;
        }
        this.selection = index;
        this.screens[index].isSelected = true;
        return true;
    }

    public selectNext(): boolean {
        return this.select(mod((this.selection ?? -1) + 1, this.screens.length));
    }

    public selectPrev(): boolean {
        return this.select(mod((this.selection ?? 0) - 1, this.screens.length));
    }

    public togglePause(): boolean {
        const selected = this.selectedScreen;
        if(!selected){
            return false;
        }
        selected.isPaused = !selected.isPaused;
        this.updateActiveScreens();
        return true;
    }

    /**
     * Screen i takes over the playlist (and position) screen i + 1 had. Flags
     * stay with the monitors.
     */
    public cycleScreens(): void {
        const playlists = this.screens.map(screen => screen.playlist);
        this.screens.forEach((screen, index) => screen.assign(playlists[(index + 1) % playlists.length]));
        this.updateActiveScreens();
        this.showWallpapers();
    }

    public nextOnSelected(): boolean {
        return this.stepSelected(1);
    }

    public prevOnSelected(): boolean {
        return this.stepSelected(-1);
    }

    public adjustRating(delta: number): Wallpaper | null {
        const wallpaper = this.selectedWallpaper();
        if(wallpaper){
            wallpaper.rating += delta;
        }
        return wallpaper;
    }

    public adjustPurity(delta: number): Wallpaper | null {
        const wallpaper = this.selectedWallpaper();
        if(wallpaper){
            wallpaper.purity += delta;
        }
        return wallpaper;
    }

    public toggleTag(tag: string): Wallpaper | null {
        const wallpaper = this.selectedWallpaper();
        if(wallpaper){
            wallpaper.toggleTag(tag);
        }
        return wallpaper;
    }

    /**
     * Puts each screen's current wallpaper on its monitor. `direction` is the
     * way a screen moves on past wallpapers whose files are gone. A screen
     * with nothing to show keeps what its monitor had.
     */
    public showWallpapers(direction: 1 | -1 = 1): void {
        const paths: string[] = [];
        for(let index = 0; index < this.screens.length; index++){
            const path = this.resolvePath(this.screens[index], direction) ?? this._livePaths[index] ?? null;
            if(path === null){
                logInfo("screens", `No wallpaper with an existing file for screen ${index + 1}`);
                return;
            }
            paths.push(path);
        }
        this._livePaths = paths;
        this.pendingPaths = paths;
        if(!this.isRendering){
            this.isRendering = true;
            this.rendering = this.render();
        }
    }

    /** Settles once the latest requested composite has been applied or has failed. */
    public whenRendered(): Promise<void> {
        return this.rendering;
    }

    public dispose(): void {
        for(const screen of this.screens){
            screen.dispose();
        }
    }

    private selectedWallpaper(): Wallpaper | null {
        return this.selectedScreen?.currentWallpaper ?? null;
    }

    /** One render at a time; requests made meanwhile collapse into the latest one. */
    private async render(): Promise<void> {
        try{
            while(this.pendingPaths){
                const paths = this.pendingPaths;
                this.pendingPaths = null;
                try{
                    await this.renderer.apply(paths);
                }catch(error){
                    logError("background", "Failed to set wallpapers", error);
                }
            }
        }finally{
            this.isRendering = false;
        }
    }

    private stepSelected(step: number): boolean {
        const selected = this.selectedScreen;
        if(!selected){
            return false;
        }
        selected.cycleWallpaper(step);
        this.showWallpapers(step < 0 ? -1 : 1);
        return true;
    }

    private updateActiveScreens(): void {
        const previous = this.activeSet.current();
        if(previous){
            previous.isCurrent = false;
        }
        this.activeSet.recompute(this.screens);
        const current = this.activeSet.current();
        if(current){
            current.isCurrent = true;
        }
    }

    /** First existing file of the screen's wallpaper; missing files are dropped from the wallpaper. */
    private resolvePath(screen: Screen, direction: 1 | -1): string | null {
        const limit = screen.playlist.partition.period;
        for(let attempt = 0; attempt <= limit; attempt++){
            const wallpaper = screen.currentWallpaper;
            for(const candidate of [...wallpaper.paths]){
                if(this.pathExists(candidate)){
                    return candidate;
                }
                logInfo("screens", `${candidate} no longer exists`);
                wallpaper.invalidatePath(candidate);
            }
            if(!screen.skipUnavailable(direction)){
                return null;
            }
        }
        return null;
    }
}
