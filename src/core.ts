/*
 * Copyright (C) 2026 Jagrit Gumber
 *
 * This program is free software; you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation; either version 2 of the License, or
 * (at your option) any later version.
 */

import { AppConfig } from "./config";
import { formatQuery } from "./filter/query";
import { Disposable, disposeAll } from "./lib/emitter";
import { StartupError, UsageError } from "./lib/errors";
import { logInfo, onLogMessage } from "./lib/log";
import { Monitor } from "./models/screen";
import { PersistenceReconciler } from "./state/reconciler";
import { JsonFileStore } from "./state/store";
import { StoreSnapshot, WallpaperStore } from "./state/types";
import { BackgroundRenderer, CommandRenderer } from "./services/background";
import { WallpaperLibrary } from "./services/library";
import { SweepResult, sweepInvalidPaths } from "./services/maintenance";
import { MonitorSource, VirtualMonitors, XrandrMonitors } from "./services/monitors";
import { RotationLoop } from "./services/rotation";
import { ScreenController } from "./services/screens";
import { Display, TerminalDisplay, TerminalOutput } from "./ui/display";
import { KeyInterpreter } from "./ui/keys";

export type KeyInput = {
    isTTY?: boolean,
    setRawMode?(mode: boolean): unknown,
    on(event: "data", listener: (chunk: Buffer) => void): unknown,
    off(event: "data", listener: (chunk: Buffer) => void): unknown,
    resume(): unknown,
    pause(): unknown
};

/** Everything the rotation talks to outside the process. Tests swap these out. */
export type CoreServices = {
    store: WallpaperStore,
    monitors: MonitorSource,
    renderer: BackgroundRenderer,
    input: KeyInput,
    output: TerminalOutput,
    display?: Display,
    pathExists?: (path: string) => boolean,
    clock?: () => number
};

export const defaultServices = (config: AppConfig): CoreServices => ({
    store: new JsonFileStore(config.store),
    monitors: config.screens === null ? new XrandrMonitors() : new VirtualMonitors(config.screens),
    renderer: new CommandRenderer(config.renderer),
    input: process.stdin,
    output: process.stdout
});

const readStore = (store: WallpaperStore): StoreSnapshot => {
    try{
        return store.readAll();
    }catch(error){
        throw new StartupError(`Cannot read store '${store.path}'`, {cause: error});
    }
};

const detectMonitors = async (source: MonitorSource): Promise<Monitor[]> => {
    let monitors: Monitor[];
    try{
        monitors = await source.detect();
    }catch(error){
        throw new StartupError("Cannot detect monitors", {cause: error});
    }
    if(monitors.length === 0){
        throw new StartupError("No screens found.");
    }
    return monitors;
};

/** Loads the store and the sources, then rotates until quit, SIGINT or SIGTERM. */
export const runRotation = async (config: AppConfig, services: CoreServices): Promise<void> => {
    const {store, input} = services;
    const snapshot = readStore(store);
    if(config.sources.length === 0 && Object.keys(snapshot.wallpapers).length === 0){
        throw new UsageError(`No sources given and '${store.path}' holds no wallpapers`);
    }

    const reconciler = new PersistenceReconciler();
    reconciler.observe(snapshot);

    const subscriptions: Disposable[] = [];
    const library = WallpaperLibrary.load(snapshot, {
        sources: config.sources,
        query: config.query,
        shuffle: config.shuffle
    });
    subscriptions.push(library);

    try{
        if(library.pool.length === 0){
            throw new StartupError(`No wallpapers match '${config.queryText}'`);
        }
        const monitors = await detectMonitors(services.monitors);
        const controller = new ScreenController(monitors, library.pool, {
            renderer: services.renderer,
            pathExists: services.pathExists
        });
        subscriptions.push(controller);
        logInfo("core", `${library.pool.length} wallpapers matching ${formatQuery(config.query)} on ${monitors.length} screens`);

        const display = services.display ?? new TerminalDisplay(controller.screens, library.pool.length, config.intervalMs, services.output);
        for(const screen of controller.screens){
            subscriptions.push(screen.onDidChange(({attribute}) => {
                if(attribute === "wallpaper"){
                    display.wallpaperChanged(screen.currentWallpaper);
                }else{
                    display.screenChanged(screen);
                }
            }));
        }
        subscriptions.push(onLogMessage(({level, message}) => display.status(level === "error" ? `Error: ${message}` : message)));

        const loop = new RotationLoop({
            controller,
            dirty: library.dirty,
            store,
            reconciler,
            display,
            intervalMs: config.intervalMs,
            clock: services.clock
        });
        subscriptions.push(loop);

        const keys = new KeyInterpreter();
        const onData = (chunk: Buffer): void => {
            for(const command of keys.interpret(chunk)){
                loop.push(command);
            }
        };
        const onSignal = (): void => loop.stop();

        process.on("SIGINT", onSignal);
        process.on("SIGTERM", onSignal);
        input.on("data", onData);
        if(input.isTTY){
            input.setRawMode?.(true);
        }
        input.resume();

        try{
            display.open();
            controller.showWallpapers();
            await loop.run();
        }finally{
            if(input.isTTY){
                input.setRawMode?.(false);
            }
            input.off("data", onData);
            input.pause();
            process.off("SIGINT", onSignal);
            process.off("SIGTERM", onSignal);
            display.close();
            await controller.whenRendered();
        }
    }finally{
        disposeAll(subscriptions);
    }
};

/** Removes paths that no longer point to files from every stored wallpaper. */
export const runMaintenance = (config: AppConfig, store: WallpaperStore = new JsonFileStore(config.store), exists?: (path: string) => boolean): SweepResult => {
    const snapshot = readStore(store);
    const reconciler = new PersistenceReconciler();
    reconciler.observe(snapshot);

    const library = WallpaperLibrary.load(snapshot, {
        sources: [],
        query: {kind: "constant", value: true},
        shuffle: false
    });
    try{
        return sweepInvalidPaths(library.all(), library.dirty, store, reconciler, exists);
    }finally{
        library.dispose();
    }
};
