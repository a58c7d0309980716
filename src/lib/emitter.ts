/*
 * Copyright (C) 2026 Jagrit Gumber
 *
 * This program is free software; you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation; either version 2 of the License, or
 * (at your option) any later version.
 */

export interface Disposable {
    dispose(): void;
}

export type Listener<T> = (value: T) => void;

export type Event<T> = (listener: Listener<T>) => Disposable;

/**
 * Synchronous publish/subscribe channel.
 *
 * Listeners run in subscription order, after the change that fired them has
 * completed. A listener added or removed while firing takes effect on the next
 * `fire`.
 */
export class Emitter<T> implements Disposable {

    private listeners: Listener<T>[] = [];

    public readonly event: Event<T> = (listener: Listener<T>) => {
        this.listeners = [...this.listeners, listener];
        return {
            dispose: () => {
                const index = this.listeners.indexOf(listener);
                if(index !== -1){
                    this.listeners = [...this.listeners.slice(0, index), ...this.listeners.slice(index + 1)];
                }
            }
        };
    };

    public get size(): number {
        return this.listeners.length;
    }

    public fire(value: T): void {
        for(const listener of this.listeners){
            listener(value);
        }
    }

    public dispose(): void {
        this.listeners = [];
    }
}

export const disposeAll = (disposables: Disposable[]): void => {
    for(const disposable of disposables.splice(0)){
        disposable.dispose();
    }
};
