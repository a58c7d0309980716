/*
 * Copyright (C) 2026 Jagrit Gumber
 *
 * This program is free software; you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation; either version 2 of the License, or
 * (at your option) any later version.
 */

export type Command =
    | { type: "quit" }
    | { type: "save" }
    | { type: "next" }
    | { type: "prev" }
    | { type: "cycleScreens" }
    | { type: "interval", delta: number }
    | { type: "select", step: number }
    | { type: "selectScreen", index: number }
    | { type: "togglePause" }
    | { type: "stepSelected", step: number }
    | { type: "rating", delta: number }
    | { type: "purity", delta: number }
    | { type: "toggleTag", tag: string }
    | { type: "prompt", text: string | null };

export const intervalStep = 250;

const arrows: Record<string, Command> = {
    "1b5b41": {type: "select", step: -1},
    "1b5b42": {type: "select", step: 1},
    "1b5b43": {type: "next"},
    "1b5b44": {type: "prev"},
    "1b4f41": {type: "select", step: -1},
    "1b4f42": {type: "select", step: 1},
    "1b4f43": {type: "next"},
    "1b4f44": {type: "prev"}
};

const letters: Record<string, Command> = {
    "q": {type: "quit"},
    "\x1b": {type: "quit"},
    "\x13": {type: "save"},
    "n": {type: "next"},
    "p": {type: "prev"},
    "x": {type: "cycleScreens"},
    "+": {type: "interval", delta: intervalStep},
    "-": {type: "interval", delta: -intervalStep},
    "j": {type: "select", step: 1},
    "k": {type: "select", step: -1},
    " ": {type: "togglePause"},
    ".": {type: "stepSelected", step: 1},
    ",": {type: "stepSelected", step: -1},
    "w": {type: "rating", delta: 1},
    "s": {type: "rating", delta: -1},
    "d": {type: "purity", delta: 1},
    "e": {type: "purity", delta: -1}
};

const isPrintable = (text: string): boolean =>
    text.length > 0 && [...text].every(char => char >= " " && char !== "\x7f");

/**
 * Turns raw terminal input into commands. Each chunk is one key press, as
 * delivered by stdin in raw mode. `t` switches to tag entry until Enter or Esc.
 */
export class KeyInterpreter {

    private tagBuffer: string | null = null;

    public interpret(raw: Buffer): Command[] {
        const hex = raw.toString("hex");
        const text = raw.toString("utf-8");

        if(text === "\x03"){
            return [{type: "quit"}];
        }
        if(this.tagBuffer !== null){
            return this.edit(hex, text, this.tagBuffer);
        }

        const arrow = arrows[hex];
        if(arrow){
            return [arrow];
        }
        if(text === "t"){
            this.tagBuffer = "";
            return [{type: "prompt", text: ""}];
        }
        if(/^[1-9]$/.test(text)){
            return [{type: "selectScreen", index: Number(text) - 1}];
        }
        const command = Object.prototype.hasOwnProperty.call(letters, text) ? letters[text] : undefined;
        return command ? [command] : [];
    }

    private edit(hex: string, text: string, buffer: string): Command[] {
        if(hex === "1b"){
            this.tagBuffer = null;
            return [{type: "prompt", text: null}];
        }
        if(text === "\r" || text === "\n"){
            this.tagBuffer = null;
            const tag = buffer.trim();
            return tag ? [{type: "prompt", text: null}, {type: "toggleTag", tag}] : [{type: "prompt", text: null}];
        }
        if(text === "\x7f" || text === "\b"){
            this.tagBuffer = [...buffer].slice(0, -1).join("");
            return [{type: "prompt", text: this.tagBuffer}];
        }
        if(isPrintable(text)){
            this.tagBuffer = buffer + text;
            return [{type: "prompt", text: this.tagBuffer}];
        }
        return [];
    }
}
