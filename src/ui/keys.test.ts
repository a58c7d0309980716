/*
 * Copyright (C) 2026 Jagrit Gumber
 *
 * This program is free software; you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation; either version 2 of the License, or
 * (at your option) any later version.
 */

import { describe, expect, it } from "vitest";

import { KeyInterpreter } from "./keys";

const key = (text: string): Buffer => Buffer.from(text, "utf-8");

describe("KeyInterpreter", () => {
    it("maps letters to commands", () => {
        const keys = new KeyInterpreter();
        expect(keys.interpret(key("n"))).toEqual([{type: "next"}]);
        expect(keys.interpret(key("x"))).toEqual([{type: "cycleScreens"}]);
        expect(keys.interpret(key("+"))).toEqual([{type: "interval", delta: 250}]);
        expect(keys.interpret(key(","))).toEqual([{type: "stepSelected", step: -1}]);
        expect(keys.interpret(key("e"))).toEqual([{type: "purity", delta: -1}]);
        expect(keys.interpret(key(" "))).toEqual([{type: "togglePause"}]);
        expect(keys.interpret(key("\x13"))).toEqual([{type: "save"}]);
    });

    it("maps arrow keys", () => {
        const keys = new KeyInterpreter();
        expect(keys.interpret(Buffer.from([0x1b, 0x5b, 0x41]))).toEqual([{type: "select", step: -1}]);
        expect(keys.interpret(Buffer.from([0x1b, 0x5b, 0x42]))).toEqual([{type: "select", step: 1}]);
        expect(keys.interpret(Buffer.from([0x1b, 0x5b, 0x43]))).toEqual([{type: "next"}]);
        expect(keys.interpret(Buffer.from([0x1b, 0x5b, 0x44]))).toEqual([{type: "prev"}]);
    });

    it("selects screens by number from one", () => {
        expect(new KeyInterpreter().interpret(key("3"))).toEqual([{type: "selectScreen", index: 2}]);
        expect(new KeyInterpreter().interpret(key("0"))).toEqual([]);
    });

    it("quits on q, Esc and Ctrl-C", () => {
        const keys = new KeyInterpreter();
        expect(keys.interpret(key("q"))).toEqual([{type: "quit"}]);
        expect(keys.interpret(key("\x1b"))).toEqual([{type: "quit"}]);
        expect(keys.interpret(key("\x03"))).toEqual([{type: "quit"}]);
    });

    it("ignores unknown keys", () => {
        expect(new KeyInterpreter().interpret(key("z"))).toEqual([]);
    });

    it("collects a tag and toggles it on Enter", () => {
        const keys = new KeyInterpreter();

        expect(keys.interpret(key("t"))).toEqual([{type: "prompt", text: ""}]);
        keys.interpret(key("S"));
        expect(keys.interpret(key("q"))).toEqual([{type: "prompt", text: "Sq"}]);
        expect(keys.interpret(key("\x7f"))).toEqual([{type: "prompt", text: "S"}]);
        keys.interpret(key("ü"));

        expect(keys.interpret(key("\r"))).toEqual([
            {type: "prompt", text: null},
            {type: "toggleTag", tag: "Sü"}
        ]);
        expect(keys.interpret(key("n"))).toEqual([{type: "next"}]);
    });

    it("cancels tag entry on Esc", () => {
        const keys = new KeyInterpreter();
        keys.interpret(key("t"));
        keys.interpret(key("x"));

        expect(keys.interpret(key("\x1b"))).toEqual([{type: "prompt", text: null}]);
        expect(keys.interpret(key("n"))).toEqual([{type: "next"}]);
    });

    it("toggles nothing for an empty tag", () => {
        const keys = new KeyInterpreter();
        keys.interpret(key("t"));
        expect(keys.interpret(key("\r"))).toEqual([{type: "prompt", text: null}]);
    });

    it("still quits on Ctrl-C during tag entry", () => {
        const keys = new KeyInterpreter();
        keys.interpret(key("t"));
        expect(keys.interpret(key("\x03"))).toEqual([{type: "quit"}]);
    });
});
