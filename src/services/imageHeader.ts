/*
 * Copyright (C) 2026 Jagrit Gumber
 *
 * This program is free software; you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation; either version 2 of the License, or
 * (at your option) any later version.
 */

export type ImageFormat = "PNG" | "JPEG" | "GIF" | "BMP";

export type ImageHeader = {
    format: ImageFormat,
    width: number,
    height: number
};

const pngSignature = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

const readPng = (data: Buffer): ImageHeader | null => {
    if(data.length < 24 || !data.subarray(0, 8).equals(pngSignature) || data.toString("ascii", 12, 16) !== "IHDR"){
        return null;
    }
    return {format: "PNG", width: data.readUInt32BE(16), height: data.readUInt32BE(20)};
};

const readGif = (data: Buffer): ImageHeader | null => {
    const magic = data.toString("ascii", 0, 6);
    if(data.length < 10 || (magic !== "GIF87a" && magic !== "GIF89a")){
        return null;
    }
    return {format: "GIF", width: data.readUInt16LE(6), height: data.readUInt16LE(8)};
};

const readBmp = (data: Buffer): ImageHeader | null => {
    if(data.length < 26 || data.toString("ascii", 0, 2) !== "BM"){
        return null;
    }
    return {format: "BMP", width: Math.abs(data.readInt32LE(18)), height: Math.abs(data.readInt32LE(22))};
};

// start-of-frame markers, excluding DHT (C4), JPG (C8) and DAC (CC)
const isStartOfFrame = (marker: number): boolean =>
    marker >= 0xc0 && marker <= 0xcf && marker !== 0xc4 && marker !== 0xc8 && marker !== 0xcc;

const readJpeg = (data: Buffer): ImageHeader | null => {
    if(data.length < 4 || data[0] !== 0xff || data[1] !== 0xd8){
        return null;
    }
    let offset = 2;
    while(offset + 9 < data.length){
        if(data[offset] !== 0xff){
            return null;
        }
        const marker = data[offset + 1];
        if(marker === 0xff){
            offset++;
            continue;
        }
        if(marker === 0xd8 || marker === 0x01 || (marker >= 0xd0 && marker <= 0xd7)){
            offset += 2;
            continue;
        }
        if(isStartOfFrame(marker)){
            return {format: "JPEG", width: data.readUInt16BE(offset + 7), height: data.readUInt16BE(offset + 5)};
        }
        offset += 2 + data.readUInt16BE(offset + 2);
    }
    return null;
};

/** Format and pixel size from the first bytes of an image file, or null if unrecognized. */
export const readImageHeader = (data: Buffer): ImageHeader | null =>
    readPng(data) ?? readJpeg(data) ?? readGif(data) ?? readBmp(data);
