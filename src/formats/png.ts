import { readFile, writeFile } from "node:fs/promises";
import { PNG } from "pngjs";

import type { GrayImage } from "./gray_image.ts";
import { grayToRGBA, rgbaToGray } from "../raster/grayscale.ts";

/**
 * Decode PNG bytes into a grayscale image using pngjs (pure JavaScript, fast)
 */
export function decodeGrayPng(bytes: Uint8Array): GrayImage {
    const png = PNG.sync.read(Buffer.from(bytes));

    return rgbaToGray({
        width: png.width,
        height: png.height,
        data: new Uint8ClampedArray(png.data),
    });
}

/**
 * Encode a grayscale image as an opaque RGBA PNG
 */
export function encodeGrayPng(img: GrayImage): Buffer {
    const rgba = grayToRGBA(img);

    const png = new PNG({ width: img.width, height: img.height });
    png.data = Buffer.from(rgba.data.buffer, rgba.data.byteOffset, rgba.data.byteLength);

    return PNG.sync.write(png);
}

/**
 * Load a PNG file as a target raster
 */
export async function loadTargetPng(filename: string): Promise<GrayImage> {
    const fileData = await readFile(filename);
    return decodeGrayPng(fileData);
}

/**
 * Save a raster as PNG for inspection
 */
export async function writeRasterPng(img: GrayImage, filename: string): Promise<void> {
    await writeFile(filename, encodeGrayPng(img));
}
