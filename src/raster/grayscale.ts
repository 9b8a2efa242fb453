import { createGrayImage, type GrayImage, WHITE } from "../formats/gray_image.ts";

/**
 * RGBA pixel buffer as produced by a canvas or a PNG decoder
 * 4 bytes per pixel (Red, Green, Blue, Alpha)
 */
export interface RGBAImage {
    width: number;
    height: number;
    data: Uint8ClampedArray | Uint8Array; // length = width * height * 4
}

/**
 * Convert an RGBA image to grayscale, compositing over a white background.
 * Uses standard luminance formula: 0.299*R + 0.587*G + 0.114*B
 *
 * A transparent pixel becomes white, so a canvas that was only cleared
 * reads as background everywhere.
 */
export function rgbaToGray(img: RGBAImage): GrayImage {
    const expected = img.width * img.height * 4;
    if (img.data.length !== expected) {
        throw new Error(
            `RGBA buffer has ${img.data.length} bytes, expected ${expected} for ${img.width}x${img.height}`,
        );
    }

    const gray = createGrayImage(img.width, img.height);

    for (let i = 0; i < img.width * img.height; i++) {
        const idx = i * 4;
        const r = img.data[idx];
        const g = img.data[idx + 1];
        const b = img.data[idx + 2];
        const alpha = img.data[idx + 3] / 255;

        const luma = 0.299 * r + 0.587 * g + 0.114 * b;
        gray.data[i] = Math.round(luma * alpha + WHITE * (1 - alpha));
    }

    return gray;
}

/**
 * Expand a grayscale image into opaque RGBA (for PNG export)
 */
export function grayToRGBA(img: GrayImage): RGBAImage {
    const data = new Uint8ClampedArray(img.width * img.height * 4);

    for (let i = 0; i < img.width * img.height; i++) {
        const value = img.data[i];
        data[i * 4] = value;
        data[i * 4 + 1] = value;
        data[i * 4 + 2] = value;
        data[i * 4 + 3] = 255;
    }

    return { width: img.width, height: img.height, data };
}
