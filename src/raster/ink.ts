import type { GrayImage } from "../formats/gray_image.ts";
import { WHITE } from "../formats/gray_image.ts";

/**
 * Options for deciding which pixels carry ink
 */
export interface InkOptions {
    /** Pixels strictly darker than this are ink (default 255, i.e. any non-white pixel) */
    threshold?: number;
}

export interface InkPixel {
    x: number;
    y: number;
    value: number;
}

/**
 * List every ink pixel in row-major order.
 *
 * Anti-aliased edges produce light gray pixels; with the default threshold
 * those count as ink, so the ink region covers all partially filled pixels.
 */
export function extractInk(img: GrayImage, options: InkOptions = {}): InkPixel[] {
    const { threshold = WHITE } = options;
    const ink: InkPixel[] = [];

    for (let y = 0; y < img.height; y++) {
        for (let x = 0; x < img.width; x++) {
            const value = img.data[y * img.width + x];
            if (value < threshold) {
                ink.push({ x, y, value });
            }
        }
    }

    return ink;
}

/**
 * Fraction of the image covered by ink, weighted by darkness
 */
export function inkCoverage(img: GrayImage): number {
    let total = 0;
    for (const v of img.data) {
        total += (WHITE - v) / WHITE;
    }
    return total / img.data.length;
}
