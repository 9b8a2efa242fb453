/**
 * Text visualization of rasters for terminals and test failure messages.
 * Darker pixels map to denser glyphs.
 */

import type { GrayImage } from "../formats/gray_image.ts";

// Light to dark
const SHADES = " .:-=+*#%@";

export function shadeFor(value: number): string {
    const level = Math.round(((255 - value) / 255) * (SHADES.length - 1));
    return SHADES[Math.min(SHADES.length - 1, Math.max(0, level))];
}

/**
 * One string per raster row, two glyphs per pixel so the aspect looks square
 */
export function showRaster(img: GrayImage): string[] {
    const lines: string[] = [];
    for (let y = 0; y < img.height; y++) {
        let line = "";
        for (let x = 0; x < img.width; x++) {
            const glyph = shadeFor(img.data[y * img.width + x]);
            line += glyph + glyph;
        }
        lines.push(`|${line}|`);
    }
    return lines;
}

/**
 * Side-by-side view of two same-height rasters (e.g. target and best candidate)
 */
export function showSideBySide(left: GrayImage, right: GrayImage, gap = "   "): string[] {
    const a = showRaster(left);
    const b = showRaster(right);
    const rows = Math.max(a.length, b.length);
    const blank = " ".repeat(left.width * 2 + 2);

    const lines: string[] = [];
    for (let i = 0; i < rows; i++) {
        lines.push(`${a[i] ?? blank}${gap}${b[i] ?? ""}`);
    }
    return lines;
}
