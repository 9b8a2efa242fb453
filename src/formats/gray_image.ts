/**
 * Grayscale image format
 * 1 byte per pixel, row-major, 0 = black, 255 = white
 */
export interface GrayImage {
    width: number;
    height: number;
    data: Uint8ClampedArray; // length = width * height
}

export const WHITE = 255;

/**
 * Create a grayscale image filled with a single value (white by default)
 */
export function createGrayImage(
    width: number,
    height: number,
    fill: number = WHITE,
): GrayImage {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
        throw new Error(`Invalid image size ${width}x${height}`);
    }
    const data = new Uint8ClampedArray(width * height);
    data.fill(fill);
    return { width, height, data };
}

/**
 * Get pixel value at (x, y)
 */
export function getPixelGray(img: GrayImage, x: number, y: number): number {
    return img.data[y * img.width + x];
}

/**
 * Set pixel value at (x, y)
 */
export function setPixelGray(
    img: GrayImage,
    x: number,
    y: number,
    value: number,
): void {
    img.data[y * img.width + x] = value;
}

export function cloneGrayImage(img: GrayImage): GrayImage {
    return {
        width: img.width,
        height: img.height,
        data: new Uint8ClampedArray(img.data),
    };
}

export function sameSize(a: GrayImage, b: GrayImage): boolean {
    return a.width === b.width && a.height === b.height;
}

/**
 * Pixel-for-pixel equality
 */
export function grayImagesEqual(a: GrayImage, b: GrayImage): boolean {
    if (!sameSize(a, b)) return false;
    for (let i = 0; i < a.data.length; i++) {
        if (a.data[i] !== b.data[i]) return false;
    }
    return true;
}

/**
 * Whether every pixel is background
 */
export function isBlank(img: GrayImage): boolean {
    return img.data.every((v) => v === WHITE);
}
