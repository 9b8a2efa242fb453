/**
 * Canvas backend interface
 * Lets the rasterizer run on any 2D canvas implementation (native, browser, test fake)
 */
export interface CanvasBackend {
    createCanvas(width: number, height: number): CanvasLike;
}

/**
 * Minimal canvas interface needed for polygon rendering
 */
export interface CanvasLike {
    width: number;
    height: number;
    getContext(contextId: "2d"): CanvasRenderingContext2DLike | null;
}

export type FillRule = "nonzero" | "evenodd";

/**
 * Minimal 2D context interface.
 * Fill style is left at the canvas default (opaque black).
 */
export interface CanvasRenderingContext2DLike {
    clearRect(x: number, y: number, w: number, h: number): void;
    beginPath(): void;
    moveTo(x: number, y: number): void;
    lineTo(x: number, y: number): void;
    closePath(): void;
    fill(fillRule?: FillRule): void;
    getImageData(
        sx: number,
        sy: number,
        sw: number,
        sh: number,
    ): ImageDataLike;
}

/**
 * Minimal ImageData interface
 */
export interface ImageDataLike {
    width: number;
    height: number;
    data: Uint8ClampedArray;
}
