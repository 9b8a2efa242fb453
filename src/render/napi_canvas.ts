import { createCanvas } from "@napi-rs/canvas";

import type { CanvasBackend, CanvasLike } from "./canvas_backend.ts";

/**
 * Native canvas backend
 * Uses @napi-rs/canvas (Skia, prebuilt binaries shipped as npm packages)
 */
export class NapiCanvasBackend implements CanvasBackend {
    createCanvas(width: number, height: number): CanvasLike {
        return createCanvas(width, height);
    }
}

export function createNapiCanvasBackend(): NapiCanvasBackend {
    return new NapiCanvasBackend();
}
