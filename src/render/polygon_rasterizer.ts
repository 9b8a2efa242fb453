import type { GrayImage } from "../formats/gray_image.ts";
import { createGrayImage } from "../formats/gray_image.ts";
import { rgbaToGray } from "../raster/grayscale.ts";
import type { Candidate } from "../search/candidate.ts";
import { isDegenerate } from "../search/geometry.ts";
import type {
    CanvasBackend,
    CanvasRenderingContext2DLike,
    FillRule,
    ImageDataLike,
} from "./canvas_backend.ts";

/**
 * Raised when the canvas backend cannot render a candidate.
 * The original failure is kept as `cause`.
 */
export class RasterizerError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = "RasterizerError";
    }
}

export interface Rasterizer {
    readonly width: number;
    readonly height: number;
    render(candidate: Candidate): GrayImage;
}

export interface PolygonRasterizerOptions {
    width: number;
    height: number;
    fillRule?: FillRule;
}

/**
 * Renders a candidate as a solid black, anti-aliased polygon on white.
 *
 * Pixel (x, y) covers [x, x+1] × [y, y+1] in canvas space, so integer
 * vertices sit on pixel corners. The canvas is created lazily and reused for
 * every render; each render clears it first, so output depends only on the
 * candidate.
 */
export class PolygonRasterizer implements Rasterizer {
    readonly width: number;
    readonly height: number;
    private readonly backend: CanvasBackend;
    private readonly fillRule: FillRule;
    private context: CanvasRenderingContext2DLike | null = null;

    constructor(backend: CanvasBackend, options: PolygonRasterizerOptions) {
        this.backend = backend;
        this.width = options.width;
        this.height = options.height;
        this.fillRule = options.fillRule ?? "nonzero";
    }

    render(candidate: Candidate): GrayImage {
        if (candidate.length === 0) {
            throw new RasterizerError("Cannot render a candidate with no points");
        }

        // Zero-area geometry: nothing to fill
        if (isDegenerate(candidate)) {
            return createGrayImage(this.width, this.height);
        }

        const pixels = this.drawPolygon(this.getContext(), candidate);

        if (pixels.width !== this.width || pixels.height !== this.height) {
            throw new RasterizerError(
                `Canvas returned ${pixels.width}x${pixels.height} pixels, expected ${this.width}x${this.height}`,
            );
        }

        return rgbaToGray(pixels);
    }

    private drawPolygon(
        ctx: CanvasRenderingContext2DLike,
        candidate: Candidate,
    ): ImageDataLike {
        try {
            ctx.clearRect(0, 0, this.width, this.height);
            ctx.beginPath();
            ctx.moveTo(candidate[0].x, candidate[0].y);
            for (let i = 1; i < candidate.length; i++) {
                ctx.lineTo(candidate[i].x, candidate[i].y);
            }
            ctx.closePath();
            ctx.fill(this.fillRule);
            return ctx.getImageData(0, 0, this.width, this.height);
        } catch (error) {
            throw new RasterizerError(
                `Canvas backend failed to render polygon: ${error instanceof Error ? error.message : String(error)}`,
                { cause: error },
            );
        }
    }

    private getContext(): CanvasRenderingContext2DLike {
        if (this.context) return this.context;

        const context = this.openContext();
        if (!context) {
            throw new RasterizerError("Failed to get 2D context");
        }

        this.context = context;
        return context;
    }

    private openContext(): CanvasRenderingContext2DLike | null {
        try {
            return this.backend.createCanvas(this.width, this.height).getContext("2d");
        } catch (error) {
            throw new RasterizerError(
                `Failed to create ${this.width}x${this.height} canvas`,
                { cause: error },
            );
        }
    }
}
