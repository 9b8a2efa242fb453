import assert from "node:assert/strict";
import { test } from "node:test";

import { getPixelGray, grayImagesEqual, isBlank } from "../formats/gray_image.ts";
import { createCandidate } from "../search/candidate.ts";
import { REFERENCE_SHAPES } from "../search/shapes.ts";
import type { CanvasBackend, CanvasLike, CanvasRenderingContext2DLike } from "./canvas_backend.ts";
import { createNapiCanvasBackend } from "./napi_canvas.ts";
import { PolygonRasterizer, RasterizerError } from "./polygon_rasterizer.ts";

function createRasterizer(): PolygonRasterizer {
    return new PolygonRasterizer(createNapiCanvasBackend(), { width: 12, height: 12 });
}

/**
 * Canvas fake that records path calls and returns a fixed pixel buffer
 */
function createRecordingBackend(calls: string[], fail?: string): CanvasBackend {
    const context: CanvasRenderingContext2DLike = {
        clearRect: () => calls.push("clearRect"),
        beginPath: () => calls.push("beginPath"),
        moveTo: (x, y) => calls.push(`moveTo ${x},${y}`),
        lineTo: (x, y) => calls.push(`lineTo ${x},${y}`),
        closePath: () => calls.push("closePath"),
        fill: (rule) => {
            if (fail) throw new Error(fail);
            calls.push(`fill ${rule}`);
        },
        getImageData: (_sx, _sy, sw, sh) => ({
            width: sw,
            height: sh,
            data: new Uint8ClampedArray(sw * sh * 4),
        }),
    };
    return {
        createCanvas(width: number, height: number): CanvasLike {
            return { width, height, getContext: () => context };
        },
    };
}

test("Rasterizer: right triangle covers the upper-right half", () => {
    const raster = createRasterizer().render(REFERENCE_SHAPES.triangle.polygon);

    // Corner pixel on the diagonal is partly covered
    const corner = getPixelGray(raster, 0, 0);
    assert.ok(corner < 255 && corner > 0, `pixel (0,0) = ${corner}`);
    // Fully inside
    assert.equal(getPixelGray(raster, 11, 0), 0);
    // Fully outside
    assert.equal(getPixelGray(raster, 0, 11), 255);
    // (11,11) also straddles the diagonal
    const far = getPixelGray(raster, 11, 11);
    assert.ok(far < 255 && far > 0, `pixel (11,11) = ${far}`);
});

test("Rasterizer: same candidate renders identically", () => {
    const rasterizer = createRasterizer();
    const star = REFERENCE_SHAPES.star.polygon;

    const first = rasterizer.render(star);
    rasterizer.render(REFERENCE_SHAPES.square.polygon);
    const second = rasterizer.render(star);

    assert.ok(grayImagesEqual(first, second));
    assert.ok(grayImagesEqual(first, createRasterizer().render(star)));
});

test("Rasterizer: star has a solid core and white corners", () => {
    const raster = createRasterizer().render(REFERENCE_SHAPES.star.polygon);

    assert.equal(getPixelGray(raster, 5, 6), 0);
    assert.equal(getPixelGray(raster, 6, 7), 0);
    assert.equal(getPixelGray(raster, 0, 0), 255);
    assert.equal(getPixelGray(raster, 11, 11), 255);
    assert.equal(getPixelGray(raster, 0, 11), 255);
});

test("Rasterizer: axis-aligned square has hard edges", () => {
    const raster = createRasterizer().render(REFERENCE_SHAPES.square.polygon);

    for (let y = 0; y < 12; y++) {
        for (let x = 0; x < 12; x++) {
            const inside = x >= 3 && x < 9 && y >= 3 && y < 9;
            assert.equal(getPixelGray(raster, x, y), inside ? 0 : 255, `pixel (${x},${y})`);
        }
    }
});

test("Rasterizer: degenerate candidates render blank", () => {
    const rasterizer = createRasterizer();

    const coincident = createCandidate([{ x: 4, y: 4 }, { x: 4, y: 4 }, { x: 4, y: 4 }]);
    const collinear = createCandidate([{ x: 0, y: 0 }, { x: 5, y: 5 }, { x: 11, y: 11 }, { x: 2, y: 2 }]);
    const twoPoints = createCandidate([{ x: 1, y: 1 }, { x: 9, y: 3 }]);

    assert.ok(isBlank(rasterizer.render(coincident)));
    assert.ok(isBlank(rasterizer.render(collinear)));
    assert.ok(isBlank(rasterizer.render(twoPoints)));
});

test("Rasterizer: points outside the grid are clipped", () => {
    const raster = createRasterizer().render(
        createCandidate([{ x: -5, y: -5 }, { x: 20, y: -5 }, { x: 20, y: 20 }, { x: -5, y: 20 }]),
    );

    assert.equal(raster.width, 12);
    assert.ok(raster.data.every((v) => v === 0));
});

test("Rasterizer: traces the polygon in order and closes it", () => {
    const calls: string[] = [];
    const rasterizer = new PolygonRasterizer(createRecordingBackend(calls), { width: 2, height: 2 });

    const raster = rasterizer.render(createCandidate([{ x: 0, y: 0 }, { x: 2, y: 0 }, { x: 0, y: 2 }]));

    assert.deepEqual(calls, [
        "clearRect",
        "beginPath",
        "moveTo 0,0",
        "lineTo 2,0",
        "lineTo 0,2",
        "closePath",
        "fill nonzero",
    ]);
    // Fake returns transparent pixels, which read as background
    assert.ok(isBlank(raster));
});

test("Rasterizer: backend failures surface as RasterizerError", () => {
    const rasterizer = new PolygonRasterizer(createRecordingBackend([], "out of memory"), {
        width: 2,
        height: 2,
    });

    assert.throws(
        () => rasterizer.render(createCandidate([{ x: 0, y: 0 }, { x: 2, y: 0 }, { x: 0, y: 2 }])),
        (error: unknown) => {
            assert.ok(error instanceof RasterizerError);
            assert.match(error.message, /out of memory/);
            assert.ok(error.cause instanceof Error);
            return true;
        },
    );
});

test("Rasterizer: missing 2D context is an error", () => {
    const backend: CanvasBackend = {
        createCanvas: (width, height) => ({ width, height, getContext: () => null }),
    };
    const rasterizer = new PolygonRasterizer(backend, { width: 2, height: 2 });

    assert.throws(
        () => rasterizer.render(createCandidate([{ x: 0, y: 0 }, { x: 2, y: 0 }, { x: 0, y: 2 }])),
        RasterizerError,
    );
});

test("Rasterizer: wrong-sized image data is an error", () => {
    const calls: string[] = [];
    const backend = createRecordingBackend(calls);
    const rasterizer = new PolygonRasterizer(
        {
            createCanvas: (width, height) => {
                const canvas = backend.createCanvas(width, height);
                return {
                    width,
                    height,
                    getContext: (id) => {
                        const ctx = canvas.getContext(id);
                        if (!ctx) return null;
                        return { ...ctx, getImageData: () => ({ width: 1, height: 1, data: new Uint8ClampedArray(4) }) };
                    },
                };
            },
        },
        { width: 2, height: 2 },
    );

    assert.throws(
        () => rasterizer.render(createCandidate([{ x: 0, y: 0 }, { x: 2, y: 0 }, { x: 0, y: 2 }])),
        /Canvas returned 1x1 pixels, expected 2x2/,
    );
});
