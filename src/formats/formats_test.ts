import assert from "node:assert/strict";
import { test } from "node:test";

import {
    cloneGrayImage,
    createGrayImage,
    getPixelGray,
    grayImagesEqual,
    isBlank,
    setPixelGray,
} from "./gray_image.ts";
import { decodeGrayPng, encodeGrayPng } from "./png.ts";
import { grayToRGBA, rgbaToGray } from "../raster/grayscale.ts";

test("Gray image - pixel get/set", () => {
    const img = createGrayImage(4, 3);

    setPixelGray(img, 0, 0, 0);
    setPixelGray(img, 3, 2, 128);

    assertEquals(getPixelGray(img, 0, 0), 0);
    assertEquals(getPixelGray(img, 3, 2), 128);
    assertEquals(getPixelGray(img, 1, 1), 255);
    assertEquals(img.data.length, 12);
});

test("Gray image - rejects empty or fractional sizes", () => {
    assert.throws(() => createGrayImage(0, 4), /Invalid image size 0x4/);
    assert.throws(() => createGrayImage(2.5, 4), /Invalid image size 2.5x4/);
});

test("Gray image - equality, clone and blank check", () => {
    const a = createGrayImage(2, 2);
    const b = cloneGrayImage(a);

    assert.ok(isBlank(a));
    assert.ok(grayImagesEqual(a, b));

    setPixelGray(b, 1, 0, 254);
    assert.ok(!isBlank(b));
    assert.ok(!grayImagesEqual(a, b));
    // clone does not share storage
    assertEquals(getPixelGray(a, 1, 0), 255);

    assert.ok(!grayImagesEqual(createGrayImage(2, 2), createGrayImage(4, 1)));
});

test("RGBA to gray composites over white", () => {
    const data = new Uint8ClampedArray([
        0, 0, 0, 0, // transparent -> background
        0, 0, 0, 255, // opaque black
        255, 0, 0, 255, // opaque red
        0, 0, 0, 128, // half-covered black
    ]);

    const gray = rgbaToGray({ width: 4, height: 1, data });

    assert.deepEqual(Array.from(gray.data), [255, 0, Math.round(0.299 * 255), 127]);
});

test("RGBA to gray rejects a short buffer", () => {
    assert.throws(
        () => rgbaToGray({ width: 2, height: 2, data: new Uint8ClampedArray(12) }),
        /RGBA buffer has 12 bytes, expected 16 for 2x2/,
    );
});

test("Gray to RGBA is opaque", () => {
    const img = createGrayImage(1, 1, 40);
    const rgba = grayToRGBA(img);

    assert.deepEqual(Array.from(rgba.data), [40, 40, 40, 255]);
});

test("PNG encode and decode preserve intensities", () => {
    const img = createGrayImage(3, 2);
    setPixelGray(img, 0, 0, 0);
    setPixelGray(img, 1, 0, 77);
    setPixelGray(img, 2, 1, 200);

    const decoded = decodeGrayPng(encodeGrayPng(img));

    assertEquals(decoded.width, 3);
    assertEquals(decoded.height, 2);
    assert.deepEqual(Array.from(decoded.data), [0, 77, 255, 255, 255, 200]);
});

function assertEquals<T>(actual: T, expected: T): void {
    assert.equal(actual, expected);
}
