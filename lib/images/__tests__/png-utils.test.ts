import { describe, it, expect } from "vitest";
import { decodeBitmap, resizeNearest } from "../png-utils";
import { bitmapToPng, solidBitmap, stripedBitmap } from "./bitmaps";

// Minimal 1x1 white PNG (67 bytes)
const TINY_PNG = Buffer.from(
  "iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mP8/5+hHgAHggJ/PchI7wAAAABJRU5ErkJggg==",
  "base64"
);

describe("decodeBitmap", () => {
  it("reads the size of a PNG from another encoder", () => {
    const bitmap = decodeBitmap(TINY_PNG);
    expect([bitmap.width, bitmap.height]).toEqual([1, 1]);
    expect(bitmap.data.length).toBe(4);
  });

  it("rejects data that is not a PNG", () => {
    expect(() => decodeBitmap(Buffer.from("GIF89a-not-a-png-at-all"))).toThrow();
  });

  it("decodes RGB PNGs without an alpha channel", () => {
    const source = solidBitmap(4, 3, [10, 20, 30, 255]);
    const bitmap = decodeBitmap(bitmapToPng(source));
    expect(bitmap.width).toBe(4);
    expect(bitmap.height).toBe(3);
    expect(bitmap.hasAlpha).toBe(false);
    expect([...bitmap.data.subarray(0, 4)]).toEqual([10, 20, 30, 255]);
  });

  it("keeps the alpha flag for RGBA PNGs", () => {
    const bitmap = decodeBitmap(bitmapToPng(solidBitmap(2, 2, [10, 20, 30, 128], true)));
    expect(bitmap.hasAlpha).toBe(true);
    expect(bitmap.data[3]).toBe(128);
  });
});

describe("resizeNearest", () => {
  it("returns the same bitmap when the size already matches", () => {
    const bitmap = solidBitmap(3, 3, [1, 1, 1, 255]);
    expect(resizeNearest(bitmap, 3, 3)).toBe(bitmap);
  });

  it("doubles rows when upscaling", () => {
    const striped = stripedBitmap(2, 2, [0, 0, 0, 255], [255, 255, 255, 255], 1);
    const big = resizeNearest(striped, 2, 4);
    expect(big.height).toBe(4);
    const rowStart = (y: number) => big.data[y * 2 * 4];
    expect([rowStart(0), rowStart(1), rowStart(2), rowStart(3)]).toEqual([0, 0, 255, 255]);
  });
});
