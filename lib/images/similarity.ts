/**
 * Pixel-level comparison heuristics for candidate images.
 *
 * These are deliberately coarse: exact pixel equality after an optional
 * nearest-neighbour resample. Callers compare against generous thresholds.
 */

import { resizeNearest, type Bitmap } from "./png-utils";

export type PixelTest = (r: number, g: number, b: number) => boolean;

export const DEFAULT_UNIFORM_THRESHOLD = 0.95;

export const isNearWhite: PixelTest = (r, g, b) => r > 240 && g > 240 && b > 240;

export const isNearBlack: PixelTest = (r, g, b) => r < 15 && g < 15 && b < 15;

/**
 * Fraction of identical pixels between two bitmaps, in [0, 1].
 *
 * `b` is resampled to `a`'s size when they differ. Alpha takes part in the
 * comparison only when either side has an alpha channel.
 */
export function pixelSimilarity(a: Bitmap, b: Bitmap): number {
  const total = a.width * a.height;
  if (total === 0 || b.width * b.height === 0) return 0;

  const other = resizeNearest(b, a.width, a.height);
  const channels = a.hasAlpha || b.hasAlpha ? 4 : 3;

  let differing = 0;
  for (let i = 0; i < total; i++) {
    const o = i * 4;
    for (let c = 0; c < channels; c++) {
      if (a.data[o + c] !== other.data[o + c]) {
        differing++;
        break;
      }
    }
  }

  return 1 - differing / total;
}

export function isMostlyUniform(
  bitmap: Bitmap,
  test: PixelTest,
  threshold = DEFAULT_UNIFORM_THRESHOLD
): boolean {
  const total = bitmap.width * bitmap.height;
  if (total === 0) return false;

  let matching = 0;
  for (let i = 0; i < total; i++) {
    const o = i * 4;
    if (test(bitmap.data[o], bitmap.data[o + 1], bitmap.data[o + 2])) matching++;
  }
  return matching / total >= threshold;
}

/** Near-blank extraction artifact: almost all white or almost all black. */
export function isBlankBitmap(bitmap: Bitmap, threshold = DEFAULT_UNIFORM_THRESHOLD): boolean {
  return (
    isMostlyUniform(bitmap, isNearWhite, threshold) ||
    isMostlyUniform(bitmap, isNearBlack, threshold)
  );
}
