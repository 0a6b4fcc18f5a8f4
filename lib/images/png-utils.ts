import { PNG } from "pngjs";

/**
 * Decoded raster. `data` is always RGBA, 4 bytes per pixel; `hasAlpha`
 * records whether the source image carried its own alpha channel.
 */
export interface Bitmap {
  width: number;
  height: number;
  hasAlpha: boolean;
  data: Buffer;
}

export function decodeBitmap(pngBuffer: Buffer): Bitmap {
  const png = PNG.sync.read(pngBuffer);
  return {
    width: png.width,
    height: png.height,
    hasAlpha: png.alpha,
    data: png.data,
  };
}

/**
 * Nearest-neighbour resample to the given size.
 */
export function resizeNearest(bitmap: Bitmap, width: number, height: number): Bitmap {
  if (bitmap.width === width && bitmap.height === height) return bitmap;

  const data = Buffer.alloc(width * height * 4);
  for (let y = 0; y < height; y++) {
    const srcY = Math.min(bitmap.height - 1, Math.floor(((y + 0.5) * bitmap.height) / height));
    for (let x = 0; x < width; x++) {
      const srcX = Math.min(bitmap.width - 1, Math.floor(((x + 0.5) * bitmap.width) / width));
      const srcOffset = (srcY * bitmap.width + srcX) * 4;
      bitmap.data.copy(data, (y * width + x) * 4, srcOffset, srcOffset + 4);
    }
  }

  return { width, height, hasAlpha: bitmap.hasAlpha, data };
}
