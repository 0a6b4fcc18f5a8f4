import sharp from "sharp";

export type OutputFormat = "png" | "jpeg" | "webp";

const JPEG_QUALITY = 90;
const WEBP_QUALITY = 90;

/**
 * Re-encode a PNG buffer into the requested output format.
 * PNG input is returned untouched so hashes stay stable across runs.
 */
export async function encodeImage(png: Buffer, format: OutputFormat): Promise<Buffer> {
  switch (format) {
    case "png":
      return png;
    case "jpeg":
      return sharp(png).flatten({ background: "#ffffff" }).jpeg({ quality: JPEG_QUALITY }).toBuffer();
    case "webp":
      return sharp(png).webp({ quality: WEBP_QUALITY }).toBuffer();
  }
}

export function extensionForFormat(format: OutputFormat): string {
  return format === "jpeg" ? "jpg" : format;
}
