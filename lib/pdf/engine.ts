import type { BBox } from "../geometry/bbox";
import type { Bitmap } from "../images/png-utils";

export interface PdfMetadata {
  title?: string;
  author?: string;
  subject?: string;
  keywords?: string;
  creator?: string;
  producer?: string;
  creationDate?: string;
  modificationDate?: string;
  format?: string;
  encryption?: string;
}

export interface VectorPrimitiveCounts {
  curves: number;
  lines: number;
  rects: number;
}

/** An embedded image placement on a page. `ref` is engine-specific. */
export interface PageImageObject<TImageRef> {
  bbox: BBox;
  ref: TImageRef;
}

export interface RenderedImage {
  /** PNG bytes */
  encoded: Buffer;
  width: number;
  height: number;
}

export interface DecodedImage extends RenderedImage {
  bitmap: Bitmap;
}

/**
 * Page-level access to a parsed PDF. Page indices are 0-based.
 *
 * Everything the pipeline knows about a document goes through this
 * interface, so tests can swap in an in-memory engine.
 */
export interface PdfEngine<TImageRef = unknown> {
  pageCount(): number;
  metadata(): PdfMetadata;
  pageBounds(pageIndex: number): BBox;
  pageText(pageIndex: number): string;
  pageVectorPrimitiveCounts(pageIndex: number): VectorPrimitiveCounts;
  pageImageObjects(pageIndex: number): PageImageObject<TImageRef>[];
  /** Rasterize the whole page at `scale` pixels per point. */
  renderPage(pageIndex: number, scale: number): RenderedImage;
  decodeImage(ref: TImageRef): DecodedImage;
}
