/**
 * PdfEngine backed by mupdf.
 *
 * Text comes from structured text, image placements from the structured text
 * walker with images preserved, and vector primitives from the page's SVG
 * rendering.
 */

import { readFile } from "node:fs/promises";
import mupdf, { type Document as MupdfDocument, type Image as MupdfImage } from "mupdf";
import type { BBox } from "../geometry/bbox";
import { decodeBitmap } from "../images/png-utils";
import type {
  DecodedImage,
  PageImageObject,
  PdfEngine,
  PdfMetadata,
  RenderedImage,
  VectorPrimitiveCounts,
} from "./engine";
import { countSvgPrimitives } from "./svg-primitives";

type MupdfPage = ReturnType<MupdfDocument["loadPage"]>;

export class DocumentOpenError extends Error {
  constructor(
    public readonly source: string,
    cause: unknown
  ) {
    super(
      `Cannot open PDF ${source}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = "DocumentOpenError";
  }
}

const METADATA_KEYS: [keyof PdfMetadata, string][] = [
  ["title", "info:Title"],
  ["author", "info:Author"],
  ["subject", "info:Subject"],
  ["keywords", "info:Keywords"],
  ["creator", "info:Creator"],
  ["producer", "info:Producer"],
  ["creationDate", "info:CreationDate"],
  ["modificationDate", "info:ModDate"],
  ["format", "format"],
  ["encryption", "encryption"],
];

export class MupdfEngine implements PdfEngine<MupdfImage> {
  /** Only the page in use stays loaded; the previous one is destroyed on switch. */
  private current: { index: number; page: MupdfPage } | null = null;
  private closed = false;

  private constructor(private readonly doc: MupdfDocument) {}

  static async open(pdfPath: string): Promise<MupdfEngine> {
    let buffer: Buffer;
    try {
      buffer = await readFile(pdfPath);
    } catch (err) {
      throw new DocumentOpenError(pdfPath, err);
    }
    return MupdfEngine.fromBuffer(buffer, pdfPath);
  }

  static fromBuffer(buffer: Buffer, source = "<buffer>"): MupdfEngine {
    // Suppress mupdf stderr warnings
    const origWrite = process.stderr.write;
    process.stderr.write = () => true;
    try {
      const doc = mupdf.Document.openDocument(buffer, "application/pdf");
      if (doc.countPages() < 1) {
        throw new Error("document has no pages");
      }
      return new MupdfEngine(doc);
    } catch (err) {
      throw new DocumentOpenError(source, err);
    } finally {
      process.stderr.write = origWrite;
    }
  }

  pageCount(): number {
    this.assertOpen();
    return this.doc.countPages();
  }

  metadata(): PdfMetadata {
    this.assertOpen();
    const metadata: PdfMetadata = {};
    for (const [key, mupdfKey] of METADATA_KEYS) {
      const value = this.doc.getMetaData(mupdfKey);
      if (value) {
        metadata[key] = value;
      }
    }
    return metadata;
  }

  pageBounds(pageIndex: number): BBox {
    const [x0, y0, x1, y1] = this.page(pageIndex).getBounds();
    return [x0, y0, x1, y1];
  }

  pageText(pageIndex: number): string {
    return this.page(pageIndex).toStructuredText("").asText();
  }

  pageVectorPrimitiveCounts(pageIndex: number): VectorPrimitiveCounts {
    return countSvgPrimitives(this.pageSvg(pageIndex));
  }

  pageImageObjects(pageIndex: number): PageImageObject<MupdfImage>[] {
    const objects: PageImageObject<MupdfImage>[] = [];
    this.page(pageIndex)
      .toStructuredText("preserve-images")
      .walk({
        onImageBlock(bbox, _transform, image) {
          objects.push({ bbox: [bbox[0], bbox[1], bbox[2], bbox[3]], ref: image });
        },
      });
    return objects;
  }

  renderPage(pageIndex: number, scale: number): RenderedImage {
    const pixmap = this.page(pageIndex).toPixmap(
      mupdf.Matrix.scale(scale, scale),
      mupdf.ColorSpace.DeviceRGB,
      false
    );
    return {
      encoded: Buffer.from(pixmap.asPNG()),
      width: pixmap.getWidth(),
      height: pixmap.getHeight(),
    };
  }

  decodeImage(ref: MupdfImage): DecodedImage {
    this.assertOpen();
    let pixmap = ref.toPixmap();
    const colorSpace = pixmap.getColorSpace();
    // PNG output only takes gray or RGB samples
    if (!colorSpace || !(colorSpace.isRGB() || colorSpace.isGray())) {
      pixmap = pixmap.convertToColorSpace(mupdf.ColorSpace.DeviceRGB, true);
    }
    const encoded = Buffer.from(pixmap.asPNG());
    const bitmap = decodeBitmap(encoded);
    return { encoded, width: bitmap.width, height: bitmap.height, bitmap };
  }

  /** Release the loaded page and the document. Safe to call twice. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.current?.page.destroy();
    this.current = null;
    this.doc.destroy();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error("PDF engine is closed");
    }
  }

  private page(pageIndex: number): MupdfPage {
    this.assertOpen();
    if (this.current?.index === pageIndex) {
      return this.current.page;
    }
    this.current?.page.destroy();
    this.current = null;
    const page = this.doc.loadPage(pageIndex);
    this.current = { index: pageIndex, page };
    return page;
  }

  private pageSvg(pageIndex: number): string {
    const page = this.page(pageIndex);
    const buf = new mupdf.Buffer();
    const writer = new mupdf.DocumentWriter(buf, "svg", "text=text");
    const device = writer.beginPage(page.getBounds());
    page.run(device, mupdf.Matrix.identity);
    writer.endPage();
    writer.close();
    return buf.asString();
  }
}
