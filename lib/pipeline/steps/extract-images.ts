/**
 * Image Extraction Step
 *
 * Classifies the document, picks a strategy, and turns each page into a
 * filtered list of encoded images. Returns data for the caller to persist;
 * nothing is written here.
 *
 * If the chosen strategy finds nothing in the whole document, the other
 * strategy runs once and its records are marked as backups.
 */

import { createHash } from "crypto";
import type { BBox } from "../../geometry/bbox";
import { encodeImage, extensionForFormat, type OutputFormat } from "../../images/encode";
import type { Bitmap } from "../../images/png-utils";
import type { PdfEngine } from "../../pdf/engine";
import type { ExtractOptions } from "../core/schemas";
import type {
  DocumentAnalysis,
  DocumentVerdict,
  ExtractedImage,
  ExtractHooks,
  ExtractionStrategy,
  ExtractPhase,
  ExtractResult,
  FilterState,
  ImageCandidate,
  ImageRecord,
  PageSignals,
} from "../core/types";
import { analyzeDocument, readPageSignals, resolveVerdict } from "./classify";
import { createFilterState, filterCandidates } from "./filter-candidates";
import {
  extractionMethod,
  fallbackStrategy,
  renderScale,
  selectStrategy,
  shouldSkipPage,
} from "./strategy";

export interface ExtractImagesInput<TImageRef> {
  engine: PdfEngine<TImageRef>;
  options: ExtractOptions;
}

interface EncodedCandidate extends ImageCandidate {
  contentHash: string;
  data: Buffer;
  width: number;
  height: number;
}

interface PassResult {
  records: ImageRecord[];
  images: ExtractedImage[];
}

/** Raw PNG plus what the filter needs to know about it. */
interface RawCandidate {
  bbox: BBox;
  png: Buffer;
  width: number;
  height: number;
  bitmap?: Bitmap;
}

interface PassContext<TImageRef> {
  engine: PdfEngine<TImageRef>;
  options: ExtractOptions;
  analysis: DocumentAnalysis;
  verdict: DocumentVerdict;
  state: FilterState;
  pages: number[];
  hooks: ExtractHooks;
}

export function imageFileName(
  pageIndex: number,
  indexInPage: number,
  contentHash: string,
  format: OutputFormat
): string {
  return `page_${pageIndex + 1}_image_${indexInPage + 1}_${contentHash.slice(0, 8)}.${extensionForFormat(format)}`;
}

export function hashContent(data: Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}

/**
 * Extract curated images from a document.
 *
 * @param input - Engine over an open document and validated options
 * @param hooks - Optional progress and warning callbacks
 */
export async function extractImages<TImageRef>(
  input: ExtractImagesInput<TImageRef>,
  hooks: ExtractHooks = {}
): Promise<ExtractResult> {
  const { engine, options } = input;

  const analysis = analyzeDocument(engine, { samplePages: options.samplePages }, hooks);
  const resolved = resolveVerdict(analysis.verdict, options.forceMode);
  if (resolved.warning) {
    hooks.onWarning?.({ message: resolved.warning });
  }

  const ctx: PassContext<TImageRef> = {
    engine,
    options,
    analysis,
    verdict: resolved.verdict,
    state: createFilterState(),
    pages: pageRange(analysis.pageCount, options.startPage, options.endPage),
    hooks,
  };

  const strategy = selectStrategy(resolved.verdict);
  let pass = await runPass(ctx, strategy, false);
  let usedFallback = false;

  if (pass.records.length === 0) {
    const backup = fallbackStrategy(strategy);
    hooks.onWarning?.({
      message: `No images found with ${strategy}, retrying with ${backup}`,
    });
    pass = await runPass(ctx, backup, true);
    usedFallback = true;

    if (pass.records.length === 0) {
      hooks.onWarning?.({ message: "No images found" });
    }
  }

  return {
    analysis,
    verdict: resolved.verdict,
    verdictOverridden: resolved.overridden,
    strategy,
    usedFallback,
    records: pass.records,
    images: pass.images,
  };
}

// ============================================================================
// Internal helpers
// ============================================================================

const tick = () => new Promise<void>((r) => setImmediate(r));

/** 0-based indices of the requested 1-based inclusive range, clamped. */
function pageRange(pageCount: number, startPage = 1, endPage?: number): number[] {
  const start = Math.max(1, startPage) - 1;
  const end = Math.min(endPage ?? pageCount, pageCount);
  const pages: number[] = [];
  for (let i = start; i < end; i++) pages.push(i);
  return pages;
}

async function runPass<TImageRef>(
  ctx: PassContext<TImageRef>,
  strategy: ExtractionStrategy,
  fallback: boolean
): Promise<PassResult> {
  const { options, hooks, pages } = ctx;
  const phase: ExtractPhase = fallback ? "fallback" : "extract";
  const method = extractionMethod(strategy, fallback);
  const result: PassResult = { records: [], images: [] };

  for (const [position, pageIndex] of pages.entries()) {
    try {
      if (!isSkipped(ctx, pageIndex)) {
        const encoded = await encodeCandidates(ctx, collectCandidates(ctx, strategy, pageIndex), pageIndex);
        const accepted = filterCandidates(encoded, options, ctx.state);

        const pageImages = accepted.map((candidate, indexInPage): ExtractedImage => ({
          record: {
            pageIndex,
            indexInPage,
            width: candidate.width,
            height: candidate.height,
            format: options.outputFormat,
            sizeBytes: candidate.data.length,
            contentHash: candidate.contentHash,
            bbox: candidate.bbox,
            extractionMethod: method,
            fileName: imageFileName(pageIndex, indexInPage, candidate.contentHash, options.outputFormat),
          },
          data: candidate.data,
        }));

        result.records.push(...pageImages.map((image) => image.record));
        if (hooks.onImages) {
          await hooks.onImages(pageImages);
        } else {
          result.images.push(...pageImages);
        }
      }
    } catch (err) {
      hooks.onWarning?.({
        message: `Page ${pageIndex + 1} failed: ${err instanceof Error ? err.message : String(err)}`,
        page: pageIndex,
      });
    }

    hooks.onProgress?.({ phase, page: position + 1, totalPages: pages.length });

    // Yield to event loop between pages
    await tick();
  }

  return result;
}

function isSkipped<TImageRef>(ctx: PassContext<TImageRef>, pageIndex: number): boolean {
  if (!ctx.options.skipTextOnlyPages) return false;
  const signals: PageSignals =
    ctx.analysis.pages.find((p) => p.pageIndex === pageIndex) ??
    readPageSignals(ctx.engine, pageIndex);
  return shouldSkipPage(ctx.verdict, ctx.options.skipTextOnlyPages, signals);
}

function collectCandidates<TImageRef>(
  ctx: PassContext<TImageRef>,
  strategy: ExtractionStrategy,
  pageIndex: number
): RawCandidate[] {
  const { engine, options, hooks } = ctx;

  if (strategy === "page-raster") {
    const rendered = engine.renderPage(pageIndex, renderScale(options.dpi));
    return [
      {
        bbox: engine.pageBounds(pageIndex),
        png: rendered.encoded,
        width: rendered.width,
        height: rendered.height,
      },
    ];
  }

  const candidates: RawCandidate[] = [];
  engine.pageImageObjects(pageIndex).forEach((object, i) => {
    try {
      const decoded = engine.decodeImage(object.ref);
      candidates.push({
        bbox: object.bbox,
        png: decoded.encoded,
        width: decoded.width,
        height: decoded.height,
        bitmap: decoded.bitmap,
      });
    } catch (err) {
      hooks.onWarning?.({
        message: `Image ${i + 1} on page ${pageIndex + 1} could not be decoded: ${err instanceof Error ? err.message : String(err)}`,
        page: pageIndex,
      });
    }
  });
  return candidates;
}

async function encodeCandidates<TImageRef>(
  ctx: PassContext<TImageRef>,
  raw: RawCandidate[],
  pageIndex: number
): Promise<EncodedCandidate[]> {
  const encoded: EncodedCandidate[] = [];
  for (const candidate of raw) {
    try {
      const data = await encodeImage(candidate.png, ctx.options.outputFormat);
      encoded.push({
        pageIndex,
        bbox: candidate.bbox,
        bitmap: candidate.bitmap,
        contentHash: hashContent(data),
        data,
        width: candidate.width,
        height: candidate.height,
      });
    } catch (err) {
      ctx.hooks.onWarning?.({
        message: `Image on page ${pageIndex + 1} could not be encoded: ${err instanceof Error ? err.message : String(err)}`,
        page: pageIndex,
      });
    }
  }
  return encoded;
}
