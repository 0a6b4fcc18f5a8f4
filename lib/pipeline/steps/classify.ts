/**
 * Content Classification Step
 *
 * Reads coarse signals (text length, embedded images, vector primitives)
 * from the first few pages and maps their totals to a document verdict.
 * Pure apart from the engine reads; nothing is written anywhere.
 */

import type { PdfEngine } from "../../pdf/engine";
import { DOCUMENT_VERDICTS } from "../core/schemas";
import type {
  DocumentAnalysis,
  DocumentVerdict,
  ExtractHooks,
  PageSignals,
  SignalTotals,
} from "../core/types";

export const VECTOR_PRIMITIVE_THRESHOLD = 1000;
export const DIGITAL_TEXT_THRESHOLD = 100;
export const DEFAULT_SAMPLE_PAGES = 3;

export function readPageSignals(engine: PdfEngine, pageIndex: number): PageSignals {
  const textCharCount = engine.pageText(pageIndex).trim().length;
  const imageCount = engine.pageImageObjects(pageIndex).length;
  const { curves, lines, rects } = engine.pageVectorPrimitiveCounts(pageIndex);
  return {
    pageIndex,
    textCharCount,
    imageCount,
    vectorPrimitiveCount: curves + lines + rects,
    curves,
    lines,
    rects,
  };
}

function emptySignals(pageIndex: number): PageSignals {
  return {
    pageIndex,
    textCharCount: 0,
    imageCount: 0,
    vectorPrimitiveCount: 0,
    curves: 0,
    lines: 0,
    rects: 0,
  };
}

export function sumSignals(pages: PageSignals[]): SignalTotals {
  const totals: SignalTotals = {
    textCharCount: 0,
    imageCount: 0,
    vectorPrimitiveCount: 0,
    curves: 0,
    lines: 0,
    rects: 0,
  };
  for (const page of pages) {
    totals.textCharCount += page.textCharCount;
    totals.imageCount += page.imageCount;
    totals.vectorPrimitiveCount += page.vectorPrimitiveCount;
    totals.curves += page.curves;
    totals.lines += page.lines;
    totals.rects += page.rects;
  }
  return totals;
}

/**
 * First matching rule wins. Vector density dominates everything else, so
 * a drawing with embedded raster stamps still counts as vector.
 */
export function classifySignals(totals: SignalTotals): DocumentVerdict {
  if (totals.vectorPrimitiveCount > VECTOR_PRIMITIVE_THRESHOLD) return "vector";
  if (totals.imageCount > 0 && totals.textCharCount < DIGITAL_TEXT_THRESHOLD) return "scanned";
  if (totals.imageCount > 0) return "digital";
  return "text";
}

export interface ResolvedVerdict {
  verdict: DocumentVerdict;
  overridden: boolean;
  warning?: string;
}

function isDocumentVerdict(value: string): value is DocumentVerdict {
  return DOCUMENT_VERDICTS.some((v) => v === value);
}

/**
 * Apply a user-forced mode. Unknown modes keep the detected verdict and
 * come back with a warning instead of an error.
 */
export function resolveVerdict(detected: DocumentVerdict, forceMode?: string): ResolvedVerdict {
  if (forceMode === undefined || forceMode.trim() === "") {
    return { verdict: detected, overridden: false };
  }
  const mode = forceMode.trim().toLowerCase();
  if (!isDocumentVerdict(mode)) {
    return {
      verdict: detected,
      overridden: false,
      warning: `Unknown mode "${forceMode}", expected one of ${DOCUMENT_VERDICTS.join(", ")}; using detected mode "${detected}"`,
    };
  }
  return { verdict: mode, overridden: mode !== detected };
}

export interface AnalyzeOptions {
  samplePages?: number;
}

/**
 * Classify a document from its first `samplePages` pages. A page whose
 * signals cannot be read is reported and contributes zeros.
 */
export function analyzeDocument(
  engine: PdfEngine,
  options: AnalyzeOptions = {},
  hooks: ExtractHooks = {}
): DocumentAnalysis {
  const pageCount = engine.pageCount();
  const sampledPages = Math.min(options.samplePages ?? DEFAULT_SAMPLE_PAGES, pageCount);

  const pages: PageSignals[] = [];
  for (let i = 0; i < sampledPages; i++) {
    try {
      pages.push(readPageSignals(engine, i));
    } catch (err) {
      hooks.onWarning?.({
        message: `Could not read page ${i + 1} for analysis: ${err instanceof Error ? err.message : String(err)}`,
        page: i,
      });
      pages.push(emptySignals(i));
    }
    hooks.onProgress?.({ phase: "analyze", page: i + 1, totalPages: sampledPages });
  }

  const totals = sumSignals(pages);
  return {
    pageCount,
    sampledPages,
    pages,
    totals,
    verdict: classifySignals(totals),
    metadata: engine.metadata(),
  };
}
