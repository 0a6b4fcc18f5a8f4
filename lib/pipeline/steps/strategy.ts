/**
 * Extraction strategy selection.
 *
 * Vector drawings, scans and text documents are captured as whole-page
 * renders; only "digital" documents have embedded images worth cropping.
 */

import type {
  DocumentVerdict,
  ExtractionMethod,
  ExtractionStrategy,
  PageSignals,
} from "../core/types";

export const TEXT_ONLY_MAX_VECTOR_PRIMITIVES = 20;
export const TEXT_ONLY_MIN_TEXT_CHARS = 500;

/** PDF user space unit: 72 points per inch. */
export const POINTS_PER_INCH = 72;

export function selectStrategy(verdict: DocumentVerdict): ExtractionStrategy {
  return verdict === "digital" ? "object-crop" : "page-raster";
}

export function fallbackStrategy(strategy: ExtractionStrategy): ExtractionStrategy {
  return strategy === "page-raster" ? "object-crop" : "page-raster";
}

export function extractionMethod(strategy: ExtractionStrategy, fallback: boolean): ExtractionMethod {
  const base = strategy === "page-raster" ? "page_render" : "object_extraction";
  return fallback ? `backup_${base}` : base;
}

export function renderScale(dpi: number): number {
  return dpi / POINTS_PER_INCH;
}

/** No images, hardly any drawing, plenty of text. */
export function isTextOnlyPage(signals: Omit<PageSignals, "pageIndex">): boolean {
  return (
    signals.imageCount === 0 &&
    signals.vectorPrimitiveCount < TEXT_ONLY_MAX_VECTOR_PRIMITIVES &&
    signals.textCharCount > TEXT_ONLY_MIN_TEXT_CHARS
  );
}

/** Text-only pages are skipped on request, never for vector drawings. */
export function shouldSkipPage(
  verdict: DocumentVerdict,
  skipTextOnlyPages: boolean,
  signals: Omit<PageSignals, "pageIndex">
): boolean {
  return skipTextOnlyPages && verdict !== "vector" && isTextOnlyPage(signals);
}
