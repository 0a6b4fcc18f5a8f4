/**
 * Core types for the extraction pipeline.
 *
 * These types define the data structures that flow through pipeline steps.
 * They are independent of storage, UI, or any specific PDF engine.
 */

import type { BBox } from "../../geometry/bbox";
import type { Bitmap } from "../../images/png-utils";
import type { OutputFormat } from "../../images/encode";
import type { PdfMetadata } from "../../pdf/engine";

// ============================================================================
// Classification
// ============================================================================

export type DocumentVerdict = "vector" | "scanned" | "digital" | "text";

export interface PageSignals {
  pageIndex: number;
  textCharCount: number;
  imageCount: number;
  /** curves + lines + rects */
  vectorPrimitiveCount: number;
  curves: number;
  lines: number;
  rects: number;
}

export type SignalTotals = Omit<PageSignals, "pageIndex">;

export interface DocumentAnalysis {
  pageCount: number;
  sampledPages: number;
  pages: PageSignals[];
  totals: SignalTotals;
  verdict: DocumentVerdict;
  metadata: PdfMetadata;
}

// ============================================================================
// Extraction
// ============================================================================

export type ExtractionStrategy = "page-raster" | "object-crop";

export type ExtractionMethod =
  | "page_render"
  | "object_extraction"
  | "backup_page_render"
  | "backup_object_extraction";

export interface ImageCandidate {
  pageIndex: number;
  bbox: BBox;
  /** Present for object crops; whole-page renders carry none. */
  bitmap?: Bitmap;
  contentHash?: string;
}

export interface ImageRecord {
  pageIndex: number;
  indexInPage: number;
  width: number;
  height: number;
  format: OutputFormat;
  sizeBytes: number;
  contentHash: string;
  bbox: BBox;
  extractionMethod: ExtractionMethod;
  fileName: string;
}

export interface ExtractedImage {
  record: ImageRecord;
  data: Buffer;
}

export interface ExtractResult {
  analysis: DocumentAnalysis;
  verdict: DocumentVerdict;
  verdictOverridden: boolean;
  strategy: ExtractionStrategy;
  usedFallback: boolean;
  /** Every accepted image, in page order */
  records: ImageRecord[];
  /** Encoded images; empty when an `onImages` hook took them page by page */
  images: ExtractedImage[];
}

/** Content hashes accepted so far in one document run. */
export interface FilterState {
  seenHashes: Set<string>;
}

// ============================================================================
// Hooks
// ============================================================================

export type ExtractPhase = "analyze" | "extract" | "fallback";

export interface ExtractProgress {
  phase: ExtractPhase;
  /** 1-based position within the pages being processed */
  page: number;
  totalPages: number;
}

export interface ExtractWarning {
  message: string;
  /** 0-based page index, when the warning concerns one page */
  page?: number;
}

export interface ExtractHooks {
  onProgress?: (progress: ExtractProgress) => void;
  onWarning?: (warning: ExtractWarning) => void;
  /**
   * Receives each page's accepted images as soon as the page is done. When
   * set, encoded data is not kept for the result.
   */
  onImages?: (images: ExtractedImage[]) => Promise<void>;
}
