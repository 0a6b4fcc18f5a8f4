/**
 * Zod schemas for extraction options and stored results.
 *
 * Options are merged from config.yaml and CLI flags, then validated once
 * here before any document is opened. Stored rows are validated on the way
 * back out of the database.
 */

import { z } from "zod/v4";
import type { ImageRecord } from "./types";

export const DOCUMENT_VERDICTS = ["vector", "scanned", "digital", "text"] as const;
export const OUTPUT_FORMATS = ["png", "jpeg", "webp"] as const;

const ratio = z.number().min(0).max(1);

export const filterOptionsSchema = z.object({
  minSize: z.number().min(0).default(100),
  filterContained: z.boolean().default(true),
  containmentTolerance: ratio.gt(0).default(0.9),
  overlapThreshold: ratio.default(0.8),
  overlapBasis: z.enum(["smaller", "larger"]).default("smaller"),
  filterDuplicates: z.boolean().default(true),
  duplicateThreshold: ratio.default(0.9),
  discardBlank: z.boolean().default(true),
  uniformThreshold: ratio.gt(0).default(0.95),
});

export type FilterOptions = z.infer<typeof filterOptionsSchema>;

export const extractOptionsSchema = filterOptionsSchema
  .extend({
    dpi: z.number().int().min(1).max(2400).default(300),
    skipTextOnlyPages: z.boolean().default(false),
    outputFormat: z.enum(OUTPUT_FORMATS).default("png"),
    /** Free text: an unknown mode is a warning, not a validation error. */
    forceMode: z.string().optional(),
    samplePages: z.number().int().min(1).default(3),
    startPage: z.number().int().min(1).optional(),
    endPage: z.number().int().min(1).optional(),
  })
  .refine(
    (o) => o.startPage === undefined || o.endPage === undefined || o.endPage >= o.startPage,
    { message: "endPage must not be before startPage", path: ["endPage"] }
  );

export type ExtractOptions = z.infer<typeof extractOptionsSchema>;
export type ExtractOptionsInput = z.input<typeof extractOptionsSchema>;

export const DEFAULT_EXTRACT_OPTIONS: ExtractOptions = extractOptionsSchema.parse({});
export const DEFAULT_FILTER_OPTIONS: FilterOptions = filterOptionsSchema.parse({});

export class InvalidOptionError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid options: ${issues.join("; ")}`);
    this.name = "InvalidOptionError";
  }
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.map(String).join(".")}: ${issue.message}` : issue.message
  );
}

/**
 * Merge option layers (later wins, undefined never overrides) and validate.
 */
export function resolveExtractOptions(...layers: ExtractOptionsInput[]): ExtractOptions {
  const merged: Record<string, unknown> = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) merged[key] = value;
    }
  }
  const result = extractOptionsSchema.safeParse(merged);
  if (!result.success) {
    throw new InvalidOptionError(describeIssues(result.error));
  }
  return result.data;
}

export function resolveFilterOptions(input: z.input<typeof filterOptionsSchema> = {}): FilterOptions {
  const result = filterOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidOptionError(describeIssues(result.error));
  }
  return result.data;
}

// ============================================================================
// Stored data (DB rows and JSON columns)
// ============================================================================

const bboxSchema = z.tuple([z.number(), z.number(), z.number(), z.number()]);

const signalTotalsSchema = z.object({
  textCharCount: z.number(),
  imageCount: z.number(),
  vectorPrimitiveCount: z.number(),
  curves: z.number(),
  lines: z.number(),
  rects: z.number(),
});

const pdfMetadataSchema = z.object({
  title: z.string().optional(),
  author: z.string().optional(),
  subject: z.string().optional(),
  keywords: z.string().optional(),
  creator: z.string().optional(),
  producer: z.string().optional(),
  creationDate: z.string().optional(),
  modificationDate: z.string().optional(),
  format: z.string().optional(),
  encryption: z.string().optional(),
});

export const runSummarySchema = z.object({
  pdfPath: z.string(),
  analysis: z.object({
    pageCount: z.number().int(),
    sampledPages: z.number().int(),
    pages: z.array(signalTotalsSchema.extend({ pageIndex: z.number().int() })),
    totals: signalTotalsSchema,
    verdict: z.enum(DOCUMENT_VERDICTS),
    metadata: pdfMetadataSchema,
  }),
  verdict: z.enum(DOCUMENT_VERDICTS),
  verdictOverridden: z.boolean(),
  strategy: z.enum(["page-raster", "object-crop"]).optional(),
  usedFallback: z.boolean().optional(),
});

export const imageRowSchema = z.object({
  file_name: z.string(),
  page_index: z.number().int(),
  index_in_page: z.number().int(),
  width: z.number().int(),
  height: z.number().int(),
  format: z.enum(OUTPUT_FORMATS),
  size_bytes: z.number().int(),
  content_hash: z.string(),
  bbox: z.string(),
  extraction_method: z.enum([
    "page_render",
    "object_extraction",
    "backup_page_render",
    "backup_object_extraction",
  ]),
});

export type ImageRow = z.infer<typeof imageRowSchema>;

export function fromDBImageRow(row: unknown): ImageRecord {
  const parsed = imageRowSchema.parse(row);
  return {
    pageIndex: parsed.page_index,
    indexInPage: parsed.index_in_page,
    width: parsed.width,
    height: parsed.height,
    format: parsed.format,
    sizeBytes: parsed.size_bytes,
    contentHash: parsed.content_hash,
    bbox: bboxSchema.parse(JSON.parse(parsed.bbox)),
    extractionMethod: parsed.extraction_method,
    fileName: parsed.file_name,
  };
}

export function toDBImageRow(record: ImageRecord): ImageRow {
  return {
    file_name: record.fileName,
    page_index: record.pageIndex,
    index_in_page: record.indexInPage,
    width: record.width,
    height: record.height,
    format: record.format,
    size_bytes: record.sizeBytes,
    content_hash: record.contentHash,
    bbox: JSON.stringify(record.bbox),
    extraction_method: record.extractionMethod,
  };
}
