import type { DocumentAnalysis, ExtractionMethod, ImageRecord } from "./core/types";
import type { OutputFormat } from "../images/encode";

const KB = 1024;

export interface SizeBuckets {
  /** under 10 KB */
  small: number;
  /** 10 KB up to 100 KB */
  medium: number;
  /** 100 KB and over */
  large: number;
}

export interface ImageSummary {
  total: number;
  /** [pageIndex, count], ascending page order */
  perPage: [number, number][];
  /** first-seen order */
  formats: [OutputFormat, number][];
  methods: [ExtractionMethod, number][];
  sizes: SizeBuckets;
}

function countBy<K>(items: ImageRecord[], key: (r: ImageRecord) => K): [K, number][] {
  const counts = new Map<K, number>();
  for (const item of items) {
    const k = key(item);
    counts.set(k, (counts.get(k) ?? 0) + 1);
  }
  return [...counts];
}

export function summarizeImages(records: ImageRecord[]): ImageSummary {
  const sizes: SizeBuckets = { small: 0, medium: 0, large: 0 };
  for (const r of records) {
    const kb = r.sizeBytes / KB;
    if (kb < 10) sizes.small++;
    else if (kb < 100) sizes.medium++;
    else sizes.large++;
  }

  return {
    total: records.length,
    perPage: countBy(records, (r) => r.pageIndex).sort((a, b) => a[0] - b[0]),
    formats: countBy(records, (r) => r.format),
    methods: countBy(records, (r) => r.extractionMethod),
    sizes,
  };
}

/**
 * Plain-text report for the CLI. Pages are shown 1-based.
 */
export function formatSummary(summary: ImageSummary): string {
  const pageWord = summary.perPage.length === 1 ? "page" : "pages";
  const lines = [`Images: ${summary.total} on ${summary.perPage.length} ${pageWord}`];
  if (summary.total === 0) return lines[0];

  lines.push("Per page:");
  for (const [pageIndex, count] of summary.perPage) {
    lines.push(`  page ${pageIndex + 1}: ${count}`);
  }
  lines.push("Formats:");
  for (const [format, count] of summary.formats) {
    lines.push(`  ${format}: ${count}`);
  }
  lines.push("Sizes:");
  lines.push(`  <10 KB: ${summary.sizes.small}`);
  lines.push(`  10-100 KB: ${summary.sizes.medium}`);
  lines.push(`  >100 KB: ${summary.sizes.large}`);
  lines.push("Methods:");
  for (const [method, count] of summary.methods) {
    lines.push(`  ${method}: ${count}`);
  }
  return lines.join("\n");
}

export function formatAnalysis(analysis: DocumentAnalysis): string {
  const { totals, metadata } = analysis;
  const lines: string[] = [];
  if (metadata.title) lines.push(`Title: ${metadata.title}`);
  lines.push(`Pages: ${analysis.pageCount} (sampled ${analysis.sampledPages})`);
  lines.push(`Text characters: ${totals.textCharCount}`);
  lines.push(`Embedded images: ${totals.imageCount}`);
  lines.push(
    `Vector primitives: ${totals.vectorPrimitiveCount} (curves ${totals.curves}, lines ${totals.lines}, rects ${totals.rects})`
  );
  lines.push(`Verdict: ${analysis.verdict}`);
  return lines.join("\n");
}
