import { describe, it, expect } from "vitest";
import { formatAnalysis, formatSummary, summarizeImages } from "../report";
import type { DocumentAnalysis, ImageRecord } from "../core/types";

function record(overrides: Partial<ImageRecord>): ImageRecord {
  return {
    pageIndex: 0,
    indexInPage: 0,
    width: 100,
    height: 100,
    format: "png",
    sizeBytes: 2000,
    contentHash: "0f0f0f0f",
    bbox: [0, 0, 100, 100],
    extractionMethod: "object_extraction",
    fileName: "page_1_image_1_0f0f0f0f.png",
    ...overrides,
  };
}

const records = [
  record({ pageIndex: 2, sizeBytes: 102400, format: "jpeg" }),
  record({ sizeBytes: 10240 }),
  record({ indexInPage: 1 }),
];

describe("summarizeImages", () => {
  it("counts images per page in page order", () => {
    expect(summarizeImages(records).perPage).toEqual([
      [0, 2],
      [2, 1],
    ]);
  });

  it("buckets sizes at 10 KB and 100 KB", () => {
    expect(summarizeImages(records).sizes).toEqual({ small: 1, medium: 1, large: 1 });
  });

  it("counts formats and methods", () => {
    const summary = summarizeImages(records);
    expect(summary.total).toBe(3);
    expect(summary.formats).toEqual([
      ["jpeg", 1],
      ["png", 2],
    ]);
    expect(summary.methods).toEqual([["object_extraction", 3]]);
  });
});

describe("formatSummary", () => {
  it("prints every section with 1-based pages", () => {
    expect(formatSummary(summarizeImages(records))).toBe(
      [
        "Images: 3 on 2 pages",
        "Per page:",
        "  page 1: 2",
        "  page 3: 1",
        "Formats:",
        "  jpeg: 1",
        "  png: 2",
        "Sizes:",
        "  <10 KB: 1",
        "  10-100 KB: 1",
        "  >100 KB: 1",
        "Methods:",
        "  object_extraction: 3",
      ].join("\n")
    );
  });

  it("prints a single line when nothing was extracted", () => {
    expect(formatSummary(summarizeImages([]))).toBe("Images: 0 on 0 pages");
  });
});

describe("formatAnalysis", () => {
  it("prints totals and the verdict", () => {
    const totals = { textCharCount: 140, imageCount: 2, vectorPrimitiveCount: 12, curves: 3, lines: 7, rects: 2 };
    const analysis: DocumentAnalysis = {
      pageCount: 8,
      sampledPages: 3,
      pages: [],
      totals,
      verdict: "digital",
      metadata: { title: "Annual review" },
    };
    expect(formatAnalysis(analysis)).toBe(
      [
        "Title: Annual review",
        "Pages: 8 (sampled 3)",
        "Text characters: 140",
        "Embedded images: 2",
        "Vector primitives: 12 (curves 3, lines 7, rects 2)",
        "Verdict: digital",
      ].join("\n")
    );
  });
});
