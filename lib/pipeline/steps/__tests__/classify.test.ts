import { describe, it, expect } from "vitest";
import {
  analyzeDocument,
  classifySignals,
  readPageSignals,
  resolveVerdict,
  sumSignals,
} from "../classify";
import type { ExtractWarning, SignalTotals } from "../../core/types";
import { solidBitmap } from "../../../images/__tests__/bitmaps";
import { FakeEngine, type FakeImage, type FakePage } from "./fake-engine";

function totals(overrides: Partial<SignalTotals>): SignalTotals {
  return {
    textCharCount: 0,
    imageCount: 0,
    vectorPrimitiveCount: 0,
    curves: 0,
    lines: 0,
    rects: 0,
    ...overrides,
  };
}

const photo: FakeImage = { bbox: [0, 0, 100, 100], bitmap: solidBitmap(4, 4, [9, 99, 199, 255]) };

describe("classifySignals", () => {
  it("classifies an empty document as text", () => {
    expect(classifySignals(totals({}))).toBe("text");
  });

  it("lets vector density win over images and text", () => {
    expect(
      classifySignals(totals({ vectorPrimitiveCount: 1001, imageCount: 3, textCharCount: 5000 }))
    ).toBe("vector");
  });

  it("needs strictly more than 1000 primitives for vector", () => {
    expect(classifySignals(totals({ vectorPrimitiveCount: 1000 }))).toBe("text");
  });

  it("treats images with little text as scanned", () => {
    expect(classifySignals(totals({ imageCount: 1, textCharCount: 99 }))).toBe("scanned");
  });

  it("treats images with text as digital", () => {
    expect(classifySignals(totals({ imageCount: 1, textCharCount: 100 }))).toBe("digital");
    expect(classifySignals(totals({ imageCount: 2, textCharCount: 4000 }))).toBe("digital");
  });

  it("treats text without images as text", () => {
    expect(classifySignals(totals({ textCharCount: 4000, vectorPrimitiveCount: 30 }))).toBe("text");
  });
});

describe("resolveVerdict", () => {
  it("keeps the detected verdict without a forced mode", () => {
    expect(resolveVerdict("digital")).toEqual({ verdict: "digital", overridden: false });
    expect(resolveVerdict("digital", "  ")).toEqual({ verdict: "digital", overridden: false });
  });

  it("applies a valid forced mode case-insensitively", () => {
    expect(resolveVerdict("text", " Vector ")).toEqual({ verdict: "vector", overridden: true });
  });

  it("does not count forcing the detected verdict as an override", () => {
    expect(resolveVerdict("scanned", "scanned")).toEqual({ verdict: "scanned", overridden: false });
  });

  it("warns about an unknown mode and keeps the detected verdict", () => {
    const resolved = resolveVerdict("scanned", "blueprint");
    expect(resolved.verdict).toBe("scanned");
    expect(resolved.overridden).toBe(false);
    expect(resolved.warning).toBe(
      'Unknown mode "blueprint", expected one of vector, scanned, digital, text; using detected mode "scanned"'
    );
  });
});

describe("readPageSignals", () => {
  it("sums primitive kinds into the vector count", () => {
    const engine = new FakeEngine([
      { text: "  Section A  \n", vectors: { curves: 2, lines: 5, rects: 1 }, images: [photo] },
    ]);
    expect(readPageSignals(engine, 0)).toEqual({
      pageIndex: 0,
      textCharCount: 9,
      imageCount: 1,
      vectorPrimitiveCount: 8,
      curves: 2,
      lines: 5,
      rects: 1,
    });
  });
});

describe("analyzeDocument", () => {
  it("samples only the first three pages", () => {
    const pages: FakePage[] = [
      { text: "a" },
      { text: "b" },
      { text: "c" },
      { images: [photo], vectors: { lines: 5000 } },
    ];
    const analysis = analyzeDocument(new FakeEngine(pages));
    expect(analysis.pageCount).toBe(4);
    expect(analysis.sampledPages).toBe(3);
    expect(analysis.pages.map((p) => p.pageIndex)).toEqual([0, 1, 2]);
    expect(analysis.totals.textCharCount).toBe(3);
    expect(analysis.verdict).toBe("text");
  });

  it("samples every page of a short document", () => {
    const analysis = analyzeDocument(new FakeEngine([{ images: [photo] }]), { samplePages: 3 });
    expect(analysis.sampledPages).toBe(1);
    expect(analysis.verdict).toBe("scanned");
  });

  it("adds signals across sampled pages before classifying", () => {
    const pages: FakePage[] = [{ vectors: { lines: 400 } }, { vectors: { curves: 400 } }, { vectors: { rects: 201 } }];
    const analysis = analyzeDocument(new FakeEngine(pages));
    expect(analysis.totals.vectorPrimitiveCount).toBe(1001);
    expect(sumSignals(analysis.pages)).toEqual(analysis.totals);
    expect(analysis.verdict).toBe("vector");
  });

  it("counts an unreadable page as zeros and warns", () => {
    const warnings: ExtractWarning[] = [];
    const analysis = analyzeDocument(
      new FakeEngine([{ broken: true }, { images: [photo], text: "x".repeat(150) }]),
      {},
      { onWarning: (w) => warnings.push(w) }
    );
    expect(analysis.pages[0].vectorPrimitiveCount).toBe(0);
    expect(analysis.verdict).toBe("digital");
    expect(warnings).toEqual([
      { message: "Could not read page 1 for analysis: page 1 is damaged", page: 0 },
    ]);
  });

  it("reports analysis progress per sampled page", () => {
    const progress: number[] = [];
    analyzeDocument(new FakeEngine([{}, {}]), {}, { onProgress: (p) => progress.push(p.page) });
    expect(progress).toEqual([1, 2]);
  });

  it("carries the document metadata", () => {
    const analysis = analyzeDocument(new FakeEngine([{}], { title: "Survey" }));
    expect(analysis.metadata).toEqual({ title: "Survey" });
  });
});
