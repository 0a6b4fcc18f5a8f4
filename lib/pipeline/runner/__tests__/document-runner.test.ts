import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { lastValueFrom, toArray } from "rxjs";
import { closeAllDbs } from "@/lib/db";
import { DocumentOpenError, MupdfEngine } from "@/lib/pdf/mupdf-engine";
import { createTestPdf, type TestPage } from "@/lib/pdf/__tests__/create-test-pdf";
import { resolveExtractOptions } from "../../core/schemas";
import { runAnalyze, runExtract, watchExtract } from "../document-runner";
import { createOutputStorage } from "../storage-adapter";
import { nullProgress, type Progress, type ProgressEvent } from "../types";

function recorder(): Progress & { events: ProgressEvent[] } {
  const events: ProgressEvent[] = [];
  return { events, emit: (event) => events.push(event) };
}

describe("document runner", () => {
  let tmpDir: string;
  let outDir: string;

  function writePdf(pages: TestPage[]): string {
    const pdfPath = path.join(tmpDir, "survey.pdf");
    fs.writeFileSync(pdfPath, createTestPdf(pages));
    return pdfPath;
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "document-runner-test-"));
    outDir = path.join(tmpDir, "survey-images");
  });

  afterEach(() => {
    closeAllDbs();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("analyzes a document and stores the verdict", async () => {
    const pdfPath = writePdf([{ kind: "text", text: "Ground floor notes" }]);
    const storage = createOutputStorage(outDir);
    const progress = recorder();

    const analysis = await runAnalyze(pdfPath, storage, progress);

    expect(analysis.verdict).toBe("text");
    expect(progress.events.map((e) => e.type)).toEqual(["step-start", "step-progress", "step-complete"]);
    const run = await storage.getRun();
    expect(run?.verdict).toBe("text");
    expect(run?.strategy).toBeUndefined();
  });

  it("extracts page renders from a scanned document into storage", async () => {
    const pdfPath = writePdf([{ kind: "image" }]);
    const storage = createOutputStorage(outDir);
    const progress = recorder();

    const result = await runExtract(
      { pdfPath, options: resolveExtractOptions({ dpi: 72 }) },
      storage,
      progress
    );

    expect(result.verdict).toBe("scanned");
    expect(result.records).toHaveLength(1);
    expect(result.images).toEqual([]);
    expect(progress.events).toEqual([
      { type: "step-start", step: "extract" },
      { type: "step-progress", step: "extract", message: "Sampling page 1", page: 1, totalPages: 1 },
      { type: "step-progress", step: "extract", message: "Processing page 1", page: 1, totalPages: 1 },
      { type: "step-complete", step: "extract" },
    ]);

    const records = await storage.listImages();
    expect(records).toEqual(result.records);
    expect(records[0]).toMatchObject({ width: 612, height: 792, extractionMethod: "page_render" });
    expect(fs.existsSync(storage.imagePath(records[0].fileName))).toBe(true);
    expect((await storage.getRun())?.strategy).toBe("page-raster");
  });

  it("replaces the previous run's files on a re-run", async () => {
    const pdfPath = writePdf([{ kind: "image" }]);
    const storage = createOutputStorage(outDir);
    const options = resolveExtractOptions({ dpi: 72 });

    const first = await runExtract({ pdfPath, options }, storage, nullProgress);
    const second = await runExtract({ pdfPath, options }, storage, nullProgress);

    expect(second.records.map((r) => r.fileName)).toEqual(first.records.map((r) => r.fileName));
    expect(fs.readdirSync(path.join(outDir, "images"))).toHaveLength(1);
  });

  it("reports a missing document as a step error", async () => {
    const progress = recorder();
    await expect(
      runExtract(
        { pdfPath: path.join(tmpDir, "missing.pdf"), options: resolveExtractOptions() },
        createOutputStorage(outDir),
        progress
      )
    ).rejects.toBeInstanceOf(DocumentOpenError);
    expect(progress.events.at(-1)?.type).toBe("step-error");
  });

  it("streams progress events followed by the result", async () => {
    const pdfPath = writePdf([{ kind: "image" }]);
    const events = await lastValueFrom(
      watchExtract({ pdfPath, options: resolveExtractOptions({ dpi: 72 }) }, createOutputStorage(outDir)).pipe(
        toArray()
      )
    );
    const last = events[events.length - 1];
    expect(last.type).toBe("done");
    if (last.type === "done") {
      expect(last.result.records).toHaveLength(1);
    }
    expect(events[0]).toEqual({ type: "step-start", step: "extract" });
  });

  it("closes the document after each run", async () => {
    const pdfPath = writePdf([{ kind: "image" }]);
    const storage = createOutputStorage(outDir);
    const close = vi.spyOn(MupdfEngine.prototype, "close");
    try {
      await runAnalyze(pdfPath, storage, nullProgress);
      expect(close).toHaveBeenCalledTimes(1);

      await runExtract({ pdfPath, options: resolveExtractOptions({ dpi: 72 }) }, storage, nullProgress);
      expect(close).toHaveBeenCalledTimes(2);
    } finally {
      close.mockRestore();
    }
  });

  it("closes the document when a run fails", async () => {
    const pdfPath = writePdf([{ kind: "image" }]);
    const storage = createOutputStorage(outDir);
    vi.spyOn(storage, "putRun").mockRejectedValueOnce(new Error("disk full"));
    const close = vi.spyOn(MupdfEngine.prototype, "close");
    const progress = recorder();
    try {
      await expect(
        runExtract({ pdfPath, options: resolveExtractOptions({ dpi: 72 }) }, storage, progress)
      ).rejects.toThrow("disk full");
      expect(close).toHaveBeenCalledTimes(1);
      expect(progress.events.at(-1)).toEqual({ type: "step-error", step: "extract", error: "disk full" });
    } finally {
      close.mockRestore();
    }
  });
});
