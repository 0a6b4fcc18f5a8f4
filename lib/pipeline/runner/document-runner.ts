/**
 * Document Runner
 *
 * Opens a PDF, runs the pure steps against it and persists what they return:
 * 1. Analysis (signals + verdict)
 * 2. Image extraction (strategy, filtering, fallback)
 */

import { Observable } from "rxjs";
import type { Progress, ProgressEvent, RunSummary, StepName, Storage } from "./types";
import { MupdfEngine } from "../../pdf/mupdf-engine";
import { analyzeDocument, extractImages } from "../steps";
import type { DocumentAnalysis, ExtractHooks, ExtractPhase, ExtractResult } from "../core/types";
import type { ExtractOptions } from "../core/schemas";

const PHASE_LABELS: Record<ExtractPhase, string> = {
  analyze: "Sampling",
  extract: "Processing",
  fallback: "Retrying",
};

function hooksFor(step: StepName, progress: Progress): ExtractHooks {
  return {
    onProgress(p) {
      progress.emit({
        type: "step-progress",
        step,
        message: `${PHASE_LABELS[p.phase]} page ${p.page}`,
        page: p.page,
        totalPages: p.totalPages,
      });
    },
    onWarning(w) {
      progress.emit({ type: "step-warning", step, message: w.message, page: w.page });
    },
  };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ============================================================================
// Analyze runner
// ============================================================================

export interface AnalyzeRunOptions {
  samplePages?: number;
}

/**
 * Classify a document without extracting anything.
 */
export async function runAnalyze(
  pdfPath: string,
  storage: Storage,
  progress: Progress,
  options: AnalyzeRunOptions = {}
): Promise<DocumentAnalysis> {
  progress.emit({ type: "step-start", step: "analyze" });

  let engine: MupdfEngine | undefined;
  try {
    engine = await MupdfEngine.open(pdfPath);
    const analysis = analyzeDocument(
      engine,
      { samplePages: options.samplePages },
      hooksFor("analyze", progress)
    );

    await storage.putRun({
      pdfPath,
      analysis,
      verdict: analysis.verdict,
      verdictOverridden: false,
    });

    progress.emit({ type: "step-complete", step: "analyze" });

    return analysis;
  } catch (err) {
    progress.emit({ type: "step-error", step: "analyze", error: errorMessage(err) });
    throw err;
  } finally {
    engine?.close();
  }
}

// ============================================================================
// Extract runner
// ============================================================================

export interface ExtractRunOptions {
  pdfPath: string;
  /** Already validated, see resolveExtractOptions */
  options: ExtractOptions;
}

/**
 * Extract images from a document into storage.
 *
 * Records and files of any previous run are removed first, so a re-run on
 * the same document produces the same set of file names.
 */
export async function runExtract(
  run: ExtractRunOptions,
  storage: Storage,
  progress: Progress
): Promise<ExtractResult> {
  const { pdfPath, options } = run;

  progress.emit({ type: "step-start", step: "extract" });

  let engine: MupdfEngine | undefined;
  try {
    engine = await MupdfEngine.open(pdfPath);

    // Images are written page by page, so nothing encoded outlives its page
    await storage.clearImages();
    const result = await extractImages(
      { engine, options },
      {
        ...hooksFor("extract", progress),
        async onImages(images) {
          for (const image of images) {
            await storage.putImage(image);
          }
        },
      }
    );

    const summary: RunSummary = {
      pdfPath,
      analysis: result.analysis,
      verdict: result.verdict,
      verdictOverridden: result.verdictOverridden,
      strategy: result.strategy,
      usedFallback: result.usedFallback,
    };
    await storage.putRun(summary);

    progress.emit({ type: "step-complete", step: "extract" });

    return result;
  } catch (err) {
    progress.emit({ type: "step-error", step: "extract", error: errorMessage(err) });
    throw err;
  } finally {
    engine?.close();
  }
}

export type ExtractEvent = ProgressEvent | { type: "done"; result: ExtractResult };

/**
 * Observable form of runExtract: emits every progress event, then a single
 * `done` event carrying the result. A fatal error terminates the stream.
 */
export function watchExtract(run: ExtractRunOptions, storage: Storage): Observable<ExtractEvent> {
  return new Observable<ExtractEvent>((subscriber) => {
    const progress: Progress = {
      emit: (event) => subscriber.next(event),
    };
    runExtract(run, storage, progress).then(
      (result) => {
        subscriber.next({ type: "done", result });
        subscriber.complete();
      },
      (err: unknown) => subscriber.error(err)
    );
  });
}
