/**
 * Runner layer types.
 *
 * These interfaces define the contracts between the pure pipeline steps
 * and the infrastructure (storage, progress emission).
 */

import type {
  DocumentAnalysis,
  DocumentVerdict,
  ExtractedImage,
  ExtractionStrategy,
  ImageRecord,
} from "../core/types";

// ============================================================================
// Storage Interface
// ============================================================================

/** What a run concluded about the document, persisted next to its images. */
export interface RunSummary {
  pdfPath: string;
  analysis: DocumentAnalysis;
  verdict: DocumentVerdict;
  verdictOverridden: boolean;
  /** Absent after an analyze-only run */
  strategy?: ExtractionStrategy;
  usedFallback?: boolean;
}

/**
 * Abstract storage interface for extraction output.
 *
 * The pipeline steps don't know or care about the underlying storage.
 */
export interface Storage {
  putRun(summary: RunSummary): Promise<void>;

  getRun(): Promise<RunSummary | null>;

  /** Remove every image record and file left by a previous run */
  clearImages(): Promise<void>;

  /** Write an image file to disk and record it in the DB */
  putImage(image: ExtractedImage): Promise<void>;

  /** Records ordered by page, then by position within the page */
  listImages(): Promise<ImageRecord[]>;

  /** Absolute path of a stored image file */
  imagePath(fileName: string): string;
}

// ============================================================================
// Progress Interface
// ============================================================================

export type StepName = "analyze" | "extract";

export type ProgressEvent =
  | { type: "step-start"; step: StepName }
  | { type: "step-progress"; step: StepName; message: string; page?: number; totalPages?: number }
  | { type: "step-warning"; step: StepName; message: string; page?: number }
  | { type: "step-complete"; step: StepName }
  | { type: "step-error"; step: StepName; error: string };

/**
 * Progress emitter interface.
 *
 * Implementations can log to console, feed an observable, collect events in tests.
 */
export interface Progress {
  emit(event: ProgressEvent): void;
}

/**
 * No-op progress emitter for when progress tracking isn't needed.
 */
export const nullProgress: Progress = {
  emit: () => {},
};

/**
 * Console-based progress emitter for CLI usage.
 */
export function createConsoleProgress(): Progress {
  return {
    emit(event) {
      switch (event.type) {
        case "step-start":
          console.log(`Starting ${formatStepName(event.step)}...`);
          break;
        case "step-progress":
          if (event.page !== undefined && event.totalPages !== undefined) {
            console.log(`${formatStepName(event.step)}: ${event.message} (${event.page}/${event.totalPages})`);
          } else {
            console.log(`${formatStepName(event.step)}: ${event.message}`);
          }
          break;
        case "step-warning":
          console.warn(`Warning in ${formatStepName(event.step)}: ${event.message}`);
          break;
        case "step-complete":
          console.log(`Completed ${formatStepName(event.step)}`);
          break;
        case "step-error":
          console.error(`Error in ${formatStepName(event.step)}: ${event.error}`);
          break;
      }
    },
  };
}

function formatStepName(step: StepName): string {
  switch (step) {
    case "analyze":
      return "document analysis";
    case "extract":
      return "image extraction";
  }
}
