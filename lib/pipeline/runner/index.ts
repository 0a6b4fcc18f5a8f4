/**
 * Pipeline Runner Module
 *
 * Provides the orchestration layer for running pure pipeline steps
 * with storage and progress tracking.
 */

export {
  type Storage,
  type RunSummary,
  type Progress,
  type StepName,
  type ProgressEvent,
  nullProgress,
  createConsoleProgress,
} from "./types";

export {
  runAnalyze,
  runExtract,
  watchExtract,
  type AnalyzeRunOptions,
  type ExtractRunOptions,
  type ExtractEvent,
} from "./document-runner";

export { createOutputStorage } from "./storage-adapter";
