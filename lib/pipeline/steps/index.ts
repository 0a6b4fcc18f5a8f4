/**
 * Pure pipeline step functions.
 *
 * Each step takes typed inputs and returns typed outputs. Steps read from a
 * PdfEngine but never touch storage; the runner persists what they return.
 */

export {
  analyzeDocument,
  classifySignals,
  readPageSignals,
  resolveVerdict,
  sumSignals,
  type AnalyzeOptions,
  type ResolvedVerdict,
} from "./classify";

export {
  extractionMethod,
  fallbackStrategy,
  isTextOnlyPage,
  renderScale,
  selectStrategy,
  shouldSkipPage,
} from "./strategy";

export { createFilterState, filterCandidates } from "./filter-candidates";

export {
  extractImages,
  hashContent,
  imageFileName,
  type ExtractImagesInput,
} from "./extract-images";
