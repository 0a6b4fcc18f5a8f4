import { bboxArea, isContained, isValidBbox, overlapRatio } from "../../geometry/bbox";
import { isBlankBitmap, pixelSimilarity } from "../../images/similarity";
import { DEFAULT_FILTER_OPTIONS, type FilterOptions } from "../core/schemas";
import type { FilterState, ImageCandidate } from "../core/types";

export function createFilterState(): FilterState {
  return { seenHashes: new Set<string>() };
}

/**
 * Reduce one page's candidates to a non-redundant set.
 *
 * Candidates are walked largest first, so a candidate is only ever rejected
 * in favour of one at least as large. Survivors come back in acceptance order.
 * `state` carries content hashes across pages of the same document; without
 * one, only this page is deduplicated.
 */
export function filterCandidates<T extends ImageCandidate>(
  candidates: T[],
  options: FilterOptions = DEFAULT_FILTER_OPTIONS,
  state: FilterState = createFilterState()
): T[] {
  const sized = candidates.filter(
    (c) => isValidBbox(c.bbox) && bboxArea(c.bbox) >= options.minSize
  );

  const nonBlank = options.discardBlank
    ? sized.filter((c) => !c.bitmap || !isBlankBitmap(c.bitmap, options.uniformThreshold))
    : sized;

  // Array.prototype.sort is stable: equal areas keep input order
  const ordered = [...nonBlank].sort((a, b) => bboxArea(b.bbox) - bboxArea(a.bbox));

  const accepted: T[] = [];
  for (const candidate of ordered) {
    if (accepted.some((kept) => isRedundant(candidate, kept, options))) continue;

    if (candidate.contentHash) {
      if (options.filterDuplicates && state.seenHashes.has(candidate.contentHash)) continue;
      state.seenHashes.add(candidate.contentHash);
    }
    accepted.push(candidate);
  }

  return accepted;
}

function isRedundant(candidate: ImageCandidate, kept: ImageCandidate, options: FilterOptions): boolean {
  if (
    options.filterContained &&
    isContained(candidate.bbox, kept.bbox, options.containmentTolerance)
  ) {
    return true;
  }

  const ratio =
    options.overlapBasis === "smaller"
      ? overlapRatio(candidate.bbox, kept.bbox)
      : overlapRatio(kept.bbox, candidate.bbox);
  if (ratio > options.overlapThreshold) return true;

  return (
    options.filterDuplicates &&
    candidate.bitmap !== undefined &&
    kept.bitmap !== undefined &&
    pixelSimilarity(candidate.bitmap, kept.bitmap) >= options.duplicateThreshold
  );
}
