/**
 * Axis-aligned rectangle helpers.
 *
 * Boxes are `[x0, y0, x1, y1]` in page space with y growing downward.
 */

export type BBox = [number, number, number, number]; // [minX, minY, maxX, maxY]

export function bboxArea(box: BBox): number {
  const [x0, y0, x1, y1] = box;
  return Math.max(0, x1 - x0) * Math.max(0, y1 - y0);
}

export function isValidBbox(box: BBox): boolean {
  return box.every(Number.isFinite) && box[2] > box[0] && box[3] > box[1];
}

/**
 * Check if two boxes overlap. Edges that only touch do not count.
 */
export function boxesOverlap(a: BBox, b: BBox): boolean {
  return a[0] < b[2] && b[0] < a[2] && a[1] < b[3] && b[1] < a[3];
}

export function intersectionArea(a: BBox, b: BBox): number {
  if (!boxesOverlap(a, b)) return 0;
  const width = Math.min(a[2], b[2]) - Math.max(a[0], b[0]);
  const height = Math.min(a[3], b[3]) - Math.max(a[1], b[1]);
  return width * height;
}

/**
 * Fraction of `subject` covered by `other`, in [0, 1].
 *
 * Measured against the subject's own area, so a small box inside a large one
 * scores 1 while the reverse scores the area ratio. The candidate filter walks
 * largest-first and passes the smaller box as subject.
 */
export function overlapRatio(subject: BBox, other: BBox): number {
  const subjectArea = bboxArea(subject);
  if (subjectArea === 0 || bboxArea(other) === 0) return 0;
  return Math.min(1, intersectionArea(subject, other) / subjectArea);
}

/**
 * Soft containment: at least `tolerance` of `inner` lies inside `outer`.
 * Tolerates a little spill over the edge from rendering imprecision.
 */
export function isContained(inner: BBox, outer: BBox, tolerance = 0.9): boolean {
  const innerArea = bboxArea(inner);
  if (innerArea === 0) return false;
  return intersectionArea(inner, outer) / innerArea >= tolerance;
}
