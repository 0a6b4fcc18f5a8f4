/**
 * Vector primitive counting over mupdf's SVG rendering of a page.
 *
 * Each sub-path of a `<path>` is classified the way a PDF drawing is usually
 * bucketed: a single straight segment is a line, a closed axis-aligned
 * quadrilateral is a rect, anything else (curved or multi-segment) is a curve.
 */

import type { VectorPrimitiveCounts } from "./engine";

type Point = [number, number];

export interface SubPath {
  points: Point[];
  segments: number;
  curved: boolean;
  closed: boolean;
}

const EPSILON = 1e-3;

/** Arguments per segment; the last two are always the end point. */
const CURVE_ARG_COUNTS: Record<string, number> = { C: 6, S: 4, Q: 4, T: 2, A: 7 };

/** Regions of the document that define geometry without painting it. */
const NON_PAINTING_BLOCKS = /<(defs|clipPath|mask|symbol)\b[\s\S]*?<\/\1>/gi;

export function emptyCounts(): VectorPrimitiveCounts {
  return { curves: 0, lines: 0, rects: 0 };
}

export function countSvgPrimitives(svg: string): VectorPrimitiveCounts {
  const counts = emptyCounts();
  const painted = svg.replace(NON_PAINTING_BLOCKS, "");

  const pathRegex = /<path\b[^>]*?\sd="([^"]*)"/gi;
  let match;
  while ((match = pathRegex.exec(painted)) !== null) {
    addPathCounts(counts, match[1]);
  }

  counts.rects += (painted.match(/<rect\b/gi) ?? []).length;
  counts.lines += (painted.match(/<line\b/gi) ?? []).length;
  counts.curves += (painted.match(/<(polyline|polygon|circle|ellipse)\b/gi) ?? []).length;

  return counts;
}

function addPathCounts(counts: VectorPrimitiveCounts, d: string): void {
  for (const sub of parseSubPaths(d)) {
    if (sub.curved) {
      counts.curves++;
    } else if (isRect(sub)) {
      counts.rects++;
    } else if (sub.segments === 1 && !sub.closed) {
      counts.lines++;
    } else if (sub.segments > 0) {
      counts.curves++;
    }
  }
}

function isRect(sub: SubPath): boolean {
  const pts = [...sub.points];
  if (pts.length > 1 && samePoint(pts[0], pts[pts.length - 1])) pts.pop();
  if (pts.length !== 4) return false;
  if (!sub.closed && !samePoint(sub.points[0], sub.points[sub.points.length - 1])) return false;

  for (let i = 0; i < 4; i++) {
    const [ax, ay] = pts[i];
    const [bx, by] = pts[(i + 1) % 4];
    const horizontal = Math.abs(ay - by) < EPSILON;
    const vertical = Math.abs(ax - bx) < EPSILON;
    if (horizontal === vertical) return false;
  }
  return true;
}

function samePoint(a: Point, b: Point): boolean {
  return Math.abs(a[0] - b[0]) < EPSILON && Math.abs(a[1] - b[1]) < EPSILON;
}

/**
 * Split a path `d` attribute into sub-paths, resolving relative commands.
 */
export function parseSubPaths(d: string): SubPath[] {
  const subPaths: SubPath[] = [];
  let current: SubPath | null = null;
  let x = 0;
  let y = 0;
  let startX = 0;
  let startY = 0;

  const begin = () => {
    current = { points: [[x, y]], segments: 0, curved: false, closed: false };
    subPaths.push(current);
    return current;
  };
  const ensure = (): SubPath => current ?? begin();

  const commands = d.match(/[MLHVCSQTAZ][^MLHVCSQTAZ]*/gi);
  if (!commands) return subPaths;

  for (const cmd of commands) {
    const type = cmd[0];
    const relative = type !== type.toUpperCase();
    const args = (cmd.slice(1).match(/-?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/g) ?? []).map(parseFloat);

    switch (type.toUpperCase()) {
      case "M":
        for (let i = 0; i + 1 < args.length; i += 2) {
          x = relative ? x + args[i] : args[i];
          y = relative ? y + args[i + 1] : args[i + 1];
          if (i === 0) {
            startX = x;
            startY = y;
            begin();
          } else {
            // Extra pairs after a moveto are implicit linetos
            const sub = ensure();
            sub.points.push([x, y]);
            sub.segments++;
          }
        }
        break;

      case "L":
        for (let i = 0; i + 1 < args.length; i += 2) {
          x = relative ? x + args[i] : args[i];
          y = relative ? y + args[i + 1] : args[i + 1];
          const sub = ensure();
          sub.points.push([x, y]);
          sub.segments++;
        }
        break;

      case "H":
        for (const arg of args) {
          x = relative ? x + arg : arg;
          const sub = ensure();
          sub.points.push([x, y]);
          sub.segments++;
        }
        break;

      case "V":
        for (const arg of args) {
          y = relative ? y + arg : arg;
          const sub = ensure();
          sub.points.push([x, y]);
          sub.segments++;
        }
        break;

      case "C":
      case "S":
      case "Q":
      case "T":
      case "A": {
        const stride = CURVE_ARG_COUNTS[type.toUpperCase()] ?? 2;
        for (let i = 0; i + stride - 1 < args.length; i += stride) {
          x = relative ? x + args[i + stride - 2] : args[i + stride - 2];
          y = relative ? y + args[i + stride - 1] : args[i + stride - 1];
          const sub = ensure();
          sub.points.push([x, y]);
          sub.segments++;
          sub.curved = true;
        }
        break;
      }

      case "Z": {
        const sub = ensure();
        sub.closed = true;
        x = startX;
        y = startY;
        current = null;
        break;
      }
    }
  }

  return subPaths;
}
