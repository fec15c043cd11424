import type { Point } from "./types";

type Vec = { x: number; y: number };

function toVec(p: Point): Vec {
  return { x: p.col, y: p.row };
}

function cross(o: Vec, a: Vec, b: Vec): number {
  return (a.x - o.x) * (b.y - o.y) - (a.y - o.y) * (b.x - o.x);
}

/**
 * Convex hull of a set of grid cells (monotone chain), counter-clockwise, collinear points dropped.
 */
export function convexHull(points: readonly Point[]): Point[] {
  const sorted = [...points].sort((a, b) => a.col - b.col || a.row - b.row);
  const unique = sorted.filter((p, i) => i === 0 || p.col !== sorted[i - 1].col || p.row !== sorted[i - 1].row);
  if (unique.length < 3) return unique;

  const lower: Point[] = [];
  for (const p of unique) {
    while (lower.length >= 2 && cross(toVec(lower[lower.length - 2]), toVec(lower[lower.length - 1]), toVec(p)) <= 0) {
      lower.pop();
    }
    lower.push(p);
  }
  const upper: Point[] = [];
  for (let i = unique.length - 1; i >= 0; i--) {
    const p = unique[i];
    while (upper.length >= 2 && cross(toVec(upper[upper.length - 2]), toVec(upper[upper.length - 1]), toVec(p)) <= 0) {
      upper.pop();
    }
    upper.push(p);
  }
  lower.pop();
  upper.pop();
  return [...lower, ...upper];
}

function distanceToSegment(p: Vec, a: Vec, b: Vec): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const lengthSq = dx * dx + dy * dy;
  const t = lengthSq === 0 ? 0 : Math.max(0, Math.min(1, ((p.x - a.x) * dx + (p.y - a.y) * dy) / lengthSq));
  return Math.hypot(p.x - (a.x + t * dx), p.y - (a.y + t * dy));
}

/**
 * Euclidean distance from a cell to the nearest edge of a hull.
 * Degenerate hulls (fewer than three vertices) have no inside, so every depth is 0.
 */
export function hullDepth(hull: readonly Point[], cell: Point): number {
  if (hull.length < 3) return 0;
  const p = toVec(cell);
  let best = Infinity;
  for (let i = 0; i < hull.length; i++) {
    best = Math.min(best, distanceToSegment(p, toVec(hull[i]), toVec(hull[(i + 1) % hull.length])));
  }
  return best;
}
