/**
 * Goal selection.
 *
 * Ring search walks outward from the agent one Manhattan radius at a time and stops at the first
 * match. Best-cell search starts from the same ring distance but weighs every comparably-near match
 * by how deep it sits inside the convex hull of all matches, so an agent heads into the core of a
 * cluster instead of flip-flopping between two equally distant outliers.
 */
import { COMPARABLE_DISTANCE_SLACK, type Cell, HULL_DEPTH_WEIGHT } from "./constants";
import type { GridModel } from "./GridModel";
import { convexHull, hullDepth } from "./hull";
import { manhattan } from "./pathfinding";
import type { Point } from "./types";

/**
 * Every in-bounds cell at exactly `radius` Manhattan distance from `origin`, in row-major order.
 */
// Extra condition a matching cell must meet to count, e.g. being reachable
export type CellFilter = (cell: Point) => boolean;

const anyCell: CellFilter = () => true;

export function* iterRing(origin: Point, radius: number, rows: number, cols: number): Generator<Point> {
  if (radius === 0) {
    yield origin;
    return;
  }
  for (let dr = -radius; dr <= radius; dr++) {
    const row = origin.row + dr;
    if (row < 0 || row >= rows) continue;
    const dc = radius - Math.abs(dr);
    const left = origin.col - dc;
    const right = origin.col + dc;
    if (left >= 0 && left < cols) yield { row, col: left };
    if (dc !== 0 && right >= 0 && right < cols) yield { row, col: right };
  }
}

// Largest radius that can still reach a cell of the grid from `origin`
function maxRadius(origin: Point, rows: number, cols: number): number {
  return Math.max(origin.row, rows - 1 - origin.row) + Math.max(origin.col, cols - 1 - origin.col);
}

/**
 * Nearest cell of one of the target types, by Manhattan distance.
 *
 * @returns The first match in ring order, or null when the grid holds none
 */
export function findNearestCell(
  grid: GridModel,
  origin: Point,
  targets: ReadonlySet<Cell>,
  accept: CellFilter = anyCell,
): Point | null {
  if (!grid.has(targets)) return null;
  const limit = maxRadius(origin, grid.rows, grid.cols);
  for (let radius = 0; radius <= limit; radius++) {
    for (const cell of iterRing(origin, radius, grid.rows, grid.cols)) {
      if (targets.has(grid.cellAt(cell)) && accept(cell)) return cell;
    }
  }
  return null;
}

/**
 * Hull-weighted choice among the matches closest to `origin`.
 *
 * Candidates are all matches within COMPARABLE_DISTANCE_SLACK of the nearest one. Each is scored
 * `distance - HULL_DEPTH_WEIGHT * depth`, depth being its distance to the hull boundary of every
 * accepted match on the grid. The lowest score wins; equal scores keep ring order.
 */
export function findBestCell(
  grid: GridModel,
  origin: Point,
  targets: ReadonlySet<Cell>,
  accept: CellFilter = anyCell,
): Point | null {
  const nearest = findNearestCell(grid, origin, targets, accept);
  if (nearest === null) return null;

  const reach = manhattan(origin, nearest) + COMPARABLE_DISTANCE_SLACK;
  const limit = Math.min(reach, maxRadius(origin, grid.rows, grid.cols));
  const candidates: Point[] = [];
  for (let radius = manhattan(origin, nearest); radius <= limit; radius++) {
    for (const cell of iterRing(origin, radius, grid.rows, grid.cols)) {
      if (targets.has(grid.cellAt(cell)) && accept(cell)) candidates.push(cell);
    }
  }
  if (candidates.length === 1) return nearest;

  const hull = convexHull(grid.findCells(targets).filter(accept));
  let best = nearest;
  let bestScore = Infinity;
  for (const cell of candidates) {
    const score = manhattan(origin, cell) - HULL_DEPTH_WEIGHT * hullDepth(hull, cell);
    if (score < bestScore) {
      best = cell;
      bestScore = score;
    }
  }
  return best;
}
