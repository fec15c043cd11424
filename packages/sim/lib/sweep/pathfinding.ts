/**
 * Grid A* path planning.
 *
 * Four-directional, unit-cost moves with a Manhattan heuristic. The open set is a binary heap
 * without decrease-key: a cell may be pushed several times and entries whose cost is stale are
 * skipped when popped. Ties on f are broken by push order, and neighbours are pushed in MOVES
 * order (up, down, left, right), so the same grid always yields the same path.
 */
import { MOVES, MOVE_DCOL, MOVE_DROW, MOVE_INDEX, type Move } from "./constants";
import type { GridModel } from "./GridModel";
import type { Point } from "./types";

export function manhattan(a: Point, b: Point): number {
  return Math.abs(a.row - b.row) + Math.abs(a.col - b.col);
}

export function samePoint(a: Point, b: Point): boolean {
  return a.row === b.row && a.col === b.col;
}

export function applyMove(pos: Point, move: Move): Point {
  const i = MOVE_INDEX[move];
  return { row: pos.row + MOVE_DROW[i], col: pos.col + MOVE_DCOL[i] };
}

/**
 * Walk a move list from `start` and return every cell visited (start excluded).
 */
export function followPath(start: Point, moves: readonly Move[]): Point[] {
  const cells: Point[] = [];
  let current = start;
  for (const move of moves) {
    current = applyMove(current, move);
    cells.push(current);
  }
  return cells;
}

type HeapEntry = {
  index: number;
  g: number;
  f: number;
  order: number;
};

class OpenSet {
  private items: HeapEntry[] = [];

  get size(): number {
    return this.items.length;
  }

  push(entry: HeapEntry): void {
    const a = this.items;
    a.push(entry);
    let i = a.length - 1;
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!this.before(a[i], a[p])) break;
      [a[i], a[p]] = [a[p], a[i]];
      i = p;
    }
  }

  pop(): HeapEntry | undefined {
    const a = this.items;
    const top = a[0];
    const last = a.pop();
    if (a.length > 0 && last !== undefined) {
      a[0] = last;
      let i = 0;
      while (true) {
        let s = i;
        const l = i * 2 + 1;
        const r = l + 1;
        if (l < a.length && this.before(a[l], a[s])) s = l;
        if (r < a.length && this.before(a[r], a[s])) s = r;
        if (s === i) break;
        [a[i], a[s]] = [a[s], a[i]];
        i = s;
      }
    }
    return top;
  }

  private before(a: HeapEntry, b: HeapEntry): boolean {
    return a.f < b.f || (a.f === b.f && a.order < b.order);
  }
}

/**
 * Shortest move list from `start` to `goal`, avoiding walls.
 *
 * @returns [] when start equals goal, null when the goal is off the grid, a wall, or cut off.
 */
export function findPath(grid: GridModel, start: Point, goal: Point): Move[] | null {
  if (!grid.inBounds(start) || !grid.inBounds(goal)) return null;
  if (samePoint(start, goal)) return [];
  if (grid.isWall(goal)) return null;

  const size = grid.rows * grid.cols;
  const gScore = new Float64Array(size).fill(Infinity);
  const cameFrom = new Int32Array(size).fill(-1);
  const cameBy = new Int8Array(size).fill(-1);
  // Each cell is expanded at most once, which bounds the search on disconnected grids
  const closed = new Uint8Array(size);

  const startIndex = grid.index(start);
  const goalIndex = grid.index(goal);
  const open = new OpenSet();
  let order = 0;

  gScore[startIndex] = 0;
  open.push({ index: startIndex, g: 0, f: manhattan(start, goal), order: order++ });

  while (open.size > 0) {
    const entry = open.pop();
    if (entry === undefined) break;
    const { index, g } = entry;
    if (closed[index] || g > gScore[index]) continue; // stale duplicate
    if (index === goalIndex) return reconstruct(cameFrom, cameBy, goalIndex);
    closed[index] = 1;

    const row = Math.floor(index / grid.cols);
    const col = index % grid.cols;
    for (let m = 0; m < MOVES.length; m++) {
      const next = { row: row + MOVE_DROW[m], col: col + MOVE_DCOL[m] };
      if (!grid.inBounds(next) || grid.isWall(next)) continue;

      const ni = grid.index(next);
      if (closed[ni]) continue;
      const tentative = g + 1;
      if (tentative < gScore[ni]) {
        gScore[ni] = tentative;
        cameFrom[ni] = index;
        cameBy[ni] = m;
        open.push({ index: ni, g: tentative, f: tentative + manhattan(next, goal), order: order++ });
      }
    }
  }

  return null;
}

/**
 * Flood fill over non-wall cells from `start`, as a mask indexed like `grid.cells` (1 = reachable).
 * Agents are not obstacles here, the same as for findPath.
 */
export function reachableFrom(grid: GridModel, start: Point): Uint8Array {
  const seen = new Uint8Array(grid.rows * grid.cols);
  if (!grid.inBounds(start) || grid.isWall(start)) return seen;

  const queue = [grid.index(start)];
  seen[queue[0]] = 1;
  for (let head = 0; head < queue.length; head++) {
    const index = queue[head];
    const row = Math.floor(index / grid.cols);
    const col = index % grid.cols;
    for (let m = 0; m < MOVES.length; m++) {
      const next = { row: row + MOVE_DROW[m], col: col + MOVE_DCOL[m] };
      if (!grid.inBounds(next) || grid.isWall(next)) continue;
      const ni = grid.index(next);
      if (seen[ni]) continue;
      seen[ni] = 1;
      queue.push(ni);
    }
  }
  return seen;
}

/**
 * Number of moves on the shortest path, or Infinity when there is none.
 */
export function pathLength(grid: GridModel, start: Point, goal: Point): number {
  const path = findPath(grid, start, goal);
  return path === null ? Infinity : path.length;
}

function reconstruct(cameFrom: Int32Array, cameBy: Int8Array, goalIndex: number): Move[] {
  const moves: Move[] = [];
  let current = goalIndex;
  while (cameFrom[current] !== -1) {
    moves.push(MOVES[cameBy[current]]);
    current = cameFrom[current];
  }
  return moves.reverse();
}
