/**
 * Personal-space collision avoidance.
 *
 * An agent looks at its five candidate moves (stay, up, down, left, right) and scores each by the
 * smallest distance it would leave to any other agent. Other agents' priority is added to that
 * distance, so an urgent agent (a full garbage collector) is owed less room than the rest.
 * Occupied cells are never candidates, which is what keeps two agents off the same cell.
 */
import { COMFORTABLE_SEPARATION, MOVES, type Move } from "./constants";
import type { GridModel } from "./GridModel";
import { applyMove, manhattan, samePoint } from "./pathfinding";
import type { Point, RandomSource } from "./types";

// Another agent as seen by the one deciding
export type Neighbour = {
  position: Point;
  priority: number;
};

// A move the agent could make this tick; `move` is null for staying put
export type MoveOption = {
  move: Move | null;
  position: Point;
};

/**
 * Stay plus every in-bounds, non-wall, unoccupied neighbour cell, in MOVES order.
 */
export function candidateMoves(grid: GridModel, position: Point, occupied: readonly Point[]): MoveOption[] {
  const options: MoveOption[] = [{ move: null, position }];
  for (const move of MOVES) {
    const next = applyMove(position, move);
    if (!grid.inBounds(next) || grid.isWall(next)) continue;
    if (occupied.some(other => samePoint(other, next))) continue;
    options.push({ move, position: next });
  }
  return options;
}

/**
 * Smallest priority-weighted distance from `position` to any neighbour (Infinity when alone).
 */
export function separation(position: Point, neighbours: readonly Neighbour[]): number {
  let best = Infinity;
  for (const other of neighbours) {
    best = Math.min(best, manhattan(position, other.position) + other.priority);
  }
  return best;
}

export function isComfortable(position: Point, neighbours: readonly Neighbour[]): boolean {
  return separation(position, neighbours) > COMFORTABLE_SEPARATION;
}

/**
 * Uniform pick from a non-empty list; only rolls when there is an actual choice.
 */
export function pickRandom<T>(items: readonly T[], random: RandomSource): T {
  if (items.length === 1) return items[0];
  return items[random.roll(items.length) % items.length];
}

/**
 * Keep the items whose score is maximal (or minimal).
 */
export function bestBy<T>(items: readonly T[], score: (item: T) => number, pick: "max" | "min"): T[] {
  const scores = items.map(score);
  const target = pick === "max" ? Math.max(...scores) : Math.min(...scores);
  return items.filter((_, i) => scores[i] === target);
}

/**
 * Move that maximises the minimum separation; ties are broken at random.
 */
export function chooseEvasiveMove(
  options: readonly MoveOption[],
  neighbours: readonly Neighbour[],
  random: RandomSource,
): MoveOption {
  return pickRandom(
    bestBy(options, option => separation(option.position, neighbours), "max"),
    random,
  );
}

/**
 * Decision for an agent without a goal: hold still while comfortably clear of everyone,
 * otherwise step to wherever leaves the most room.
 */
export function chooseIdleMove(
  options: readonly MoveOption[],
  neighbours: readonly Neighbour[],
  random: RandomSource,
): MoveOption {
  const stay = options[0];
  if (isComfortable(stay.position, neighbours)) return stay;
  return chooseEvasiveMove(options, neighbours, random);
}

/**
 * Decision for an agent chasing a goal.
 *
 * Progress moves (shorter remaining distance than staying) win when there are any: the closest
 * ones first, then the one leaving the most room, then a random pick. With no progress possible
 * the agent is conflicted and falls back to plain evasion.
 *
 * @param distanceToGoal - Remaining distance from a candidate cell (Infinity when cut off)
 */
export function choosePursuitMove(
  options: readonly MoveOption[],
  neighbours: readonly Neighbour[],
  distanceToGoal: (position: Point) => number,
  random: RandomSource,
): MoveOption {
  const distances = new Map<MoveOption, number>(options.map(option => [option, distanceToGoal(option.position)]));
  const current = distances.get(options[0]) ?? Infinity;
  const progress = options.filter(option => (distances.get(option) ?? Infinity) < current);
  if (progress.length === 0) {
    return chooseEvasiveMove(options, neighbours, random);
  }
  const closest = bestBy(progress, option => distances.get(option) ?? Infinity, "min");
  return pickRandom(
    bestBy(closest, option => separation(option.position, neighbours), "max"),
    random,
  );
}
