/**
 * Movement constants.
 * Defines the four unit moves, their grid deltas, and the personal-space thresholds.
 */

// Expansion order for A* and candidate order for collision avoidance
export const MOVES = ["up", "down", "left", "right"] as const;

export type Move = (typeof MOVES)[number];

// Fast indexed deltas (index matches MOVES)
export const MOVE_DROW = new Int8Array([-1, 1, 0, 0]);
export const MOVE_DCOL = new Int8Array([0, 0, -1, 1]);

export const MOVE_INDEX: Record<Move, number> = {
  up: 0,
  down: 1,
  left: 2,
  right: 3,
};

// An idle agent further than this from everyone (priority included) stays where it is
export const COMFORTABLE_SEPARATION = 6;
