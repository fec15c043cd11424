/**
 * Core simulation types.
 */
import type { AgentKind } from "./constants";

// Grid coordinate (row 0 is the top edge, col 0 the left edge)
export type Point = {
  row: number;
  col: number;
};

export type GarbageMode = "collecting" | "returningToBin";

// Vacuum and mop only track where they are and where they are headed
export type CleanerState = {
  kind: "vacuum" | "mop";
  position: Point;
  goal: Point | null;
};

export type GarbageState = {
  kind: "garbageCollector";
  position: Point;
  goal: Point | null;
  load: number;
  capacity: number;
  mode: GarbageMode;
};

export type AgentState = GarbageState | CleanerState;

// One state per kind; the garbage collector entry is always the garbage variant
export type AgentRoster = {
  garbageCollector: GarbageState;
  vacuum: CleanerState & { kind: "vacuum" };
  mop: CleanerState & { kind: "mop" };
};

export type StartPositions = Record<AgentKind, Point>;

export type AgentLocations = Record<AgentKind, Point>;

/**
 * Anything that can roll a number in [0, max).
 * DeterministicDice satisfies this; tests substitute scripted sources.
 */
export type RandomSource = {
  roll(max: number): number;
};

// Fresh random source for each tick, derived from the run seed
export type RandomFactory = (tick: number) => RandomSource;

export type Hex = `0x${string}`;
