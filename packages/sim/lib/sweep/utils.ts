import {
  AGENT_KINDS,
  type Cell,
  DEFAULT_BIN_COUNT,
  DEFAULT_COLS,
  DEFAULT_FILL_PERCENT,
  DEFAULT_ROWS,
  DEFAULT_WALL_PERCENT,
  DEFAULT_WET_PERCENT,
} from "./constants";
import { GridModel } from "./GridModel";
import { samePoint } from "./pathfinding";
import type { AgentLocations, Hex, Point, RandomFactory, RandomSource, StartPositions } from "./types";
import { DeterministicDice } from "deterministic-dice";
import { encodePacked, keccak256, toHex } from "viem";

/**
 * Keccak256 of (row, col, seed), for position-based randomness that does not depend on visiting order.
 */
export function hash(row: number, col: number, seed: bigint): bigint {
  return BigInt(keccak256(encodePacked(["uint256", "uint256", "uint256"], [BigInt(row), BigInt(col), seed])));
}

/**
 * Dice for one purpose of a run ("bins", "start", ...), so each purpose draws an independent stream.
 */
export function diceFor(seed: Hex, label: string): DeterministicDice {
  return new DeterministicDice(keccak256(encodePacked(["bytes32", "string"], [seed, label])));
}

/**
 * Per-tick dice: the randomness a tick sees depends only on the seed and the tick number,
 * so replaying a rolled-back tick rolls the same values.
 */
export function tickDice(seed: Hex): RandomFactory {
  return tick => new DeterministicDice(keccak256(encodePacked(["bytes32", "string", "uint32"], [seed, "tick", tick])));
}

/**
 * Fresh run seed: a random integer hashed to 32 bytes.
 */
export function randomSeed(): Hex {
  const randomNumber = Math.floor(Math.random() * Number.MAX_SAFE_INTEGER);
  return keccak256(toHex(randomNumber));
}

export type GridOptions = {
  rows: number;
  cols: number;
  fillPercent: number;
  wetPercent: number;
  binCount: number;
  wallPercent: number;
};

export const DEFAULT_GRID_OPTIONS: GridOptions = {
  rows: DEFAULT_ROWS,
  cols: DEFAULT_COLS,
  fillPercent: DEFAULT_FILL_PERCENT,
  wetPercent: DEFAULT_WET_PERCENT,
  binCount: DEFAULT_BIN_COUNT,
  wallPercent: DEFAULT_WALL_PERCENT,
};

/**
 * Generate a grid from a seed.
 * 1. Walls: each cell rolls against wallPercent
 * 2. Trash: every other cell rolls against fillPercent, then wet vs dry against wetPercent
 * 3. Bins: binCount distinct non-wall cells picked with the "bins" dice, overwriting whatever was there
 *
 * Seed derivation matches keccak256(abi.encodePacked(seed, "map")).
 */
export function generateGrid(seed: Hex, options: Partial<GridOptions> = {}): GridModel {
  const { rows, cols, fillPercent, wetPercent, binCount, wallPercent } = { ...DEFAULT_GRID_OPTIONS, ...options };
  const mapSeed = BigInt(keccak256(encodePacked(["bytes32", "string"], [seed, "map"])));

  const cells: Cell[][] = [];
  for (let row = 0; row < rows; row++) {
    const rowCells: Cell[] = [];
    for (let col = 0; col < cols; col++) {
      const wallRoll = Number(hash(row, col, mapSeed) % 100n);
      const fillRoll = Number(hash(row + 1000, col + 1000, mapSeed) % 100n);
      const wetRoll = Number(hash(row + 2000, col + 2000, mapSeed) % 100n);

      if (wallRoll < wallPercent) {
        rowCells.push("wall");
      } else if (fillRoll < fillPercent) {
        rowCells.push(wetRoll < wetPercent ? "wetTrash" : "dryTrash");
      } else {
        rowCells.push("empty");
      }
    }
    cells.push(rowCells);
  }

  const open: Point[] = [];
  cells.forEach((rowCells, row) =>
    rowCells.forEach((cell, col) => {
      if (cell !== "wall") open.push({ row, col });
    }),
  );
  if (open.length < binCount) {
    throw new RangeError(`Cannot place ${binCount} bins on ${open.length} open cells`);
  }
  const dice = diceFor(seed, "bins");
  for (let i = 0; i < binCount; i++) {
    const [{ row, col }] = open.splice(dice.roll(open.length), 1);
    cells[row][col] = "bin";
  }

  return GridModel.fromRows(cells);
}

// Non-wall cells in row-major order
function openCells(grid: GridModel): Point[] {
  const open: Point[] = [];
  for (let row = 0; row < grid.rows; row++) {
    for (let col = 0; col < grid.cols; col++) {
      if (!grid.isWall({ row, col })) open.push({ row, col });
    }
  }
  return open;
}

/**
 * Garbage collector top-left, vacuum top-right, mop bottom-left.
 * A corner that is a wall (or already taken on a tiny grid) falls back to the first free cell in row-major order.
 */
export function defaultStartPositions(grid: GridModel): StartPositions {
  const corners: Point[] = [
    { row: 0, col: 0 },
    { row: 0, col: grid.cols - 1 },
    { row: grid.rows - 1, col: 0 },
  ];
  const open = openCells(grid);
  const taken: Point[] = [];

  corners.forEach(corner => {
    const free = (pos: Point) => !grid.isWall(pos) && !taken.some(t => samePoint(t, pos));
    const pick = free(corner) ? corner : open.find(free);
    if (pick === undefined) {
      throw new RangeError(`Grid has fewer than ${AGENT_KINDS.length} open cells`);
    }
    taken.push(pick);
  });

  return { garbageCollector: taken[0], vacuum: taken[1], mop: taken[2] };
}

/**
 * Distinct random open cells, one per agent.
 */
export function randomStartPositions(grid: GridModel, dice: RandomSource): StartPositions {
  const open = openCells(grid);
  if (open.length < AGENT_KINDS.length) {
    throw new RangeError(`Grid has fewer than ${AGENT_KINDS.length} open cells`);
  }
  const [garbageCollector] = open.splice(dice.roll(open.length), 1);
  const [vacuum] = open.splice(dice.roll(open.length), 1);
  const [mop] = open.splice(dice.roll(open.length), 1);
  return { garbageCollector, vacuum, mop };
}

/**
 * Fingerprint of the grid's cells (row-major cell codes).
 */
export function hashGrid(grid: GridModel): Hex {
  return keccak256(grid.cells);
}

export function hashPositions(locations: AgentLocations): Hex {
  const { garbageCollector: g, vacuum: v, mop: m } = locations;
  return keccak256(
    encodePacked(
      ["uint32", "uint32", "uint32", "uint32", "uint32", "uint32"],
      [g.row, g.col, v.row, v.col, m.row, m.col],
    ),
  );
}
