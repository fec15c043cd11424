import { GARBAGE_CAPACITY, WATCHDOG_TICKS_PER_CELL } from "./constants";
import type { Strategy } from "./controllers";
import type { Hex } from "./types";
import { DEFAULT_GRID_OPTIONS, type GridOptions, randomSeed } from "./utils";
import { isHex, size } from "viem";

export type StartMode = "default" | "random";

/**
 * Everything one run is built from. Two runs with the same config produce the same report.
 */
export type SimulationConfig = GridOptions & {
  seed: Hex;
  strategy: Strategy;
  start: StartMode;
  capacity: number;
  // Ticks before the watchdog aborts the run
  maxTicks: number;
};

/**
 * Merge overrides onto the defaults and validate the result.
 * A missing seed is drawn at random; a missing maxTicks scales with the grid area.
 */
export function resolveConfig(overrides: Partial<SimulationConfig> = {}): SimulationConfig {
  const grid: GridOptions = { ...DEFAULT_GRID_OPTIONS, ...withoutUndefined(overrides) };
  const config: SimulationConfig = {
    ...grid,
    seed: overrides.seed ?? randomSeed(),
    strategy: overrides.strategy ?? "centralized",
    start: overrides.start ?? "default",
    capacity: overrides.capacity ?? GARBAGE_CAPACITY,
    maxTicks: overrides.maxTicks ?? WATCHDOG_TICKS_PER_CELL * grid.rows * grid.cols,
  };

  positiveInteger("rows", config.rows);
  positiveInteger("cols", config.cols);
  positiveInteger("capacity", config.capacity);
  positiveInteger("maxTicks", config.maxTicks);
  percent("fillPercent", config.fillPercent);
  percent("wetPercent", config.wetPercent);
  percent("wallPercent", config.wallPercent);
  // Without a bin the garbage collector could never unload
  positiveInteger("binCount", config.binCount);
  if (config.rows * config.cols < config.binCount + 3) {
    throw new RangeError(`A ${config.rows}x${config.cols} grid has no room for three agents and ${config.binCount} bins`);
  }
  if (!isHex(config.seed, { strict: true }) || size(config.seed) !== 32) {
    throw new RangeError(`Seed must be a 32-byte 0x-prefixed hex string, got ${config.seed}`);
  }
  return config;
}

function withoutUndefined(overrides: Partial<SimulationConfig>): Partial<GridOptions> {
  const { rows, cols, fillPercent, wetPercent, binCount, wallPercent } = overrides;
  const picked: Partial<GridOptions> = {};
  if (rows !== undefined) picked.rows = rows;
  if (cols !== undefined) picked.cols = cols;
  if (fillPercent !== undefined) picked.fillPercent = fillPercent;
  if (wetPercent !== undefined) picked.wetPercent = wetPercent;
  if (binCount !== undefined) picked.binCount = binCount;
  if (wallPercent !== undefined) picked.wallPercent = wallPercent;
  return picked;
}

function positiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

function percent(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 100) {
    throw new RangeError(`${name} must be between 0 and 100, got ${value}`);
  }
}
