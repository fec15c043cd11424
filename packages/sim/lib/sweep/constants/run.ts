/**
 * Run settings.
 * Defaults for grid generation and the watchdog, mirroring the command-line defaults.
 */

// Grid generation
export const DEFAULT_ROWS = 6;
export const DEFAULT_COLS = 10;
export const DEFAULT_FILL_PERCENT = 50; // Chance (0-100) that a cell starts with trash
export const DEFAULT_WET_PERCENT = 50; // Share (0-100) of trash cells that are wet
export const DEFAULT_BIN_COUNT = 1;
export const DEFAULT_WALL_PERCENT = 0;

// Watchdog - a run that has not finished after rows * cols * this many ticks is aborted
export const WATCHDOG_TICKS_PER_CELL = 20;

// Headless driver pacing
export const DEFAULT_TICK_DELAY_MS = 500;
