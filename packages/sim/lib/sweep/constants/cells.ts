/**
 * Cell type constants.
 * Defines the cell states, their storage codes, and which of them count as hazards.
 */

export type Cell = "empty" | "dryTrash" | "wetTrash" | "dusty" | "soaked" | "bin" | "wall";

// Cell types in code order (index = value stored in the grid's Uint8Array)
export const CELL_TYPES: readonly Cell[] = ["empty", "dryTrash", "wetTrash", "dusty", "soaked", "bin", "wall"];

export const CELL_CODES: Record<Cell, number> = {
  empty: 0,
  dryTrash: 1,
  wetTrash: 2,
  dusty: 3,
  soaked: 4,
  bin: 5,
  wall: 6,
};

// Cells some agent still has to neutralize
export const HAZARD_CELLS: ReadonlySet<Cell> = new Set<Cell>(["dryTrash", "wetTrash", "dusty", "soaked"]);

export const TRASH_CELLS: ReadonlySet<Cell> = new Set<Cell>(["dryTrash", "wetTrash"]);

export const BIN_CELLS: ReadonlySet<Cell> = new Set<Cell>(["bin"]);

// Clean-up never touches these
export const FIXED_CELLS: ReadonlySet<Cell> = new Set<Cell>(["bin", "wall"]);

// Single-character glyphs for ASCII maps (GridModel.parse / GridModel.render)
export const CELL_GLYPHS: Record<Cell, string> = {
  empty: ".",
  dryTrash: "d",
  wetTrash: "w",
  dusty: "u",
  soaked: "s",
  bin: "B",
  wall: "#",
};
