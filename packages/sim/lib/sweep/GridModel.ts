import {
  AGENT_GLYPHS,
  AGENT_KINDS,
  type AgentKind,
  CELL_CODES,
  CELL_GLYPHS,
  CELL_TYPES,
  CLEAN_UP_RESULTS,
  type Cell,
  FIXED_CELLS,
  HAZARD_CELLS,
} from "./constants";
import type { AgentLocations, Point } from "./types";

const GLYPH_CELLS: ReadonlyMap<string, Cell> = new Map<string, Cell>(CELL_TYPES.map(cell => [CELL_GLYPHS[cell], cell]));

/**
 * Saved copy of the cell array, used to roll back a tick that failed half way.
 */
export type GridSnapshot = {
  cells: Uint8Array;
  revision: number;
};

/**
 * The simulation grid.
 *
 * Cells are stored row-major as codes in one Uint8Array (see CELL_CODES). Every write goes through
 * `writeCell`, which keeps a per-type counter up to date so hazard counts are O(1); `scanCount` walks the
 * array instead and is what the finished() cross-check compares against.
 */
export class GridModel {
  readonly rows: number;
  readonly cols: number;
  readonly cells: Uint8Array;

  // Bumped by every out-of-band edit so callers can tell the grid changed under them
  revision: number = 0;

  private readonly counts: Int32Array;

  constructor(rows: number, cols: number, fill: Cell = "empty") {
    if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows <= 0 || cols <= 0) {
      throw new RangeError(`Grid must have a positive integer size, got ${rows}x${cols}`);
    }
    this.rows = rows;
    this.cols = cols;
    this.cells = new Uint8Array(rows * cols).fill(CELL_CODES[fill]);
    this.counts = new Int32Array(CELL_TYPES.length);
    this.counts[CELL_CODES[fill]] = rows * cols;
  }

  /**
   * Build a grid from rows of cells. All rows must have the same length.
   */
  static fromRows(rows: Cell[][]): GridModel {
    const width = rows[0]?.length ?? 0;
    const grid = new GridModel(rows.length, width);
    rows.forEach((cells, row) => {
      if (cells.length !== width) {
        throw new RangeError(`Row ${row} has ${cells.length} cells, expected ${width}`);
      }
      cells.forEach((cell, col) => grid.writeCell(row, col, cell));
    });
    return grid;
  }

  /**
   * Build a grid from an ASCII map, one string per row.
   * `.` empty, `d` dry trash, `w` wet trash, `u` dusty, `s` soaked, `B` bin, `#` wall.
   */
  static parse(lines: string[]): GridModel {
    return GridModel.fromRows(
      lines.map((line, row) =>
        [...line].map((glyph, col) => {
          const cell = GLYPH_CELLS.get(glyph);
          if (cell === undefined) {
            throw new RangeError(`Unknown cell glyph "${glyph}" at (${row}, ${col})`);
          }
          return cell;
        }),
      ),
    );
  }

  inBounds(pos: Point): boolean {
    return pos.row >= 0 && pos.row < this.rows && pos.col >= 0 && pos.col < this.cols;
  }

  index(pos: Point): number {
    return pos.row * this.cols + pos.col;
  }

  cellAt(pos: Point): Cell {
    if (!this.inBounds(pos)) {
      throw new RangeError(`(${pos.row}, ${pos.col}) is outside the ${this.rows}x${this.cols} grid`);
    }
    return CELL_TYPES[this.cells[this.index(pos)]];
  }

  isWall(pos: Point): boolean {
    return this.cellAt(pos) === "wall";
  }

  /**
   * Apply an agent's visit to a cell.
   * Garbage collectors bag trash and leave residue (dry -> dusty, wet -> soaked);
   * vacuums clear dust and mops clear soaked cells. Bins, walls and cells the kind
   * has no business with are left alone.
   *
   * @returns The cell that was cleaned, or null if nothing changed
   */
  cleanUp(pos: Point, actingKind: AgentKind): Cell | null {
    const current = this.cellAt(pos);
    if (FIXED_CELLS.has(current)) return null;

    const result = CLEAN_UP_RESULTS[actingKind][current];
    if (result === undefined) return null;

    this.writeCell(pos.row, pos.col, result);
    return current;
  }

  /**
   * Out-of-band edit from outside the simulation (e.g. painting a new hazard between ticks).
   * Controllers revalidate their cached goals on the next tick.
   */
  paint(pos: Point, cell: Cell): void {
    if (!this.inBounds(pos)) {
      throw new RangeError(`(${pos.row}, ${pos.col}) is outside the ${this.rows}x${this.cols} grid`);
    }
    this.writeCell(pos.row, pos.col, cell);
    this.revision++;
  }

  // Counter-backed totals, O(1)
  count(cell: Cell): number {
    return this.counts[CELL_CODES[cell]];
  }

  hazardCount(): number {
    let total = 0;
    for (const cell of HAZARD_CELLS) total += this.count(cell);
    return total;
  }

  /**
   * Count matching cells by walking the whole array, independent of the counters.
   */
  scanCount(targets: ReadonlySet<Cell>): number {
    let total = 0;
    for (let i = 0; i < this.cells.length; i++) {
      if (targets.has(CELL_TYPES[this.cells[i]])) total++;
    }
    return total;
  }

  has(targets: ReadonlySet<Cell>): boolean {
    for (const cell of targets) {
      if (this.count(cell) > 0) return true;
    }
    return false;
  }

  // Every matching cell in row-major order
  findCells(targets: ReadonlySet<Cell>): Point[] {
    const found: Point[] = [];
    for (let row = 0; row < this.rows; row++) {
      for (let col = 0; col < this.cols; col++) {
        if (targets.has(CELL_TYPES[this.cells[row * this.cols + col]])) {
          found.push({ row, col });
        }
      }
    }
    return found;
  }

  snapshot(): GridSnapshot {
    return { cells: this.cells.slice(), revision: this.revision };
  }

  restore(snapshot: GridSnapshot): void {
    this.cells.set(snapshot.cells);
    this.revision = snapshot.revision;
    this.recount();
  }

  toRows(): Cell[][] {
    const rows: Cell[][] = [];
    for (let row = 0; row < this.rows; row++) {
      const cells: Cell[] = [];
      for (let col = 0; col < this.cols; col++) {
        cells.push(CELL_TYPES[this.cells[row * this.cols + col]]);
      }
      rows.push(cells);
    }
    return rows;
  }

  /**
   * ASCII picture of the grid, one line per row, with agents drawn over their cells.
   */
  render(agents?: AgentLocations): string {
    const lines = this.toRows().map(cells => cells.map(cell => CELL_GLYPHS[cell]));
    if (agents) {
      for (const kind of AGENT_KINDS) {
        const { row, col } = agents[kind];
        if (this.inBounds(agents[kind])) lines[row][col] = AGENT_GLYPHS[kind];
      }
    }
    return lines.map(line => line.join("")).join("\n");
  }

  private writeCell(row: number, col: number, cell: Cell): void {
    const i = row * this.cols + col;
    this.counts[this.cells[i]]--;
    this.cells[i] = CELL_CODES[cell];
    this.counts[this.cells[i]]++;
  }

  private recount(): void {
    this.counts.fill(0);
    for (let i = 0; i < this.cells.length; i++) this.counts[this.cells[i]]++;
  }
}
