import { GridModel } from "./GridModel";
import { type Cell, HAZARD_CELLS, TRASH_CELLS } from "./constants";
import { describe, expect, it } from "vitest";

describe("GridModel", () => {
  it("parses an ASCII map", () => {
    const grid = GridModel.parse(["d.w", "B#u"]);

    expect(grid.rows).toBe(2);
    expect(grid.cols).toBe(3);
    expect(grid.cellAt({ row: 0, col: 0 })).toBe("dryTrash");
    expect(grid.cellAt({ row: 0, col: 2 })).toBe("wetTrash");
    expect(grid.cellAt({ row: 1, col: 0 })).toBe("bin");
    expect(grid.isWall({ row: 1, col: 1 })).toBe(true);
    expect(grid.cellAt({ row: 1, col: 2 })).toBe("dusty");
  });

  it("rejects unknown glyphs, ragged rows and empty maps", () => {
    expect(() => GridModel.parse(["d?"])).toThrow(RangeError);
    expect(() => GridModel.parse(["...", ".."])).toThrow(RangeError);
    expect(() => GridModel.parse([])).toThrow(RangeError);
  });

  it("throws on out-of-bounds reads", () => {
    const grid = new GridModel(2, 2);
    expect(grid.inBounds({ row: 2, col: 0 })).toBe(false);
    expect(() => grid.cellAt({ row: 2, col: 0 })).toThrow(RangeError);
    expect(() => grid.cellAt({ row: 0, col: -1 })).toThrow(RangeError);
  });

  it("counts hazards from its counters and by scanning", () => {
    const grid = GridModel.parse(["d.w", "B#u", "s.."]);
    expect(grid.hazardCount()).toBe(4);
    expect(grid.scanCount(HAZARD_CELLS)).toBe(4);
    expect(grid.count("empty")).toBe(3);
    expect(grid.has(TRASH_CELLS)).toBe(true);
  });

  it("applies clean-up by agent kind", () => {
    const grid = GridModel.parse(["dwB"]);

    expect(grid.cleanUp({ row: 0, col: 0 }, "garbageCollector")).toBe("dryTrash");
    expect(grid.cellAt({ row: 0, col: 0 })).toBe("dusty");
    expect(grid.cleanUp({ row: 0, col: 1 }, "garbageCollector")).toBe("wetTrash");
    expect(grid.cellAt({ row: 0, col: 1 })).toBe("soaked");

    // Residue is still a hazard until the matching cleaner comes by
    expect(grid.hazardCount()).toBe(2);
    expect(grid.cleanUp({ row: 0, col: 1 }, "vacuum")).toBeNull();
    expect(grid.cleanUp({ row: 0, col: 0 }, "vacuum")).toBe("dusty");
    expect(grid.cleanUp({ row: 0, col: 1 }, "mop")).toBe("soaked");
    expect(grid.hazardCount()).toBe(0);
  });

  it("never cleans bins or walls", () => {
    const grid = GridModel.parse(["B#"]);
    for (const kind of ["garbageCollector", "vacuum", "mop"] as const) {
      expect(grid.cleanUp({ row: 0, col: 0 }, kind)).toBeNull();
      expect(grid.cleanUp({ row: 0, col: 1 }, kind)).toBeNull();
    }
    expect(grid.cellAt({ row: 0, col: 0 })).toBe("bin");
    expect(grid.cellAt({ row: 0, col: 1 })).toBe("wall");
  });

  it("bumps the revision on out-of-band edits", () => {
    const grid = new GridModel(2, 2);
    grid.paint({ row: 1, col: 1 }, "soaked");
    expect(grid.revision).toBe(1);
    expect(grid.count("soaked")).toBe(1);
    expect(() => grid.paint({ row: 5, col: 0 }, "wall")).toThrow(RangeError);
  });

  it("restores a snapshot and its counters", () => {
    const grid = GridModel.parse(["dd"]);
    const saved = grid.snapshot();

    grid.cleanUp({ row: 0, col: 0 }, "garbageCollector");
    grid.paint({ row: 0, col: 1 }, "empty");
    grid.restore(saved);

    expect(grid.toRows()).toEqual([["dryTrash", "dryTrash"]]);
    expect(grid.count("dryTrash")).toBe(2);
    expect(grid.count("dusty")).toBe(0);
    expect(grid.revision).toBe(0);
  });

  it("lists matching cells in row-major order", () => {
    const grid = GridModel.parse([".u", "u."]);
    expect(grid.findCells(new Set<Cell>(["dusty"]))).toEqual([
      { row: 0, col: 1 },
      { row: 1, col: 0 },
    ]);
  });

  it("renders agents over their cells", () => {
    const grid = GridModel.parse(["d..", ".B."]);
    const picture = grid.render({
      garbageCollector: { row: 0, col: 0 },
      vacuum: { row: 0, col: 2 },
      mop: { row: 1, col: 2 },
    });
    expect(picture).toBe("G.V\n.BM");
    expect(grid.render()).toBe("d..\n.B.");
  });
});
