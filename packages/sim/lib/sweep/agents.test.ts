import { GridModel } from "./GridModel";
import {
  agentPriority,
  cloneRoster,
  createRoster,
  describeAgent,
  isBusy,
  refreshAgent,
  revalidateGoal,
  rosterOrder,
  selectGoal,
  visitCell,
} from "./agents";
import type { StartPositions } from "./types";
import { describe, expect, it } from "vitest";

const START: StartPositions = {
  garbageCollector: { row: 0, col: 0 },
  vacuum: { row: 0, col: 1 },
  mop: { row: 0, col: 2 },
};

describe("garbage collector", () => {
  it("bags trash and leaves residue behind", () => {
    const grid = GridModel.parse(["d.B"]);
    const { garbageCollector } = createRoster(START);

    expect(visitCell(garbageCollector, grid)).toEqual({ type: "collected", cell: "dryTrash", load: 1 });
    expect(grid.cellAt({ row: 0, col: 0 })).toBe("dusty");
    expect(garbageCollector.mode).toBe("collecting");
  });

  it("heads for a bin as soon as it is full and collects nothing on the way", () => {
    const grid = GridModel.parse(["dwB"]);
    const { garbageCollector } = createRoster(START, 1);

    visitCell(garbageCollector, grid);
    expect(garbageCollector.load).toBe(1);
    expect(garbageCollector.mode).toBe("returningToBin");
    expect(garbageCollector.goal).toEqual({ row: 0, col: 2 });

    garbageCollector.position = { row: 0, col: 1 };
    expect(visitCell(garbageCollector, grid)).toEqual({ type: "none" });
    expect(grid.cellAt({ row: 0, col: 1 })).toBe("wetTrash");
    expect(garbageCollector.load).toBe(1);

    garbageCollector.position = { row: 0, col: 2 };
    expect(visitCell(garbageCollector, grid)).toEqual({ type: "unloaded", amount: 1 });
    expect(garbageCollector.load).toBe(0);
    expect(garbageCollector.mode).toBe("collecting");
    expect(garbageCollector.goal).toBeNull();
  });

  it("returns a partial load once the grid runs out of trash", () => {
    const grid = GridModel.parse(["u.B"]);
    const { garbageCollector } = createRoster(START);
    garbageCollector.load = 2;

    refreshAgent(garbageCollector, grid);
    expect(garbageCollector.mode).toBe("returningToBin");
    expect(selectGoal(garbageCollector, grid)).toEqual({ row: 0, col: 2 });
  });

  it("goes back to collecting once empty", () => {
    const grid = GridModel.parse(["d.B"]);
    const { garbageCollector } = createRoster(START);
    garbageCollector.mode = "returningToBin";

    refreshAgent(garbageCollector, grid);
    expect(garbageCollector.mode).toBe("collecting");
    expect(selectGoal(garbageCollector, grid)).toEqual({ row: 0, col: 0 });
  });

  it("claims extra priority while full", () => {
    const { garbageCollector, vacuum } = createRoster(START, 2);
    expect(agentPriority(garbageCollector)).toBe(1);

    garbageCollector.load = 2;
    expect(agentPriority(garbageCollector)).toBe(2);
    expect(agentPriority(vacuum)).toBe(0);
  });

  it("stays busy while it carries anything", () => {
    const { garbageCollector } = createRoster(START);
    expect(isBusy(garbageCollector)).toBe(false);
    garbageCollector.load = 1;
    expect(isBusy(garbageCollector)).toBe(true);
  });
});

describe("cleaners", () => {
  it("clean only their own residue and drop the goal on arrival", () => {
    const grid = GridModel.parse(["uw"]);
    const { vacuum } = createRoster(START);
    vacuum.position = { row: 0, col: 0 };
    vacuum.goal = { row: 0, col: 0 };

    expect(visitCell(vacuum, grid)).toEqual({ type: "cleaned", cell: "dusty" });
    expect(vacuum.goal).toBeNull();
    expect(isBusy(vacuum)).toBe(false);

    vacuum.position = { row: 0, col: 1 };
    expect(visitCell(vacuum, grid)).toEqual({ type: "none" });
    expect(grid.cellAt({ row: 0, col: 1 })).toBe("wetTrash");
  });

  it("drop goals that were edited away", () => {
    const grid = GridModel.parse(["s.s"]);
    const { mop } = createRoster(START);
    mop.goal = { row: 0, col: 0 };

    expect(revalidateGoal(mop, grid)).toBe(false);
    grid.paint({ row: 0, col: 0 }, "empty");
    expect(revalidateGoal(mop, grid)).toBe(true);
    expect(mop.goal).toBeNull();
  });
});

describe("roster", () => {
  it("steps agents in a fixed order", () => {
    expect(rosterOrder(createRoster(START)).map(agent => agent.kind)).toEqual(["garbageCollector", "vacuum", "mop"]);
  });

  it("clones deeply", () => {
    const roster = createRoster(START);
    const copy = cloneRoster(roster);
    roster.vacuum.position.row = 3;
    roster.garbageCollector.load = 4;
    expect(copy.vacuum.position).toEqual({ row: 0, col: 1 });
    expect(copy.garbageCollector.load).toBe(0);
  });

  it("describes agents in one line", () => {
    const roster = createRoster(START);
    roster.vacuum.goal = { row: 1, col: 2 };
    expect(describeAgent(roster.garbageCollector)).toBe("garbageCollector at (0, 0) idle [0/5, collecting]");
    expect(describeAgent(roster.vacuum)).toBe("vacuum at (0, 1) -> (1, 2)");
  });
});

describe("goal reachability", () => {
  const cornered: StartPositions = { ...START, garbageCollector: { row: 2, col: 0 } };

  it("passes over walled-off trash for trash it can walk to", () => {
    const grid = GridModel.parse(["d#.", "##.", "..d"]);
    const { garbageCollector } = createRoster(cornered);
    expect(selectGoal(garbageCollector, grid)).toEqual({ row: 2, col: 2 });
  });

  it("still names walled-off trash when nothing else is left", () => {
    const grid = GridModel.parse(["d#.", "##.", "..."]);
    const { garbageCollector } = createRoster(cornered);
    expect(selectGoal(garbageCollector, grid)).toEqual({ row: 0, col: 0 });
  });

  it("heads for a bin it can reach once full", () => {
    const grid = GridModel.parse(["B#...", "##...", "d...B"]);
    const { garbageCollector } = createRoster(cornered, 1);

    expect(visitCell(garbageCollector, grid)).toEqual({ type: "collected", cell: "dryTrash", load: 1 });
    expect(garbageCollector.mode).toBe("returningToBin");
    expect(garbageCollector.goal).toEqual({ row: 2, col: 4 });
  });
});
