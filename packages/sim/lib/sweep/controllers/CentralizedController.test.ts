import { GridModel } from "../GridModel";
import { silentLogSink } from "../logging";
import type { RandomFactory } from "../types";
import { CentralizedController } from "./CentralizedController";
import { describe, expect, it } from "vitest";

// Every tie goes to the first candidate
const firstChoice: RandomFactory = () => ({ roll: () => 0 });

describe("CentralizedController", () => {
  it("collects trash next to the bin and waits for the vacuum before finishing", () => {
    const grid = GridModel.parse(["B.d", "...", "..."]);
    const controller = new CentralizedController({
      grid,
      start: {
        garbageCollector: { row: 0, col: 0 },
        vacuum: { row: 2, col: 2 },
        mop: { row: 2, col: 0 },
      },
      random: firstChoice,
      log: silentLogSink,
    });

    controller.tick();
    expect(controller.agentLocations()).toEqual({
      garbageCollector: { row: 0, col: 1 },
      vacuum: { row: 1, col: 2 },
      mop: { row: 2, col: 0 },
    });

    controller.tick();
    expect(controller.agents.garbageCollector.position).toEqual({ row: 0, col: 2 });
    expect(controller.agents.garbageCollector.load).toBe(1);
    expect(grid.cellAt({ row: 0, col: 2 })).toBe("dusty");
    expect(controller.finished()).toBe(false);

    // The vacuum cleans the residue while the garbage collector heads back to the bin
    controller.tick();
    expect(grid.cellAt({ row: 0, col: 2 })).toBe("empty");
    expect(controller.agents.vacuum.position).toEqual({ row: 0, col: 2 });
    expect(controller.agents.garbageCollector.mode).toBe("returningToBin");
    expect(controller.agents.garbageCollector.goal).toEqual({ row: 0, col: 0 });
    expect(controller.finished()).toBe(false);

    controller.tick();
    expect(controller.agents.garbageCollector.position).toEqual({ row: 0, col: 0 });
    expect(controller.agents.garbageCollector.load).toBe(0);
    expect(controller.finished()).toBe(true);
    expect(controller.tickCount).toBe(4);
    expect(controller.violations()).toEqual([]);
  });

  it("keeps following its committed route to the bin", () => {
    const grid = GridModel.parse(["B...d", ".....", "....."]);
    const controller = new CentralizedController({
      grid,
      start: {
        garbageCollector: { row: 0, col: 3 },
        vacuum: { row: 2, col: 4 },
        mop: { row: 2, col: 0 },
      },
      random: firstChoice,
      capacity: 1,
      log: silentLogSink,
    });

    controller.tick();
    expect(controller.agents.garbageCollector.position).toEqual({ row: 0, col: 4 });
    expect(controller.agents.garbageCollector.mode).toBe("returningToBin");

    controller.tick();
    expect(controller.agents.garbageCollector.position).toEqual({ row: 0, col: 3 });

    // A closer bin appears, but the trip in progress is not re-planned
    grid.paint({ row: 1, col: 3 }, "bin");
    controller.tick();
    expect(controller.agents.garbageCollector.position).toEqual({ row: 0, col: 2 });
    expect(controller.agents.garbageCollector.goal).toEqual({ row: 0, col: 0 });
  });

  it("re-plans when a wall is painted across its route", () => {
    const grid = GridModel.parse(["B...d", ".....", "....."]);
    const controller = new CentralizedController({
      grid,
      start: {
        garbageCollector: { row: 0, col: 3 },
        vacuum: { row: 2, col: 4 },
        mop: { row: 2, col: 0 },
      },
      random: firstChoice,
      capacity: 1,
      log: silentLogSink,
    });

    controller.tick();
    controller.tick();
    expect(controller.agents.garbageCollector.position).toEqual({ row: 0, col: 3 });

    // The next step is still open, but the route beyond it is not
    grid.paint({ row: 0, col: 1 }, "wall");
    grid.paint({ row: 1, col: 1 }, "wall");
    grid.paint({ row: 1, col: 2 }, "wall");
    controller.tick();
    expect(controller.agents.garbageCollector.position).toEqual({ row: 1, col: 3 });
    expect(controller.agents.garbageCollector.goal).toEqual({ row: 0, col: 0 });
    expect(controller.diagnostics()).toEqual([]);
  });

  it("reports an unreachable goal every tick without crashing", () => {
    const messages: string[] = [];
    const controller = new CentralizedController({
      grid: GridModel.parse(["...#d", "...##", "....."]),
      start: {
        garbageCollector: { row: 2, col: 0 },
        vacuum: { row: 2, col: 4 },
        mop: { row: 0, col: 0 },
      },
      random: firstChoice,
      log: message => messages.push(message),
    });

    controller.tick();
    controller.tick();

    expect(messages[0]).toBe("[tick 1] planning failure: garbageCollector at (2, 0) cannot reach (0, 4)");
    expect(controller.diagnostics().map(d => [d.type, d.tick])).toEqual([
      ["planningFailure", 1],
      ["planningFailure", 2],
    ]);
    expect(controller.agents.garbageCollector.goal).toBeNull();
    expect(controller.violations()).toEqual([]);
  });
});
