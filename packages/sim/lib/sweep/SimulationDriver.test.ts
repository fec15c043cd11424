import { GridModel } from "./GridModel";
import { SimulationDriver, runSimulation } from "./SimulationDriver";
import { createController } from "./controllers";
import { SimulationFault } from "./errors";
import type { RandomFactory } from "./types";
import { keccak256, toHex } from "viem";
import { describe, expect, it } from "vitest";

const SEED = keccak256(toHex("driver-test"));
const firstChoice: RandomFactory = () => ({ roll: () => 0 });
const STRATEGIES = ["centralized", "decentralized"] as const;

describe("SimulationDriver", () => {
  it.each(STRATEGIES)("aborts a %s run that cannot finish once the watchdog limit is hit", strategy => {
    const messages: string[] = [];
    const log = (message: string) => messages.push(message);
    const controller = createController(strategy, {
      grid: GridModel.parse(["...#d", "...##", "....."]),
      start: {
        garbageCollector: { row: 2, col: 0 },
        vacuum: { row: 2, col: 4 },
        mop: { row: 0, col: 0 },
      },
      random: firstChoice,
      log,
    });
    const driver = new SimulationDriver(controller, { maxTicks: 10, seed: SEED, log });

    expect(driver.run()).toBe("aborted");
    expect(controller.tickCount).toBe(10);
    expect(controller.diagnostics().filter(d => d.type === "planningFailure")).toHaveLength(10);
    expect(messages.at(-1)).toBe("[tick 10] watchdog: not finished after 10 ticks, aborting");
    expect(driver.step()).toBe("aborted");
    expect(controller.tickCount).toBe(10);
  });

  it("pauses on a fault and resumes from the rolled-back state", () => {
    let jammed = true;
    const controller = createController("decentralized", {
      grid: GridModel.parse([".....", "..s..", ".u...", ".....", "....."]),
      start: {
        garbageCollector: { row: 4, col: 4 },
        vacuum: { row: 0, col: 1 },
        mop: { row: 1, col: 0 },
      },
      random: () => ({
        roll: () => {
          if (jammed) {
            jammed = false;
            throw new Error("dice jammed");
          }
          return 0;
        },
      }),
      log: () => undefined,
    });
    const driver = new SimulationDriver(controller, { maxTicks: 100, seed: SEED, log: () => undefined });

    expect(driver.step()).toBe("faulted");
    expect(driver.fault).toBeInstanceOf(SimulationFault);
    expect(driver.fault?.message).toBe("Simulation fault at tick 1: dice jammed");
    expect(driver.fault?.seed).toBe(SEED);
    expect(driver.fault?.summary).toBe(
      "decentralized @ tick 0: garbageCollector at (4, 4) idle [0/5, collecting]; vacuum at (0, 1) idle; mop at (1, 0) idle",
    );

    // Nothing happens until the caller resumes
    expect(driver.step()).toBe("faulted");
    expect(controller.tickCount).toBe(0);

    driver.resume();
    expect(driver.fault).toBeNull();
    expect(driver.step()).toBe("running");
    expect(controller.agentLocations()).toEqual({
      garbageCollector: { row: 4, col: 4 },
      vacuum: { row: 1, col: 1 },
      mop: { row: 0, col: 0 },
    });
  });

  it("starts finished on a grid with nothing to do", () => {
    const controller = createController("centralized", {
      grid: GridModel.parse(["B..", "..."]),
      start: {
        garbageCollector: { row: 1, col: 0 },
        vacuum: { row: 1, col: 1 },
        mop: { row: 1, col: 2 },
      },
      random: firstChoice,
      log: () => undefined,
    });
    const driver = new SimulationDriver(controller, { maxTicks: 5, log: () => undefined });
    expect(driver.status).toBe("finished");
    expect(driver.run()).toBe("finished");
    expect(controller.tickCount).toBe(0);
  });
});

describe("runSimulation", () => {
  it("gives the same report for the same seed", () => {
    for (const strategy of STRATEGIES) {
      const first = runSimulation({ seed: SEED, strategy }, () => undefined);
      const second = runSimulation({ seed: SEED, strategy }, () => undefined);
      expect(second).toEqual(first);
      expect(first.seed).toBe(SEED);
      expect(first.strategy).toBe(strategy);
      expect(first.ticks).toBeGreaterThan(0);
    }
  });
});
