import { type SimulationConfig, resolveConfig } from "./config";
import { type AgentController, createController } from "./controllers";
import type { InvariantViolation } from "./diagnostics";
import { SimulationFault } from "./errors";
import { type LogSink, consoleLogSink } from "./logging";
import type { Hex } from "./types";
import {
  defaultStartPositions,
  diceFor,
  generateGrid,
  hashGrid,
  hashPositions,
  randomStartPositions,
  tickDice,
} from "./utils";

export type RunStatus = "running" | "finished" | "aborted" | "faulted";

export type DriverOptions = {
  maxTicks: number;
  seed?: Hex | null;
  log?: LogSink;
};

/**
 * Runs a controller tick by tick, stopping when it reports finished, when the watchdog limit is
 * reached, or when a tick throws. A throwing tick pauses the run with the error wrapped in a
 * SimulationFault; `resume()` picks up from the state the controller rolled back to.
 */
export class SimulationDriver {
  readonly controller: AgentController;
  status: RunStatus = "running";
  fault: SimulationFault | null = null;

  private readonly maxTicks: number;
  private readonly seed: Hex | null;
  private readonly log: LogSink;

  constructor(controller: AgentController, { maxTicks, seed = null, log = consoleLogSink }: DriverOptions) {
    this.controller = controller;
    this.maxTicks = maxTicks;
    this.seed = seed;
    this.log = log;
    if (controller.finished()) this.status = "finished";
  }

  step(): RunStatus {
    if (this.status !== "running") return this.status;

    if (this.controller.tickCount >= this.maxTicks) {
      this.status = "aborted";
      this.log(`[tick ${this.controller.tickCount}] watchdog: not finished after ${this.maxTicks} ticks, aborting`);
      return this.status;
    }

    try {
      this.controller.tick();
    } catch (error) {
      this.fault = new SimulationFault(error, {
        tick: this.controller.tickCount + 1,
        seed: this.seed,
        summary: this.controller.describe(),
      });
      this.status = "faulted";
      this.log(`[tick ${this.fault.tick}] fault: ${this.fault.message} (seed ${this.seed ?? "none"}; ${this.fault.summary})`);
      return this.status;
    }

    if (this.controller.finished()) this.status = "finished";
    return this.status;
  }

  /**
   * Step until the run leaves the running state.
   *
   * @param onTick - Called after every tick that ran, e.g. to draw a frame
   */
  run(onTick?: (controller: AgentController) => void): RunStatus {
    while (this.status === "running") {
      const before = this.controller.tickCount;
      this.step();
      if (onTick && this.controller.tickCount > before) onTick(this.controller);
    }
    return this.status;
  }

  // Continue after a fault; the failed tick is retried from its rolled-back state
  resume(): void {
    if (this.status !== "faulted") return;
    this.fault = null;
    this.status = "running";
  }
}

export type RunReport = {
  seed: Hex;
  strategy: SimulationConfig["strategy"];
  outcome: RunStatus;
  ticks: number;
  mapHash: Hex;
  positionsHash: Hex;
  violations: InvariantViolation[];
};

/**
 * Build grid, agents, controller and driver from one seed and run to completion.
 * Identical configs give identical reports.
 */
export function buildSimulation(config: SimulationConfig, log: LogSink = consoleLogSink): SimulationDriver {
  const grid = generateGrid(config.seed, config);
  const start =
    config.start === "random" ? randomStartPositions(grid, diceFor(config.seed, "start")) : defaultStartPositions(grid);
  const controller = createController(config.strategy, {
    grid,
    start,
    random: tickDice(config.seed),
    capacity: config.capacity,
    log,
  });
  return new SimulationDriver(controller, { maxTicks: config.maxTicks, seed: config.seed, log });
}

export function reportRun(config: SimulationConfig, driver: SimulationDriver): RunReport {
  const { controller } = driver;
  return {
    seed: config.seed,
    strategy: config.strategy,
    outcome: driver.status,
    ticks: controller.tickCount,
    mapHash: hashGrid(controller.grid),
    positionsHash: hashPositions(controller.agentLocations()),
    violations: controller.violations(),
  };
}

export function runSimulation(overrides: Partial<SimulationConfig> = {}, log: LogSink = consoleLogSink): RunReport {
  const config = resolveConfig(overrides);
  const driver = buildSimulation(config, log);
  driver.run();
  return reportRun(config, driver);
}
