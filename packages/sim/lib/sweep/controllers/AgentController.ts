import { AGENT_KINDS, GARBAGE_CAPACITY, HAZARD_CELLS } from "../constants";
import type { GridModel } from "../GridModel";
import {
  agentPriority,
  cloneRoster,
  createRoster,
  describeAgent,
  isBusy,
  refreshAgent,
  revalidateGoal,
  rosterOrder,
  visitCell,
} from "../agents";
import type { MoveOption, Neighbour } from "../avoidance";
import { DiagnosticLog, type Diagnostic, type InvariantViolation } from "../diagnostics";
import { type LogSink, consoleLogSink } from "../logging";
import { samePoint } from "../pathfinding";
import type { AgentLocations, AgentRoster, AgentState, Point, RandomFactory, RandomSource, StartPositions } from "../types";

export type Strategy = "centralized" | "decentralized";

/**
 * What every controller exposes to whoever drives the run.
 */
export interface AgentController {
  readonly strategy: Strategy;
  readonly grid: GridModel;
  readonly agents: AgentRoster;
  readonly tickCount: number;
  tick(): void;
  agentLocations(): AgentLocations;
  finished(): boolean;
  describe(): string;
  diagnostics(): readonly Diagnostic[];
  violations(): InvariantViolation[];
}

export type ControllerOptions = {
  grid: GridModel;
  start: StartPositions;
  random: RandomFactory;
  capacity?: number;
  log?: LogSink;
};

/**
 * Shared tick loop for both strategies.
 *
 * A tick steps the agents one at a time in AGENT_KINDS order, mutating positions and the grid in
 * place, so each agent decides against the positions its predecessors already moved to. If anything
 * throws half way, the grid, the agents and the diagnostics recorded so far are put back as they
 * were after the last committed tick before the error is rethrown.
 */
export abstract class BaseController implements AgentController {
  abstract readonly strategy: Strategy;

  readonly grid: GridModel;
  agents: AgentRoster;
  tickCount: number = 0;

  protected readonly diagnosticLog: DiagnosticLog;
  private readonly randomFor: RandomFactory;
  private mismatchReportedAt: number = -1;

  constructor({ grid, start, random, capacity = GARBAGE_CAPACITY, log = consoleLogSink }: ControllerOptions) {
    validateStart(grid, start);
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Garbage capacity must be a positive integer, got ${capacity}`);
    }
    this.grid = grid;
    this.agents = createRoster(start, capacity);
    this.randomFor = random;
    this.diagnosticLog = new DiagnosticLog(log);
  }

  /**
   * Decide and commit one agent's move for the current tick.
   */
  protected abstract stepAgent(agent: AgentState, random: RandomSource): void;

  // Strategy-specific state that has to roll back with a failed tick
  protected saveState(): void {}
  protected restoreState(): void {}

  tick(): void {
    const grid = this.grid.snapshot();
    const agents = cloneRoster(this.agents);
    const logged = this.diagnosticLog.length;
    this.saveState();

    try {
      const random = this.randomFor(this.tickCount);
      for (const agent of rosterOrder(this.agents)) {
        refreshAgent(agent, this.grid);
        revalidateGoal(agent, this.grid);
        this.stepAgent(agent, random);
      }
    } catch (error) {
      this.grid.restore(grid);
      this.agents = agents;
      this.diagnosticLog.truncate(logged);
      this.restoreState();
      throw error;
    }

    this.tickCount++;
    this.audit();
  }

  agentLocations(): AgentLocations {
    return {
      garbageCollector: { ...this.agents.garbageCollector.position },
      vacuum: { ...this.agents.vacuum.position },
      mop: { ...this.agents.mop.position },
    };
  }

  /**
   * True once every hazard is gone, no agent holds a goal, and the garbage collector is empty.
   *
   * The hazard total comes from the grid's counters; when everything claims to be done it is
   * checked against a full scan, and a disagreement is reported (once per tick) instead of trusted.
   */
  finished(): boolean {
    if (rosterOrder(this.agents).some(isBusy)) return false;
    const counted = this.grid.hazardCount();
    if (counted !== 0) return false;

    const scanned = this.grid.scanCount(HAZARD_CELLS);
    if (scanned !== 0) {
      if (this.mismatchReportedAt !== this.tickCount) {
        this.mismatchReportedAt = this.tickCount;
        this.diagnosticLog.report({ type: "finishMismatch", tick: this.tickCount, counted, scanned });
      }
      return false;
    }
    return true;
  }

  describe(): string {
    return `${this.strategy} @ tick ${this.tickCount}: ${rosterOrder(this.agents).map(describeAgent).join("; ")}`;
  }

  diagnostics(): readonly Diagnostic[] {
    return this.diagnosticLog.all();
  }

  violations(): InvariantViolation[] {
    return this.diagnosticLog.violations();
  }

  protected neighboursOf(agent: AgentState): Neighbour[] {
    return rosterOrder(this.agents)
      .filter(other => other.kind !== agent.kind)
      .map(other => ({ position: other.position, priority: agentPriority(other) }));
  }

  protected occupiedBy(agent: AgentState): Point[] {
    return rosterOrder(this.agents)
      .filter(other => other.kind !== agent.kind)
      .map(other => other.position);
  }

  /**
   * Move the agent (or keep it in place) and let it act on the cell it ends up on.
   */
  protected commit(agent: AgentState, option: MoveOption): void {
    agent.position = { ...option.position };
    visitCell(agent, this.grid);
  }

  protected reportPlanningFailure(agent: AgentState, goal: Point): void {
    this.diagnosticLog.report({
      type: "planningFailure",
      tick: this.tickCount + 1,
      agent: agent.kind,
      from: { ...agent.position },
      goal: { ...goal },
    });
  }

  private audit(): void {
    const garbage = this.agents.garbageCollector;
    if (garbage.load > garbage.capacity) {
      this.diagnosticLog.report({
        type: "overflow",
        tick: this.tickCount,
        load: garbage.load,
        capacity: garbage.capacity,
      });
    }

    const agents = rosterOrder(this.agents);
    const reported = new Set<string>();
    for (const agent of agents) {
      const sharing = agents.filter(other => samePoint(other.position, agent.position));
      const key = `${agent.position.row},${agent.position.col}`;
      if (sharing.length > 1 && !reported.has(key)) {
        reported.add(key);
        this.diagnosticLog.report({
          type: "collision",
          tick: this.tickCount,
          agents: sharing.map(other => other.kind),
          position: { ...agent.position },
        });
      }
    }
  }
}

function validateStart(grid: GridModel, start: StartPositions): void {
  AGENT_KINDS.forEach((kind, i) => {
    const pos = start[kind];
    if (!grid.inBounds(pos)) {
      throw new RangeError(`${kind} starts outside the grid at (${pos.row}, ${pos.col})`);
    }
    if (grid.isWall(pos)) {
      throw new RangeError(`${kind} starts inside a wall at (${pos.row}, ${pos.col})`);
    }
    for (const other of AGENT_KINDS.slice(0, i)) {
      if (samePoint(start[other], pos)) {
        throw new RangeError(`${kind} and ${other} both start at (${pos.row}, ${pos.col})`);
      }
    }
  });
}
