/**
 * Diagnostics raised while a run is in progress.
 *
 * - planningFailure: a goal could not be reached; the goal is dropped and picked again next tick.
 * - overflow: the garbage collector holds more than its capacity.
 * - collision: two agents ended a tick on the same cell.
 * - finishMismatch: the controller's bookkeeping says the run is done but a scan of the grid disagrees.
 *
 * The last three are invariant violations: never fatal during a run, always a bug.
 */
import type { AgentKind } from "./constants";
import type { LogSink } from "./logging";
import type { Point } from "./types";

export type PlanningFailure = {
  type: "planningFailure";
  tick: number;
  agent: AgentKind;
  from: Point;
  goal: Point;
};

export type OverflowViolation = {
  type: "overflow";
  tick: number;
  load: number;
  capacity: number;
};

export type CollisionViolation = {
  type: "collision";
  tick: number;
  agents: AgentKind[];
  position: Point;
};

export type FinishMismatch = {
  type: "finishMismatch";
  tick: number;
  counted: number;
  scanned: number;
};

export type Diagnostic = PlanningFailure | OverflowViolation | CollisionViolation | FinishMismatch;

export type InvariantViolation = Exclude<Diagnostic, PlanningFailure>;

export function isViolation(diagnostic: Diagnostic): diagnostic is InvariantViolation {
  return diagnostic.type !== "planningFailure";
}

const at = (p: Point) => `(${p.row}, ${p.col})`;

export function formatDiagnostic(diagnostic: Diagnostic): string {
  switch (diagnostic.type) {
    case "planningFailure":
      return `[tick ${diagnostic.tick}] planning failure: ${diagnostic.agent} at ${at(diagnostic.from)} cannot reach ${at(diagnostic.goal)}`;
    case "overflow":
      return `[tick ${diagnostic.tick}] overflow: garbage collector holds ${diagnostic.load}/${diagnostic.capacity}`;
    case "collision":
      return `[tick ${diagnostic.tick}] collision: ${diagnostic.agents.join(", ")} share ${at(diagnostic.position)}`;
    case "finishMismatch":
      return `[tick ${diagnostic.tick}] finish mismatch: counters report ${diagnostic.counted} hazards, grid scan found ${diagnostic.scanned}`;
  }
}

/**
 * Collects diagnostics for a run and forwards each one to the log sink as it arrives.
 */
export class DiagnosticLog {
  private readonly entries: Diagnostic[] = [];

  constructor(private readonly log: LogSink) {}

  report(diagnostic: Diagnostic): void {
    this.entries.push(diagnostic);
    this.log(formatDiagnostic(diagnostic));
  }

  all(): readonly Diagnostic[] {
    return this.entries;
  }

  violations(): InvariantViolation[] {
    return this.entries.filter(isViolation);
  }

  // Drop entries recorded after a rolled-back tick began
  truncate(length: number): void {
    this.entries.length = length;
  }

  get length(): number {
    return this.entries.length;
  }
}
