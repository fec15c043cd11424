/**
 * Per-kind agent behaviour.
 *
 * Each AgentKind gets one behaviour object supplying its goal selection, what it does when it
 * visits a cell, and how much priority it claims in collision avoidance. Agents themselves are plain
 * state (see AgentState); the grid is passed in by reference on every call.
 */
import {
  AGENT_AFFINITIES,
  AGENT_KINDS,
  type AgentKind,
  BASE_PRIORITY,
  BIN_CELLS,
  type Cell,
  GARBAGE_CAPACITY,
  TRASH_CELLS,
  URGENT_PRIORITY_BONUS,
} from "./constants";
import type { GridModel } from "./GridModel";
import { type CellFilter, findBestCell, findNearestCell } from "./goals";
import { reachableFrom, samePoint } from "./pathfinding";
import type { AgentRoster, AgentState, CleanerState, GarbageState, Point, StartPositions } from "./types";

/**
 * What a visit changed, for diagnostics and the caller's bookkeeping.
 */
export type VisitResult =
  | { type: "none" }
  | { type: "cleaned"; cell: Cell }
  | { type: "collected"; cell: Cell; load: number }
  | { type: "unloaded"; amount: number };

export interface AgentBehaviour<S extends AgentState> {
  readonly kind: S["kind"];
  // Cell types the agent is currently after
  targets(agent: S): ReadonlySet<Cell>;
  // Settle mode changes driven by the grid (e.g. no trash left) before choosing a goal
  refresh(agent: S, grid: GridModel): void;
  selectGoal(agent: S, grid: GridModel): Point | null;
  visit(agent: S, grid: GridModel): VisitResult;
  priority(agent: S): number;
  // Urgent agents are owed less personal space
  isUrgent(agent: S): boolean;
  // Whether the agent still has unfinished business that keeps the run going
  isBusy(agent: S): boolean;
}

/**
 * Run a goal search over the cells the agent can walk to. When every match is walled off the
 * unrestricted result is returned, so the planner reports the failure.
 */
function reachableGoal(
  grid: GridModel,
  origin: Point,
  search: (accept: CellFilter) => Point | null,
): Point | null {
  const reachable = reachableFrom(grid, origin);
  return search(cell => reachable[grid.index(cell)] === 1) ?? search(() => true);
}

const cleanerBehaviour = (kind: CleanerState["kind"]): AgentBehaviour<CleanerState> => ({
  kind,
  targets: () => AGENT_AFFINITIES[kind],
  refresh: () => undefined,
  selectGoal: (agent, grid) =>
    reachableGoal(grid, agent.position, accept => findBestCell(grid, agent.position, AGENT_AFFINITIES[kind], accept)),
  visit: (agent, grid) => {
    const cleaned = grid.cleanUp(agent.position, kind);
    if (agent.goal !== null && samePoint(agent.goal, agent.position)) agent.goal = null;
    return cleaned === null ? { type: "none" } : { type: "cleaned", cell: cleaned };
  },
  priority: () => BASE_PRIORITY[kind],
  isUrgent: () => false,
  isBusy: agent => agent.goal !== null,
});

/**
 * Garbage collector: bags trash until full, then must empty into a bin.
 *
 * collecting -> returningToBin when the load reaches capacity, or when the grid has no trash left
 * while something is still on board. returningToBin -> collecting when it unloads at a bin.
 */
export const garbageBehaviour: AgentBehaviour<GarbageState> = {
  kind: "garbageCollector",

  targets: agent => (agent.mode === "returningToBin" ? BIN_CELLS : TRASH_CELLS),

  refresh: (agent, grid) => {
    if (agent.mode === "collecting" && agent.load > 0 && (agent.load >= agent.capacity || !grid.has(TRASH_CELLS))) {
      agent.mode = "returningToBin";
      agent.goal = null;
    } else if (agent.mode === "returningToBin" && agent.load === 0) {
      agent.mode = "collecting";
      agent.goal = null;
    }
  },

  selectGoal: (agent, grid) =>
    reachableGoal(grid, agent.position, accept =>
      agent.mode === "returningToBin"
        ? findNearestCell(grid, agent.position, BIN_CELLS, accept)
        : findBestCell(grid, agent.position, TRASH_CELLS, accept),
    ),

  visit: (agent, grid) => {
    const here = grid.cellAt(agent.position);
    const atGoal = agent.goal !== null && samePoint(agent.goal, agent.position);

    if (here === "bin" && agent.load > 0) {
      const amount = agent.load;
      agent.load = 0;
      agent.mode = "collecting";
      agent.goal = null;
      return { type: "unloaded", amount };
    }

    if (agent.mode === "collecting" && agent.load < agent.capacity && TRASH_CELLS.has(here)) {
      grid.cleanUp(agent.position, "garbageCollector");
      agent.load++;
      if (atGoal) agent.goal = null;
      if (agent.load >= agent.capacity) {
        // Full: commit to a bin trip straight away
        agent.mode = "returningToBin";
        agent.goal = reachableGoal(grid, agent.position, accept =>
          findNearestCell(grid, agent.position, BIN_CELLS, accept),
        );
      }
      return { type: "collected", cell: here, load: agent.load };
    }

    if (atGoal && !garbageBehaviour.targets(agent).has(here)) agent.goal = null;
    return { type: "none" };
  },

  priority: agent => BASE_PRIORITY.garbageCollector + (garbageBehaviour.isUrgent(agent) ? URGENT_PRIORITY_BONUS : 0),

  isUrgent: agent => agent.load >= agent.capacity,

  isBusy: agent => agent.goal !== null || agent.load > 0,
};

export const vacuumBehaviour = cleanerBehaviour("vacuum");
export const mopBehaviour = cleanerBehaviour("mop");

/**
 * Dispatch helpers over the AgentState variant.
 */
export function behaviourTargets(agent: AgentState): ReadonlySet<Cell> {
  return agent.kind === "garbageCollector" ? garbageBehaviour.targets(agent) : AGENT_AFFINITIES[agent.kind];
}

export function refreshAgent(agent: AgentState, grid: GridModel): void {
  if (agent.kind === "garbageCollector") garbageBehaviour.refresh(agent, grid);
}

export function selectGoal(agent: AgentState, grid: GridModel): Point | null {
  return agent.kind === "garbageCollector"
    ? garbageBehaviour.selectGoal(agent, grid)
    : cleanerFor(agent).selectGoal(agent, grid);
}

export function visitCell(agent: AgentState, grid: GridModel): VisitResult {
  return agent.kind === "garbageCollector" ? garbageBehaviour.visit(agent, grid) : cleanerFor(agent).visit(agent, grid);
}

export function agentPriority(agent: AgentState): number {
  return agent.kind === "garbageCollector" ? garbageBehaviour.priority(agent) : cleanerFor(agent).priority(agent);
}

export function isBusy(agent: AgentState): boolean {
  return agent.kind === "garbageCollector" ? garbageBehaviour.isBusy(agent) : cleanerFor(agent).isBusy(agent);
}

function cleanerFor(agent: CleanerState): AgentBehaviour<CleanerState> {
  return agent.kind === "vacuum" ? vacuumBehaviour : mopBehaviour;
}

/**
 * Drop a cached goal that no longer points at something this agent wants
 * (the cell was cleaned, or edited from outside between ticks).
 *
 * @returns true if the goal was dropped
 */
export function revalidateGoal(agent: AgentState, grid: GridModel): boolean {
  if (agent.goal === null) return false;
  if (grid.inBounds(agent.goal) && behaviourTargets(agent).has(grid.cellAt(agent.goal))) return false;
  agent.goal = null;
  return true;
}

/**
 * Fresh agent states for a run.
 */
export function createRoster(start: StartPositions, capacity: number = GARBAGE_CAPACITY): AgentRoster {
  return {
    garbageCollector: {
      kind: "garbageCollector",
      position: { ...start.garbageCollector },
      goal: null,
      load: 0,
      capacity,
      mode: "collecting",
    },
    vacuum: { kind: "vacuum", position: { ...start.vacuum }, goal: null },
    mop: { kind: "mop", position: { ...start.mop }, goal: null },
  };
}

// Agents in stepping order
export function rosterOrder(roster: AgentRoster): AgentState[] {
  return AGENT_KINDS.map((kind: AgentKind) => roster[kind]);
}

export function cloneRoster(roster: AgentRoster): AgentRoster {
  const { garbageCollector, vacuum, mop } = roster;
  return {
    garbageCollector: { ...garbageCollector, position: { ...garbageCollector.position }, goal: cloneGoal(garbageCollector.goal) },
    vacuum: { ...vacuum, position: { ...vacuum.position }, goal: cloneGoal(vacuum.goal) },
    mop: { ...mop, position: { ...mop.position }, goal: cloneGoal(mop.goal) },
  };
}

function cloneGoal(goal: Point | null): Point | null {
  return goal === null ? null : { ...goal };
}

/**
 * One-line description of an agent for logs and summaries.
 */
export function describeAgent(agent: AgentState): string {
  const { row, col } = agent.position;
  const goal = agent.goal === null ? "idle" : `-> (${agent.goal.row}, ${agent.goal.col})`;
  if (agent.kind === "garbageCollector") {
    return `${agent.kind} at (${row}, ${col}) ${goal} [${agent.load}/${agent.capacity}, ${agent.mode}]`;
  }
  return `${agent.kind} at (${row}, ${col}) ${goal}`;
}
