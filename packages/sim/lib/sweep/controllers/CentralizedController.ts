import type { Move } from "../constants";
import { selectGoal } from "../agents";
import { candidateMoves, chooseEvasiveMove, chooseIdleMove } from "../avoidance";
import type { GridModel } from "../GridModel";
import { applyMove, findPath, followPath, samePoint } from "../pathfinding";
import type { AgentState, Point, RandomSource } from "../types";
import { BaseController } from "./AgentController";

/**
 * Plans a full A* path for every agent every tick and advances each one step along it.
 *
 * The garbage collector is the exception once it is returning to a bin: it keeps the path it
 * committed to and walks it to the end without looking at goals again, re-planning only when the
 * next step is blocked, a wall is painted across the route, or the bin disappears.
 */
export class CentralizedController extends BaseController {
  readonly strategy = "centralized" as const;

  // Remaining moves of the garbage collector's committed bin trip
  private returnPlan: Move[] | null = null;
  private savedReturnPlan: Move[] | null = null;

  protected override saveState(): void {
    this.savedReturnPlan = this.returnPlan === null ? null : [...this.returnPlan];
  }

  protected override restoreState(): void {
    this.returnPlan = this.savedReturnPlan;
  }

  protected stepAgent(agent: AgentState, random: RandomSource): void {
    const grid = this.grid;
    const occupied = this.occupiedBy(agent);
    const neighbours = this.neighboursOf(agent);

    if (agent.kind === "garbageCollector") {
      if (agent.mode !== "returningToBin" || agent.goal === null) {
        this.returnPlan = null;
      } else if (this.returnPlan !== null && this.returnPlan.length > 0) {
        const move = this.returnPlan[0];
        const route = followPath(agent.position, this.returnPlan);
        const next = route[0];
        if (routeIntact(grid, route, agent.goal) && !occupied.some(pos => samePoint(pos, next))) {
          this.returnPlan.shift();
          this.commit(agent, { move, position: next });
          if (agent.mode !== "returningToBin") this.returnPlan = null;
          return;
        }
        this.returnPlan = null;
      }
    }

    agent.goal = selectGoal(agent, grid);
    const options = candidateMoves(grid, agent.position, occupied);

    if (agent.goal === null) {
      this.commit(agent, chooseIdleMove(options, neighbours, random));
      return;
    }
    if (samePoint(agent.goal, agent.position)) {
      this.commit(agent, options[0]);
      return;
    }

    const path = findPath(grid, agent.position, agent.goal);
    if (path === null) {
      this.reportPlanningFailure(agent, agent.goal);
      agent.goal = null;
      this.commit(agent, options[0]);
      return;
    }

    const next = applyMove(agent.position, path[0]);
    if (occupied.some(pos => samePoint(pos, next))) {
      // Next step is taken: get out of the way and plan again next tick
      if (agent.kind === "garbageCollector") this.returnPlan = null;
      this.commit(agent, chooseEvasiveMove(options, neighbours, random));
      return;
    }

    if (agent.kind === "garbageCollector" && agent.mode === "returningToBin") {
      this.returnPlan = path.slice(1);
    }
    this.commit(agent, { move: path[0], position: next });
    if (agent.kind === "garbageCollector" && agent.mode !== "returningToBin") this.returnPlan = null;
  }
}

// Still ends on the goal and crosses no wall painted since it was planned
function routeIntact(grid: GridModel, route: readonly Point[], goal: Point): boolean {
  const end = route.at(-1);
  return end !== undefined && samePoint(end, goal) && route.every(cell => grid.inBounds(cell) && !grid.isWall(cell));
}
