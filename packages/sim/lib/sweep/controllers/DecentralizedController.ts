import { selectGoal } from "../agents";
import { candidateMoves, chooseIdleMove, choosePursuitMove } from "../avoidance";
import { pathLength, samePoint } from "../pathfinding";
import type { AgentState, RandomSource } from "../types";
import { BaseController } from "./AgentController";

/**
 * Each agent keeps its own goal until it is reached or stops being worth having, and picks its
 * step locally: among the free neighbouring cells it takes the one that gets it closest to the
 * goal, leaving as much room to the others as it can.
 */
export class DecentralizedController extends BaseController {
  readonly strategy = "decentralized" as const;

  protected stepAgent(agent: AgentState, random: RandomSource): void {
    const grid = this.grid;
    const options = candidateMoves(grid, agent.position, this.occupiedBy(agent));
    const neighbours = this.neighboursOf(agent);

    if (agent.goal === null) agent.goal = selectGoal(agent, grid);
    const goal = agent.goal;

    if (goal === null) {
      this.commit(agent, chooseIdleMove(options, neighbours, random));
      return;
    }
    if (samePoint(goal, agent.position)) {
      this.commit(agent, options[0]);
      return;
    }

    const current = pathLength(grid, agent.position, goal);
    if (current === Infinity) {
      this.reportPlanningFailure(agent, goal);
      agent.goal = null;
      this.commit(agent, options[0]);
      return;
    }

    const move = choosePursuitMove(
      options,
      neighbours,
      position => (samePoint(position, agent.position) ? current : pathLength(grid, position, goal)),
      random,
    );
    this.commit(agent, move);
  }
}
