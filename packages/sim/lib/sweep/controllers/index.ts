import { CentralizedController } from "./CentralizedController";
import { DecentralizedController } from "./DecentralizedController";
import type { AgentController, ControllerOptions, Strategy } from "./AgentController";

export * from "./AgentController";
export * from "./CentralizedController";
export * from "./DecentralizedController";

export function createController(strategy: Strategy, options: ControllerOptions): AgentController {
  return strategy === "centralized" ? new CentralizedController(options) : new DecentralizedController(options);
}
