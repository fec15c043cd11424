export * from "./constants";
export * from "./types";
export * from "./GridModel";
export * from "./pathfinding";
export * from "./hull";
export * from "./goals";
export * from "./agents";
export * from "./avoidance";
export * from "./diagnostics";
export * from "./errors";
export * from "./logging";
export * from "./controllers";
export * from "./utils";
export * from "./config";
export * from "./SimulationDriver";
