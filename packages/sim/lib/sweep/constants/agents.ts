/**
 * Agent kind constants.
 * Defines the agent kinds, their stepping order, affinities, and collision priorities.
 */
import type { Cell } from "./cells";

// Stepping order within a tick - later agents see earlier agents' new positions
export const AGENT_KINDS = ["garbageCollector", "vacuum", "mop"] as const;

export type AgentKind = (typeof AGENT_KINDS)[number];

// What each kind turns a visited cell into
export const CLEAN_UP_RESULTS: Record<AgentKind, Partial<Record<Cell, Cell>>> = {
  garbageCollector: { dryTrash: "dusty", wetTrash: "soaked" },
  vacuum: { dusty: "empty" },
  mop: { soaked: "empty" },
};

// Cells each kind goes looking for (the garbage collector switches to bins when full)
export const AGENT_AFFINITIES: Record<AgentKind, ReadonlySet<Cell>> = {
  garbageCollector: new Set<Cell>(["dryTrash", "wetTrash"]),
  vacuum: new Set<Cell>(["dusty"]),
  mop: new Set<Cell>(["soaked"]),
};

// Added to an agent's distance when others measure their personal space against it
export const BASE_PRIORITY: Record<AgentKind, number> = {
  garbageCollector: 1,
  vacuum: 0,
  mop: 0,
};
export const URGENT_PRIORITY_BONUS = 1;

// Bags of trash the garbage collector carries before it must empty into a bin
export const GARBAGE_CAPACITY = 5;

// One-letter labels used by GridModel.render and the CLI
export const AGENT_GLYPHS: Record<AgentKind, string> = {
  garbageCollector: "G",
  vacuum: "V",
  mop: "M",
};
