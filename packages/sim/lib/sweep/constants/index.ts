/**
 * Re-exports all constants from submodules.
 */

export * from "./cells";
export * from "./agents";
export * from "./movement";
export * from "./goals";
export * from "./run";
