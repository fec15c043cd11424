/**
 * Goal selection constants.
 */

// Cells up to this much further than the nearest match still compete in best-cell search
export const COMPARABLE_DISTANCE_SLACK = 1;

// How many steps one unit of convex-hull depth is worth
export const HULL_DEPTH_WEIGHT = 0.5;
