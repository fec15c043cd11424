/**
 * Re-exports all constants from the constants/ folder.
 *
 * For targeted imports, use "./constants/cells" etc. directly.
 */

export * from "./constants/index";
