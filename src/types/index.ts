/**
 * Shared type foundations for the market-intelligence tracker.
 */

export * from "./enums.js";
export * from "./subject.js";
export * from "./data-point.js";
export * from "./reference.js";
export * from "./audit.js";
export * from "./interview.js";
