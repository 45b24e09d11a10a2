/**
 * Reservoir module - guarded store, sampling engine and snapshots
 */
export * from "./types.js";
export * from "./guard.js";
export * from "./reservoir.js";
