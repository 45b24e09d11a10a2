/**
 * Sampler module - runs a reservoir over a line stream until it ends or is interrupted
 */
export * from "./types.js";
export * from "./run.js";
