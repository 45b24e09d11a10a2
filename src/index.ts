/**
 * linesample: uniform reservoir sampling over line streams of unknown length
 *
 * @packageDocumentation
 */

// Modules
export * from "./lib/reservoir/index.js";
export * from "./lib/termination/index.js";
export * from "./lib/input/index.js";
export * from "./lib/emitter/index.js";
export * from "./lib/exposure/index.js";
export * from "./lib/sampler/index.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
export * from "./utils/seed-manager.js";
