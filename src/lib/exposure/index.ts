/**
 * Exposure module - renders live snapshots for HTTP pull requests
 */
export * from "./types.js";
export * from "./render.js";
export * from "./server.js";
