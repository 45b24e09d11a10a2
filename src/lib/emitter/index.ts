/**
 * Emitter module - side-channel sinks for the input stream
 */
export * from "./types.js";
export * from "./stream-sink.js";
export * from "./file-sink.js";
export * from "./tee-sink.js";
export * from "./sample-writer.js";
