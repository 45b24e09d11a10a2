export * from "./line-reader.js";
export * from "./open-input.js";
