export * from "./coordinator.js";
