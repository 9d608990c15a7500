export * from "./types.js";
export * from "./gameFactory.js";
