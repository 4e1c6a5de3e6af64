export * from "./config.js";
export * from "./shells.js";
export * from "./smoke.js";
