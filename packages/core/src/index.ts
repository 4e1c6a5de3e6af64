export * from "./types.js";
export * from "./voxel.js";
export * from "./indexing.js";
export * from "./debug.js";
export * from "./chunk.js";
