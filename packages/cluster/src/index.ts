export * from "./types.js";
export * from "./face-cluster.js";
export * from "./cube-cluster.js";
export * from "./extent.js";
