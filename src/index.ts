export * from "./types.js";
export * from "./logger.js";
export * from "./config/engine.js";
export * from "./graph/types.js";
export * from "./graph/errors.js";
export * from "./graph/listGraph.js";
export * from "./graph/matrixGraph.js";
export * from "./algorithms/traversal.js";
export * from "./algorithms/dijkstra.js";
export * from "./algorithms/tarjan.js";
export * from "./algorithms/topological.js";
export * from "./algorithms/closure/index.js";
