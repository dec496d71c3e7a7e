export * from "./ids.js";
export * from "./errors.js";
export * from "./schemas.js";
export * from "./vertex.js";
export * from "./path.js";
export * from "./priorityQueue.js";
export * from "./dijkstra.js";
export * from "./graph.js";
