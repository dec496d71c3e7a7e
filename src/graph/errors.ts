import type { VertexId } from "./ids.js";

/** Base error used by the graph container, path records and queries. */
export class GraphError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GraphError";
  }
}

/** Error raised when an edge weight is negative or not an integer. */
export class InvalidWeightError extends GraphError {
  public readonly code = "E-GRAPH-WEIGHT";
  public readonly hint = "edge weights must be non-negative integers";
  public readonly details: { weight: number };

  constructor(weight: number) {
    super(`invalid edge weight ${weight}`);
    this.name = "InvalidWeightError";
    this.details = { weight };
  }
}

/** Error raised when a path total would leave the exactly representable integer range. */
export class DistanceOverflowError extends GraphError {
  public readonly code = "E-GRAPH-OVERFLOW";
  public readonly hint = "keep path totals below Number.MAX_SAFE_INTEGER";
  public readonly details: { total: number; weight: number };

  constructor(total: number, weight: number) {
    super(`path total ${total} + ${weight} exceeds the safe integer range`);
    this.name = "DistanceOverflowError";
    this.details = { total, weight };
  }
}

/** Error raised when a mutation references a vertex the graph does not own. */
export class UnknownVertexError extends GraphError {
  public readonly code = "E-GRAPH-VERTEX";
  public readonly hint = "the vertex was removed or belongs to another graph";
  public readonly details: { vertexId: VertexId };

  constructor(vertexId: VertexId) {
    super(`vertex ${vertexId} is not part of the graph`);
    this.name = "UnknownVertexError";
    this.details = { vertexId };
  }
}

/** Error raised when the options given to a graph fail validation. */
export class GraphOptionsError extends GraphError {
  public readonly code = "E-GRAPH-OPTIONS";
  public readonly hint = "use mode 'directed' or 'symmetric'";
  public readonly details: { issues: string[] };

  constructor(issues: string[]) {
    super(`invalid graph options: ${issues.join("; ")}`);
    this.name = "GraphOptionsError";
    this.details = { issues };
  }
}
