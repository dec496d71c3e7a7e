import { DistanceOverflowError, InvalidWeightError } from "./errors.js";
import { isValidWeight } from "./schemas.js";
import type { VertexHandle } from "./vertex.js";

/** Distance reported for a path that reaches nothing. */
export const NO_DISTANCE = -1;

/** One traversed edge: the vertex it leads to and its weight. */
export interface PathStep<TValue = unknown> {
  readonly to: VertexHandle<TValue>;
  readonly weight: number;
}

export type PathDestination<TValue = unknown> =
  | { readonly found: true; readonly vertex: VertexHandle<TValue> }
  | { readonly found: false };

/** Outcome of {@link Path.extend}. */
export type PathExtension<TValue = unknown> =
  | { readonly ok: true; readonly path: Path<TValue> }
  | { readonly ok: false; readonly error: InvalidWeightError | DistanceOverflowError };

/** Visitor used by {@link Path.iterateEdges}; returning `false` stops the walk. */
export type PathStepVisitor<TValue = unknown> = (step: PathStep<TValue>, index: number) => boolean | void;

interface PathNode<TValue> {
  readonly step: PathStep<TValue>;
  readonly previous: PathNode<TValue> | null;
}

/**
 * Immutable route from an implicit source. Extensions share the prefix of the
 * path they extend, so growing a path by one edge is O(1) and paths recorded
 * for different destinations never alias mutable state.
 */
export class Path<TValue = unknown> {
  private constructor(
    private readonly start: VertexHandle<TValue> | null,
    private readonly tail: PathNode<TValue> | null,
    /** Number of edges on the path. */
    readonly length: number,
    private readonly total: number,
  ) {}

  /** Path reaching nothing: no edges and {@link NO_DISTANCE}. */
  static unreachable<TValue = unknown>(): Path<TValue> {
    return new Path<TValue>(null, null, 0, 0);
  }

  /** Zero-length route standing at {@link source}. */
  static origin<TValue = unknown>(source: VertexHandle<TValue>): Path<TValue> {
    return new Path<TValue>(source, null, 0, 0);
  }

  isReachable(): boolean {
    return this.start !== null || this.tail !== null;
  }

  /** Sum of the edge weights, or {@link NO_DISTANCE} for an unreachable path. */
  distance(): number {
    return this.isReachable() ? this.total : NO_DISTANCE;
  }

  /** Vertex the path ends at: the last edge target, or the source of an origin path. */
  destination(): PathDestination<TValue> {
    if (this.tail) {
      return { found: true, vertex: this.tail.step.to };
    }
    if (this.start) {
      return { found: true, vertex: this.start };
    }
    return { found: false };
  }

  /** Source the path was seeded from, when it is known. */
  source(): VertexHandle<TValue> | undefined {
    return this.start ?? undefined;
  }

  edges(): PathStep<TValue>[] {
    const steps: PathStep<TValue>[] = new Array<PathStep<TValue>>(this.length);
    let node = this.tail;
    for (let index = this.length - 1; node !== null; index -= 1) {
      steps[index] = node.step;
      node = node.previous;
    }
    return steps;
  }

  /** Vertices in traversal order, the source first when it is known. */
  vertices(): VertexHandle<TValue>[] {
    const visited = this.edges().map((step) => step.to);
    return this.start ? [this.start, ...visited] : visited;
  }

  iterateEdges(visit: PathStepVisitor<TValue>): void {
    const steps = this.edges();
    for (let index = 0; index < steps.length; index += 1) {
      if (visit(steps[index], index) === false) {
        return;
      }
    }
  }

  /**
   * Returns a new path with one more edge. Negative or fractional weights, and
   * totals past `Number.MAX_SAFE_INTEGER`, are rejected and leave this path
   * untouched.
   */
  extend(to: VertexHandle<TValue>, weight: number): PathExtension<TValue> {
    if (!isValidWeight(weight)) {
      return { ok: false, error: new InvalidWeightError(weight) };
    }
    if (!Number.isSafeInteger(this.total + weight)) {
      return { ok: false, error: new DistanceOverflowError(this.total, weight) };
    }
    const node: PathNode<TValue> = { step: { to, weight }, previous: this.tail };
    return { ok: true, path: new Path(this.start, node, this.length + 1, this.total + weight) };
  }

  /** Renders every edge as `->weight [id]`, separated by spaces. */
  toString(): string {
    return this.edges()
      .map((step) => `->${step.weight} ${step.to.toString()}`)
      .join(" ");
  }
}
