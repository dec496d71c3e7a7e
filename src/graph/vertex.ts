import type { VertexId } from "./ids.js";

/** Directed arc stored in the outgoing list of its source vertex. */
export interface Edge {
  readonly to: VertexId;
  readonly weight: number;
}

/**
 * Arena entry owned by a graph. Records never point at each other: edges only
 * carry the identifier of their target.
 */
export interface VertexRecord<TValue> {
  readonly id: VertexId;
  outgoing: Edge[];
  value: TValue | undefined;
}

/** Subset of the graph API a handle needs to reach its record. */
export interface VertexStore<TValue> {
  hasVertex(ref: VertexRef<TValue>): boolean;
  getValue(ref: VertexRef<TValue>): TValue | undefined;
  setValue(ref: VertexRef<TValue>, value: TValue | undefined): void;
}

/**
 * Lightweight reference to a vertex. Handles only carry the identifier and the
 * owning graph, so any number of them may exist for the same vertex and they
 * stay safe to hold after the vertex is removed.
 */
export class VertexHandle<TValue = unknown> {
  constructor(
    readonly id: VertexId,
    readonly graph: VertexStore<TValue>,
  ) {}

  /** Payload attached by the caller; `undefined` once the vertex is removed. */
  get value(): TValue | undefined {
    return this.graph.getValue(this.id);
  }

  set value(value: TValue | undefined) {
    this.graph.setValue(this.id, value);
  }

  exists(): boolean {
    return this.graph.hasVertex(this.id);
  }

  equals(other: VertexHandle<TValue>): boolean {
    return this.graph === other.graph && this.id === other.id;
  }

  toString(): string {
    return formatVertexId(this.id);
  }
}

/** Vertex designated either by its handle or by its raw identifier. */
export type VertexRef<TValue = unknown> = VertexHandle<TValue> | VertexId;

export function formatVertexId(id: VertexId): string {
  return `[${id}]`;
}

/**
 * Removes every edge of {@link record} pointing at {@link target} while keeping
 * the order of the remaining edges. Returns the number of removed edges.
 */
export function stripEdgesTo<TValue>(record: VertexRecord<TValue>, target: VertexId): number {
  const kept = record.outgoing.filter((edge) => edge.to !== target);
  const removed = record.outgoing.length - kept.length;
  if (removed > 0) {
    record.outgoing = kept;
  }
  return removed;
}

/** Renders `[id] -> [target], [target]`, or `[id]` without outgoing edges. */
export function renderVertex<TValue>(record: VertexRecord<TValue>): string {
  const head = formatVertexId(record.id);
  if (record.outgoing.length === 0) {
    return head;
  }
  return `${head} -> ${record.outgoing.map((edge) => formatVertexId(edge.to)).join(", ")}`;
}
