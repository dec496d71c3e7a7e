import type { StructuredLogger } from "../logger.js";
import {
  shortestPath,
  shortestPaths,
  traverseShortestPaths,
  type ResolvedVertexVisitor,
  type ShortestPathGraph,
  type TraversalOptions,
  type TraversalSummary,
} from "./dijkstra.js";
import { InvalidWeightError, UnknownVertexError } from "./errors.js";
import { createIdGenerator, type IdGenerator, type VertexId } from "./ids.js";
import type { Path } from "./path.js";
import { isValidWeight, parseGraphMode, type GraphMode } from "./schemas.js";
import {
  VertexHandle,
  renderVertex,
  stripEdgesTo,
  type Edge,
  type VertexRecord,
  type VertexRef,
  type VertexStore,
} from "./vertex.js";

export interface GraphOptions {
  /** Receives debug traces of mutations and queries. Graphs are silent without it. */
  readonly logger?: StructuredLogger;
}

/**
 * Adjacency-list graph with integer edge weights. Vertex records live in an
 * arena keyed by identifier, in creation order; callers hold
 * {@link VertexHandle}s. In `symmetric` mode every edge insertion and removal
 * is mirrored on the reverse direction.
 *
 * Only identifier allocation is safe to interleave with other work; callers
 * sharing a graph must serialise mutations and queries themselves.
 */
export class Graph<TValue = unknown> implements VertexStore<TValue>, ShortestPathGraph<TValue> {
  readonly mode: GraphMode;
  private readonly records = new Map<VertexId, VertexRecord<TValue>>();
  private readonly nextId: IdGenerator = createIdGenerator();
  private readonly logger?: StructuredLogger;
  private edgeTotal = 0;

  constructor(mode: GraphMode, options: GraphOptions = {}) {
    this.mode = parseGraphMode(mode);
    if (options.logger) {
      this.logger = options.logger;
    }
  }

  get symmetric(): boolean {
    return this.mode === "symmetric";
  }

  get vertexCount(): number {
    return this.records.size;
  }

  /** Number of stored edge records; a mirrored edge counts twice. */
  get edgeCount(): number {
    return this.edgeTotal;
  }

  newVertex(value?: TValue): VertexHandle<TValue> {
    const id = this.nextId();
    this.records.set(id, { id, outgoing: [], value });
    return new VertexHandle(id, this);
  }

  /**
   * Removes the vertex and every edge pointing at it. Costs a pass over all
   * outgoing lists. Returns `false` when the vertex is not part of the graph.
   */
  removeVertex(ref: VertexRef<TValue>): boolean {
    const record = this.lookup(ref);
    if (!record) {
      return false;
    }
    this.records.delete(record.id);
    let incoming = 0;
    for (const other of this.records.values()) {
      incoming += stripEdgesTo(other, record.id);
    }
    this.edgeTotal -= record.outgoing.length + incoming;
    this.logger?.debug("vertex_removed", {
      vertex: record.id,
      outgoing_removed: record.outgoing.length,
      incoming_removed: incoming,
    });
    return true;
  }

  /**
   * Appends `from → to` (and `to → from` in symmetric mode). Parallel edges
   * are kept side by side.
   */
  addEdge(from: VertexRef<TValue>, to: VertexRef<TValue>, weight: number): void {
    if (!isValidWeight(weight)) {
      throw new InvalidWeightError(weight);
    }
    const source = this.requireRecord(from);
    const target = this.requireRecord(to);
    source.outgoing.push({ to: target.id, weight });
    this.edgeTotal += 1;
    if (this.symmetric) {
      target.outgoing.push({ to: source.id, weight });
      this.edgeTotal += 1;
    }
  }

  /**
   * Removes every `from → to` edge, plus every `to → from` edge in symmetric
   * mode. Returns the number of edge records removed.
   */
  removeEdges(from: VertexRef<TValue>, to: VertexRef<TValue>): number {
    const source = this.lookup(from);
    const target = this.lookup(to);
    if (!source || !target) {
      return 0;
    }
    let removed = stripEdgesTo(source, target.id);
    if (this.symmetric) {
      removed += stripEdgesTo(target, source.id);
    }
    this.edgeTotal -= removed;
    this.logger?.debug("edges_removed", { from: source.id, to: target.id, removed });
    return removed;
  }

  hasVertex(ref: VertexRef<TValue>): boolean {
    return this.lookup(ref) !== undefined;
  }

  hasEdge(from: VertexRef<TValue>, to: VertexRef<TValue>): boolean {
    const target = this.lookup(to);
    return target !== undefined && this.edgesFrom(from).some((edge) => edge.to === target.id);
  }

  vertex(ref: VertexRef<TValue>): VertexHandle<TValue> | undefined {
    const record = this.lookup(ref);
    return record ? new VertexHandle(record.id, this) : undefined;
  }

  /** Handles of every live vertex, in creation order. */
  vertices(): VertexHandle<TValue>[] {
    return this.vertexIds().map((id) => new VertexHandle(id, this));
  }

  vertexIds(): VertexId[] {
    return Array.from(this.records.keys());
  }

  /** Snapshot of the outgoing edges of {@link ref}; empty when the vertex is unknown. */
  edgesFrom(ref: VertexRef<TValue>): readonly Edge[] {
    return this.lookup(ref)?.outgoing.slice() ?? [];
  }

  getValue(ref: VertexRef<TValue>): TValue | undefined {
    return this.lookup(ref)?.value;
  }

  setValue(ref: VertexRef<TValue>, value: TValue | undefined): void {
    this.requireRecord(ref).value = value;
  }

  /** Shortest path between two vertices; unreachable when no route exists. */
  shortestPath(source: VertexRef<TValue>, destination: VertexRef<TValue>): Path<TValue> {
    return shortestPath(this, source, destination, this.traversalOptions());
  }

  /** Shortest paths to every vertex reachable from {@link source}. */
  shortestPaths(source: VertexRef<TValue>): ReadonlyMap<VertexId, Path<TValue>> {
    return shortestPaths(this, source, this.traversalOptions());
  }

  /** Streams resolved vertices to {@link visit}; see {@link traverseShortestPaths}. */
  traverseShortestPaths(source: VertexRef<TValue>, visit: ResolvedVertexVisitor<TValue>): TraversalSummary {
    return traverseShortestPaths(this, source, visit, this.traversalOptions());
  }

  /** One `[id] -> [id], [id]` line per vertex; diagnostic only. */
  debugString(): string {
    return Array.from(this.records.values(), (record) => renderVertex(record)).join("\n");
  }

  toString(): string {
    return this.debugString();
  }

  private traversalOptions(): TraversalOptions {
    return this.logger ? { logger: this.logger } : {};
  }

  private lookup(ref: VertexRef<TValue>): VertexRecord<TValue> | undefined {
    if (typeof ref === "number") {
      return this.records.get(ref);
    }
    return ref.graph === this ? this.records.get(ref.id) : undefined;
  }

  private requireRecord(ref: VertexRef<TValue>): VertexRecord<TValue> {
    const record = this.lookup(ref);
    if (!record) {
      throw new UnknownVertexError(typeof ref === "number" ? ref : ref.id);
    }
    return record;
  }
}
