import type { StructuredLogger } from "../logger.js";
import type { VertexId } from "./ids.js";
import { NO_DISTANCE, Path } from "./path.js";
import { DecreaseKeyQueue } from "./priorityQueue.js";
import type { Edge, VertexHandle, VertexRef } from "./vertex.js";

/** Read-only view of a graph the traversal walks over. */
export interface ShortestPathGraph<TValue> {
  vertexIds(): VertexId[];
  /** Handle for {@link ref}, or `undefined` when the graph does not own it. */
  vertex(ref: VertexRef<TValue>): VertexHandle<TValue> | undefined;
  edgesFrom(ref: VertexRef<TValue>): readonly Edge[];
}

/**
 * Receives every resolved vertex together with its final shortest path, in
 * non-decreasing distance order. Returning `false` stops the traversal.
 */
export type ResolvedVertexVisitor<TValue> = (vertex: VertexHandle<TValue>, path: Path<TValue>) => boolean | void;

export interface TraversalOptions {
  readonly logger?: StructuredLogger;
}

export interface TraversalSummary {
  /** Number of vertices handed to the visitor, the source included. */
  readonly resolved: number;
  /** Whether the visitor interrupted the traversal. */
  readonly stoppedEarly: boolean;
}

/**
 * Single-source Dijkstra. Every vertex is queued up front (the source at 0,
 * the others at {@link NO_DISTANCE}); the traversal stops once the queue is
 * drained, an unresolved vertex reaches the head, or the visitor asks to stop.
 *
 * Relaxation uses a strict comparison, so among equal-length routes the one
 * discovered first is kept.
 */
export function traverseShortestPaths<TValue>(
  graph: ShortestPathGraph<TValue>,
  source: VertexRef<TValue>,
  visit: ResolvedVertexVisitor<TValue>,
  options: TraversalOptions = {},
): TraversalSummary {
  const origin = graph.vertex(source);
  if (!origin) {
    return { resolved: 0, stoppedEarly: false };
  }

  const paths = new Map<VertexId, Path<TValue>>([[origin.id, Path.origin(origin)]]);
  const queue = new DecreaseKeyQueue<VertexId>();
  for (const id of graph.vertexIds()) {
    queue.push(id, id === origin.id ? 0 : NO_DISTANCE);
  }

  let resolved = 0;
  let stoppedEarly = false;
  for (let closest = queue.popMinimum(); closest && closest.priority >= 0; closest = queue.popMinimum()) {
    const current = graph.vertex(closest.key);
    const currentPath = paths.get(closest.key);
    if (!current || !currentPath) {
      continue;
    }

    resolved += 1;
    if (visit(current, currentPath) === false) {
      stoppedEarly = true;
      break;
    }

    for (const edge of graph.edgesFrom(closest.key)) {
      if (edge.to === origin.id) {
        continue;
      }
      const known = paths.get(edge.to)?.distance() ?? NO_DISTANCE;
      const candidate = closest.priority + edge.weight;
      if (!Number.isSafeInteger(candidate)) {
        options.logger?.warn("distance_overflow", { from: closest.key, to: edge.to, weight: edge.weight });
        continue;
      }
      if (known >= 0 && candidate >= known) {
        continue;
      }
      const target = graph.vertex(edge.to);
      if (!target) {
        continue;
      }
      const extension = currentPath.extend(target, edge.weight);
      if (!extension.ok) {
        options.logger?.warn("path_extension_rejected", {
          from: closest.key,
          to: edge.to,
          code: extension.error.code,
          weight: edge.weight,
        });
        continue;
      }
      paths.set(edge.to, extension.path);
      queue.update(edge.to, candidate);
    }
  }

  options.logger?.debug("shortest_paths_completed", {
    source: origin.id,
    resolved,
    stopped_early: stoppedEarly,
  });
  return { resolved, stoppedEarly };
}

/**
 * Shortest path from {@link source} to {@link destination}. The traversal
 * stops as soon as the destination resolves; an unreachable (or unknown)
 * destination yields {@link Path.unreachable}.
 */
export function shortestPath<TValue>(
  graph: ShortestPathGraph<TValue>,
  source: VertexRef<TValue>,
  destination: VertexRef<TValue>,
  options: TraversalOptions = {},
): Path<TValue> {
  const target = graph.vertex(destination);
  if (!target) {
    return Path.unreachable<TValue>();
  }

  let found = Path.unreachable<TValue>();
  traverseShortestPaths(
    graph,
    source,
    (vertex, path) => {
      if (vertex.id !== target.id) {
        return true;
      }
      found = path;
      return false;
    },
    options,
  );
  return found;
}

/**
 * Shortest paths from {@link source} to every reachable vertex, keyed by
 * vertex identifier. Unreachable vertices are absent; the source maps to its
 * zero-length path. Routes whose total would exceed `Number.MAX_SAFE_INTEGER`
 * are not followed.
 */
export function shortestPaths<TValue>(
  graph: ShortestPathGraph<TValue>,
  source: VertexRef<TValue>,
  options: TraversalOptions = {},
): ReadonlyMap<VertexId, Path<TValue>> {
  const result = new Map<VertexId, Path<TValue>>();
  traverseShortestPaths(
    graph,
    source,
    (vertex, path) => {
      result.set(vertex.id, path);
    },
    options,
  );
  return result;
}
