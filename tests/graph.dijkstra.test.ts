import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { Graph } from "../src/graph/graph.js";
import type { VertexHandle } from "../src/graph/vertex.js";
import type { Path } from "../src/graph/path.js";
import { StructuredLogger, type LogEntry } from "../src/logger.js";

type Edge = readonly [from: number, to: number, weight: number];

/** Builds a graph whose vertices are addressed by their creation index. */
function buildGraph(mode: "directed" | "symmetric", size: number, edges: readonly Edge[]) {
  const graph = new Graph(mode);
  const vertices: VertexHandle[] = [];
  for (let index = 0; index < size; index += 1) {
    vertices.push(graph.newVertex());
  }
  for (const [from, to, weight] of edges) {
    graph.addEdge(vertices[from], vertices[to], weight);
  }
  return { graph, vertices };
}

function distancesByIndex(vertices: VertexHandle[], paths: ReadonlyMap<number, Path>): Array<number | undefined> {
  return vertices.map((vertex) => paths.get(vertex.id)?.distance());
}

function route(path: Path | undefined): number[] {
  return path ? path.vertices().map((vertex) => vertex.id) : [];
}

const CHAIN_EDGES: readonly Edge[] = [
  [0, 2, 1],
  [2, 4, 2],
  [2, 5, 3],
  [3, 5, 4],
  [4, 5, 5],
  [5, 1, 6],
];

describe("dijkstra shortest paths", () => {
  describe("shortestPaths", () => {
    it("resolves every reachable vertex of a directed graph", () => {
      const { graph, vertices } = buildGraph("directed", 6, CHAIN_EDGES);

      const paths = graph.shortestPaths(vertices[0]);

      expect(distancesByIndex(vertices, paths)).to.deep.equal([0, 10, 1, undefined, 3, 4]);
      expect(paths.has(vertices[3].id)).to.equal(false);
      expect(route(paths.get(vertices[1].id))).to.deep.equal([
        vertices[0].id,
        vertices[2].id,
        vertices[5].id,
        vertices[1].id,
      ]);
      expect(route(paths.get(vertices[5].id))).to.deep.equal([vertices[0].id, vertices[2].id, vertices[5].id]);
    });

    it("follows the heavier first hop when the chain starts with weight 3", () => {
      const edges: readonly Edge[] = [[0, 2, 3], ...CHAIN_EDGES.slice(1)];
      const { graph, vertices } = buildGraph("directed", 6, edges);

      const paths = graph.shortestPaths(vertices[0]);

      expect(distancesByIndex(vertices, paths)).to.deep.equal([0, 12, 3, undefined, 5, 6]);
    });

    it("walks mirrored edges of a symmetric graph", () => {
      const { graph, vertices } = buildGraph("symmetric", 3, [
        [0, 1, 1],
        [1, 2, 2],
      ]);

      const paths = graph.shortestPaths(vertices[1]);

      expect(distancesByIndex(vertices, paths)).to.deep.equal([1, 0, 2]);
    });

    it("maps the source to an empty zero-length path", () => {
      const { graph, vertices } = buildGraph("directed", 2, [
        [0, 1, 4],
        [1, 0, 1],
      ]);

      const origin = graph.shortestPaths(vertices[0]).get(vertices[0].id);

      expect(origin?.distance()).to.equal(0);
      expect(origin?.length).to.equal(0);
      expect(origin?.edges()).to.deep.equal([]);
    });

    it("keeps the first discovered route among equal-length candidates", () => {
      const { graph, vertices } = buildGraph("directed", 4, [
        [0, 1, 1],
        [0, 2, 1],
        [1, 3, 1],
        [2, 3, 1],
      ]);

      const path = graph.shortestPaths(vertices[0]).get(vertices[3].id);

      expect(path?.distance()).to.equal(2);
      expect(route(path)).to.deep.equal([vertices[0].id, vertices[1].id, vertices[3].id]);
    });

    it("picks the lightest of parallel edges and honours zero weights", () => {
      const { graph, vertices } = buildGraph("directed", 3, [
        [0, 1, 5],
        [0, 1, 2],
        [1, 2, 0],
      ]);

      const paths = graph.shortestPaths(vertices[0]);

      expect(distancesByIndex(vertices, paths)).to.deep.equal([0, 2, 2]);
      expect(paths.get(vertices[1].id)?.edges().map((step) => step.weight)).to.deep.equal([2]);
    });

    it("ignores vertices removed before the query", () => {
      const { graph, vertices } = buildGraph("directed", 3, [
        [0, 1, 1],
        [1, 2, 1],
      ]);
      graph.removeVertex(vertices[1]);

      const paths = graph.shortestPaths(vertices[0]);

      expect([...paths.keys()]).to.deep.equal([vertices[0].id]);
    });

    it("returns an empty mapping for an unknown source", () => {
      const { graph } = buildGraph("directed", 2, [[0, 1, 1]]);

      expect(graph.shortestPaths(99).size).to.equal(0);
    });
  });

  describe("shortestPath", () => {
    it("drops routes whose total would leave the safe integer range", () => {
      const onEntry = sinon.spy();
      const logger = new StructuredLogger({ write: () => undefined, onEntry });
      const graph = new Graph("directed", { logger });
      const [a, b, c, d] = [graph.newVertex(), graph.newVertex(), graph.newVertex(), graph.newVertex()];
      graph.addEdge(a, b, Number.MAX_SAFE_INTEGER);
      graph.addEdge(a, c, Number.MAX_SAFE_INTEGER);
      graph.addEdge(b, d, 2);
      graph.addEdge(c, d, 1);

      const path = graph.shortestPath(a, d);

      expect(path.isReachable()).to.equal(false);
      expect(path.distance()).to.equal(-1);
      const entries: LogEntry[] = onEntry.getCalls().map((call) => call.args[0]);
      expect(entries.map((entry) => entry.message)).to.deep.equal([
        "distance_overflow",
        "distance_overflow",
        "shortest_paths_completed",
      ]);
      expect(entries[0].payload).to.deep.equal({ from: b.id, to: d.id, weight: 2 });
      expect(entries[1].payload).to.deep.equal({ from: c.id, to: d.id, weight: 1 });
      expect(distancesByIndex([a, b, c, d], graph.shortestPaths(a))).to.deep.equal([
        0,
        Number.MAX_SAFE_INTEGER,
        Number.MAX_SAFE_INTEGER,
        undefined,
      ]);
    });


    it("returns the optimal route to the destination", () => {
      const { graph, vertices } = buildGraph("directed", 6, CHAIN_EDGES);

      const path = graph.shortestPath(vertices[0], vertices[5]);
      const destination = path.destination();

      expect(path.distance()).to.equal(4);
      expect(destination.found && destination.vertex.id).to.equal(vertices[5].id);
      expect(path.toString()).to.equal(`->1 [${vertices[2].id}] ->3 [${vertices[5].id}]`);
    });

    it("reports an unreachable destination through the sentinel", () => {
      const { graph, vertices } = buildGraph("directed", 6, CHAIN_EDGES);

      const path = graph.shortestPath(vertices[0], vertices[3]);

      expect(path.distance()).to.equal(-1);
      expect(path.destination()).to.deep.equal({ found: false });
      expect(path.edges()).to.deep.equal([]);
    });

    it("returns the zero-length path when source and destination match", () => {
      const { graph, vertices } = buildGraph("directed", 2, [[0, 1, 3]]);

      expect(graph.shortestPath(vertices[1], vertices[1]).distance()).to.equal(0);
    });

    it("returns the unreachable path for a removed destination", () => {
      const { graph, vertices } = buildGraph("directed", 2, [[0, 1, 3]]);
      graph.removeVertex(vertices[1]);

      expect(graph.shortestPath(vertices[0], vertices[1]).isReachable()).to.equal(false);
    });
  });

  describe("traverseShortestPaths", () => {
    it("visits vertices by non-decreasing distance", () => {
      const { graph, vertices } = buildGraph("directed", 6, CHAIN_EDGES);
      const order: Array<[number, number]> = [];

      const summary = graph.traverseShortestPaths(vertices[0], (vertex, path) => {
        order.push([vertex.id, path.distance()]);
      });

      expect(order).to.deep.equal([
        [vertices[0].id, 0],
        [vertices[2].id, 1],
        [vertices[4].id, 3],
        [vertices[5].id, 4],
        [vertices[1].id, 10],
      ]);
      expect(summary).to.deep.equal({ resolved: 5, stoppedEarly: false });
    });

    it("stops as soon as the visitor asks for it", () => {
      const { graph, vertices } = buildGraph("directed", 6, CHAIN_EDGES);
      const visit = sinon.spy((vertex: VertexHandle) => vertex.id !== vertices[4].id);

      const summary = graph.traverseShortestPaths(vertices[0], visit);

      sinon.assert.callCount(visit, 3);
      expect(summary).to.deep.equal({ resolved: 3, stoppedEarly: true });
    });

    it("logs a completion summary", () => {
      const onEntry = sinon.spy();
      const logger = new StructuredLogger({ write: () => undefined, onEntry });
      const graph = new Graph("directed", { logger });
      const a = graph.newVertex();
      const b = graph.newVertex();
      graph.addEdge(a, b, 2);

      graph.shortestPath(a, b);

      const entries: LogEntry[] = onEntry.getCalls().map((call) => call.args[0]);
      expect(entries.map((entry) => entry.message)).to.deep.equal(["shortest_paths_completed"]);
      expect(entries[0].payload).to.deep.equal({ source: a.id, resolved: 2, stopped_early: true });
    });
  });
});
