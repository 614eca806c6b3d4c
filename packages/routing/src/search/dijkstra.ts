/**
 * Single-source shortest paths over the trail graph.
 *
 * Linear-scan Dijkstra, O(V²). Trail networks are small enough to author by
 * hand, so a priority queue buys nothing here. Selection ties go to the
 * lowest node index and relaxation uses a strict `<`, which makes the
 * materialized path deterministic for a given edge order.
 */

import type { Graph, GraphEdge, ShortestPathTree } from "@trail-postman/types";
import { getEdge, neighbors } from "../domain/graph.js";
import { InvariantError } from "../domain/errors.js";

/**
 * Compute distances from `source` to every node.
 *
 * Unreachable nodes keep a distance of `Infinity` and no previous edge.
 */
export function dijkstra(graph: Graph, source: number): ShortestPathTree {
  if (!Number.isInteger(source) || source < 0 || source >= graph.nodeCount) {
    throw new InvariantError(`Dijkstra source ${source} is outside the graph`);
  }

  const distances: number[] = new Array<number>(graph.nodeCount).fill(Number.POSITIVE_INFINITY);
  const previousEdge: (number | null)[] = new Array<number | null>(graph.nodeCount).fill(null);
  const visited: boolean[] = new Array<boolean>(graph.nodeCount).fill(false);
  distances[source] = 0;

  for (;;) {
    // Pick the closest unvisited node (first encountered on ties)
    let current = -1;
    let currentDistance = Number.POSITIVE_INFINITY;
    for (let node = 0; node < graph.nodeCount; node++) {
      const d = distances[node] ?? Number.POSITIVE_INFINITY;
      if (!visited[node] && d < currentDistance) {
        current = node;
        currentDistance = d;
      }
    }
    // Remaining unvisited nodes (if any) are unreachable
    if (current === -1) break;

    for (const neighbor of neighbors(graph, current)) {
      if (visited[neighbor.target]) continue;
      const candidate = neighbor.weight + currentDistance;
      if (candidate < (distances[neighbor.target] ?? Number.POSITIVE_INFINITY)) {
        distances[neighbor.target] = candidate;
        previousEdge[neighbor.target] = neighbor.edgeId;
      }
    }
    visited[current] = true;
  }

  return { source, distances, previousEdge };
}

/** Distance from the tree's source to `target` */
export function distanceTo(tree: ShortestPathTree, target: number): number {
  const distance = tree.distances[target];
  if (distance === undefined) {
    throw new InvariantError(`Node ${target} is missing from the shortest-path tree of ${tree.source}`);
  }
  return distance;
}

/**
 * Edges of the shortest path from the tree's source to `target`, in walking
 * order. Empty when `target` is the source.
 *
 * @throws InvariantError when `target` is unreachable
 */
export function shortestPath(tree: ShortestPathTree, graph: Graph, target: number): GraphEdge[] {
  if (distanceTo(tree, target) === Number.POSITIVE_INFINITY) {
    throw new InvariantError(`Node ${target} is not reachable from node ${tree.source}`);
  }

  const path: GraphEdge[] = [];
  let node = target;
  while (node !== tree.source) {
    const edgeId = tree.previousEdge[node];
    if (edgeId === null || edgeId === undefined) {
      throw new InvariantError(`Shortest-path tree of ${tree.source} has no edge into node ${node}`);
    }
    const edge = getEdge(graph, edgeId);
    path.push(edge);
    node = edge.from === node ? edge.to : edge.from;
    if (path.length > graph.edges.length) {
      throw new InvariantError(`Shortest-path tree of ${tree.source} contains a cycle`);
    }
  }
  return path.reverse();
}
