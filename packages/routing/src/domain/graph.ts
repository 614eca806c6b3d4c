/**
 * Graph model operations.
 *
 * The graph is a plain {@link Graph} value mutated in place by the pipeline
 * stages. Edges are only ever added: a stage that needs a segment walked
 * twice appends a parallel edge rather than changing a weight.
 */

import type { Graph, GraphEdge, Neighbor } from "@trail-postman/types";
import { InvariantError } from "./errors.js";

/** Create an edgeless graph with `nodeCount` nodes */
export function createGraph(nodeCount: number): Graph {
  if (!Number.isInteger(nodeCount) || nodeCount < 0) {
    throw new InvariantError(`Invalid node count: ${nodeCount}`);
  }
  const incidence: number[][] = [];
  for (let i = 0; i < nodeCount; i++) incidence.push([]);
  return { nodeCount, edges: [], incidence };
}

function assertNode(graph: Graph, node: number): void {
  if (!Number.isInteger(node) || node < 0 || node >= graph.nodeCount) {
    throw new InvariantError(`Node ${node} is outside the graph (0..${graph.nodeCount - 1})`);
  }
}

/**
 * Append an undirected edge. Parallel edges and self-loops are allowed;
 * a self-loop is listed twice in its node's incidence list.
 */
export function addEdge(graph: Graph, from: number, to: number, weight: number): GraphEdge {
  assertNode(graph, from);
  assertNode(graph, to);
  if (!Number.isInteger(weight) || weight < 0) {
    throw new InvariantError(`Edge (${from}, ${to}) has invalid weight ${weight}`);
  }

  const edge: GraphEdge = { id: graph.edges.length, from, to, weight };
  graph.edges.push(edge);
  incidentEdgeIds(graph, from).push(edge.id);
  incidentEdgeIds(graph, to).push(edge.id);
  return edge;
}

/** Append a copy of an existing edge (same endpoints and weight) */
export function duplicateEdge(graph: Graph, edge: GraphEdge): GraphEdge {
  return addEdge(graph, edge.from, edge.to, edge.weight);
}

function incidentEdgeIds(graph: Graph, node: number): number[] {
  const ids = graph.incidence[node];
  if (!ids) {
    throw new InvariantError(`Node ${node} has no incidence list`);
  }
  return ids;
}

export function getEdge(graph: Graph, edgeId: number): GraphEdge {
  const edge = graph.edges[edgeId];
  if (!edge) {
    throw new InvariantError(`Edge ${edgeId} does not exist`);
  }
  return edge;
}

/** The endpoint of `edge` that is not `node` (itself, for a self-loop) */
export function otherEndpoint(edge: GraphEdge, node: number): number {
  if (edge.from === node) return edge.to;
  if (edge.to === node) return edge.from;
  throw new InvariantError(`Edge ${edge.id} (${edge.from}, ${edge.to}) is not incident to node ${node}`);
}

/** Number of edge endpoints at `node` */
export function degree(graph: Graph, node: number): number {
  assertNode(graph, node);
  return incidentEdgeIds(graph, node).length;
}

/** Edges at `node` as (target, weight) pairs, in insertion order */
export function neighbors(graph: Graph, node: number): Neighbor[] {
  assertNode(graph, node);
  return incidentEdgeIds(graph, node).map((edgeId) => {
    const edge = getEdge(graph, edgeId);
    return { target: otherEndpoint(edge, node), weight: edge.weight, edgeId };
  });
}

/** Nodes with an odd degree, ascending */
export function oddDegreeNodes(graph: Graph): number[] {
  const odd: number[] = [];
  for (let node = 0; node < graph.nodeCount; node++) {
    if (degree(graph, node) % 2 === 1) odd.push(node);
  }
  return odd;
}

/** Sum of all edge weights (feet) */
export function totalWeight(graph: Graph): number {
  let total = 0;
  for (const edge of graph.edges) total += edge.weight;
  return total;
}

/**
 * First node that cannot be reached from `start` although it has edges
 * (or `start` itself when it is isolated in a graph that has edges).
 * Returns null when every edge is reachable.
 */
export function findUnreachableNode(graph: Graph, start: number): number | null {
  assertNode(graph, start);
  if (graph.edges.length === 0) return null;
  if (degree(graph, start) === 0) return start;

  const visited = new Set<number>([start]);
  const queue: number[] = [start];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    for (const { target } of neighbors(graph, current)) {
      if (!visited.has(target)) {
        visited.add(target);
        queue.push(target);
      }
    }
  }

  for (let node = 0; node < graph.nodeCount; node++) {
    if (!visited.has(node) && degree(graph, node) > 0) return node;
  }
  return null;
}

/** Whether every edge can be reached from `start` */
export function isConnected(graph: Graph, start: number): boolean {
  return findUnreachableNode(graph, start) === null;
}
