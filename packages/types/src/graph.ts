/**
 * Weighted undirected multigraph of a trail network.
 *
 * Nodes are dense integer indices (trail junctions and dead ends); edges are
 * trail segments weighted by their length in feet. Parallel edges are kept as
 * separate entries: a segment walked twice is two edges.
 */

/** An undirected edge between two nodes */
export interface GraphEdge {
  /** Insertion index, unique within a graph */
  id: number;
  from: number;
  to: number;
  /** Length in feet (non-negative integer) */
  weight: number;
}

/** One edge as seen from one of its endpoints */
export interface Neighbor {
  /** Node at the other end */
  target: number;
  weight: number;
  edgeId: number;
}

/** The complete graph structure */
export interface Graph {
  nodeCount: number;
  /** All edges, indexed by id */
  edges: GraphEdge[];
  /** Incidence list: node -> ids of incident edges, in insertion order (self-loops listed twice) */
  incidence: number[][];
}

/** Single-source shortest-path result, scoped to one Dijkstra run */
export interface ShortestPathTree {
  source: number;
  /** Distance from source per node (Infinity when unreachable) */
  distances: number[];
  /** Edge used to reach each node on its shortest path (null for source/unreachable) */
  previousEdge: (number | null)[];
}
