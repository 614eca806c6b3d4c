/**
 * Route results - the output of the route inspection pipeline.
 *
 * A route is a closed walk over the network that covers every trail
 * segment at least once, starting and ending at the same node.
 */

/** Closed walk as node indices (first === last) */
export type Circuit = number[];

/** A pair of odd-degree nodes joined by duplicated shortest-path edges */
export interface OddNodePair {
  a: number;
  b: number;
  /** Shortest-path distance between a and b in feet */
  distance: number;
}

/** Aggregated statistics about a route */
export interface RouteStats {
  /** Number of edges walked (including duplicates) */
  edgeCount: number;
  /** Sum of the parsed segment lengths in feet */
  originalFeet: number;
  /** Feet added by dead-end and eulerization duplicates */
  addedFeet: number;
  /** Total walked distance in feet */
  totalFeet: number;
  /** Dead-end nodes whose edge was doubled */
  deadEndsFixed: number;
  /** Odd-degree node pairs joined during eulerization */
  oddNodePairs: OddNodePair[];
}

/** A solved route */
export interface RouteSolution {
  circuit: Circuit;
  /** Letter labels joined by the separator, or null when the graph has nodes past "Z" */
  labels: string | null;
  /** Total distance in the configured unit, truncated */
  distance: number;
  /** Name of the configured unit (e.g. "miles") */
  unit: string;
  stats: RouteStats;
}
