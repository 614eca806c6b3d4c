/**
 * Human-readable circuit output.
 *
 * Node indices map to letters so the circuit can be read against a
 * hand-labeled map (0 -> "A", 1 -> "B", ...). Lengths are stored in feet
 * and reported in miles, truncated rather than rounded.
 */

import type { Circuit, DistanceUnit, Graph } from "@trail-postman/types";
import { getEdge, otherEndpoint } from "../domain/graph.js";
import { InvariantError, LabelRangeError } from "../domain/errors.js";

export const FEET_PER_MILE = 5280;

export const MILES: DistanceUnit = { name: "miles", feetPerUnit: FEET_PER_MILE };

export const DEFAULT_LABEL_SEPARATOR = " -- ";

const ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";

/** Letter label for a node index (A-Z only) */
export function nodeLabel(node: number): string {
  const letter = Number.isInteger(node) ? ALPHABET[node] : undefined;
  if (letter === undefined) {
    throw new LabelRangeError(node);
  }
  return letter;
}

/**
 * Join the letter labels of a path.
 *
 * @throws LabelRangeError for any node past "Z"
 */
export function alphabetize(path: Circuit, separator: string = DEFAULT_LABEL_SEPARATOR): string {
  return path.map(nodeLabel).join(separator);
}

/**
 * Edge walked for one step: the first edge at `from` (incidence order) that
 * leads to `to` and is not yet counted, else the first one that leads there.
 */
function stepEdgeId(graph: Graph, from: number, to: number, counted: Set<number>): number {
  let fallback: number | null = null;
  for (const edgeId of graph.incidence[from] ?? []) {
    if (otherEndpoint(getEdge(graph, edgeId), from) !== to) continue;
    if (!counted.has(edgeId)) return edgeId;
    if (fallback === null) fallback = edgeId;
  }
  if (fallback === null) {
    throw new InvariantError(`Path step ${from} -> ${to} has no edge in the graph`);
  }
  return fallback;
}

/**
 * Total length of a path in feet.
 *
 * Parallel edges are counted in incidence order, so an Euler circuit sums
 * to the weight of the whole graph even when parallel segments differ.
 *
 * @throws InvariantError when a step has no matching edge
 */
export function lengthFeet(path: Circuit, graph: Graph): number {
  const counted = new Set<number>();
  let feet = 0;
  for (let i = 0; i + 1 < path.length; i++) {
    const from = path[i];
    const to = path[i + 1];
    if (from === undefined || to === undefined) break;
    const edgeId = stepEdgeId(graph, from, to, counted);
    counted.add(edgeId);
    feet += getEdge(graph, edgeId).weight;
  }
  return feet;
}

/**
 * Convert feet to `unit`, truncated to `decimals` places.
 *
 * Integer units are divided exactly (10559 ft -> 1.99 miles); fractional
 * units go through floating point.
 */
export function toDistanceUnit(feet: number, unit: DistanceUnit = MILES, decimals = 2): number {
  const scale = 10 ** decimals;
  return Math.floor((feet * scale) / unit.feetPerUnit) / scale;
}

/** Path length in miles, truncated to two decimals */
export function lengthMiles(path: Circuit, graph: Graph): number {
  return toDistanceUnit(lengthFeet(path, graph), MILES, 2);
}
