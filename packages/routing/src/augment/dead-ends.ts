/**
 * Dead-end (cul-de-sac) fixing.
 *
 * A closed walk enters and leaves every node an even number of times, so a
 * node with a single segment can only be covered by walking in and back out.
 * Doubling that segment up front makes the out-and-back explicit before
 * eulerization looks at the remaining odd nodes.
 */

import type { Graph } from "@trail-postman/types";
import { degree, duplicateEdge, getEdge } from "../domain/graph.js";
import { InvariantError } from "../domain/errors.js";

/**
 * Duplicate the sole edge of every degree-1 node, in place.
 *
 * Dead ends are collected first (ascending) and each one doubles its edge.
 * An isolated segment has two dead ends, so it ends up walked three times
 * here and eulerization adds the fourth.
 *
 * Must run once per graph: a second run finds no dead ends left to fix.
 *
 * @returns The dead-end nodes whose edge was duplicated
 */
export function fixDeadEnds(graph: Graph): number[] {
  const deadEnds: number[] = [];
  for (let node = 0; node < graph.nodeCount; node++) {
    if (degree(graph, node) === 1) deadEnds.push(node);
  }

  for (const node of deadEnds) {
    const edgeId = graph.incidence[node]?.[0];
    if (edgeId === undefined) {
      throw new InvariantError(`Dead-end node ${node} has no incident edge`);
    }
    duplicateEdge(graph, getEdge(graph, edgeId));
  }

  if (deadEnds.length > 0) {
    console.log(`[dead-ends] Doubled ${deadEnds.length} dead-end segments: ${deadEnds.join(", ")}`);
  }
  return deadEnds;
}
