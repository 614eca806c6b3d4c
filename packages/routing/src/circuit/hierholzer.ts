/**
 * Euler circuit extraction (Hierholzer's algorithm).
 *
 * Expects an eulerized, connected graph. Nothing here checks that: on an
 * unprepared graph the walk silently misses edges, so callers run the
 * connectivity and parity checks first.
 */

import type { Circuit, Graph } from "@trail-postman/types";
import { getEdge, otherEndpoint } from "../domain/graph.js";
import { InvariantError } from "../domain/errors.js";

/**
 * Walk every edge exactly once, starting and ending at `start`.
 *
 * Keeps a stack of nodes that may still have unused edges. The top node
 * either takes its lowest-id unused edge (pushing the far endpoint) or, with
 * none left, is popped onto the path. The path therefore lists nodes in the
 * order they were finished.
 */
export function extractCircuit(graph: Graph, start = 0): Circuit {
  if (!Number.isInteger(start) || start < 0 || start >= graph.nodeCount) {
    throw new InvariantError(`Circuit start ${start} is outside the graph`);
  }

  const used: boolean[] = new Array<boolean>(graph.edges.length).fill(false);
  // Per-node cursor into its incidence list; edges before it are used
  const cursor: number[] = new Array<number>(graph.nodeCount).fill(0);

  const stack: number[] = [start];
  const path: Circuit = [];

  while (stack.length > 0) {
    const node = stack[stack.length - 1];
    if (node === undefined) break;
    const incident = graph.incidence[node] ?? [];

    let position = cursor[node] ?? 0;
    while (position < incident.length) {
      const id = incident[position];
      if (id === undefined || !used[id]) break;
      position++;
    }
    cursor[node] = position;

    const edgeId = incident[position];
    if (edgeId === undefined) {
      stack.pop();
      path.push(node);
      continue;
    }

    used[edgeId] = true;
    stack.push(otherEndpoint(getEdge(graph, edgeId), node));
  }

  return path;
}
