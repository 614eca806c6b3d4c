/**
 * Eulerization by duplicating shortest paths between odd-degree nodes.
 *
 * Odd nodes are paired greedily: each unmatched odd node, in index order,
 * takes its nearest unmatched odd node. This is not a minimum-weight perfect
 * matching, so the added distance can exceed the optimum.
 *
 * Duplicating every edge on the a-b path adds one endpoint at a and at b and
 * two at each intermediate node, so only a and b change parity.
 */

import type { Graph, GraphEdge, OddNodePair, ShortestPathTree } from "@trail-postman/types";
import { duplicateEdge, oddDegreeNodes } from "../domain/graph.js";
import { InvariantError } from "../domain/errors.js";
import { dijkstra, distanceTo, shortestPath } from "../search/dijkstra.js";

export interface EulerizeResult {
  /** Odd nodes paired, in pairing order */
  pairs: OddNodePair[];
  /** Edges appended to the graph */
  addedEdges: GraphEdge[];
}

/**
 * Pair odd nodes greedily by shortest-path distance.
 *
 * @param oddNodes - Odd-degree nodes, ascending
 * @param trees - Shortest-path tree per odd node
 */
export function pairOddNodes(
  oddNodes: number[],
  trees: Map<number, ShortestPathTree>,
): OddNodePair[] {
  const matched = new Set<number>();
  const pairs: OddNodePair[] = [];

  for (const a of oddNodes) {
    if (matched.has(a)) continue;
    const tree = trees.get(a);
    if (!tree) {
      throw new InvariantError(`No shortest-path tree for odd node ${a}`);
    }

    let partner = -1;
    let best = Number.POSITIVE_INFINITY;
    for (const b of oddNodes) {
      if (b === a || matched.has(b)) continue;
      const d = distanceTo(tree, b);
      if (d < best) {
        best = d;
        partner = b;
      }
    }
    if (partner === -1) {
      throw new InvariantError(`Odd node ${a} has no reachable unmatched odd node to pair with`);
    }

    matched.add(a);
    matched.add(partner);
    pairs.push({ a, b: partner, distance: best });
  }

  return pairs;
}

/**
 * Make every node even by duplicating edges in place.
 *
 * No-op when the graph has no odd nodes.
 *
 * @throws InvariantError when the odd-node count is odd, an odd node cannot
 *   reach a partner, or a node is still odd afterwards
 */
export function eulerize(graph: Graph): EulerizeResult {
  const oddNodes = oddDegreeNodes(graph);
  if (oddNodes.length === 0) {
    return { pairs: [], addedEdges: [] };
  }
  if (oddNodes.length % 2 !== 0) {
    throw new InvariantError(`Found ${oddNodes.length} odd-degree nodes; the count must be even`);
  }

  console.log(`[eulerize] ${oddNodes.length} odd-degree nodes of ${graph.nodeCount}: ${oddNodes.join(", ")}`);

  const trees = new Map<number, ShortestPathTree>();
  for (const node of oddNodes) {
    trees.set(node, dijkstra(graph, node));
  }

  const pairs = pairOddNodes(oddNodes, trees);

  // Resolve every path against the unmodified graph before appending anything
  const toDuplicate: GraphEdge[] = [];
  for (const { a, b } of pairs) {
    const tree = trees.get(a);
    if (!tree) {
      throw new InvariantError(`No shortest-path tree for odd node ${a}`);
    }
    toDuplicate.push(...shortestPath(tree, graph, b));
  }
  const addedEdges = toDuplicate.map((edge) => duplicateEdge(graph, edge));

  const stillOdd = oddDegreeNodes(graph);
  if (stillOdd.length > 0) {
    throw new InvariantError(`Nodes still odd after eulerization: ${stillOdd.join(", ")}`);
  }

  const addedFeet = addedEdges.reduce((sum, edge) => sum + edge.weight, 0);
  console.log(
    `[eulerize] Paired ${pairs.map((p) => `${p.a}-${p.b}`).join(" ")}, duplicated ${addedEdges.length} edges (${addedFeet} ft)`,
  );

  return { pairs, addedEdges };
}
