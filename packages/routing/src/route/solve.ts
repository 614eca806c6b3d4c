/**
 * Route inspection pipeline.
 *
 * parse -> fix dead ends -> eulerize -> connectivity check -> circuit -> format
 *
 * The graph is owned by the pipeline and mutated in place by the
 * augmentation stages; the circuit stage only reads it.
 */

import type { Graph, RouteConfig, RouteSolution } from "@trail-postman/types";
import { findUnreachableNode, totalWeight } from "../domain/graph.js";
import { InvariantError, LabelRangeError } from "../domain/errors.js";
import { fixDeadEnds } from "../augment/dead-ends.js";
import { eulerize } from "../augment/eulerize.js";
import { extractCircuit } from "../circuit/hierholzer.js";
import { alphabetize, lengthFeet, toDistanceUnit } from "../export/path-format.js";
import { getHardcodedDefaults } from "../config/route-config.js";
import { loadGraphFile } from "../ingestion/index.js";

/**
 * Labels for a circuit, or null when it runs past "Z". The numeric circuit
 * and distance stay valid either way.
 */
function tryAlphabetize(circuit: number[], separator: string): string | null {
  try {
    return alphabetize(circuit, separator);
  } catch (err) {
    if (err instanceof LabelRangeError) {
      console.warn(`[route] ${err.message}; reporting node numbers instead`);
      return null;
    }
    throw err;
  }
}

/**
 * Solve the route inspection problem on a parsed graph.
 *
 * Mutates `graph`: dead-end and eulerization duplicates are appended to it.
 *
 * @throws InvariantError when the graph is disconnected or a stage contract breaks
 */
export function solveRoute(graph: Graph, config: RouteConfig = getHardcodedDefaults()): RouteSolution {
  const start = performance.now();
  const originalFeet = totalWeight(graph);

  const deadEnds = fixDeadEnds(graph);
  const { pairs } = eulerize(graph);

  const unreachable = findUnreachableNode(graph, config.startNode);
  if (unreachable !== null) {
    throw new InvariantError(
      `Graph is not connected: node ${unreachable} cannot be reached from start node ${config.startNode}`,
    );
  }

  const circuit = extractCircuit(graph, config.startNode);
  if (circuit.length !== graph.edges.length + 1) {
    throw new InvariantError(
      `Circuit covers ${circuit.length - 1} of ${graph.edges.length} edges`,
    );
  }

  const totalFeet = lengthFeet(circuit, graph);
  const solution: RouteSolution = {
    circuit,
    labels: tryAlphabetize(circuit, config.labelSeparator),
    distance: toDistanceUnit(totalFeet, config.unit, config.decimals),
    unit: config.unit.name,
    stats: {
      edgeCount: graph.edges.length,
      originalFeet,
      addedFeet: totalWeight(graph) - originalFeet,
      totalFeet,
      deadEndsFixed: deadEnds.length,
      oddNodePairs: pairs,
    },
  };

  console.log(
    `[route] ${solution.stats.edgeCount} edges walked, ${totalFeet} ft (${solution.stats.addedFeet} ft repeated) in ${(performance.now() - start).toFixed(0)}ms`,
  );
  return solution;
}

/** Load an adjacency file and solve it */
export function solveRouteFile(filePath: string, config?: RouteConfig): RouteSolution {
  return solveRoute(loadGraphFile(filePath), config);
}
