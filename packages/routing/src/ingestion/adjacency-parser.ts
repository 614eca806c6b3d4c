/**
 * Adjacency-list text parser.
 *
 * The input has one line per node; the line number (0-based) is the node
 * index. Each line is a comma-separated list of `neighbor:weight` tokens:
 *
 * ```
 * 1:120,2:340
 * 2:95
 * ```
 *
 * Line 0 above gives node 0 edges to node 1 (120 ft) and node 2 (340 ft).
 * Tokens without a `:` are ignored. Every token becomes one edge, so a
 * segment listed on both of its endpoint lines is parsed twice.
 */

import type { Graph } from "@trail-postman/types";
import { addEdge, createGraph } from "../domain/graph.js";
import { FormatError } from "../domain/errors.js";

/** An edge as read from the file, before the graph is sized */
export interface ParsedEdge {
  from: number;
  to: number;
  weight: number;
}

const INTEGER = /^\d+$/;

/** Split text into lines, dropping `\r` and the empty piece after a final newline */
export function splitLines(text: string): string[] {
  const lines = text.split("\n").map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

function parseInteger(part: string, lineIndex: number, token: string): number {
  if (!INTEGER.test(part)) {
    throw new FormatError(
      `Line ${lineIndex + 1}: "${part}" in token "${token}" is not a non-negative integer`,
      lineIndex + 1,
      token,
    );
  }
  const value = Number(part);
  if (!Number.isSafeInteger(value)) {
    throw new FormatError(
      `Line ${lineIndex + 1}: "${part}" in token "${token}" is too large`,
      lineIndex + 1,
      token,
    );
  }
  return value;
}

/** Parse one line into edges originating at `lineIndex` */
export function parseLine(line: string, lineIndex: number): ParsedEdge[] {
  const edges: ParsedEdge[] = [];
  for (const rawToken of line.split(",")) {
    const token = rawToken.trim();
    if (!token.includes(":")) continue;

    const [neighborPart = "", weightPart = ""] = token.split(":").map((part) => part.trim());
    edges.push({
      from: lineIndex,
      to: parseInteger(neighborPart, lineIndex, token),
      weight: parseInteger(weightPart, lineIndex, token),
    });
  }
  return edges;
}

/**
 * Parse adjacency text into a graph.
 *
 * The node count is the larger of the line count and the highest
 * referenced neighbor + 1.
 *
 * @throws FormatError when a neighbor or weight is not a non-negative integer
 */
export function parseGraph(text: string): Graph {
  const lines = splitLines(text);
  const parsed: ParsedEdge[] = [];
  lines.forEach((line, lineIndex) => {
    parsed.push(...parseLine(line, lineIndex));
  });

  let nodeCount = lines.length;
  for (const edge of parsed) {
    if (edge.to + 1 > nodeCount) nodeCount = edge.to + 1;
  }

  const graph = createGraph(nodeCount);
  for (const edge of parsed) {
    addEdge(graph, edge.from, edge.to, edge.weight);
  }

  console.log(`[parse] ${graph.nodeCount} nodes, ${graph.edges.length} edges from ${lines.length} lines`);
  return graph;
}
