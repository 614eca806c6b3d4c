/**
 * Graph ingestion.
 *
 * Reads an adjacency file from disk and turns it into a {@link Graph}.
 * File-system errors are not wrapped; they reach the caller as thrown
 * by node:fs.
 */

import { readFileSync } from "node:fs";
import type { Graph } from "@trail-postman/types";
import { parseGraph } from "./adjacency-parser.js";

export { parseGraph, parseLine, splitLines, type ParsedEdge } from "./adjacency-parser.js";

/** Read and parse an adjacency file */
export function loadGraphFile(filePath: string): Graph {
  const text = readFileSync(filePath, "utf-8");
  return parseGraph(text);
}
