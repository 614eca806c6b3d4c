import { describe, it, expect } from "vitest";
import { fixDeadEnds } from "./dead-ends.js";
import { parseGraph } from "../ingestion/adjacency-parser.js";
import { createGraph, addEdge, degree, oddDegreeNodes } from "../domain/graph.js";

function degrees(graph: ReturnType<typeof createGraph>): number[] {
  return Array.from({ length: graph.nodeCount }, (_, node) => degree(graph, node));
}

describe("fixDeadEnds", () => {
  it("doubles the segment into every dead end of a path", () => {
    // 0 — 1 — 2
    const graph = parseGraph("1:100\n2:200\n");
    expect(degrees(graph)).toEqual([1, 2, 1]);

    const fixed = fixDeadEnds(graph);

    expect(fixed).toEqual([0, 2]);
    expect(graph.edges.slice(2)).toEqual([
      { id: 2, from: 0, to: 1, weight: 100 },
      { id: 3, from: 1, to: 2, weight: 200 },
    ]);
    expect(degrees(graph)).toEqual([2, 4, 2]);
  });

  it("doubles an isolated segment from each of its ends", () => {
    const graph = parseGraph("1:50\n");

    expect(fixDeadEnds(graph)).toEqual([0, 1]);
    expect(graph.edges).toEqual([
      { id: 0, from: 0, to: 1, weight: 50 },
      { id: 1, from: 0, to: 1, weight: 50 },
      { id: 2, from: 0, to: 1, weight: 50 },
    ]);
    expect(degrees(graph)).toEqual([3, 3]);
    expect(oddDegreeNodes(graph)).toEqual([0, 1]);
  });

  it("leaves a graph without dead ends unchanged", () => {
    const graph = parseGraph("1:10,3:15\n2:10\n3:10\n");

    expect(fixDeadEnds(graph)).toEqual([]);
    expect(graph.edges).toHaveLength(4);
  });

  it("ignores isolated nodes", () => {
    const graph = createGraph(3);
    addEdge(graph, 0, 1, 5);
    addEdge(graph, 1, 0, 5);

    expect(fixDeadEnds(graph)).toEqual([]);
    expect(degree(graph, 2)).toBe(0);
  });

  it("turns every dead end even while keeping the odd count even", () => {
    // Star: 0 joined to 1, 2, 3
    const graph = parseGraph("1:1,2:2,3:3\n");
    expect(oddDegreeNodes(graph)).toEqual([0, 1, 2, 3]);

    fixDeadEnds(graph);

    expect(degrees(graph)).toEqual([6, 2, 2, 2]);
    expect(oddDegreeNodes(graph)).toEqual([]);
  });

  it("finds nothing left to fix on a second run", () => {
    const graph = parseGraph("1:100\n2:200\n");
    fixDeadEnds(graph);
    expect(fixDeadEnds(graph)).toEqual([]);
    expect(graph.edges).toHaveLength(4);
  });
});
