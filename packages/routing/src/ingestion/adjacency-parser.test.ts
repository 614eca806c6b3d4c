import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { parseGraph, parseLine, splitLines } from "./adjacency-parser.js";
import { loadGraphFile } from "./index.js";
import { degree } from "../domain/graph.js";
import { FormatError } from "../domain/errors.js";

const SQUARE = "1:10,3:15\n2:10\n3:10\n\n";

describe("splitLines", () => {
  it("drops the empty piece after a final newline", () => {
    expect(splitLines("a\nb\n")).toEqual(["a", "b"]);
  });

  it("keeps an explicit empty line before the final newline", () => {
    expect(splitLines("a\n\n")).toEqual(["a", ""]);
  });

  it("strips carriage returns", () => {
    expect(splitLines("1:10\r\n0:10\r\n")).toEqual(["1:10", "0:10"]);
  });

  it("returns no lines for empty input", () => {
    expect(splitLines("")).toEqual([]);
  });
});

describe("parseLine", () => {
  it("emits one edge per neighbor:weight token", () => {
    expect(parseLine("1:120,2:340", 0)).toEqual([
      { from: 0, to: 1, weight: 120 },
      { from: 0, to: 2, weight: 340 },
    ]);
  });

  it("skips tokens without a colon", () => {
    expect(parseLine("1:10,junk,,2:5", 3)).toEqual([
      { from: 3, to: 1, weight: 10 },
      { from: 3, to: 2, weight: 5 },
    ]);
  });

  it("trims whitespace around tokens and parts", () => {
    expect(parseLine(" 1: 10 , 2:5 ", 0)).toEqual([
      { from: 0, to: 1, weight: 10 },
      { from: 0, to: 2, weight: 5 },
    ]);
  });

  it("uses the first two parts of a token with extra colons", () => {
    expect(parseLine("1:10:99", 0)).toEqual([{ from: 0, to: 1, weight: 10 }]);
  });

  it("throws FormatError for a non-numeric weight", () => {
    expect(() => parseLine("2:abc", 0)).toThrow(
      'Line 1: "abc" in token "2:abc" is not a non-negative integer',
    );
  });

  it("throws FormatError for a negative neighbor", () => {
    try {
      parseLine("3:5,-1:4", 6);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(FormatError);
      if (err instanceof FormatError) {
        expect(err.lineNumber).toBe(7);
        expect(err.token).toBe("-1:4");
      }
    }
  });

  it("throws FormatError for an empty weight", () => {
    expect(() => parseLine("1:", 0)).toThrow(FormatError);
  });

  it("throws FormatError for a number past the safe integer range", () => {
    expect(() => parseLine("1:9007199254740993", 0)).toThrow(FormatError);
    expect(() => parseLine("1:9007199254740993", 0)).toThrow(
      'Line 1: "9007199254740993" in token "1:9007199254740993" is too large',
    );
  });

  it("accepts the largest safe integer", () => {
    expect(parseLine("1:9007199254740991", 0)).toEqual([{ from: 0, to: 1, weight: 9007199254740991 }]);
  });
});

describe("parseGraph", () => {
  it("parses the square graph with one edge per token", () => {
    const graph = parseGraph(SQUARE);

    expect(graph.nodeCount).toBe(4);
    expect(graph.edges).toEqual([
      { id: 0, from: 0, to: 1, weight: 10 },
      { id: 1, from: 0, to: 3, weight: 15 },
      { id: 2, from: 1, to: 2, weight: 10 },
      { id: 3, from: 2, to: 3, weight: 10 },
    ]);
    for (let node = 0; node < 4; node++) {
      expect(degree(graph, node)).toBe(2);
    }
  });

  it("sizes the graph by the highest referenced neighbor", () => {
    const graph = parseGraph("5:1\n");
    expect(graph.nodeCount).toBe(6);
    expect(degree(graph, 5)).toBe(1);
  });

  it("keeps a segment listed on both endpoint lines as two edges", () => {
    const graph = parseGraph("1:10\n0:10\n");
    expect(graph.edges).toHaveLength(2);
    expect(degree(graph, 0)).toBe(2);
    expect(degree(graph, 1)).toBe(2);
  });

  it("aborts the whole parse on a bad token", () => {
    expect(() => parseGraph("1:10\n2:1x\n")).toThrow(FormatError);
  });
});

describe("loadGraphFile", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "trail-postman-parse-"));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("reads and parses an adjacency file", () => {
    const filePath = join(tmpDir, "square.txt");
    writeFileSync(filePath, SQUARE, "utf-8");

    const graph = loadGraphFile(filePath);
    expect(graph.nodeCount).toBe(4);
    expect(graph.edges).toHaveLength(4);
  });

  it("surfaces the file-system error for a missing file", () => {
    expect(() => loadGraphFile(join(tmpDir, "missing.txt"))).toThrow(/ENOENT/);
  });
});
