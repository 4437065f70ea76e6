import { describe, expect, it } from "vitest";
import {
  canonicalizeGraph,
  dedupeEdges,
  renumberNodes,
  validateContiguousIds,
} from "./canonicalize.js";
import { GraphIntegrityError } from "./errors.js";
import { createRandom } from "./random.js";
import type { EdgeRecord, NodeRecord } from "./types.js";

const node = (id: number, lat = 0, lon = 0): NodeRecord => ({ id, lat, lon });
const edge = (src: number, dst: number, distance = 1): EdgeRecord => ({ src, dst, distance });

describe("dedupeEdges", () => {
  it("keeps the shortest of parallel edges", () => {
    const result = dedupeEdges([edge(0, 1, 5.0), edge(0, 1, 3.2)]);
    expect(result).toEqual([edge(0, 1, 3.2)]);
  });

  it("keeps the first edge seen when distances tie", () => {
    const first = edge(0, 1, 2);
    const second = edge(0, 1, 2);
    const result = dedupeEdges([first, second]);
    expect(result).toHaveLength(1);
    expect(result[0]).toBe(first);
  });

  it("treats opposite directions as distinct edges", () => {
    const result = dedupeEdges([edge(1, 0), edge(0, 1)]);
    expect(result).toEqual([edge(0, 1), edge(1, 0)]);
  });

  it("sorts by source then destination", () => {
    const result = dedupeEdges([edge(2, 0), edge(0, 2), edge(10, 1), edge(0, 1)]);
    expect(result.map((e) => [e.src, e.dst])).toEqual([
      [0, 1],
      [0, 2],
      [2, 0],
      [10, 1],
    ]);
  });

  it("is idempotent", () => {
    const input = [edge(3, 1, 4), edge(1, 3, 2), edge(3, 1, 1), edge(0, 2, 7), edge(0, 2, 7)];
    const once = dedupeEdges(input);
    expect(dedupeEdges(once)).toEqual(once);
  });
});

describe("validateContiguousIds", () => {
  it("accepts ids 0..N-1 in any order", () => {
    expect(() => validateContiguousIds([node(1), node(0), node(2)], [edge(0, 2)])).not.toThrow();
  });

  it("reports missing ids", () => {
    expect(() => validateContiguousIds([node(0), node(2)], [])).toThrow(
      "Node ids are not contiguous from 0..N-1. Missing: 1"
    );
  });

  it("rejects duplicated ids", () => {
    expect(() => validateContiguousIds([node(0), node(0)], [])).toThrow("Node ids are duplicated: 0");
  });

  it("rejects edges pointing at unknown nodes", () => {
    expect(() => validateContiguousIds([node(0), node(1)], [edge(0, 5)])).toThrow(
      "Edges reference unknown nodes: 5"
    );
  });

  it("rejects an empty node set", () => {
    expect(() => validateContiguousIds([], [])).toThrow(GraphIntegrityError);
  });
});

describe("renumberNodes", () => {
  it("maps referenced ids onto 0..M-1 in ascending raw order", () => {
    const nodes = [node(40, 4, 4), node(10, 1, 1), node(20, 2, 2), node(30, 3, 3)];
    const edges = [edge(10, 30), edge(30, 10), edge(40, 30)];

    const result = renumberNodes(nodes, edges);

    expect(Array.from(result.idMapping.entries())).toEqual([
      [10, 0],
      [30, 1],
      [40, 2],
    ]);
    expect(result.edges).toEqual([edge(0, 1), edge(1, 0), edge(2, 1)]);
    expect(result.nodes).toEqual([node(0, 1, 1), node(1, 3, 3), node(2, 4, 4)]);
  });

  it("fails when an edge endpoint has no node record", () => {
    expect(() => renumberNodes([node(10)], [edge(10, 11)])).toThrow("Edges reference unknown nodes: 11");
  });
});

describe("canonicalizeGraph", () => {
  it("leaves an already contiguous graph untouched", () => {
    const { graph, idMapping } = canonicalizeGraph(
      { nodes: [node(0, 37.0, -122.0), node(1, 37.1, -122.1)], edges: [edge(0, 1, 5.0)] },
      "validate"
    );

    expect(Array.from(graph.nodes.keys())).toEqual([0, 1]);
    expect(graph.nodes.get(1)).toEqual(node(1, 37.1, -122.1));
    expect(graph.edges).toEqual([edge(0, 1, 5.0)]);
    expect(idMapping.get(1)).toBe(1);
  });

  it("collapses duplicate edges before validating", () => {
    const result = canonicalizeGraph(
      { nodes: [node(0), node(1)], edges: [edge(0, 1, 5.0), edge(0, 1, 3.2)] },
      "validate"
    );

    expect(result.graph.edges).toEqual([edge(0, 1, 3.2)]);
    expect(result.duplicateEdges).toBe(1);
  });

  it("keeps unreferenced nodes under the validate policy", () => {
    const { graph, droppedNodes } = canonicalizeGraph(
      { nodes: [node(0), node(1), node(2)], edges: [edge(0, 1)] },
      "validate"
    );

    expect(graph.nodes.size).toBe(3);
    expect(droppedNodes).toBe(0);
  });

  it("drops unreferenced nodes under the renumber policy", () => {
    const result = canonicalizeGraph(
      { nodes: [node(7), node(3), node(5)], edges: [edge(7, 3, 2), edge(7, 3, 1)] },
      "renumber"
    );

    expect(Array.from(result.graph.nodes.keys())).toEqual([0, 1]);
    expect(result.graph.edges).toEqual([edge(1, 0, 1)]);
    expect(result.droppedNodes).toBe(1);
    expect(result.duplicateEdges).toBe(1);
  });

  it("fails on an empty node set under either policy", () => {
    expect(() => canonicalizeGraph({ nodes: [], edges: [] }, "validate")).toThrow("Node set is empty");
    expect(() => canonicalizeGraph({ nodes: [], edges: [] }, "renumber")).toThrow("Node set is empty");
  });

  it("produces a bijective mapping with every endpoint inside the new id space", () => {
    const random = createRandom(99);
    const rawIds = Array.from({ length: 60 }, (_, i) => i * 7 + 3);
    const nodes = rawIds.map((id) => node(id));
    const edges = Array.from({ length: 150 }, () =>
      edge(
        rawIds[Math.floor(random.next() * rawIds.length)],
        rawIds[Math.floor(random.next() * rawIds.length)],
        random.next() * 10
      )
    );

    const { graph, idMapping } = canonicalizeGraph({ nodes, edges }, "renumber");

    const newIds = Array.from(idMapping.values());
    expect(new Set(newIds).size).toBe(newIds.length);
    expect(graph.nodes.size).toBe(idMapping.size);
    for (const e of graph.edges) {
      expect(e.src).toBeLessThan(graph.nodes.size);
      expect(e.dst).toBeLessThan(graph.nodes.size);
    }
  });
});
