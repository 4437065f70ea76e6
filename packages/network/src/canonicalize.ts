import type { IdPolicy } from "@widepath/config";
import { GraphIntegrityError } from "./errors.js";
import type { CanonicalGraph, EdgeRecord, NodeRecord, RawGraph } from "./types.js";

export type CanonicalizeResult = {
  graph: CanonicalGraph;
  /** raw id -> canonical id; identity under the validate policy */
  idMapping: ReadonlyMap<number, number>;
  droppedNodes: number;
  duplicateEdges: number;
};

function compareEdges(a: EdgeRecord, b: EdgeRecord): number {
  return a.src - b.src || a.dst - b.dst;
}

/**
 * Collapse parallel edges, keeping the shortest. Among equal distances the
 * first one seen wins. Output is sorted by (src, dst).
 */
export function dedupeEdges(edges: readonly EdgeRecord[]): EdgeRecord[] {
  const byKey = new Map<string, EdgeRecord>();
  for (const edge of edges) {
    const key = `${edge.src}:${edge.dst}`;
    const existing = byKey.get(key);
    if (!existing || edge.distance < existing.distance) {
      byKey.set(key, edge);
    }
  }
  return Array.from(byKey.values()).sort(compareEdges);
}

function collectEndpoints(edges: readonly EdgeRecord[]): Set<number> {
  const ids = new Set<number>();
  for (const edge of edges) {
    ids.add(edge.src);
    ids.add(edge.dst);
  }
  return ids;
}

/**
 * Require the raw ids to be exactly 0..N-1 and every endpoint to be known.
 */
export function validateContiguousIds(nodes: readonly NodeRecord[], edges: readonly EdgeRecord[]): void {
  if (nodes.length === 0) {
    throw new GraphIntegrityError("Node set is empty");
  }

  const seen = new Set<number>();
  const duplicates: number[] = [];
  for (const node of nodes) {
    if (seen.has(node.id)) {
      duplicates.push(node.id);
    }
    seen.add(node.id);
  }
  if (duplicates.length > 0) {
    throw new GraphIntegrityError("Node ids are duplicated", duplicates);
  }

  const outOfRange = nodes
    .filter((node) => !Number.isInteger(node.id) || node.id < 0 || node.id >= nodes.length)
    .map((node) => node.id);
  if (outOfRange.length > 0) {
    const missing: number[] = [];
    for (let id = 0; id < nodes.length; id += 1) {
      if (!seen.has(id)) missing.push(id);
    }
    throw new GraphIntegrityError("Node ids are not contiguous from 0..N-1. Missing", missing);
  }

  const unknown = Array.from(collectEndpoints(edges))
    .filter((id) => !seen.has(id))
    .sort((a, b) => a - b);
  if (unknown.length > 0) {
    throw new GraphIntegrityError("Edges reference unknown nodes", unknown);
  }
}

/**
 * Map the ids referenced by at least one edge onto 0..M-1 in ascending raw
 * order. Nodes no edge touches are dropped.
 */
export function renumberNodes(
  nodes: readonly NodeRecord[],
  edges: readonly EdgeRecord[]
): { nodes: NodeRecord[]; edges: EdgeRecord[]; idMapping: Map<number, number> } {
  if (nodes.length === 0) {
    throw new GraphIntegrityError("Node set is empty");
  }

  const rawNodes = new Map<number, NodeRecord>();
  for (const node of nodes) {
    rawNodes.set(node.id, node);
  }

  const usedIds = Array.from(collectEndpoints(edges)).sort((a, b) => a - b);
  const unknown = usedIds.filter((id) => !rawNodes.has(id));
  if (unknown.length > 0) {
    throw new GraphIntegrityError("Edges reference unknown nodes", unknown);
  }

  const idMapping = new Map<number, number>();
  const renumbered: NodeRecord[] = [];
  usedIds.forEach((rawId, newId) => {
    idMapping.set(rawId, newId);
    const node = rawNodes.get(rawId);
    if (node) {
      renumbered.push({ id: newId, lat: node.lat, lon: node.lon });
    }
  });

  const remapped = edges.map((edge) => ({
    src: idMapping.get(edge.src) ?? -1,
    dst: idMapping.get(edge.dst) ?? -1,
    distance: edge.distance
  }));

  return { nodes: renumbered, edges: remapped, idMapping };
}

function assertEndpointsInRange(nodes: ReadonlyMap<number, NodeRecord>, edges: readonly EdgeRecord[]): void {
  const outside = Array.from(collectEndpoints(edges))
    .filter((id) => !Number.isInteger(id) || id < 0 || id >= nodes.size || !nodes.has(id))
    .sort((a, b) => a - b);
  if (outside.length > 0) {
    throw new GraphIntegrityError(`Edges reference ids outside 0..${nodes.size - 1}`, outside);
  }
}

/**
 * Deduplicate edges, then give the graph a contiguous 0..N-1 id space using
 * the dataset's policy.
 */
export function canonicalizeGraph(raw: RawGraph, policy: IdPolicy): CanonicalizeResult {
  if (raw.nodes.length === 0) {
    throw new GraphIntegrityError("Node set is empty");
  }

  const deduped = dedupeEdges(raw.edges);
  const duplicateEdges = raw.edges.length - deduped.length;

  let nodeList: NodeRecord[];
  let edges: EdgeRecord[];
  let idMapping: Map<number, number>;

  if (policy === "validate") {
    validateContiguousIds(raw.nodes, deduped);
    nodeList = raw.nodes.map((node) => ({ ...node }));
    edges = deduped;
    idMapping = new Map(raw.nodes.map((node) => [node.id, node.id]));
  } else {
    const renumbered = renumberNodes(raw.nodes, deduped);
    nodeList = renumbered.nodes;
    // Ascending raw order maps to ascending new order, so the sort survives
    edges = renumbered.edges;
    idMapping = renumbered.idMapping;
  }

  const nodes = new Map<number, NodeRecord>();
  for (const node of nodeList.sort((a, b) => a.id - b.id)) {
    nodes.set(node.id, node);
  }

  assertEndpointsInRange(nodes, edges);

  return {
    graph: { nodes, edges },
    idMapping,
    droppedNodes: raw.nodes.length - nodes.size,
    duplicateEdges
  };
}
