import fs from "fs";
import {
  GraphIntegrityError,
  ParseError,
  type CanonicalGraph,
  type SynthesizedEdge,
  type TimeGrid
} from "@widepath/network";
import type { OutputPaths } from "./serialize.js";

export type WrittenNode = {
  id: number;
  lat: number;
  lon: number;
  clusterId: number;
};

export type WrittenEdge = {
  src: number;
  dst: number;
  costs: number[];
  baseWidth: number;
  rushWidth: number;
  distance: number;
};

export type WrittenEdges = {
  arrivalPoints: number[];
  widthPoints: number[];
  edges: WrittenEdge[];
};

function toNumber(token: string, file: string, lineNumber: number, line: string): number {
  const value = Number(token);
  if (token.length === 0 || !Number.isFinite(value)) {
    throw new ParseError(file, lineNumber, line, `Invalid number '${token}'`);
  }
  return value;
}

function toInteger(token: string, file: string, lineNumber: number, line: string): number {
  const value = toNumber(token, file, lineNumber, line);
  if (!Number.isInteger(value)) {
    throw new ParseError(file, lineNumber, line, `Invalid integer '${token}'`);
  }
  return value;
}

function splitFileLines(text: string): string[] {
  const lines = text.split("\n");
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

export function parseNodesText(text: string, file: string): WrittenNode[] {
  return splitFileLines(text).map((line, idx) => {
    const parts = line.split(" ");
    if (parts.length !== 4) {
      throw new ParseError(file, idx + 1, line, "Expected `id lat lon clusterId`");
    }
    const [id, lat, lon, clusterId] = parts;
    return {
      id: toInteger(id, file, idx + 1, line),
      lat: toNumber(lat, file, idx + 1, line),
      lon: toNumber(lon, file, idx + 1, line),
      clusterId: toInteger(clusterId, file, idx + 1, line)
    };
  });
}

export function parseEdgesText(text: string, file: string): WrittenEdges {
  const lines = splitFileLines(text);
  if (lines.length < 2) {
    throw new ParseError(file, null, null, "Missing time series header lines");
  }

  const series = (line: string, lineNumber: number) =>
    line.split(" ").map((token) => toInteger(token, file, lineNumber, line));
  const arrivalPoints = series(lines[0], 1);
  const widthPoints = series(lines[1], 2);

  const edges = lines.slice(2).map((line, idx) => {
    const lineNumber = idx + 3;
    const parts = line.split(" ");
    if (parts.length !== 6) {
      throw new ParseError(file, lineNumber, line, "Expected `src dst costs baseWidth rushWidth distance`");
    }
    const [src, dst, costs, baseWidth, rushWidth, distance] = parts;
    const costValues = costs.split(",").map((token) => toNumber(token, file, lineNumber, line));
    if (costValues.length !== arrivalPoints.length) {
      throw new ParseError(
        file,
        lineNumber,
        line,
        `Expected ${arrivalPoints.length} costs, found ${costValues.length}`
      );
    }
    return {
      src: toInteger(src, file, lineNumber, line),
      dst: toInteger(dst, file, lineNumber, line),
      costs: costValues,
      baseWidth: toNumber(baseWidth, file, lineNumber, line),
      rushWidth: toNumber(rushWidth, file, lineNumber, line),
      distance: toNumber(distance, file, lineNumber, line)
    };
  });

  return { arrivalPoints, widthPoints, edges };
}

export async function readNodesFile(filePath: string): Promise<WrittenNode[]> {
  return parseNodesText(await fs.promises.readFile(filePath, "utf-8"), filePath);
}

export async function readEdgesFile(filePath: string): Promise<WrittenEdges> {
  return parseEdgesText(await fs.promises.readFile(filePath, "utf-8"), filePath);
}

/**
 * Re-read written output and check it against what was meant to be written:
 * the same node ids and coordinates, the same (src, dst, distance) triples,
 * and cost vectors aligned with the arrival series.
 */
export async function verifyOutput(
  paths: OutputPaths,
  graph: CanonicalGraph,
  edges: readonly SynthesizedEdge[],
  grid: TimeGrid
): Promise<void> {
  const [nodes, written] = await Promise.all([readNodesFile(paths.nodesPath), readEdgesFile(paths.edgesPath)]);

  if (nodes.length !== graph.nodes.size) {
    throw new GraphIntegrityError(`Wrote ${nodes.length} nodes, expected ${graph.nodes.size}`);
  }
  const mismatchedNodes = nodes
    .filter((node, idx) => {
      const expected = graph.nodes.get(idx);
      return !expected || node.id !== idx || node.lat !== expected.lat || node.lon !== expected.lon;
    })
    .map((node) => node.id);
  if (mismatchedNodes.length > 0) {
    throw new GraphIntegrityError("Written nodes differ from the canonical graph", mismatchedNodes);
  }

  if (written.arrivalPoints.join(" ") !== grid.arrivalPoints.join(" ")) {
    throw new GraphIntegrityError("Written arrival series differs from the time grid");
  }
  if (written.edges.length !== edges.length) {
    throw new GraphIntegrityError(`Wrote ${written.edges.length} edges, expected ${edges.length}`);
  }
  const mismatchedEdges = written.edges
    .filter((edge, idx) => {
      const expected = edges[idx];
      return edge.src !== expected.src || edge.dst !== expected.dst || edge.distance !== expected.distance;
    })
    .map((edge) => edge.src);
  if (mismatchedEdges.length > 0) {
    throw new GraphIntegrityError("Written edges differ from the canonical graph at sources", mismatchedEdges);
  }
}
