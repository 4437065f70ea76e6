import fs from "fs";
import path from "path";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import { CLUSTER_ID } from "@widepath/config";
import {
  GraphIntegrityError,
  type CanonicalGraph,
  type NodeRecord,
  type SynthesizedEdge,
  type TimeGrid
} from "@widepath/network";

export type OutputPaths = {
  nodesPath: string;
  edgesPath: string;
};

export function outputPaths(outputDir: string, nodeCount: number): OutputPaths {
  return {
    nodesPath: path.join(outputDir, `nodes_${nodeCount}.txt`),
    edgesPath: path.join(outputDir, `edges_${nodeCount}.txt`)
  };
}

/**
 * Shortest round-trip form, with whole numbers keeping one decimal
 * (`5.0`, not `5`) as the solver's reader expects.
 */
export function formatFloat(value: number): string {
  if (Number.isInteger(value) && Math.abs(value) < 1e16) {
    return value.toFixed(1);
  }
  return String(value);
}

export function formatCost(value: number): string {
  return value.toFixed(6);
}

export function formatSeries(points: readonly number[]): string {
  return points.map((point) => String(point)).join(" ");
}

export function formatNodeLine(node: NodeRecord, clusterId: number = CLUSTER_ID): string {
  return `${node.id} ${formatFloat(node.lat)} ${formatFloat(node.lon)} ${clusterId}`;
}

export function formatEdgeLine(edge: SynthesizedEdge): string {
  const costs = edge.costs.map(formatCost).join(",");
  return [
    edge.src,
    edge.dst,
    costs,
    formatFloat(edge.baseWidth),
    formatFloat(edge.rushWidth),
    formatFloat(edge.distance)
  ].join(" ");
}

function* nodeLines(graph: CanonicalGraph): Generator<string> {
  for (let id = 0; id < graph.nodes.size; id += 1) {
    const node = graph.nodes.get(id);
    if (!node) {
      throw new GraphIntegrityError("Node ids are not contiguous", [id]);
    }
    yield `${formatNodeLine(node)}\n`;
  }
}

function* edgeLines(edges: readonly SynthesizedEdge[], grid: TimeGrid): Generator<string> {
  yield `${formatSeries(grid.arrivalPoints)}\n`;
  yield `${formatSeries(grid.widthPoints)}\n`;
  for (const edge of edges) {
    if (edge.costs.length !== grid.arrivalPoints.length) {
      throw new RangeError(
        `Edge ${edge.src}->${edge.dst} has ${edge.costs.length} costs for ${grid.arrivalPoints.length} arrival points`
      );
    }
    yield `${formatEdgeLine(edge)}\n`;
  }
}

export async function writeNodesFile(filePath: string, graph: CanonicalGraph): Promise<void> {
  await pipeline(Readable.from(nodeLines(graph)), fs.createWriteStream(filePath, { encoding: "utf-8" }));
}

export async function writeEdgesFile(
  filePath: string,
  edges: readonly SynthesizedEdge[],
  grid: TimeGrid
): Promise<void> {
  await pipeline(Readable.from(edgeLines(edges, grid)), fs.createWriteStream(filePath, { encoding: "utf-8" }));
}
