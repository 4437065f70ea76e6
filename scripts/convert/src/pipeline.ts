import fs from "fs";
import path from "path";
import { randomInt } from "crypto";
import { RUSH_WINDOWS, SEEDS, describeRushWindows } from "@widepath/config";
import {
  buildTimeGrid,
  canonicalizeGraph,
  createRandom,
  createSpeedModel,
  synthesizeEdges
} from "@widepath/network";
import { getDatasetConfig, resolveInputDir, resolveSpeed, type Config } from "./config.js";
import { createLoader, type DatasetLoader } from "./loaders.js";
import type { Logger } from "./logger.js";
import { createProjector } from "./projection.js";
import { verifyOutput } from "./reader.js";
import { outputPaths, writeEdgesFile, writeNodesFile, type OutputPaths } from "./serialize.js";

export type ConversionDeps = {
  logger: Logger;
  loader?: DatasetLoader;
  /** Seed for the cost stream when none is configured */
  drawSeed?: () => number;
};

export type ConversionResult = {
  paths: OutputPaths;
  rawNodeCount: number;
  rawEdgeCount: number;
  nodeCount: number;
  edgeCount: number;
  duplicateEdges: number;
  droppedNodes: number;
  arrivalPointCount: number;
  clearwayCount: number;
  scoredCount: number;
  costSeed: number;
  removedLegacyFiles: string[];
};

function drawCostSeed(): number {
  return randomInt(0, 2 ** 31);
}

/**
 * Older exports wrote separate `node_<N>.txt` / `edge_<N>.txt` files; drop
 * them so the merged files are the only ones left.
 */
export async function removeLegacyFiles(outputDir: string, nodeCount: number): Promise<string[]> {
  const removed: string[] = [];
  for (const name of [`node_${nodeCount}.txt`, `edge_${nodeCount}.txt`]) {
    const filePath = path.join(outputDir, name);
    if (fs.existsSync(filePath)) {
      await fs.promises.unlink(filePath);
      removed.push(name);
    }
  }
  return removed;
}

export async function runConversion(config: Config, deps: ConversionDeps): Promise<ConversionResult> {
  const { logger } = deps;
  const dataset = getDatasetConfig(config);
  const inputDir = resolveInputDir(config);
  const outputDir = config.CONVERT_OUTPUT_DIR;
  const loader = deps.loader ?? createLoader(dataset, createProjector(config.CONVERT_PROJECTION));

  logger.info({ dataset: dataset.datasetId, inputDir }, `loading ${dataset.datasetName}`);
  const raw = await loader.load(inputDir);
  logger.info({ nodes: raw.nodes.length, edges: raw.edges.length }, "loaded raw network");

  const { graph, duplicateEdges, droppedNodes } = canonicalizeGraph(raw, dataset.idPolicy);
  logger.info(
    { policy: dataset.idPolicy, nodes: graph.nodes.size, edges: graph.edges.length, duplicateEdges, droppedNodes },
    "canonicalized graph"
  );

  if (config.CONVERT_SPEED !== undefined && dataset.speed.kind !== "scaled") {
    logger.warn(
      { dataset: dataset.datasetId, speed: config.CONVERT_SPEED },
      "speed setting ignored: this dataset draws its own speeds"
    );
  }

  const grid = buildTimeGrid(RUSH_WINDOWS);
  const costSeed = config.CONVERT_COST_SEED ?? (deps.drawSeed ?? drawCostSeed)();
  if (config.CONVERT_COST_SEED === undefined) {
    logger.info({ costSeed }, "no cost seed configured, drew one for this run");
  }

  const edges = synthesizeEdges(graph.edges, grid, {
    windows: RUSH_WINDOWS,
    speedModel: createSpeedModel(dataset.speed, resolveSpeed(config)),
    widths: { baseWidth: config.CONVERT_BASE_WIDTH, clearwayWidth: config.CONVERT_CLEARWAY_WIDTH },
    clearwayPercent: config.CONVERT_CLEARWAY_PCT,
    densityPercent: config.CONVERT_DENSITY,
    random: {
      cost: createRandom(costSeed),
      clearway: createRandom(SEEDS.clearway),
      score: createRandom(SEEDS.score)
    }
  });

  await fs.promises.mkdir(outputDir, { recursive: true });
  const paths = outputPaths(outputDir, graph.nodes.size);
  await writeNodesFile(paths.nodesPath, graph);
  await writeEdgesFile(paths.edgesPath, edges, grid);

  if (config.CONVERT_VERIFY) {
    await verifyOutput(paths, graph, edges, grid);
    logger.info({ nodesPath: paths.nodesPath, edgesPath: paths.edgesPath }, "verified written files");
  }

  const removedLegacyFiles = await removeLegacyFiles(outputDir, graph.nodes.size);
  if (removedLegacyFiles.length > 0) {
    logger.info({ files: removedLegacyFiles }, "removed old separate files");
  }

  const result: ConversionResult = {
    paths,
    rawNodeCount: raw.nodes.length,
    rawEdgeCount: raw.edges.length,
    nodeCount: graph.nodes.size,
    edgeCount: edges.length,
    duplicateEdges,
    droppedNodes,
    arrivalPointCount: grid.arrivalPoints.length,
    clearwayCount: edges.filter((edge) => edge.clearway).length,
    scoredCount: edges.filter((edge) => edge.scored).length,
    costSeed,
    removedLegacyFiles
  };

  logger.info(
    {
      nodes: result.nodeCount,
      edges: result.edgeCount,
      nodesPath: paths.nodesPath,
      edgesPath: paths.edgesPath,
      timePoints: result.arrivalPointCount,
      rushHours: describeRushWindows(RUSH_WINDOWS),
      densityPct: config.CONVERT_DENSITY,
      scoredEdges: result.scoredCount,
      clearwayPct: config.CONVERT_CLEARWAY_PCT,
      clearwayEdges: result.clearwayCount,
      clearwayWidth: config.CONVERT_CLEARWAY_WIDTH,
      baseWidth: config.CONVERT_BASE_WIDTH,
      rushWidth: config.CONVERT_RUSH_WIDTH,
      costSeed
    },
    "conversion complete"
  );

  return result;
}
