import fs from "fs";
import path from "path";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import type { DatasetConfig } from "@widepath/config";
import {
  InputNotFoundError,
  ParseError,
  type EdgeRecord,
  type NodeRecord,
  type RawGraph
} from "@widepath/network";
import type { LatLon, Projector } from "./projection.js";

/**
 * One implementation per raw dataset layout. The pipeline only ever sees
 * the resulting node and edge records.
 */
export type DatasetLoader = {
  requiredFiles: (inputDir: string) => string[];
  load: (inputDir: string) => Promise<RawGraph>;
};

const INTEGER_PATTERN = /^\+?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

type Line = { lineNumber: number; text: string };

function contentLines(text: string): Line[] {
  return text
    .split(/\r?\n/)
    .map((line, idx) => ({ lineNumber: idx + 1, text: line.trim() }))
    .filter((line) => line.text.length > 0);
}

function parseId(token: string, file: string, line: Line, label: string): number {
  if (!INTEGER_PATTERN.test(token)) {
    throw new ParseError(file, line.lineNumber, line.text, `Invalid ${label} '${token}'`);
  }
  return Number(token);
}

function parseFloatToken(token: string, file: string, line: Line, label: string): number {
  if (!FLOAT_PATTERN.test(token)) {
    throw new ParseError(file, line.lineNumber, line.text, `Invalid ${label} '${token}'`);
  }
  return Number(token);
}

/**
 * Whitespace node file: `id longitude latitude` per line.
 */
export function parseNodeText(text: string, file: string): NodeRecord[] {
  return contentLines(text).map((line) => {
    const parts = line.text.split(/\s+/);
    if (parts.length < 3) {
      throw new ParseError(file, line.lineNumber, line.text, "Malformed node line");
    }
    return {
      id: parseId(parts[0], file, line, "node id"),
      lon: parseFloatToken(parts[1], file, line, "longitude"),
      lat: parseFloatToken(parts[2], file, line, "latitude")
    };
  });
}

/**
 * Whitespace edge file: `edgeId src dst distance` per line.
 */
export function parseEdgeText(text: string, file: string): EdgeRecord[] {
  return contentLines(text).map((line) => {
    const parts = line.text.split(/\s+/);
    if (parts.length < 4) {
      throw new ParseError(file, line.lineNumber, line.text, "Malformed edge line");
    }
    const distance = parseFloatToken(parts[3], file, line, "distance");
    if (distance < 0) {
      throw new ParseError(file, line.lineNumber, line.text, "Negative distance");
    }
    return {
      src: parseId(parts[1], file, line, "source id"),
      dst: parseId(parts[2], file, line, "destination id"),
      distance
    };
  });
}

const floatColumn = z.string().trim().regex(FLOAT_PATTERN, "not a number").transform(Number);
const idColumn = z.string().trim().regex(INTEGER_PATTERN, "not a node id").transform(Number);

const edgeListRowSchema = z.object({
  XCoord: floatColumn,
  YCoord: floatColumn,
  START_NODE: idColumn,
  END_NODE: idColumn,
  LENGTH: floatColumn.pipe(z.number().nonnegative())
});

const csvRecordSchema = z.object({
  record: z.record(z.string(), z.string()),
  raw: z.string().optional(),
  info: z.object({ lines: z.number() }).optional()
});

export type EdgeListRow = z.output<typeof edgeListRowSchema>;

export function parseEdgeListCsv(text: string, file: string): EdgeListRow[] {
  let records: unknown;
  try {
    records = parse(text, {
      bom: true,
      columns: true,
      skip_empty_lines: true,
      trim: true,
      raw: true,
      info: true
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ParseError(file, null, null, `Malformed CSV (${reason})`);
  }

  if (!Array.isArray(records)) {
    throw new ParseError(file, null, null, "Malformed CSV");
  }

  return records.map((entry: unknown, idx: number) => {
    const wrapped = csvRecordSchema.safeParse(entry);
    if (!wrapped.success) {
      throw new ParseError(file, idx + 2, null, "Malformed CSV record");
    }
    const lineNumber = wrapped.data.info?.lines ?? idx + 2;
    const rawLine = wrapped.data.raw?.trim() ?? null;

    const row = edgeListRowSchema.safeParse(wrapped.data.record);
    if (!row.success) {
      const reason = row.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new ParseError(file, lineNumber, rawLine, `Invalid edge row (${reason})`);
    }
    return row.data;
  });
}

/**
 * Build nodes and edges from edge-list rows. Each row's coordinates belong
 * to its start node, so a start node takes the last row that names it; a
 * node only ever seen as an end node borrows the first row it appears in.
 */
export function edgeListToGraph(rows: EdgeListRow[], project: Projector): RawGraph {
  const asStart = new Map<number, LatLon>();
  const firstSeen = new Map<number, LatLon>();
  const edges: EdgeRecord[] = [];

  for (const row of rows) {
    const coords = project(row.XCoord, row.YCoord);
    asStart.set(row.START_NODE, coords);
    if (!firstSeen.has(row.START_NODE)) firstSeen.set(row.START_NODE, coords);
    if (!firstSeen.has(row.END_NODE)) firstSeen.set(row.END_NODE, coords);
    edges.push({ src: row.START_NODE, dst: row.END_NODE, distance: row.LENGTH });
  }

  const nodes: NodeRecord[] = [];
  for (const [id, fallback] of firstSeen) {
    const { lat, lon } = asStart.get(id) ?? fallback;
    nodes.push({ id, lat, lon });
  }

  return { nodes, edges };
}

function assertFilesExist(files: string[]) {
  for (const file of files) {
    if (!fs.existsSync(file)) {
      throw new InputNotFoundError(file);
    }
  }
}

export function createWhitespaceLoader(nodeFile: string, edgeFile: string): DatasetLoader {
  const requiredFiles = (inputDir: string) => [path.join(inputDir, nodeFile), path.join(inputDir, edgeFile)];

  return {
    requiredFiles,
    async load(inputDir) {
      const [nodePath, edgePath] = requiredFiles(inputDir);
      assertFilesExist([nodePath, edgePath]);
      const [nodeText, edgeText] = await Promise.all([
        fs.promises.readFile(nodePath, "utf-8"),
        fs.promises.readFile(edgePath, "utf-8")
      ]);
      return {
        nodes: parseNodeText(nodeText, nodePath),
        edges: parseEdgeText(edgeText, edgePath)
      };
    }
  };
}

export function createEdgeListLoader(edgeFile: string, project: Projector): DatasetLoader {
  const requiredFiles = (inputDir: string) => [path.join(inputDir, edgeFile)];

  return {
    requiredFiles,
    async load(inputDir) {
      const [edgePath] = requiredFiles(inputDir);
      assertFilesExist([edgePath]);
      const text = await fs.promises.readFile(edgePath, "utf-8");
      return edgeListToGraph(parseEdgeListCsv(text, edgePath), project);
    }
  };
}

export function createLoader(dataset: DatasetConfig, project: Projector): DatasetLoader {
  switch (dataset.format) {
    case "whitespace":
      if (!dataset.nodeFile) {
        throw new Error(`Dataset "${dataset.datasetId}" needs a node file for the whitespace format`);
      }
      return createWhitespaceLoader(dataset.nodeFile, dataset.edgeFile);
    case "edge-list-csv":
      return createEdgeListLoader(dataset.edgeFile, project);
  }
}
