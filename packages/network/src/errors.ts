export class InputNotFoundError extends Error {
  path: string;

  constructor(path: string, label = "input file") {
    super(`Missing ${label}: ${path}`);
    this.path = path;
    this.name = "InputNotFoundError";
  }
}

export class ParseError extends Error {
  file: string;
  lineNumber: number | null;
  line: string | null;

  constructor(file: string, lineNumber: number | null, line: string | null, reason: string) {
    const location = lineNumber === null ? file : `${file}:${lineNumber}`;
    const excerpt = line === null ? "" : ` '${line}'`;
    super(`${reason} at ${location}${excerpt}`);
    this.file = file;
    this.lineNumber = lineNumber;
    this.line = line;
    this.name = "ParseError";
  }
}

// Only the first few offending ids go into the message
const MAX_REPORTED_IDS = 20;

export class GraphIntegrityError extends Error {
  nodeIds: number[];

  constructor(message: string, nodeIds: number[] = []) {
    const listed = nodeIds.slice(0, MAX_REPORTED_IDS);
    super(listed.length > 0 ? `${message}: ${listed.join(",")}` : message);
    this.nodeIds = nodeIds;
    this.name = "GraphIntegrityError";
  }
}
