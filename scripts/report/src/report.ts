export type ParetoPath = {
  index: number;
  widenessPct: number;
  rightTurns: number;
  sharpTurns: number;
  travelMinutes: number;
};

export type ParetoReport = {
  source: number;
  destination: number;
  departureMinutes: number | null;
  departureClock: string | null;
  budgetMinutes: number | null;
  /** Count of `--- Pareto Path #n ---` headers, including blocks that failed to parse */
  pathCount: number;
  paths: ParetoPath[];
};

const SOURCE_PATTERN = /Source: (\d+)/;
const DESTINATION_PATTERN = /Destination: (\d+)/;
const DEPARTURE_PATTERN = /Departure Time: ([\d.]+) minutes \((\d+:\d+)\)/;
const BUDGET_PATTERN = /Budget: ([\d.]+) minutes/;
const PATH_HEADER_PATTERN = /--- Pareto Path #\d+ ---/g;
const PATH_BLOCK_PATTERN =
  /--- Pareto Path #(\d+) ---\s+Wideness Score: ([\d.]+)%\s+Right Turns: (\d+)\s+Sharp Turns: (\d+)\s+Travel Time: ([\d.]+) minutes/g;

const RULE = "=".repeat(70);
const THIN_RULE = "-".repeat(70);

/**
 * Extract the query and its Pareto-optimal paths from a routing report.
 * Returns null when the report names no source/destination pair.
 */
export function parseParetoReport(text: string): ParetoReport | null {
  const source = SOURCE_PATTERN.exec(text);
  const destination = DESTINATION_PATTERN.exec(text);
  if (!source || !destination) {
    return null;
  }

  const departure = DEPARTURE_PATTERN.exec(text);
  const budget = BUDGET_PATTERN.exec(text);

  const paths = Array.from(text.matchAll(PATH_BLOCK_PATTERN), (match) => ({
    index: Number(match[1]),
    widenessPct: Number(match[2]),
    rightTurns: Number(match[3]),
    sharpTurns: Number(match[4]),
    travelMinutes: Number(match[5])
  }));

  return {
    source: Number(source[1]),
    destination: Number(destination[1]),
    departureMinutes: departure ? Number(departure[1]) : null,
    departureClock: departure ? departure[2] : null,
    budgetMinutes: budget ? Number(budget[1]) : null,
    pathCount: (text.match(PATH_HEADER_PATTERN) ?? []).length,
    paths
  };
}

function pickBy(paths: readonly ParetoPath[], better: (a: ParetoPath, b: ParetoPath) => boolean): ParetoPath | null {
  let best: ParetoPath | null = null;
  for (const path of paths) {
    if (!best || better(path, best)) {
      best = path;
    }
  }
  return best;
}

export function widestPath(paths: readonly ParetoPath[]): ParetoPath | null {
  return pickBy(paths, (a, b) => a.widenessPct > b.widenessPct);
}

export function fewestRightTurns(paths: readonly ParetoPath[]): ParetoPath | null {
  return pickBy(paths, (a, b) => a.rightTurns < b.rightTurns);
}

export function formatPathRow(path: ParetoPath): string {
  const num = `#${String(path.index).padStart(2)}`;
  const wideness = `${path.widenessPct.toFixed(2)}%`.padStart(9);
  const right = String(path.rightTurns).padStart(6);
  const sharp = String(path.sharpTurns).padStart(6);
  const travel = path.travelMinutes.toFixed(2).padStart(7);
  return `  ${num}   ${wideness}   ${right}   ${sharp}   ${travel} min`;
}

function formatConclusion(report: ParetoReport): string[] {
  const widest = widestPath(report.paths);
  const fewest = fewestRightTurns(report.paths);
  if (!widest || !fewest) {
    return ["No Pareto path details were found in the report."];
  }
  if (widest === fewest) {
    return [
      `Path #${widest.index} is both the widest (${widest.widenessPct.toFixed(2)}%) and the one with the fewest right turns (${widest.rightTurns}).`
    ];
  }
  return [
    `The pair (${report.source} -> ${report.destination}) trades road wideness against turns:`,
    "",
    `  * Path #${widest.index} maximizes wideness (${widest.widenessPct.toFixed(2)}%) with ${widest.rightTurns} right turns`,
    `  * Path #${fewest.index} minimizes right turns (${fewest.rightTurns}) at ${fewest.widenessPct.toFixed(2)}% wideness`,
    "",
    `None of the ${report.pathCount} paths dominates another on both criteria.`
  ];
}

/**
 * Render a parsed report as a plain-text summary table.
 */
export function formatParetoSummary(report: ParetoReport): string {
  const departure = report.departureClock ?? "N/A";
  const budget = report.budgetMinutes === null ? "N/A" : `${report.budgetMinutes} minutes`;

  const lines = [
    RULE,
    "Pareto optimal routes",
    RULE,
    "",
    `  Source node:      ${report.source}`,
    `  Destination node: ${report.destination}`,
    `  Departure time:   ${departure}`,
    `  Budget:           ${budget}`,
    `  Pareto routes:    ${report.pathCount}`,
    "",
    THIN_RULE,
    `${"Path".padStart(5).padEnd(6)} ${"Wideness".padStart(10)} ${"R-Turns".padStart(8)} ${"S-Turns".padStart(8)} ${"Travel".padStart(10)}`,
    "-".repeat(50),
    ...report.paths.map(formatPathRow),
    "",
    RULE,
    ...formatConclusion(report)
  ];

  return `${lines.join("\n")}\n`;
}
