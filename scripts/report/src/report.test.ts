import fs from "fs";
import os from "os";
import path from "path";
import { describe, expect, it, vi } from "vitest";
import { parseReportArgs, resolveLogLevel, summarizeReport } from "./index.js";
import {
  fewestRightTurns,
  formatParetoSummary,
  formatPathRow,
  parseParetoReport,
  widestPath
} from "./report.js";

const REPORT = `Query
Source: 1204
Destination: 877
Departure Time: 1020.0 minutes (17:00)
Budget: 45.0 minutes

--- Pareto Path #1 ---
Wideness Score: 4.93%
Right Turns: 7
Sharp Turns: 2
Travel Time: 31.50 minutes

--- Pareto Path #2 ---
Wideness Score: 3.40%
Right Turns: 0
Sharp Turns: 1
Travel Time: 38.25 minutes
`;

describe("parseParetoReport", () => {
  it("reads the query and each path block", () => {
    expect(parseParetoReport(REPORT)).toEqual({
      source: 1204,
      destination: 877,
      departureMinutes: 1020,
      departureClock: "17:00",
      budgetMinutes: 45,
      pathCount: 2,
      paths: [
        { index: 1, widenessPct: 4.93, rightTurns: 7, sharpTurns: 2, travelMinutes: 31.5 },
        { index: 2, widenessPct: 3.4, rightTurns: 0, sharpTurns: 1, travelMinutes: 38.25 }
      ]
    });
  });

  it("returns null without a destination", () => {
    expect(parseParetoReport("Source: 1\n")).toBeNull();
  });

  it("leaves missing departure and budget empty", () => {
    const report = parseParetoReport("Source: 1\nDestination: 2\n");
    expect(report?.departureClock).toBeNull();
    expect(report?.budgetMinutes).toBeNull();
    expect(report?.paths).toEqual([]);
  });
});

describe("path selection", () => {
  const report = parseParetoReport(REPORT);
  const paths = report ? report.paths : [];

  it("finds the widest path and the one with fewest right turns", () => {
    expect(widestPath(paths)?.index).toBe(1);
    expect(fewestRightTurns(paths)?.index).toBe(2);
  });

  it("returns null for no paths", () => {
    expect(widestPath([])).toBeNull();
  });
});

describe("formatting", () => {
  it("aligns a table row", () => {
    expect(
      formatPathRow({ index: 1, widenessPct: 4.93, rightTurns: 7, sharpTurns: 2, travelMinutes: 31.5 })
    ).toBe("  # 1       4.93%        7        2     31.50 min");
  });

  it("summarizes the trade-off", () => {
    const report = parseParetoReport(REPORT);
    expect(report).not.toBeNull();
    if (!report) return;

    const lines = formatParetoSummary(report).split("\n");
    expect(lines).toContain("  Departure time:   17:00");
    expect(lines).toContain("  Budget:           45 minutes");
    expect(lines).toContain("  * Path #1 maximizes wideness (4.93%) with 7 right turns");
    expect(lines).toContain("  * Path #2 minimizes right turns (0) at 3.40% wideness");
    expect(lines).toContain("None of the 2 paths dominates another on both criteria.");
  });
});

describe("summarizeReport", () => {
  it("writes the summary for a report file", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "widepath-report-"));
    try {
      const file = path.join(dir, "report.txt");
      fs.writeFileSync(file, REPORT);
      const write = vi.fn();

      expect(await summarizeReport(file, write)).toBe(0);
      expect(write).toHaveBeenCalledTimes(1);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("rejects a missing file", async () => {
    await expect(summarizeReport("/nonexistent/report.txt", vi.fn())).rejects.toThrow("Report file not found");
  });

  it("defaults the report path", () => {
    expect(parseReportArgs(["node", "report"]).file).toBe("output/pareto_pairs_test.txt");
    expect(parseReportArgs(["node", "report", "--file=a.txt"]).file).toBe("a.txt");
  });
});

describe("resolveLogLevel", () => {
  it("keeps a known level", () => {
    expect(resolveLogLevel("debug")).toBe("debug");
  });

  it("falls back to info for unset or unknown levels", () => {
    expect(resolveLogLevel(undefined)).toBe("info");
    expect(resolveLogLevel("loud")).toBe("info");
  });
});
