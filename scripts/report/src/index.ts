import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import pino from "pino";
import { z } from "zod";
import { formatParetoSummary, parseParetoReport } from "./report.js";

export * from "./report.js";

const __filename = fileURLToPath(import.meta.url);

export const DEFAULT_REPORT_FILE = "output/pareto_pairs_test.txt";

const argsSchema = z.object({
  file: z.string().min(1).default(DEFAULT_REPORT_FILE)
});

const logLevelSchema = z
  .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
  .catch("info");

/** Falls back to "info" for unset or unknown levels. */
export function resolveLogLevel(value: string | undefined): z.infer<typeof logLevelSchema> {
  return logLevelSchema.parse(value);
}

export function parseReportArgs(argv: string[]): z.infer<typeof argsSchema> {
  const fileArg = argv.slice(2).find((arg) => arg.startsWith("--file="));
  return argsSchema.parse({ file: fileArg?.slice("--file=".length) || undefined });
}

/**
 * Summarize a report file. Returns the process exit code.
 */
export async function summarizeReport(
  filePath: string,
  write: (text: string) => void
): Promise<number> {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Report file not found: ${filePath}. Run the routing engine first.`);
  }

  const report = parseParetoReport(await fs.promises.readFile(filePath, "utf-8"));
  if (!report) {
    write("No source/destination pair found in the report.\n");
    return 1;
  }

  write(formatParetoSummary(report));
  return 0;
}

async function main(): Promise<void> {
  const logger = pino({ name: "report", level: resolveLogLevel(process.env.LOG_LEVEL) });
  try {
    const { file } = parseReportArgs(process.argv);
    process.exitCode = await summarizeReport(file, (text) => process.stdout.write(text));
  } catch (err) {
    logger.error({ err }, "report failed");
    process.exitCode = 1;
  }
}

if (process.argv[1] && path.resolve(process.argv[1]) === __filename) {
  void main();
}
