import { z } from "zod";
import {
  DATASET_CONFIGS,
  DATASET_IDS,
  DEFAULT_BASE_WIDTH,
  DEFAULT_CLEARWAY_PERCENTAGE,
  DEFAULT_CLEARWAY_WIDTH,
  DEFAULT_DENSITY,
  DEFAULT_RUSH_WIDTH,
  DEFAULT_SPEED,
  type DatasetConfig
} from "@widepath/config";
import { logLevelSchema } from "./logger.js";

// CLI flags and the environment variables they override
const FLAG_ENV_NAMES: Record<string, string> = {
  dataset: "CONVERT_DATASET",
  input: "CONVERT_INPUT_DIR",
  output: "CONVERT_OUTPUT_DIR",
  "base-width": "CONVERT_BASE_WIDTH",
  "rush-width": "CONVERT_RUSH_WIDTH",
  "clearway-width": "CONVERT_CLEARWAY_WIDTH",
  "clearway-pct": "CONVERT_CLEARWAY_PCT",
  density: "CONVERT_DENSITY",
  speed: "CONVERT_SPEED",
  projection: "CONVERT_PROJECTION",
  "cost-seed": "CONVERT_COST_SEED",
  verify: "CONVERT_VERIFY"
};

const percent = (fallback: number) => z.coerce.number().int().min(0).max(100).default(fallback);

const configSchema = z
  .object({
    CONVERT_DATASET: z.enum(DATASET_IDS).default("california"),
    CONVERT_INPUT_DIR: z.string().min(1).optional(), // defaults per dataset
    CONVERT_OUTPUT_DIR: z.string().min(1).default("dataset"),
    CONVERT_BASE_WIDTH: z.coerce.number().positive().default(DEFAULT_BASE_WIDTH),
    CONVERT_RUSH_WIDTH: z.coerce.number().positive().default(DEFAULT_RUSH_WIDTH),
    CONVERT_CLEARWAY_WIDTH: z.coerce.number().positive().default(DEFAULT_CLEARWAY_WIDTH),
    CONVERT_CLEARWAY_PCT: percent(DEFAULT_CLEARWAY_PERCENTAGE),
    CONVERT_DENSITY: percent(DEFAULT_DENSITY),
    // Meters per minute; only datasets with a scaled speed profile read it
    CONVERT_SPEED: z.coerce.number().positive().optional(),
    CONVERT_PROJECTION: z.enum(["proj4", "linear"]).default("proj4"),
    CONVERT_COST_SEED: z.coerce.number().int().nonnegative().max(0xffffffff).optional(), // 32-bit state
    CONVERT_VERIFY: z
      .enum(["true", "false", "1", "0"])
      .default("false")
      .transform((value) => value === "true" || value === "1"),
    LOG_LEVEL: logLevelSchema.default("info")
  })
  .refine((config) => config.CONVERT_CLEARWAY_WIDTH >= config.CONVERT_BASE_WIDTH, {
    message: "CONVERT_CLEARWAY_WIDTH must not be narrower than CONVERT_BASE_WIDTH",
    path: ["CONVERT_CLEARWAY_WIDTH"]
  });

export type Config = z.infer<typeof configSchema>;

/**
 * Turn `--name=value` (or a bare `--name`) arguments into env-style keys.
 */
export function parseArgs(argv: string[]): Record<string, string> {
  const values: Record<string, string> = {};
  const unknown: string[] = [];

  for (const arg of argv.slice(2)) {
    if (!arg.startsWith("--")) {
      continue;
    }
    const [name, ...rest] = arg.slice(2).split("=");
    const envName = FLAG_ENV_NAMES[name];
    if (!envName) {
      unknown.push(`--${name}`);
      continue;
    }
    values[envName] = rest.length > 0 ? rest.join("=") : "true";
  }

  if (unknown.length > 0) {
    const available = Object.keys(FLAG_ENV_NAMES)
      .map((flag) => `--${flag}`)
      .join(", ");
    throw new Error(`Unknown option ${unknown.join(", ")}. Available options: ${available}`);
  }

  return values;
}

export function loadConfig(env: NodeJS.ProcessEnv, argv: string[]): Config {
  const merged: Record<string, string> = {};
  for (const [key, value] of Object.entries({ ...env, ...parseArgs(argv) })) {
    // Treat empty variables as unset so coercion does not turn them into 0
    if (value !== undefined && value !== "") {
      merged[key] = value;
    }
  }

  const result = configSchema.safeParse(merged);

  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `  ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new Error(`Configuration validation failed:\n${errors}`);
  }

  return result.data;
}

let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (cachedConfig) {
    return cachedConfig;
  }

  cachedConfig = loadConfig(process.env, process.argv);
  return cachedConfig;
}

// For testing: reset cached config
export function resetConfig(): void {
  cachedConfig = null;
}

export function getDatasetConfig(config: Config): DatasetConfig {
  return DATASET_CONFIGS[config.CONVERT_DATASET];
}

export function resolveInputDir(config: Config): string {
  return config.CONVERT_INPUT_DIR ?? getDatasetConfig(config).defaultInputDir;
}

export function resolveSpeed(config: Config): number {
  return config.CONVERT_SPEED ?? DEFAULT_SPEED;
}
