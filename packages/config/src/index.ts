export type RushWindow = {
  /** Minutes from midnight, inclusive */
  start: number;
  /** Minutes from midnight, inclusive */
  end: number;
};

export const MINUTES_PER_DAY = 24 * 60;

// Spacing of samples inside a rush window
export const TIME_STEP_MINUTES = 30;

export const RUSH_WINDOWS: RushWindow[] = [
  { start: 7 * 60 + 30, end: 9 * 60 + 30 }, // 7:30am - 9:30am
  { start: 16 * 60, end: 18 * 60 + 30 } // 4:00pm - 6:30pm
];

// Reserved for per-width time dependence; the solver does not read it yet
export const WIDTH_SERIES: number[] = [0];

export const CLUSTER_ID = 1;

export const DEFAULT_BASE_WIDTH = 3.5; // meters, typical lane width
export const DEFAULT_RUSH_WIDTH = 2.5; // meters under congestion
export const DEFAULT_CLEARWAY_WIDTH = 4.5; // meters when parking is cleared for rush hour
export const DEFAULT_CLEARWAY_PERCENTAGE = 5;
export const DEFAULT_DENSITY = 20; // percentage of edges with positive scores
export const DEFAULT_SPEED = 100; // meters per minute

/**
 * Seeds for the reproducible per-edge annotation groups. Each group gets its
 * own stream so changing how one is drawn never shifts the other.
 */
export const SEEDS = {
  score: 42,
  clearway: 123
} as const;

export type MultiplierBand = {
  positions: number[];
  min: number;
  max: number;
};

/**
 * Rush-hour cost increase by 30-minute position inside the active window.
 * Positions not listed here add nothing.
 */
export const RUSH_MULTIPLIER_BANDS: MultiplierBand[] = [
  { positions: [0, 4], min: 0.1, max: 0.15 },
  { positions: [1, 3], min: 0.2, max: 0.25 },
  { positions: [2], min: 0.3, max: 0.4 }
];

export const KM_PER_MILE = 1.60934;

export type IdPolicy = "validate" | "renumber";

export type DatasetFormat = "whitespace" | "edge-list-csv";

export type SpeedProfile =
  | { kind: "mph-range"; minMph: number; maxMph: number }
  | { kind: "scaled"; minFactor: number; maxFactor: number };

export type DatasetConfig = {
  datasetId: string;
  datasetName: string;
  format: DatasetFormat;
  idPolicy: IdPolicy;
  /** Unit of the raw distance column; costs come out in minutes either way */
  distanceUnit: "km" | "m";
  defaultInputDir: string;
  nodeFile?: string;
  edgeFile: string;
  speed: SpeedProfile;
};

export const CALIFORNIA_DATASET: DatasetConfig = {
  datasetId: "california",
  datasetName: "California road network",
  format: "whitespace",
  idPolicy: "validate",
  distanceUnit: "km",
  defaultInputDir: "datasets/California",
  nodeFile: "node coordinates.txt",
  edgeFile: "edge distance.txt",
  speed: { kind: "mph-range", minMph: 20, maxMph: 25 }
};

export const LONDON_DATASET: DatasetConfig = {
  datasetId: "london",
  datasetName: "London street network",
  format: "edge-list-csv",
  idPolicy: "renumber",
  distanceUnit: "m",
  defaultInputDir: "datasets/London",
  edgeFile: "London_Edgelist.csv",
  speed: { kind: "scaled", minFactor: 0.8, maxFactor: 1.2 }
};

export const DATASET_IDS = ["california", "london"] as const;

export type DatasetId = (typeof DATASET_IDS)[number];

export const DATASET_CONFIGS: Record<DatasetId, DatasetConfig> = {
  california: CALIFORNIA_DATASET,
  london: LONDON_DATASET
};

/**
 * Format minutes from midnight as HH:MM.
 */
export function formatClock(minutes: number): string {
  const whole = Math.floor(minutes);
  const hours = Math.floor(whole / 60) % 24;
  const mins = whole % 60;
  return `${String(hours).padStart(2, "0")}:${String(mins).padStart(2, "0")}`;
}

export function describeRushWindows(windows: RushWindow[] = RUSH_WINDOWS): string {
  return windows.map((w) => `${formatClock(w.start)}-${formatClock(w.end)}`).join(", ");
}
