export type {
  NodeRecord,
  EdgeRecord,
  RawGraph,
  CanonicalGraph,
  TimeGrid,
  EdgeAttributes,
  SynthesizedEdge,
  Random,
  SpeedModel,
} from "./types.js";

export type { CanonicalizeResult } from "./canonicalize.js";
export type { CostOptions, WidthOptions, SynthesisOptions } from "./synthesize.js";

export {
  canonicalizeGraph,
  dedupeEdges,
  renumberNodes,
  validateContiguousIds,
} from "./canonicalize.js";

export { assertValidWindows, buildTimeGrid } from "./time-grid.js";
export { rushMultiplier, synthesizeCosts, synthesizeEdges } from "./synthesize.js";
export { createSpeedModel, mphRangeSpeed, scaledSpeed } from "./speed.js";
export { assignFlags, createRandom, shuffle, uniform } from "./random.js";
export { GraphIntegrityError, InputNotFoundError, ParseError } from "./errors.js";
