import {
  RUSH_MULTIPLIER_BANDS,
  RUSH_WINDOWS,
  TIME_STEP_MINUTES,
  type MultiplierBand,
  type RushWindow
} from "@widepath/config";
import { assignFlags, uniform } from "./random.js";
import type { EdgeRecord, Random, SpeedModel, SynthesizedEdge, TimeGrid } from "./types.js";

export type CostOptions = {
  windows?: readonly RushWindow[];
  bands?: readonly MultiplierBand[];
  stepMinutes?: number;
};

export type WidthOptions = {
  baseWidth: number;
  clearwayWidth: number;
};

export type SynthesisOptions = CostOptions & {
  speedModel: SpeedModel;
  widths: WidthOptions;
  clearwayPercent: number;
  densityPercent: number;
  random: {
    /** Speeds and rush multipliers */
    cost: Random;
    clearway: Random;
    score: Random;
  };
};

/**
 * Draw the rush-hour increase for a position inside a window, or 0 when no
 * band covers it.
 */
export function rushMultiplier(
  position: number,
  random: Random,
  bands: readonly MultiplierBand[] = RUSH_MULTIPLIER_BANDS
): number {
  const band = bands.find((candidate) => candidate.positions.includes(position));
  return band ? uniform(random, band.min, band.max) : 0;
}

/**
 * One cost per arrival point. Walks the grid with a small automaton: a time
 * equal to the current window's start enters rush, a time at or past its end
 * leaves it and moves on to the next window.
 */
export function synthesizeCosts(
  baseCost: number,
  arrivalPoints: readonly number[],
  random: Random,
  options: CostOptions = {}
): number[] {
  const windows = options.windows ?? RUSH_WINDOWS;
  const bands = options.bands ?? RUSH_MULTIPLIER_BANDS;
  const step = options.stepMinutes ?? TIME_STEP_MINUTES;

  const costs: number[] = [];
  let rushIndex = 0;
  let insideRush = false;

  for (const time of arrivalPoints) {
    // Windows the grid skipped over entirely are never entered
    while (!insideRush && rushIndex < windows.length && time > windows[rushIndex].end) {
      rushIndex += 1;
    }

    if (rushIndex < windows.length) {
      const { start, end } = windows[rushIndex];
      if (!insideRush && time === start) {
        insideRush = true;
      } else if (insideRush && time >= end) {
        insideRush = false;
        rushIndex += 1;
      }
    }

    let cost = baseCost;
    if (insideRush) {
      const position = Math.floor((time - windows[rushIndex].start) / step);
      cost += baseCost * rushMultiplier(position, random, bands);
    }
    costs.push(cost);
  }

  return costs;
}

/**
 * Costs, widths and annotations for every canonical edge, in edge order.
 */
export function synthesizeEdges(
  edges: readonly EdgeRecord[],
  grid: TimeGrid,
  options: SynthesisOptions
): SynthesizedEdge[] {
  const clearways = assignFlags(edges.length, options.clearwayPercent, options.random.clearway);
  const scores = assignFlags(edges.length, options.densityPercent, options.random.score);
  const { baseWidth, clearwayWidth } = options.widths;

  return edges.map((edge, idx) => {
    const speed = options.speedModel(options.random.cost);
    if (!(speed > 0)) {
      throw new RangeError(`Free-flow speed must be positive, got ${speed} for edge ${edge.src}->${edge.dst}`);
    }
    const baseCost = edge.distance / speed;
    const costs = synthesizeCosts(baseCost, grid.arrivalPoints, options.random.cost, options);
    const clearway = clearways[idx];

    return {
      src: edge.src,
      dst: edge.dst,
      distance: edge.distance,
      baseCost,
      costs,
      baseWidth,
      // Clearways widen when parking is cleared; other roads keep one width all day
      rushWidth: clearway ? clearwayWidth : baseWidth,
      clearway,
      scored: scores[idx]
    };
  });
}
