import {
  MINUTES_PER_DAY,
  RUSH_WINDOWS,
  TIME_STEP_MINUTES,
  WIDTH_SERIES,
  type RushWindow
} from "@widepath/config";
import type { TimeGrid } from "./types.js";

export function assertValidWindows(windows: readonly RushWindow[]): void {
  let previousEnd = -1;
  for (const window of windows) {
    if (!Number.isInteger(window.start) || !Number.isInteger(window.end)) {
      throw new RangeError(`Rush window bounds must be whole minutes: ${window.start}-${window.end}`);
    }
    if (window.start < 0 || window.end > MINUTES_PER_DAY || window.start > window.end) {
      throw new RangeError(`Rush window ${window.start}-${window.end} is outside the day`);
    }
    if (window.start <= previousEnd) {
      throw new RangeError("Rush windows must be ordered and disjoint");
    }
    previousEnd = window.end;
  }
}

/**
 * Arrival-time samples shared by every edge: midnight, then every step from
 * each window's start up to and including its end.
 */
export function buildTimeGrid(
  windows: readonly RushWindow[] = RUSH_WINDOWS,
  stepMinutes: number = TIME_STEP_MINUTES
): TimeGrid {
  if (!Number.isInteger(stepMinutes) || stepMinutes <= 0) {
    throw new RangeError(`Time step must be a positive whole number of minutes: ${stepMinutes}`);
  }
  assertValidWindows(windows);

  const arrivalPoints = [0];
  for (const { start, end } of windows) {
    for (let time = start; time <= end; time += stepMinutes) {
      // A window opening at midnight would repeat the leading 0
      if (time > arrivalPoints[arrivalPoints.length - 1]) {
        arrivalPoints.push(time);
      }
    }
  }

  return { arrivalPoints, widthPoints: [...WIDTH_SERIES] };
}
