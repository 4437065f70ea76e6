import { KM_PER_MILE, type SpeedProfile } from "@widepath/config";
import { uniform } from "./random.js";
import type { SpeedModel } from "./types.js";

/**
 * Speed drawn in mph, returned in km per minute for km distances.
 */
export function mphRangeSpeed(minMph: number, maxMph: number): SpeedModel {
  return (random) => (uniform(random, minMph, maxMph) * KM_PER_MILE) / 60;
}

/**
 * Base speed (distance units per minute) scaled by a per-edge factor.
 */
export function scaledSpeed(baseSpeed: number, minFactor: number, maxFactor: number): SpeedModel {
  return (random) => baseSpeed * uniform(random, minFactor, maxFactor);
}

export function createSpeedModel(profile: SpeedProfile, baseSpeed: number): SpeedModel {
  switch (profile.kind) {
    case "mph-range":
      return mphRangeSpeed(profile.minMph, profile.maxMph);
    case "scaled":
      return scaledSpeed(baseSpeed, profile.minFactor, profile.maxFactor);
  }
}
