import { isDistanceUnit, type DistanceUnit } from "./units.js";

export interface EngineConfig {
  debug: boolean;
  distanceUnit: DistanceUnit;
}

export type EnvSource = Record<string, string | undefined>;

function processEnv(): EnvSource {
  return typeof process !== "undefined" && process.env ? process.env : {};
}

function flag(value: string | undefined): boolean {
  return value === "1" || value?.toLowerCase() === "true";
}

/** Read engine settings from the environment (GEONAV_DEBUG, GEONAV_DISTANCE_UNIT). */
export function readEngineConfig(env: EnvSource = processEnv()): EngineConfig {
  const unit = env.GEONAV_DISTANCE_UNIT;
  return {
    debug: flag(env.GEONAV_DEBUG),
    distanceUnit: unit !== undefined && isDistanceUnit(unit) ? unit : "kilometers",
  };
}

export function isDebugEnabled(): boolean {
  return readEngineConfig().debug;
}
