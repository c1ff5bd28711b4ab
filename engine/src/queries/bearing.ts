import { readEngineConfig } from "../config.js";
import { createPoint } from "../geometry/factories.js";
import { initialBearing, rhumbLineBearing, rhumbLineDestination, rhumbLineDistanceUnits } from "../navigation.js";
import type { Point } from "../types.js";
import type { DistanceUnit } from "../units.js";

/** Great-circle bearing between two points, degrees from true north in [0, 360). */
export function bearing(start: Point, end: Point): number {
  const [lon1, lat1] = start.coordinates;
  const [lon2, lat2] = end.coordinates;
  return initialBearing(lat1, lon1, lat2, lon2);
}

export function rhumbBearing(start: Point, end: Point): number {
  const [lon1, lat1] = start.coordinates;
  const [lon2, lat2] = end.coordinates;
  return rhumbLineBearing(lat1, lon1, lat2, lon2);
}

export function rhumbDestination(start: Point, distanceKm: number, bearingDeg: number): Point {
  const [lon, lat] = start.coordinates;
  const destination = rhumbLineDestination(lat, lon, distanceKm, bearingDeg);
  return createPoint(destination.lon, destination.lat);
}

/** Rhumb-line distance in `unit`, or in the configured default unit (GEONAV_DISTANCE_UNIT). */
export function rhumbDistance(start: Point, end: Point, unit: DistanceUnit = readEngineConfig().distanceUnit): number {
  const [lon1, lat1] = start.coordinates;
  const [lon2, lat2] = end.coordinates;
  return rhumbLineDistanceUnits(lat1, lon1, lat2, lon2, unit);
}
