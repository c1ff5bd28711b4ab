import { failure, success, type GeoResult } from "../errors.js";
import { createLineString, createMultiLineString, samePosition } from "../geometry/factories.js";
import { greatCircleDistance, greatCircleIntermediatePoint } from "../navigation.js";
import type { LineString, MultiLineString, Point, Position } from "../types.js";

export const DEFAULT_ROUTE_POINTS = 2;

export type Route = LineString | MultiLineString;

/** Split wherever consecutive longitudes jump by more than 180°. */
function splitAtAntimeridian(coords: readonly Position[]): Position[][] {
  if (coords.length === 0) return [];
  const lines: Position[][] = [];
  let current: Position[] = [coords[0]];
  for (let i = 1; i < coords.length; i++) {
    const prev = coords[i - 1];
    const curr = coords[i];
    if (Math.abs(curr[0] - prev[0]) > 180) {
      lines.push(current);
      current = [curr];
    } else {
      current.push(curr);
    }
  }
  lines.push(current);
  return lines;
}

/**
 * `npoints` evenly spaced points on the great circle from `start` to `end`.
 * Routes crossing the antimeridian come back as a MultiLineString; identical
 * endpoints give a LineString repeating the start.
 */
export function greatCircleRoute(start: Point, end: Point, npoints = DEFAULT_ROUTE_POINTS): Route {
  const n = Number.isFinite(npoints) && npoints >= 1 ? Math.floor(npoints) : DEFAULT_ROUTE_POINTS;
  const startPos = start.coordinates;
  const endPos = end.coordinates;

  if (samePosition(startPos, endPos)) {
    return createLineString(Array.from({ length: n }, () => startPos));
  }

  const [lon1, lat1] = startPos;
  const [lon2, lat2] = endPos;
  const coords: Position[] = [];
  for (let i = 0; i < n; i++) {
    // a single point sits at the start
    const fraction = n === 1 ? 0 : i / (n - 1);
    const { lat, lon } = greatCircleIntermediatePoint(lat1, lon1, lat2, lon2, fraction);
    coords.push([lon, lat]);
  }

  const lines = splitAtAntimeridian(coords);
  return lines.length === 1 ? createLineString(lines[0]) : createMultiLineString(lines);
}

/** Great-circle route with points roughly every `spacingKm` kilometres. */
export function greatCircleRouteByDistance(start: Point, end: Point, spacingKm: number): GeoResult<Route> {
  if (!Number.isFinite(spacingKm) || spacingKm <= 0) {
    return failure("InvalidArgument", `spacing must be a positive number of kilometres, got ${spacingKm}`);
  }
  const [lon1, lat1] = start.coordinates;
  const [lon2, lat2] = end.coordinates;
  const total = greatCircleDistance(lat1, lon1, lat2, lon2);
  const npoints = Math.max(DEFAULT_ROUTE_POINTS, Math.floor(total / spacingKm) + 1);
  return success(greatCircleRoute(start, end, npoints));
}
