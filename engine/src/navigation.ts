/**
 * Spherical navigation primitives
 *
 * Great-circle and rhumb-line distance, bearing, interpolation and projection
 * on a sphere of fixed radius. Arguments are latitude first, in degrees;
 * distances are kilometres.
 */

import type { DistanceFn, LatLon, ProjectionResult } from "./types.js";
import { convertDistanceFromKm, type DistanceUnit } from "./units.js";

export const EARTH_RADIUS_KM = 6371.0;
export const EARTH_RADIUS_MILES = 3959.0;

/** Below this |Δψ| a rhumb line is treated as running due east or west. */
const EAST_WEST_EPSILON = 1e-12;

export function toRadians(deg: number): number {
  return (deg * Math.PI) / 180;
}

export function toDegrees(rad: number): number {
  return (rad * 180) / Math.PI;
}

/** Wrap a longitude into [-180, 180). */
export function normalizeLongitude(lon: number): number {
  return ((((lon + 180) % 360) + 360) % 360) - 180;
}

/** Central angle between two points in radians (haversine). */
export function angularDistance(lat1: number, lon1: number, lat2: number, lon2: number): number {
  const φ1 = toRadians(lat1);
  const φ2 = toRadians(lat2);
  const Δφ = toRadians(lat2 - lat1);
  const Δλ = toRadians(lon2 - lon1);

  const a = Math.sin(Δφ / 2) * Math.sin(Δφ / 2) + Math.cos(φ1) * Math.cos(φ2) * Math.sin(Δλ / 2) * Math.sin(Δλ / 2);
  return 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
}

/** Great-circle distance in kilometres using the haversine formula. */
export const greatCircleDistance: DistanceFn = (lat1, lon1, lat2, lon2) =>
  EARTH_RADIUS_KM * angularDistance(lat1, lon1, lat2, lon2);

export function greatCircleDistanceUnits(
  lat1: number,
  lon1: number,
  lat2: number,
  lon2: number,
  unit: DistanceUnit
): number {
  return convertDistanceFromKm(greatCircleDistance(lat1, lon1, lat2, lon2), unit);
}

/** Longitude delta in radians, taking the shorter way round the antimeridian. */
function wrappedDeltaLambda(lon1: number, lon2: number): number {
  let Δλ = toRadians(lon2 - lon1);
  if (Math.abs(Δλ) > Math.PI) {
    Δλ = Δλ > 0 ? -(2 * Math.PI - Δλ) : 2 * Math.PI + Δλ;
  }
  return Δλ;
}

/** Difference of Mercator-projected latitudes. */
function projectedLatitudeDelta(φ1: number, φ2: number): number {
  return Math.log(Math.tan(φ2 / 2 + Math.PI / 4) / Math.tan(φ1 / 2 + Math.PI / 4));
}

/**
 * Rhumb-line (loxodrome) distance in kilometres. Never shorter than the
 * great-circle distance between the same endpoints.
 */
export function rhumbLineDistance(lat1: number, lon1: number, lat2: number, lon2: number): number {
  const φ1 = toRadians(lat1);
  const φ2 = toRadians(lat2);
  const Δφ = φ2 - φ1;
  const Δλ = wrappedDeltaLambda(lon1, lon2);
  const Δψ = projectedLatitudeDelta(φ1, φ2);

  // E-W courses leave Δφ/Δψ undefined.
  const q = Math.abs(Δψ) > EAST_WEST_EPSILON ? Δφ / Δψ : Math.cos(φ1);
  const δ = Math.sqrt(Δφ * Δφ + q * q * Δλ * Δλ);
  return δ * EARTH_RADIUS_KM;
}

export function rhumbLineDistanceUnits(
  lat1: number,
  lon1: number,
  lat2: number,
  lon2: number,
  unit: DistanceUnit
): number {
  return convertDistanceFromKm(rhumbLineDistance(lat1, lon1, lat2, lon2), unit);
}

/** Forward azimuth from point 1 towards point 2, degrees in [0, 360). */
export function initialBearing(lat1: number, lon1: number, lat2: number, lon2: number): number {
  const φ1 = toRadians(lat1);
  const φ2 = toRadians(lat2);
  const Δλ = toRadians(lon2 - lon1);
  const y = Math.sin(Δλ) * Math.cos(φ2);
  const x = Math.cos(φ1) * Math.sin(φ2) - Math.sin(φ1) * Math.cos(φ2) * Math.cos(Δλ);
  return (toDegrees(Math.atan2(y, x)) + 360) % 360;
}

/** Constant bearing of the rhumb line from point 1 to point 2, degrees in [0, 360). */
export function rhumbLineBearing(lat1: number, lon1: number, lat2: number, lon2: number): number {
  const Δλ = wrappedDeltaLambda(lon1, lon2);
  const Δψ = projectedLatitudeDelta(toRadians(lat1), toRadians(lat2));
  return (toDegrees(Math.atan2(Δλ, Δψ)) + 360) % 360;
}

export function rhumbLineDestination(lat: number, lon: number, distanceKm: number, bearingDeg: number): LatLon {
  const δ = distanceKm / EARTH_RADIUS_KM;
  const φ1 = toRadians(lat);
  const λ1 = toRadians(lon);
  const θ = toRadians(bearingDeg);

  const Δφ = δ * Math.cos(θ);
  let φ2 = φ1 + Δφ;
  // over a pole: come back down the other side
  if (Math.abs(φ2) > Math.PI / 2) {
    φ2 = φ2 > 0 ? Math.PI - φ2 : -Math.PI - φ2;
  }

  const Δψ = projectedLatitudeDelta(φ1, φ2);
  const q = Math.abs(Δψ) > EAST_WEST_EPSILON ? Δφ / Δψ : Math.cos(φ1);
  const Δλ = (δ * Math.sin(θ)) / q;

  return { lat: toDegrees(φ2), lon: normalizeLongitude(toDegrees(λ1 + Δλ)) };
}

export function greatCircleDestination(lat: number, lon: number, distanceKm: number, bearingDeg: number): LatLon {
  const δ = distanceKm / EARTH_RADIUS_KM;
  const φ1 = toRadians(lat);
  const λ1 = toRadians(lon);
  const θ = toRadians(bearingDeg);

  const sinφ2 = Math.sin(φ1) * Math.cos(δ) + Math.cos(φ1) * Math.sin(δ) * Math.cos(θ);
  const φ2 = Math.asin(Math.max(-1, Math.min(1, sinφ2)));
  const λ2 = λ1 + Math.atan2(Math.sin(θ) * Math.sin(δ) * Math.cos(φ1), Math.cos(δ) - Math.sin(φ1) * sinφ2);

  return { lat: toDegrees(φ2), lon: normalizeLongitude(toDegrees(λ2)) };
}

/**
 * Point at `fraction` of the way along the great circle from point 1 to
 * point 2 (spherical linear interpolation). Coincident endpoints return the
 * start.
 */
export function greatCircleIntermediatePoint(
  lat1: number,
  lon1: number,
  lat2: number,
  lon2: number,
  fraction: number
): LatLon {
  const δ = angularDistance(lat1, lon1, lat2, lon2);
  if (δ === 0) {
    return { lat: lat1, lon: normalizeLongitude(lon1) };
  }

  const φ1 = toRadians(lat1);
  const λ1 = toRadians(lon1);
  const φ2 = toRadians(lat2);
  const λ2 = toRadians(lon2);

  const a = Math.sin((1 - fraction) * δ) / Math.sin(δ);
  const b = Math.sin(fraction * δ) / Math.sin(δ);

  const x = a * Math.cos(φ1) * Math.cos(λ1) + b * Math.cos(φ2) * Math.cos(λ2);
  const y = a * Math.cos(φ1) * Math.sin(λ1) + b * Math.cos(φ2) * Math.sin(λ2);
  const z = a * Math.sin(φ1) + b * Math.sin(φ2);

  const φ = Math.atan2(z, Math.sqrt(x * x + y * y));
  const λ = Math.atan2(y, x);
  return { lat: toDegrees(φ), lon: normalizeLongitude(toDegrees(λ)) };
}

/**
 * Project P onto the infinite great circle through points 1 and 2.
 *
 * Along-track distance is signed and not clamped to the segment: it is
 * negative behind the start and exceeds the path length beyond the end.
 */
export function greatCircleProject(
  lat1: number,
  lon1: number,
  lat2: number,
  lon2: number,
  latP: number,
  lonP: number
): ProjectionResult {
  const δ13 = angularDistance(lat1, lon1, latP, lonP);
  if (angularDistance(lat1, lon1, lat2, lon2) === 0) {
    return { lat: lat1, lon: normalizeLongitude(lon1), crossTrackKm: δ13 * EARTH_RADIUS_KM, alongTrackKm: 0 };
  }

  const θ13 = toRadians(initialBearing(lat1, lon1, latP, lonP));
  const θ12 = toRadians(initialBearing(lat1, lon1, lat2, lon2));

  const δxt = Math.asin(Math.max(-1, Math.min(1, Math.sin(δ13) * Math.sin(θ13 - θ12))));
  const cosAt = Math.cos(δ13) / Math.abs(Math.cos(δxt));
  const δat = Math.acos(Math.max(-1, Math.min(1, cosAt))) * (Math.cos(θ13 - θ12) < 0 ? -1 : 1);

  const alongTrackKm = δat * EARTH_RADIUS_KM;
  const foot = greatCircleDestination(lat1, lon1, alongTrackKm, toDegrees(θ12));
  return { lat: foot.lat, lon: foot.lon, crossTrackKm: δxt * EARTH_RADIUS_KM, alongTrackKm };
}

/**
 * Segment-clamped projection. When the foot of the perpendicular falls
 * outside the segment, the nearer endpoint is returned and cross-track is the
 * plain great-circle distance to it.
 */
export function greatCircleProjectToSegment(
  lat1: number,
  lon1: number,
  lat2: number,
  lon2: number,
  latP: number,
  lonP: number
): ProjectionResult {
  const projected = greatCircleProject(lat1, lon1, lat2, lon2, latP, lonP);
  const total = greatCircleDistance(lat1, lon1, lat2, lon2);

  if (projected.alongTrackKm < 0) {
    return {
      lat: lat1,
      lon: normalizeLongitude(lon1),
      crossTrackKm: greatCircleDistance(latP, lonP, lat1, lon1),
      alongTrackKm: 0,
    };
  }
  if (projected.alongTrackKm > total) {
    return {
      lat: lat2,
      lon: normalizeLongitude(lon2),
      crossTrackKm: greatCircleDistance(latP, lonP, lat2, lon2),
      alongTrackKm: total,
    };
  }
  return projected;
}

/** Symmetric distance matrix over `points`, for graph and tour solvers. */
export function distanceMatrix(points: readonly LatLon[], distance: DistanceFn = greatCircleDistance): number[][] {
  const matrix = points.map(() => new Array<number>(points.length).fill(0));
  for (let i = 0; i < points.length; i++) {
    for (let j = i + 1; j < points.length; j++) {
      const d = distance(points[i].lat, points[i].lon, points[j].lat, points[j].lon);
      matrix[i][j] = d;
      matrix[j][i] = d;
    }
  }
  return matrix;
}
