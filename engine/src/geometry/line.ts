import { failure, success, type GeoResult } from "../errors.js";
import {
  greatCircleDistance,
  greatCircleIntermediatePoint,
  greatCircleProject,
  greatCircleProjectToSegment,
} from "../navigation.js";
import type { LineString, Point, Position, ProjectionResult } from "../types.js";
import { createPoint, pointFromLatLon, positionToLatLon } from "./factories.js";

export interface LineMidpoint {
  lengthKm: number;
  /** Undefined when the line has zero length. */
  midpoint?: Position;
}

type Projector = (
  lat1: number,
  lon1: number,
  lat2: number,
  lon2: number,
  latP: number,
  lonP: number
) => ProjectionResult;

function tooShort(): GeoResult<never> {
  return failure("DegenerateGeometry", "linestring must have at least 2 coordinates");
}

function segmentLength(start: Position, end: Position): number {
  return greatCircleDistance(start[1], start[0], end[1], end[0]);
}

/** Sum of great-circle segment lengths in kilometres. */
export function lineStringLengthKm(line: LineString): GeoResult<number> {
  const coords = line.coordinates;
  if (coords.length < 2) return tooShort();
  let total = 0;
  for (let i = 0; i < coords.length - 1; i++) {
    total += segmentLength(coords[i], coords[i + 1]);
  }
  return success(total);
}

/**
 * Point `distanceKm` along the line, interpolated on the great circle of the
 * segment it falls in. Distances at or below zero give the first coordinate,
 * distances at or beyond the total length the last one.
 */
export function pointAtDistance(line: LineString, distanceKm: number): GeoResult<Point> {
  const coords = line.coordinates;
  if (coords.length < 2) return tooShort();

  const first = coords[0];
  const last = coords[coords.length - 1];
  if (distanceKm <= 0) return success(createPoint(first[0], first[1]));

  let remaining = distanceKm;
  for (let i = 0; i < coords.length - 1; i++) {
    const start = coords[i];
    const end = coords[i + 1];
    const seg = segmentLength(start, end);
    if (remaining < seg) {
      const { lat, lon } = positionToLatLon(start);
      const target = positionToLatLon(end);
      return success(pointFromLatLon(greatCircleIntermediatePoint(lat, lon, target.lat, target.lon, remaining / seg)));
    }
    remaining -= seg;
  }
  return success(createPoint(last[0], last[1]));
}

export function lineMidpointWithLength(line: LineString): GeoResult<LineMidpoint> {
  const length = lineStringLengthKm(line);
  if (!length.ok) return length;
  if (length.value === 0) return success({ lengthKm: 0 });

  const mid = pointAtDistance(line, length.value / 2);
  if (!mid.ok) return mid;
  return success({ lengthKm: length.value, midpoint: mid.value.coordinates });
}

/** Arc-length midpoint; a zero-length line gives its first coordinate. */
export function lineMidpoint(line: LineString): GeoResult<Point> {
  const measured = lineMidpointWithLength(line);
  if (!measured.ok) return measured;
  const position = measured.value.midpoint ?? line.coordinates[0];
  return success(createPoint(position[0], position[1]));
}

function minimumCrossTrack(line: LineString, point: Point, project: Projector): GeoResult<number> {
  const coords = line.coordinates;
  if (coords.length < 2) return tooShort();

  const [lonP, latP] = point.coordinates;
  let minDist = Infinity;
  for (let i = 0; i < coords.length - 1; i++) {
    const [lon1, lat1] = coords[i];
    const [lon2, lat2] = coords[i + 1];
    const dist = Math.abs(project(lat1, lon1, lat2, lon2, latP, lonP).crossTrackKm);
    if (dist < minDist) minDist = dist;
  }
  return success(minDist);
}

/**
 * Minimum perpendicular distance in kilometres from `point` to the great
 * circles through each segment. Not clamped to segment endpoints; see
 * {@link lineSegmentPointDistance} for the clamped measure.
 */
export function linePointDistance(line: LineString, point: Point): GeoResult<number> {
  return minimumCrossTrack(line, point, greatCircleProject);
}

/** Minimum distance to the segments themselves, endpoints included. */
export function lineSegmentPointDistance(line: LineString, point: Point): GeoResult<number> {
  return minimumCrossTrack(line, point, greatCircleProjectToSegment);
}
