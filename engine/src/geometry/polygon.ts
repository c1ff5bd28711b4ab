import { failure, success, type GeoResult } from "../errors.js";
import type { Polygon, Position, Ring } from "../types.js";
import { samePosition } from "./factories.js";

/** Fixed degree-space tolerance for the on-boundary test. */
export const BOUNDARY_EPSILON = 1e-12;

export interface RingMeasure {
  /** Shoelace area; positive for counter-clockwise rings. */
  signedArea: number;
  centroid: Position;
}

export interface PolygonMass {
  centroid: Position;
  area: number;
}

/**
 * Signed planar area and centroid of a ring (shoelace formula). The ring is
 * walked with wrap-around, so open rings are measured as if closed. Fewer
 * than three positions, or zero area, measure as zero.
 */
export function ringAreaCentroid(ring: Ring): RingMeasure {
  const n = ring.length;
  if (n < 3) return { signedArea: 0, centroid: [0, 0] };

  let area = 0;
  let cx = 0;
  let cy = 0;
  for (let i = 0; i < n; i++) {
    const [x0, y0] = ring[i];
    const [x1, y1] = ring[(i + 1) % n];
    const cross = x0 * y1 - x1 * y0;
    area += cross;
    cx += (x0 + x1) * cross;
    cy += (y0 + y1) * cross;
  }
  area *= 0.5;
  if (area === 0) return { signedArea: 0, centroid: [0, 0] };
  return { signedArea: area, centroid: [cx / (6 * area), cy / (6 * area)] };
}

/**
 * Area-weighted centroid and absolute area of a polygon. Every ring after the
 * first is subtracted as a hole whatever its winding; zero-area holes are
 * ignored.
 */
export function polygonCentroidArea(polygon: Polygon): GeoResult<PolygonMass> {
  const [outer, ...holes] = polygon.coordinates;
  if (!outer) return failure("EmptyGeometry", "polygon has no coordinates");

  const exterior = ringAreaCentroid(outer);
  if (exterior.signedArea === 0) {
    return failure("DegenerateGeometry", "polygon exterior ring has no area");
  }

  let areaSum = Math.abs(exterior.signedArea);
  let lonSum = exterior.centroid[0] * areaSum;
  let latSum = exterior.centroid[1] * areaSum;

  for (const hole of holes) {
    const measure = ringAreaCentroid(hole);
    if (measure.signedArea === 0) continue;
    const absArea = Math.abs(measure.signedArea);
    areaSum -= absArea;
    lonSum -= measure.centroid[0] * absArea;
    latSum -= measure.centroid[1] * absArea;
  }

  if (areaSum <= 0) {
    return failure("DegenerateGeometry", "polygon holes cover its exterior");
  }
  return success({ centroid: [lonSum / areaSum, latSum / areaSum], area: areaSum });
}

/** True when `p` lies on segment a-b: collinear within tolerance and inside its parametric bounds. */
export function pointOnSegment(p: Position, a: Position, b: Position): boolean {
  const [ax, ay] = a;
  const [bx, by] = b;
  const [px, py] = p;

  const cross = (px - ax) * (by - ay) - (py - ay) * (bx - ax);
  if (Math.abs(cross) > BOUNDARY_EPSILON) return false;

  const dot = (px - ax) * (bx - ax) + (py - ay) * (by - ay);
  if (dot < -BOUNDARY_EPSILON) return false;

  const sqLen = (bx - ax) * (bx - ax) + (by - ay) * (by - ay);
  return dot - sqLen <= BOUNDARY_EPSILON;
}

/**
 * Ray-casting containment test. Points on an edge (including the implicit
 * closing edge of an open ring) count as inside.
 */
export function pointInRing(point: Position, ring: Ring): boolean {
  const n = ring.length;
  if (n < 3) return false;

  for (let i = 0; i < n - 1; i++) {
    if (pointOnSegment(point, ring[i], ring[i + 1])) return true;
  }
  if (!samePosition(ring[0], ring[n - 1]) && pointOnSegment(point, ring[n - 1], ring[0])) {
    return true;
  }

  const [x, y] = point;
  let inside = false;
  for (let i = 0, j = n - 1; i < n; j = i++) {
    const [xi, yi] = ring[i];
    const [xj, yj] = ring[j];
    const intersect = yi > y !== yj > y && x < ((xj - xi) * (y - yi)) / (yj - yi) + xi;
    if (intersect) inside = !inside;
  }
  return inside;
}

/** Inside the exterior ring and not inside (or on the boundary of) any hole. */
export function pointInPolygon(point: Position, polygon: Polygon): boolean {
  const [outer, ...holes] = polygon.coordinates;
  if (!outer || !pointInRing(point, outer)) return false;
  return !holes.some((hole) => pointInRing(point, hole));
}

/** Copy of `ring` with its first position appended when it is not already closed. */
export function closeRing(ring: Ring): Ring {
  if (ring.length === 0 || samePosition(ring[0], ring[ring.length - 1])) return ring;
  return [...ring, ring[0]];
}
