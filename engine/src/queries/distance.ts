import { failure, success, unsupported, type GeoResult } from "../errors.js";
import { createLineString, createPolygon } from "../geometry/factories.js";
import { linePointDistance } from "../geometry/line.js";
import { closeRing, pointInPolygon } from "../geometry/polygon.js";
import type { FeatureCollection, GeoObject, MultiPolygon, Point, Polygon, Ring } from "../types.js";

function ringDistance(ring: Ring, point: Point): GeoResult<number> {
  if (ring.length < 2) return failure("DegenerateGeometry", "ring must have at least 2 coordinates");
  return linePointDistance(createLineString(closeRing(ring)), point);
}

function polygonDistance(polygon: Polygon, point: Point): GeoResult<number> {
  if (polygon.coordinates.length === 0) return failure("EmptyGeometry", "polygon has no coordinates");

  let minDist = Infinity;
  for (const ring of polygon.coordinates) {
    const dist = ringDistance(ring, point);
    if (dist.ok && dist.value < minDist) minDist = dist.value;
  }
  if (minDist === Infinity) {
    return failure("DegenerateGeometry", "unable to compute distance to polygon edges");
  }
  return success(pointInPolygon(point.coordinates, polygon) ? -minDist : minDist);
}

/** Smallest |distance| wins; the sign is negative if any candidate was inside. */
interface SignedMinimum {
  minDist: number;
  inside: boolean;
}

function mergeSigned(acc: SignedMinimum, dist: GeoResult<number>): SignedMinimum {
  if (!dist.ok) return acc;
  return {
    minDist: Math.min(acc.minDist, Math.abs(dist.value)),
    inside: acc.inside || dist.value < 0,
  };
}

const NO_MINIMUM: SignedMinimum = { minDist: Infinity, inside: false };

function resolveSigned({ minDist, inside }: SignedMinimum): number {
  return inside ? -minDist : minDist;
}

function multiPolygonDistance(multi: MultiPolygon, point: Point): GeoResult<number> {
  if (multi.coordinates.length === 0) return failure("EmptyGeometry", "multipolygon has no polygons");
  const signed = multi.coordinates.reduce(
    (acc, rings) => mergeSigned(acc, polygonDistance(createPolygon(rings), point)),
    NO_MINIMUM
  );
  if (signed.minDist === Infinity) return failure("DegenerateGeometry", "multipolygon has no valid rings");
  return success(resolveSigned(signed));
}

function collectionDistance(collection: FeatureCollection, point: Point): GeoResult<number> {
  let signed = NO_MINIMUM;
  for (const feature of collection.features) {
    const geometry = feature.geometry;
    if (geometry === null) return unsupported(null);
    if (geometry.type === "Polygon") signed = mergeSigned(signed, polygonDistance(geometry, point));
    else if (geometry.type === "MultiPolygon") signed = mergeSigned(signed, multiPolygonDistance(geometry, point));
  }
  if (signed.minDist === Infinity) return failure("NoResult", "featurecollection contains no polygons");
  return success(resolveSigned(signed));
}

/**
 * Signed distance in kilometres from `point` to the nearest polygon edge.
 * Negative inside, positive outside; holes count as outside. Rings are
 * measured as closed without touching the caller's coordinates.
 */
export function polygonPointDistance(obj: GeoObject, point: Point): GeoResult<number> {
  switch (obj.type) {
    case "Polygon":
      return polygonDistance(obj, point);
    case "MultiPolygon":
      return multiPolygonDistance(obj, point);
    case "Feature":
      return obj.geometry === null ? unsupported(null) : polygonPointDistance(obj.geometry, point);
    case "FeatureCollection":
      return collectionDistance(obj, point);
    case "Point":
    case "LineString":
    case "MultiLineString":
    default:
      return unsupported(obj);
  }
}
