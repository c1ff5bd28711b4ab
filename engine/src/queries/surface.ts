import { failure, success, unsupported, type GeoResult } from "../errors.js";
import { createLineString, createPoint, createPolygon } from "../geometry/factories.js";
import { lineMidpoint, lineStringLengthKm } from "../geometry/line.js";
import { pointInPolygon, polygonCentroidArea } from "../geometry/polygon.js";
import type { FeatureCollection, GeoObject, LineString, MultiLineString, MultiPolygon, Point, Polygon } from "../types.js";

/** Centroid when it falls inside the polygon, otherwise the first exterior vertex. */
export function polygonPointOnSurface(polygon: Polygon): GeoResult<Point> {
  const outer = polygon.coordinates[0];
  if (!outer || outer.length === 0) return failure("EmptyGeometry", "polygon has no coordinates");

  const mass = polygonCentroidArea(polygon);
  if (mass.ok && pointInPolygon(mass.value.centroid, polygon)) {
    const [lon, lat] = mass.value.centroid;
    return success(createPoint(lon, lat));
  }
  return success(createPoint(outer[0][0], outer[0][1]));
}

/** Midpoint of the longest member line (the first member when none has length). */
export function multiLinePointOnSurface(multi: MultiLineString): GeoResult<Point> {
  let best: LineString | undefined;
  let bestLength = 0;
  for (const coords of multi.coordinates) {
    const line = createLineString(coords);
    const length = lineStringLengthKm(line);
    if (length.ok && length.value > bestLength) {
      bestLength = length.value;
      best = line;
    }
  }
  if (bestLength === 0 && multi.coordinates.length > 0) {
    best = createLineString(multi.coordinates[0]);
  }
  if (!best || best.coordinates.length === 0) {
    return failure("EmptyGeometry", "multilinestring has no coordinates");
  }
  return lineMidpoint(best);
}

/** Surface point of the largest member polygon (the first member when none has area). */
export function multiPolygonPointOnSurface(multi: MultiPolygon): GeoResult<Point> {
  let best: Polygon | undefined;
  let bestArea = 0;
  for (const rings of multi.coordinates) {
    const polygon = createPolygon(rings);
    const mass = polygonCentroidArea(polygon);
    if (mass.ok && mass.value.area > bestArea) {
      bestArea = mass.value.area;
      best = polygon;
    }
  }
  if (bestArea === 0 && multi.coordinates.length > 0) {
    best = createPolygon(multi.coordinates[0]);
  }
  if (!best || best.coordinates.length === 0) {
    return failure("EmptyGeometry", "multipolygon has no coordinates");
  }
  return polygonPointOnSurface(best);
}

/**
 * Polygons beat lines, lines beat points. The largest polygon and longest
 * line are kept across the scan; a multi-line (multi-polygon) member answers
 * at once if no line with length (polygon with area) has been seen before it.
 */
function featureCollectionPointOnSurface(collection: FeatureCollection): GeoResult<Point> {
  let bestPolygon: Polygon | undefined;
  let bestArea = 0;
  let bestLine: LineString | undefined;
  let bestLength = 0;
  let firstPoint: Point | undefined;

  for (const feature of collection.features) {
    const geometry = feature.geometry;
    if (geometry === null) return unsupported(null);

    switch (geometry.type) {
      case "Point":
        if (!firstPoint) firstPoint = geometry;
        break;
      case "LineString": {
        const length = lineStringLengthKm(geometry);
        if (length.ok && length.value > bestLength) {
          bestLength = length.value;
          bestLine = geometry;
        }
        break;
      }
      case "Polygon": {
        const mass = polygonCentroidArea(geometry);
        if (mass.ok && mass.value.area > bestArea) {
          bestArea = mass.value.area;
          bestPolygon = geometry;
        }
        break;
      }
      case "MultiLineString": {
        const point = multiLinePointOnSurface(geometry);
        if (point.ok && bestLength === 0) return point;
        break;
      }
      case "MultiPolygon": {
        const point = multiPolygonPointOnSurface(geometry);
        if (point.ok && bestArea === 0) return point;
        break;
      }
      default:
        return unsupported(geometry);
    }
  }

  if (bestPolygon && bestArea > 0) return polygonPointOnSurface(bestPolygon);
  if (bestLine && bestLength > 0) return lineMidpoint(bestLine);
  if (firstPoint) return success(firstPoint);
  return failure("NoResult", "featurecollection has no supported geometries");
}

/** A point guaranteed to lie on or within `obj`, unlike the bounding-box center. */
export function pointOnSurface(obj: GeoObject): GeoResult<Point> {
  switch (obj.type) {
    case "Point":
      return success(obj);
    case "LineString":
      return lineMidpoint(obj);
    case "Polygon":
      return polygonPointOnSurface(obj);
    case "MultiLineString":
      return multiLinePointOnSurface(obj);
    case "MultiPolygon":
      return multiPolygonPointOnSurface(obj);
    case "Feature":
      return obj.geometry === null ? unsupported(null) : pointOnSurface(obj.geometry);
    case "FeatureCollection":
      return featureCollectionPointOnSurface(obj);
    default:
      return unsupported(obj);
  }
}
