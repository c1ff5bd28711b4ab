import { failure, success, type GeoResult } from "../errors.js";
import { createLineString, createPoint, createPolygon } from "../geometry/factories.js";
import { lineMidpointWithLength } from "../geometry/line.js";
import { polygonCentroidArea } from "../geometry/polygon.js";
import { collectPositions, foldGeoObject, type GeometryFold } from "../geometry/traverse.js";
import { debug } from "../log.js";
import type { BBox, GeoObject, LineString, Point, Polygon, Position } from "../types.js";

/** Longitude/latitude extent of every position in `obj`. */
export function boundingBox(obj: GeoObject): GeoResult<BBox> {
  const positions = collectPositions(obj);
  if (!positions.ok) return positions;
  const [first, ...rest] = positions.value;
  if (!first) return failure("NoResult", "no coordinates found");

  const bbox: BBox = { minLon: first[0], minLat: first[1], maxLon: first[0], maxLat: first[1] };
  for (const [lon, lat] of rest) {
    if (lon < bbox.minLon) bbox.minLon = lon;
    if (lon > bbox.maxLon) bbox.maxLon = lon;
    if (lat < bbox.minLat) bbox.minLat = lat;
    if (lat > bbox.maxLat) bbox.maxLat = lat;
  }
  return success(bbox);
}

/** Midpoint of the bounding box. May fall outside non-convex shapes. */
export function center(obj: GeoObject): GeoResult<Point> {
  const bbox = boundingBox(obj);
  if (!bbox.ok) return bbox;
  const { minLon, minLat, maxLon, maxLat } = bbox.value;
  return success(createPoint((minLon + maxLon) / 2, (minLat + maxLat) / 2));
}

export interface MassAccumulator {
  readonly areaSum: number;
  readonly areaLonSum: number;
  readonly areaLatSum: number;
  readonly lengthSum: number;
  readonly lengthLonSum: number;
  readonly lengthLatSum: number;
  readonly pointCount: number;
  readonly pointLonSum: number;
  readonly pointLatSum: number;
}

export const EMPTY_MASS: MassAccumulator = {
  areaSum: 0,
  areaLonSum: 0,
  areaLatSum: 0,
  lengthSum: 0,
  lengthLonSum: 0,
  lengthLatSum: 0,
  pointCount: 0,
  pointLonSum: 0,
  pointLatSum: 0,
};

function addPoint(acc: MassAccumulator, [lon, lat]: Position): MassAccumulator {
  return {
    ...acc,
    pointCount: acc.pointCount + 1,
    pointLonSum: acc.pointLonSum + lon,
    pointLatSum: acc.pointLatSum + lat,
  };
}

function addLine(acc: MassAccumulator, line: LineString): MassAccumulator {
  const measured = lineMidpointWithLength(line);
  if (!measured.ok || !measured.value.midpoint) {
    debug("center-of-mass", "skipping line without length", { coordinates: line.coordinates.length });
    return acc;
  }
  const { lengthKm, midpoint } = measured.value;
  return {
    ...acc,
    lengthSum: acc.lengthSum + lengthKm,
    lengthLonSum: acc.lengthLonSum + midpoint[0] * lengthKm,
    lengthLatSum: acc.lengthLatSum + midpoint[1] * lengthKm,
  };
}

function addPolygon(acc: MassAccumulator, polygon: Polygon): MassAccumulator {
  const mass = polygonCentroidArea(polygon);
  if (!mass.ok || mass.value.area === 0) {
    debug("center-of-mass", "skipping polygon without area", { rings: polygon.coordinates.length });
    return acc;
  }
  const { centroid, area } = mass.value;
  return {
    ...acc,
    areaSum: acc.areaSum + area,
    areaLonSum: acc.areaLonSum + centroid[0] * area,
    areaLatSum: acc.areaLatSum + centroid[1] * area,
  };
}

const massFold: GeometryFold<MassAccumulator> = {
  point: (acc, g) => addPoint(acc, g.coordinates),
  lineString: addLine,
  polygon: addPolygon,
  multiLineString: (acc, g) => g.coordinates.reduce((next, line) => addLine(next, createLineString(line)), acc),
  multiPolygon: (acc, g) => g.coordinates.reduce((next, rings) => addPolygon(next, createPolygon(rings)), acc),
};

export function accumulateMass(obj: GeoObject, initial: MassAccumulator = EMPTY_MASS): GeoResult<MassAccumulator> {
  return foldGeoObject(obj, initial, massFold);
}

/**
 * Area-weighted centroid of the polygons in `obj`; failing any area, the
 * length-weighted midpoint of its lines; failing that, the mean of its points.
 * Zero-area and zero-length members are skipped.
 */
export function centerOfMass(obj: GeoObject): GeoResult<Point> {
  const accumulated = accumulateMass(obj);
  if (!accumulated.ok) return accumulated;
  const m = accumulated.value;

  if (m.areaSum > 0) return success(createPoint(m.areaLonSum / m.areaSum, m.areaLatSum / m.areaSum));
  if (m.lengthSum > 0) return success(createPoint(m.lengthLonSum / m.lengthSum, m.lengthLatSum / m.lengthSum));
  if (m.pointCount > 0) return success(createPoint(m.pointLonSum / m.pointCount, m.pointLatSum / m.pointCount));
  return failure("NoResult", "no coordinates found");
}
