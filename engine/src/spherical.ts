import { geoArea, geoBounds, geoCentroid, type GeoPermissibleObjects } from "d3-geo";
import type * as GeoJSON from "geojson";
import { createPoint } from "./geometry/factories.js";
import { ringAreaCentroid } from "./geometry/polygon.js";
import { toGeoJSON } from "./geojson.js";
import { EARTH_RADIUS_KM } from "./navigation.js";
import type { BBox, GeoObject, Point } from "./types.js";

/**
 * d3-geo reads clockwise exteriors and counter-clockwise holes; GeoJSON in
 * the wild uses either. Winding is judged by planar signed area.
 */
function rewindRing(ring: GeoJSON.Position[], exterior: boolean): GeoJSON.Position[] {
  const { signedArea } = ringAreaCentroid(ring.map(([lon, lat]) => [lon, lat] as const));
  const clockwise = signedArea < 0;
  return clockwise === exterior || signedArea === 0 ? ring : [...ring].reverse();
}

function rewindPolygon(rings: GeoJSON.Position[][]): GeoJSON.Position[][] {
  return rings.map((ring, index) => rewindRing(ring, index === 0));
}

function rewindGeometry(geometry: GeoJSON.Geometry): GeoJSON.Geometry {
  switch (geometry.type) {
    case "Polygon":
      return { ...geometry, coordinates: rewindPolygon(geometry.coordinates) };
    case "MultiPolygon":
      return { ...geometry, coordinates: geometry.coordinates.map(rewindPolygon) };
    default:
      return geometry;
  }
}

function rewindFeature(feature: GeoJSON.Feature<GeoJSON.Geometry | null>): GeoJSON.Feature<GeoJSON.Geometry | null> {
  return { ...feature, geometry: feature.geometry ? rewindGeometry(feature.geometry) : null };
}

/** GeoJSON copy of `obj` wound the way d3-geo expects. */
export function toSphericalObject(obj: GeoObject): GeoPermissibleObjects {
  const geojson = toGeoJSON(obj);
  switch (geojson.type) {
    case "Feature":
      return rewindFeature(geojson);
    case "FeatureCollection":
      return { ...geojson, features: geojson.features.map(rewindFeature) };
    default:
      return rewindGeometry(geojson);
  }
}

/** Area on the sphere in square kilometres. Points and lines have none. */
export function sphericalAreaKm2(obj: GeoObject): number {
  return geoArea(toSphericalObject(obj)) * EARTH_RADIUS_KM * EARTH_RADIUS_KM;
}

/**
 * Spherical bounding box; `minLon > maxLon` when it straddles the
 * antimeridian.
 */
export function sphericalBounds(obj: GeoObject): BBox {
  const [[minLon, minLat], [maxLon, maxLat]] = geoBounds(toSphericalObject(obj));
  return { minLon, minLat, maxLon, maxLat };
}

export function sphericalCentroid(obj: GeoObject): Point {
  const [lon, lat] = geoCentroid(toSphericalObject(obj));
  return createPoint(lon, lat);
}
