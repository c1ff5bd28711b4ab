import type {
  Feature,
  FeatureCollection,
  FeatureProperties,
  Geometry,
  LatLon,
  LineString,
  MultiLineString,
  MultiPolygon,
  Point,
  Polygon,
  Position,
  Ring,
} from "../types.js";

export function createPoint(lon: number, lat: number): Point {
  return { type: "Point", coordinates: [lon, lat] };
}

export function createLineString(coordinates: readonly Position[]): LineString {
  return { type: "LineString", coordinates };
}

export function createPolygon(coordinates: readonly Ring[]): Polygon {
  return { type: "Polygon", coordinates };
}

export function createMultiLineString(coordinates: readonly (readonly Position[])[]): MultiLineString {
  return { type: "MultiLineString", coordinates };
}

export function createMultiPolygon(coordinates: readonly (readonly Ring[])[]): MultiPolygon {
  return { type: "MultiPolygon", coordinates };
}

export function createFeature<G extends Geometry>(
  geometry: G | null,
  properties?: FeatureProperties,
  id?: string | number
): Feature<G> {
  const feature: Feature<G> = { type: "Feature", geometry };
  if (properties === undefined && id === undefined) return feature;
  return {
    ...feature,
    ...(properties !== undefined ? { properties } : {}),
    ...(id !== undefined ? { id } : {}),
  };
}

export function createFeatureCollection(features: readonly Feature[]): FeatureCollection {
  return { type: "FeatureCollection", features };
}

export function positionToLatLon(position: Position): LatLon {
  return { lat: position[1], lon: position[0] };
}

export function pointFromLatLon({ lat, lon }: LatLon): Point {
  return createPoint(lon, lat);
}

export function samePosition(a: Position, b: Position): boolean {
  return a[0] === b[0] && a[1] === b[1];
}
