/**
 * GeoJSON interchange
 *
 * Converts between untyped GeoJSON documents and the engine's closed geometry
 * model. Tags and [longitude, latitude] ordering are preserved exactly.
 */

import type * as GeoJSON from "geojson";
import { failure, success, unsupported, type GeoResult } from "./errors.js";
import type {
  Feature,
  FeatureCollection,
  FeatureProperties,
  GeoObject,
  Geometry,
  Position,
  Ring,
} from "./types.js";

export type GeoJSONOutput =
  | GeoJSON.Geometry
  | GeoJSON.Feature<GeoJSON.Geometry | null>
  | GeoJSON.FeatureCollection<GeoJSON.Geometry | null>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function malformed(type: string, detail: string) {
  return failure("UnsupportedVariant", `malformed ${type}: ${detail}`);
}

/** Longitude and latitude; any further members (elevation) are dropped. */
function parsePosition(value: unknown): Position | undefined {
  if (!Array.isArray(value) || value.length < 2) return undefined;
  const [lon, lat] = value;
  if (typeof lon !== "number" || typeof lat !== "number") return undefined;
  if (!Number.isFinite(lon) || !Number.isFinite(lat)) return undefined;
  return [lon, lat];
}

function parseList<T>(value: unknown, item: (entry: unknown) => T | undefined): T[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const out: T[] = [];
  for (const entry of value) {
    const parsed = item(entry);
    if (parsed === undefined) return undefined;
    out.push(parsed);
  }
  return out;
}

const parsePositions = (value: unknown) => parseList(value, parsePosition);
const parseRings = (value: unknown): Ring[] | undefined => parseList(value, parsePositions);
const parsePolygons = (value: unknown) => parseList(value, parseRings);

function parseGeometry(input: Record<string, unknown>): GeoResult<Geometry> {
  const coordinates = input.coordinates;
  switch (input.type) {
    case "Point": {
      const position = parsePosition(coordinates);
      return position ? success<Geometry>({ type: "Point", coordinates: position }) : malformed("Point", "expected [lon, lat]");
    }
    case "LineString": {
      const positions = parsePositions(coordinates);
      return positions
        ? success<Geometry>({ type: "LineString", coordinates: positions })
        : malformed("LineString", "expected an array of positions");
    }
    case "Polygon": {
      const rings = parseRings(coordinates);
      return rings ? success<Geometry>({ type: "Polygon", coordinates: rings }) : malformed("Polygon", "expected an array of rings");
    }
    case "MultiLineString": {
      const lines = parseRings(coordinates);
      return lines
        ? success<Geometry>({ type: "MultiLineString", coordinates: lines })
        : malformed("MultiLineString", "expected an array of lines");
    }
    case "MultiPolygon": {
      const polygons = parsePolygons(coordinates);
      return polygons
        ? success<Geometry>({ type: "MultiPolygon", coordinates: polygons })
        : malformed("MultiPolygon", "expected an array of polygons");
    }
    default:
      return unsupported(input);
  }
}

function parseFeature(input: unknown): GeoResult<Feature> {
  if (!isRecord(input) || input.type !== "Feature") return unsupported(input);

  let geometry: Geometry | null = null;
  if (input.geometry !== null && input.geometry !== undefined) {
    if (!isRecord(input.geometry)) return unsupported(input.geometry);
    const parsed = parseGeometry(input.geometry);
    if (!parsed.ok) return parsed;
    geometry = parsed.value;
  }

  let properties: FeatureProperties | undefined;
  if (input.properties === null) properties = null;
  else if (isRecord(input.properties)) properties = input.properties;
  else if (input.properties !== undefined) return malformed("Feature", "properties must be an object or null");

  let id: string | number | undefined;
  if (typeof input.id === "string" || typeof input.id === "number") id = input.id;
  else if (input.id !== undefined) return malformed("Feature", "id must be a string or number");

  const feature: Feature = {
    type: "Feature",
    geometry,
    ...(properties !== undefined ? { properties } : {}),
    ...(id !== undefined ? { id } : {}),
  };
  return success(feature);
}

function parseFeatureCollection(input: Record<string, unknown>): GeoResult<FeatureCollection> {
  if (!Array.isArray(input.features)) return malformed("FeatureCollection", "features must be an array");
  const features: Feature[] = [];
  for (const entry of input.features) {
    const feature = parseFeature(entry);
    if (!feature.ok) return feature;
    features.push(feature.value);
  }
  const collection: FeatureCollection = { type: "FeatureCollection", features };
  return success(collection);
}

/**
 * Parse an untyped GeoJSON value. Only the engine's seven variants are
 * accepted; MultiPoint, GeometryCollection and anything unrecognised are
 * reported as UnsupportedVariant.
 */
export function parseGeoObject(input: unknown): GeoResult<GeoObject> {
  if (!isRecord(input)) return unsupported(input);
  switch (input.type) {
    case "Feature":
      return parseFeature(input);
    case "FeatureCollection":
      return parseFeatureCollection(input);
    default:
      return parseGeometry(input);
  }
}

function copyPositions(positions: readonly Position[]): GeoJSON.Position[] {
  return positions.map(([lon, lat]) => [lon, lat]);
}

function geometryToGeoJSON(geometry: Geometry): GeoJSON.Geometry {
  switch (geometry.type) {
    case "Point":
      return { type: "Point", coordinates: [geometry.coordinates[0], geometry.coordinates[1]] };
    case "LineString":
      return { type: "LineString", coordinates: copyPositions(geometry.coordinates) };
    case "Polygon":
      return { type: "Polygon", coordinates: geometry.coordinates.map(copyPositions) };
    case "MultiLineString":
      return { type: "MultiLineString", coordinates: geometry.coordinates.map(copyPositions) };
    case "MultiPolygon":
      return {
        type: "MultiPolygon",
        coordinates: geometry.coordinates.map((rings) => rings.map(copyPositions)),
      };
  }
}

function featureToGeoJSON(feature: Feature): GeoJSON.Feature<GeoJSON.Geometry | null> {
  return {
    type: "Feature",
    geometry: feature.geometry === null ? null : geometryToGeoJSON(feature.geometry),
    properties: feature.properties ? { ...feature.properties } : null,
    ...(feature.id !== undefined ? { id: feature.id } : {}),
  };
}

/** Plain, mutable GeoJSON copy of `obj`. */
export function toGeoJSON(obj: GeoObject): GeoJSONOutput {
  switch (obj.type) {
    case "Feature":
      return featureToGeoJSON(obj);
    case "FeatureCollection":
      return { type: "FeatureCollection", features: obj.features.map(featureToGeoJSON) };
    default:
      return geometryToGeoJSON(obj);
  }
}

export function stringifyGeoObject(obj: GeoObject, space?: number): string {
  return JSON.stringify(toGeoJSON(obj), null, space);
}
