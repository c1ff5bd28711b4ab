import { feature } from "topojson-client";
import type { Topology } from "topojson-specification";
import {
  failure,
  parseGeoObject,
  success,
  type Feature,
  type FeatureCollection,
  type GeoObject,
  type GeoResult,
} from "geonav-engine";

export function isTopology(source: unknown): source is Topology {
  return (
    typeof source === "object" &&
    source !== null &&
    "type" in source &&
    source.type === "Topology" &&
    "objects" in source &&
    typeof source.objects === "object" &&
    source.objects !== null &&
    "arcs" in source &&
    Array.isArray(source.arcs)
  );
}

/** Decode one named TopoJSON object into the engine's geometry model. */
export function decodeTopologyObject(topology: Topology, objectName: string): GeoResult<GeoObject> {
  const object = topology.objects[objectName];
  if (!object) return failure("NoResult", `topology has no object named ${objectName}`);
  let decoded: unknown;
  try {
    decoded = feature(topology, object);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return failure("UnsupportedVariant", `malformed topology object ${objectName}: ${message}`);
  }
  return parseGeoObject(decoded);
}

/** Every object of a topology, flattened into one collection in object order. */
export function decodeTopology(topology: Topology): GeoResult<FeatureCollection> {
  const features: Feature[] = [];
  for (const name of Object.keys(topology.objects)) {
    const decoded = decodeTopologyObject(topology, name);
    if (!decoded.ok) return decoded;
    const obj = decoded.value;
    if (obj.type === "FeatureCollection") features.push(...obj.features);
    else if (obj.type === "Feature") features.push(obj);
    else features.push({ type: "Feature", geometry: obj });
  }
  const collection: FeatureCollection = { type: "FeatureCollection", features };
  return success(collection);
}

function matchesRef(candidate: Feature, ref: string): boolean {
  return candidate.id?.toString() === ref || candidate.properties?.name === ref;
}

function findInObject(obj: GeoObject, ref: string): Feature | undefined {
  if (obj.type === "FeatureCollection") return obj.features.find((f) => matchesRef(f, ref));
  if (obj.type === "Feature" && matchesRef(obj, ref)) return obj;
  return undefined;
}

/**
 * Find a feature by `id` or `properties.name`, either in a GeoJSON
 * Feature/FeatureCollection or in any object of a TopoJSON topology.
 */
export function decodeGeometryByRef(source: unknown, ref: string): GeoResult<Feature> {
  if (isTopology(source)) {
    if (source.objects[ref]) {
      const direct = decodeTopologyObject(source, ref);
      if (!direct.ok) return direct;
      if (direct.value.type === "Feature") return success(direct.value);
    }
    for (const name of Object.keys(source.objects)) {
      const decoded = decodeTopologyObject(source, name);
      if (!decoded.ok) return decoded;
      const found = findInObject(decoded.value, ref);
      if (found) return success(found);
    }
    return failure("NoResult", `no feature ${ref} in topology`);
  }

  const parsed = parseGeoObject(source);
  if (!parsed.ok) return parsed;
  const found = findInObject(parsed.value, ref);
  return found ? success(found) : failure("NoResult", `no feature ${ref} in source`);
}
