import { readFile } from "fs/promises";
import { debug, parseGeoObject, type GeoObject, type GeoResult } from "geonav-engine";
import { decodeTopology, isTopology } from "./topology.js";

async function readJson(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to read geometry file ${path}: ${message}`);
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Geometry file ${path} is not valid JSON: ${message}`);
  }
}

/**
 * Load a GeoJSON or TopoJSON document from disk. A topology becomes a single
 * FeatureCollection holding every object's features. Unreadable files and
 * invalid JSON reject; well-formed JSON with an unsupported shape resolves to
 * a failed result.
 */
export async function readGeoFile(path: string): Promise<GeoResult<GeoObject>> {
  const json = await readJson(path);
  if (isTopology(json)) {
    debug("ingestion", `decoding topology ${path}`, { objects: Object.keys(json.objects) });
    return decodeTopology(json);
  }
  const parsed = parseGeoObject(json);
  if (parsed.ok) debug("ingestion", `parsed ${parsed.value.type} from ${path}`);
  return parsed;
}
