import { success, unsupported, type GeoResult } from "../errors.js";
import type {
  Feature,
  GeoObject,
  LineString,
  MultiLineString,
  MultiPolygon,
  Point,
  Polygon,
  Position,
} from "../types.js";

/** One handler per geometry kind; each returns the next accumulator value. */
export interface GeometryFold<A> {
  point(acc: A, geometry: Point): A;
  lineString(acc: A, geometry: LineString): A;
  polygon(acc: A, geometry: Polygon): A;
  multiLineString(acc: A, geometry: MultiLineString): A;
  multiPolygon(acc: A, geometry: MultiPolygon): A;
}

function foldFeature<A>(feature: Feature, acc: A, fold: GeometryFold<A>): GeoResult<A> {
  if (feature.geometry === null) return unsupported(null);
  return foldGeoObject(feature.geometry, acc, fold);
}

/**
 * Fold every geometry reachable from `obj` in document order. Features
 * delegate to their geometry, collections to each feature. The first
 * unsupported variant aborts the whole traversal.
 */
export function foldGeoObject<A>(obj: GeoObject, initial: A, fold: GeometryFold<A>): GeoResult<A> {
  switch (obj.type) {
    case "Point":
      return success(fold.point(initial, obj));
    case "LineString":
      return success(fold.lineString(initial, obj));
    case "Polygon":
      return success(fold.polygon(initial, obj));
    case "MultiLineString":
      return success(fold.multiLineString(initial, obj));
    case "MultiPolygon":
      return success(fold.multiPolygon(initial, obj));
    case "Feature":
      return foldFeature(obj, initial, fold);
    case "FeatureCollection": {
      let acc = initial;
      for (const feature of obj.features) {
        const next = foldFeature(feature, acc, fold);
        if (!next.ok) return next;
        acc = next.value;
      }
      return success(acc);
    }
    default:
      return unsupported(obj);
  }
}

function append(acc: Position[], positions: readonly Position[]): Position[] {
  for (const p of positions) acc.push(p);
  return acc;
}

// appends into the per-call accumulator
const positionCollector: GeometryFold<Position[]> = {
  point: (acc, g) => append(acc, [g.coordinates]),
  lineString: (acc, g) => append(acc, g.coordinates),
  polygon: (acc, g) => append(acc, g.coordinates.flat()),
  multiLineString: (acc, g) => append(acc, g.coordinates.flat()),
  multiPolygon: (acc, g) => append(acc, g.coordinates.flat(2)),
};

/** Flatten every position of `obj` into one sequence, in document order. */
export function collectPositions(obj: GeoObject): GeoResult<Position[]> {
  return foldGeoObject<Position[]>(obj, [], positionCollector);
}
