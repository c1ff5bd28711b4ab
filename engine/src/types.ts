/** [longitude, latitude] in degrees, longitude first. */
export type Position = readonly [lon: number, lat: number];

export type Ring = readonly Position[];

export interface Point {
  readonly type: "Point";
  readonly coordinates: Position;
}

export interface LineString {
  readonly type: "LineString";
  readonly coordinates: readonly Position[];
}

/** Ring 0 is the exterior, rings 1..n are holes. */
export interface Polygon {
  readonly type: "Polygon";
  readonly coordinates: readonly Ring[];
}

export interface MultiLineString {
  readonly type: "MultiLineString";
  readonly coordinates: readonly (readonly Position[])[];
}

export interface MultiPolygon {
  readonly type: "MultiPolygon";
  readonly coordinates: readonly (readonly Ring[])[];
}

export type Geometry = Point | LineString | Polygon | MultiLineString | MultiPolygon;

export type GeometryType = Geometry["type"];

export type FeatureProperties = Readonly<Record<string, unknown>> | null;

export interface Feature<G extends Geometry = Geometry> {
  readonly type: "Feature";
  readonly geometry: G | null;
  readonly properties?: FeatureProperties;
  readonly id?: string | number;
}

export interface FeatureCollection {
  readonly type: "FeatureCollection";
  readonly features: readonly Feature[];
}

export type GeoObject = Geometry | Feature | FeatureCollection;

/** Latitude-first pair used by the trigonometric layer. */
export interface LatLon {
  lat: number;
  lon: number;
}

export interface BBox {
  minLon: number;
  minLat: number;
  maxLon: number;
  maxLat: number;
}

export interface ProjectionResult extends LatLon {
  /** Positive when the point lies right of the direction of travel. */
  crossTrackKm: number;
  alongTrackKm: number;
}

/** Edge-weight oracle consumed by graph search and tour heuristics. */
export type DistanceFn = (lat1: number, lon1: number, lat2: number, lon2: number) => number;
