/**
 * geonav engine
 * -------------
 * Spherical navigation primitives and GeoJSON-shaped geometry algorithms.
 */
export * from "./types.js";

export {
  GeometryError,
  success,
  failure,
  unwrap,
  type GeometryErrorKind,
  type GeoResult,
  type Success,
  type Failure,
} from "./errors.js";

export { readEngineConfig, type EngineConfig, type EnvSource } from "./config.js";
export { debug } from "./log.js";

export {
  DISTANCE_UNITS,
  METERS_PER_KM,
  KM_PER_MILE,
  KM_PER_NAUTICAL_MILE,
  isDistanceUnit,
  convertDistanceFromKm,
  convertDistanceToKm,
  type DistanceUnit,
} from "./units.js";

export {
  EARTH_RADIUS_KM,
  EARTH_RADIUS_MILES,
  toRadians,
  toDegrees,
  normalizeLongitude,
  angularDistance,
  greatCircleDistance,
  greatCircleDistanceUnits,
  rhumbLineDistance,
  rhumbLineDistanceUnits,
  initialBearing,
  rhumbLineBearing,
  rhumbLineDestination,
  greatCircleDestination,
  greatCircleIntermediatePoint,
  greatCircleProject,
  greatCircleProjectToSegment,
  distanceMatrix,
} from "./navigation.js";

export {
  createPoint,
  createLineString,
  createPolygon,
  createMultiLineString,
  createMultiPolygon,
  createFeature,
  createFeatureCollection,
  positionToLatLon,
  pointFromLatLon,
} from "./geometry/factories.js";

export { foldGeoObject, collectPositions, type GeometryFold } from "./geometry/traverse.js";

export {
  BOUNDARY_EPSILON,
  ringAreaCentroid,
  polygonCentroidArea,
  pointOnSegment,
  pointInRing,
  pointInPolygon,
  closeRing,
  type RingMeasure,
  type PolygonMass,
} from "./geometry/polygon.js";

export {
  lineStringLengthKm,
  pointAtDistance,
  lineMidpoint,
  linePointDistance,
  lineSegmentPointDistance,
} from "./geometry/line.js";

export { boundingBox, center, centerOfMass, accumulateMass, type MassAccumulator } from "./queries/center.js";

export { pointOnSurface } from "./queries/surface.js";

export { polygonPointDistance } from "./queries/distance.js";

export {
  DEFAULT_ROUTE_POINTS,
  greatCircleRoute,
  greatCircleRouteByDistance,
  type Route,
} from "./queries/route.js";

export { bearing, rhumbBearing, rhumbDestination, rhumbDistance } from "./queries/bearing.js";

export { parseGeoObject, toGeoJSON, stringifyGeoObject, type GeoJSONOutput } from "./geojson.js";

export { toSphericalObject, sphericalAreaKm2, sphericalBounds, sphericalCentroid } from "./spherical.js";
