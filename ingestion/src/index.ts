export { isTopology, decodeTopologyObject, decodeTopology, decodeGeometryByRef } from "./topology.js";
export { readGeoFile } from "./files.js";
