import type { Topology } from "topojson-specification";

export const squareTopology: Topology = {
  type: "Topology",
  arcs: [
    [
      [0, 0],
      [2, 0],
      [2, 2],
      [0, 2],
      [0, 0],
    ],
  ],
  objects: {
    shapes: {
      type: "GeometryCollection",
      geometries: [
        { type: "Polygon", arcs: [[0]], id: "sq", properties: { name: "Square" } },
        { type: "Point", coordinates: [5, 5], id: "pt", properties: { name: "Marker" } },
      ],
    },
    outline: { type: "Polygon", arcs: [[0]], properties: { name: "Outline" } },
  },
};
