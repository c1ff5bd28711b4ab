import { describe, expect, it } from "vitest";

import { createPolygon } from "../src/geometry/factories.js";
import {
  closeRing,
  pointInPolygon,
  pointInRing,
  pointOnSegment,
  polygonCentroidArea,
  ringAreaCentroid,
} from "../src/geometry/polygon.js";
import type { Position, Ring } from "../src/types.js";

const square: Ring = [
  [0, 0],
  [2, 0],
  [2, 2],
  [0, 2],
  [0, 0],
];

const frame = createPolygon([
  [
    [0, 0],
    [4, 0],
    [4, 4],
    [0, 4],
    [0, 0],
  ],
  [
    [1, 1],
    [3, 1],
    [3, 3],
    [1, 3],
    [1, 1],
  ],
]);

describe("ring area and centroid", () => {
  it("measures a counter-clockwise square", () => {
    expect(ringAreaCentroid(square)).toEqual({ signedArea: 4, centroid: [1, 1] });
  });

  it("gives clockwise rings a negative area", () => {
    const clockwise = [...square].reverse();
    expect(ringAreaCentroid(clockwise)).toEqual({ signedArea: -4, centroid: [1, 1] });
  });

  it("measures an open ring as if closed", () => {
    expect(ringAreaCentroid(square.slice(0, 4)).signedArea).toBe(4);
  });

  it("treats short and flat rings as empty", () => {
    expect(ringAreaCentroid([[0, 0], [1, 1]])).toEqual({ signedArea: 0, centroid: [0, 0] });
    expect(
      ringAreaCentroid([
        [0, 0],
        [1, 1],
        [2, 2],
        [0, 0],
      ])
    ).toEqual({ signedArea: 0, centroid: [0, 0] });
  });
});

describe("polygon centroid and area", () => {
  it("subtracts holes", () => {
    const result = polygonCentroidArea(frame);
    expect(result).toEqual({ ok: true, value: { centroid: [2, 2], area: 12 } });
  });

  it("shifts the centroid away from an off-centre hole", () => {
    const result = polygonCentroidArea(
      createPolygon([
        [
          [0, 0],
          [4, 0],
          [4, 4],
          [0, 4],
          [0, 0],
        ],
        [
          [0, 0],
          [0, 2],
          [2, 2],
          [2, 0],
          [0, 0],
        ],
      ])
    );
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.area).toBe(12);
    expect(result.value.centroid[0]).toBeCloseTo(7 / 3, 12);
    expect(result.value.centroid[1]).toBeCloseTo(7 / 3, 12);
  });

  it("ignores zero-area holes", () => {
    const result = polygonCentroidArea(createPolygon([square, [[1, 1], [1, 1]]]));
    expect(result).toEqual({ ok: true, value: { centroid: [1, 1], area: 4 } });
  });

  it("rejects empty and degenerate polygons", () => {
    const empty = polygonCentroidArea(createPolygon([]));
    expect(empty.ok).toBe(false);
    if (!empty.ok) expect(empty.error.kind).toBe("EmptyGeometry");

    const flat = polygonCentroidArea(
      createPolygon([
        [
          [0, 0],
          [1, 0],
          [2, 0],
          [0, 0],
        ],
      ])
    );
    expect(flat.ok).toBe(false);
    if (!flat.ok) expect(flat.error.kind).toBe("DegenerateGeometry");
  });

  it("rejects polygons whose holes cover the exterior", () => {
    const covered = polygonCentroidArea(createPolygon([square, square]));
    expect(covered.ok).toBe(false);
    if (!covered.ok) expect(covered.error.kind).toBe("DegenerateGeometry");
  });
});

describe("point on segment", () => {
  const a: Position = [0, 0];
  const b: Position = [2, 2];

  it("accepts points between the endpoints", () => {
    expect(pointOnSegment([1, 1], a, b)).toBe(true);
    expect(pointOnSegment([0, 0], a, b)).toBe(true);
    expect(pointOnSegment([2, 2], a, b)).toBe(true);
  });

  it("rejects collinear points past either end", () => {
    expect(pointOnSegment([3, 3], a, b)).toBe(false);
    expect(pointOnSegment([-1, -1], a, b)).toBe(false);
  });

  it("rejects points off the line", () => {
    expect(pointOnSegment([1, 1.001], a, b)).toBe(false);
  });
});

describe("point in ring", () => {
  it("finds interior and exterior points", () => {
    expect(pointInRing([1, 1], square)).toBe(true);
    expect(pointInRing([3, 1], square)).toBe(false);
  });

  it("counts the boundary as inside", () => {
    expect(pointInRing([2, 1], square)).toBe(true);
    expect(pointInRing([0, 0], square)).toBe(true);
  });

  it("tests the closing edge of an open ring", () => {
    const open: Ring = [
      [0, 0],
      [2, 0],
      [2, 2],
      [0, 2],
    ];
    expect(pointInRing([0, 1], open)).toBe(true);
    expect(pointInRing([1, 1], open)).toBe(true);
  });

  it("never contains anything in a ring of fewer than three points", () => {
    expect(pointInRing([0, 0], [[0, 0], [1, 1]])).toBe(false);
  });

  it("handles a concave ring", () => {
    const u: Ring = [
      [0, 0],
      [3, 0],
      [3, 3],
      [2, 3],
      [2, 1],
      [1, 1],
      [1, 3],
      [0, 3],
      [0, 0],
    ];
    expect(pointInRing([1.5, 2], u)).toBe(false);
    expect(pointInRing([0.5, 2], u)).toBe(true);
  });
});

describe("point in polygon", () => {
  it("excludes holes and their boundaries", () => {
    expect(pointInPolygon([0.5, 0.5], frame)).toBe(true);
    expect(pointInPolygon([2, 2], frame)).toBe(false);
    expect(pointInPolygon([1, 2], frame)).toBe(false);
    expect(pointInPolygon([5, 5], frame)).toBe(false);
  });

  it("is false for a polygon without rings", () => {
    expect(pointInPolygon([0, 0], createPolygon([]))).toBe(false);
  });
});

describe("closeRing", () => {
  it("appends the first position to open rings without touching the input", () => {
    const open: Ring = square.slice(0, 4);
    const closed = closeRing(open);
    expect(closed).toEqual(square);
    expect(open).toHaveLength(4);
  });

  it("returns closed rings unchanged", () => {
    expect(closeRing(square)).toBe(square);
  });
});
