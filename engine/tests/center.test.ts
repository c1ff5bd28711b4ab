import { describe, expect, it } from "vitest";

import {
  createFeature,
  createFeatureCollection,
  createLineString,
  createMultiLineString,
  createMultiPolygon,
  createPoint,
  createPolygon,
} from "../src/geometry/factories.js";
import { accumulateMass, boundingBox, center, centerOfMass } from "../src/queries/center.js";
import type { Ring } from "../src/types.js";

const square: Ring = [
  [0, 0],
  [2, 0],
  [2, 2],
  [0, 2],
  [0, 0],
];

describe("boundingBox and center", () => {
  it("spans every position", () => {
    const fc = createFeatureCollection([
      createFeature(createPoint(0, 0)),
      createFeature(createPoint(10, 10)),
      createFeature(
        createLineString([
          [-4, 3],
          [2, -6],
        ])
      ),
    ]);
    expect(boundingBox(fc)).toEqual({ ok: true, value: { minLon: -4, minLat: -6, maxLon: 10, maxLat: 10 } });
    expect(center(fc)).toEqual({ ok: true, value: createPoint(3, 2) });
  });

  it("centres two points", () => {
    const fc = createFeatureCollection([createFeature(createPoint(0, 0)), createFeature(createPoint(10, 10))]);
    expect(center(fc)).toEqual({ ok: true, value: createPoint(5, 5) });
  });

  it("has no answer without coordinates", () => {
    const result = center(createFeatureCollection([]));
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("NoResult");
    expect(result.error.message).toBe("no coordinates found");
  });

  it("propagates unsupported features", () => {
    const result = center(createFeature(null));
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("UnsupportedVariant");
  });
});

describe("centerOfMass", () => {
  it("uses the polygon centroid", () => {
    expect(centerOfMass(createPolygon([square]))).toEqual({ ok: true, value: createPoint(1, 1) });
  });

  it("weights polygons by area", () => {
    const multi = createMultiPolygon([
      [square],
      [
        [
          [10, 0],
          [11, 0],
          [11, 1],
          [10, 1],
          [10, 0],
        ],
      ],
    ]);
    const result = centerOfMass(multi);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.coordinates[0]).toBeCloseTo((1 * 4 + 10.5 * 1) / 5, 12);
    expect(result.value.coordinates[1]).toBeCloseTo((1 * 4 + 0.5 * 1) / 5, 12);
  });

  it("prefers polygons over lines and points", () => {
    const fc = createFeatureCollection([
      createFeature(createPoint(50, 50)),
      createFeature(
        createLineString([
          [20, 20],
          [30, 20],
        ])
      ),
      createFeature(createPolygon([square])),
    ]);
    expect(centerOfMass(fc)).toEqual({ ok: true, value: createPoint(1, 1) });
  });

  it("weights line midpoints by length without polygons", () => {
    const lines = createMultiLineString([
      [
        [0, 0],
        [10, 0],
      ],
      [
        [0, 10],
        [0, 30],
      ],
    ]);
    const result = centerOfMass(lines);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.coordinates[0]).toBeCloseTo(5 / 3, 6);
    expect(result.value.coordinates[1]).toBeCloseTo(40 / 3, 6);
  });

  it("averages points when nothing else has extent", () => {
    const fc = createFeatureCollection([
      createFeature(createPoint(0, 0)),
      createFeature(createPoint(4, 2)),
      createFeature(
        createLineString([
          [9, 9],
          [9, 9],
        ])
      ),
    ]);
    expect(centerOfMass(fc)).toEqual({ ok: true, value: createPoint(2, 1) });
  });

  it("has no answer when every member is degenerate", () => {
    const result = centerOfMass(
      createLineString([
        [1, 1],
        [1, 1],
      ])
    );
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("NoResult");
  });

  it("threads the accumulator through the fold", () => {
    const first = accumulateMass(createPoint(2, 4));
    expect(first.ok).toBe(true);
    if (!first.ok) return;
    const second = accumulateMass(createPoint(4, 8), first.value);
    expect(second.ok && second.value).toMatchObject({ pointCount: 2, pointLonSum: 6, pointLatSum: 12 });
    expect(first.value.pointCount).toBe(1);
  });
});
