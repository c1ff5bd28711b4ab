import { describe, expect, it } from "vitest";

import { createLineString, createPoint } from "../src/geometry/factories.js";
import {
  lineMidpoint,
  linePointDistance,
  lineSegmentPointDistance,
  lineStringLengthKm,
  pointAtDistance,
} from "../src/geometry/line.js";
import { greatCircleDistance } from "../src/navigation.js";

const equator = createLineString([
  [0, 0],
  [90, 0],
]);

const elbow = createLineString([
  [0, 0],
  [1, 0],
  [1, 1],
]);

const oneDegreeKm = greatCircleDistance(0, 0, 1, 0);

describe("lineStringLengthKm", () => {
  it("sums segment lengths", () => {
    const length = lineStringLengthKm(elbow);
    expect(length.ok).toBe(true);
    if (length.ok) expect(length.value).toBeCloseTo(greatCircleDistance(0, 0, 0, 1) + greatCircleDistance(0, 1, 1, 1), 9);
  });

  it("rejects lines with fewer than two coordinates", () => {
    const result = lineStringLengthKm(createLineString([[0, 0]]));
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("DegenerateGeometry");
  });
});

describe("pointAtDistance", () => {
  it("interpolates along the great circle", () => {
    const half = pointAtDistance(equator, greatCircleDistance(0, 0, 0, 90) / 2);
    expect(half.ok).toBe(true);
    if (!half.ok) return;
    expect(half.value.type).toBe("Point");
    expect(half.value.coordinates[0]).toBeCloseTo(45, 9);
    expect(half.value.coordinates[1]).toBeCloseTo(0, 9);
  });

  it("walks into later segments", () => {
    const result = pointAtDistance(elbow, 150);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.coordinates[0]).toBeCloseTo(1, 9);
    expect(result.value.coordinates[1]).toBeCloseTo((150 - oneDegreeKm) / oneDegreeKm, 6);
  });

  it("clamps to the endpoints", () => {
    expect(pointAtDistance(elbow, 0)).toEqual({ ok: true, value: createPoint(0, 0) });
    expect(pointAtDistance(elbow, -10)).toEqual({ ok: true, value: createPoint(0, 0) });
    expect(pointAtDistance(elbow, 10000)).toEqual({ ok: true, value: createPoint(1, 1) });
  });

  it("rejects degenerate lines", () => {
    const result = pointAtDistance(createLineString([]), 5);
    expect(result.ok).toBe(false);
  });
});

describe("lineMidpoint", () => {
  it("finds the arc-length midpoint", () => {
    const mid = lineMidpoint(equator);
    expect(mid.ok).toBe(true);
    if (!mid.ok) return;
    expect(mid.value.coordinates[0]).toBeCloseTo(45, 9);
  });

  it("returns the first coordinate of a zero-length line", () => {
    const stuck = createLineString([
      [4, 5],
      [4, 5],
    ]);
    expect(lineMidpoint(stuck)).toEqual({ ok: true, value: createPoint(4, 5) });
  });
});

describe("linePointDistance", () => {
  it("measures the perpendicular to the segment's great circle", () => {
    const result = linePointDistance(equator, createPoint(45, 10));
    expect(result.ok).toBe(true);
    if (result.ok) expect(result.value).toBeCloseTo(1111.949, 2);
  });

  it("does not clamp to the segment ends", () => {
    const line = createLineString([
      [0, 0],
      [10, 0],
    ]);
    const unclamped = linePointDistance(line, createPoint(15, 0));
    const clamped = lineSegmentPointDistance(line, createPoint(15, 0));
    expect(unclamped.ok && unclamped.value).toBeCloseTo(0, 6);
    expect(clamped.ok && clamped.value).toBeCloseTo(555.975, 2);
  });

  it("takes the nearest segment", () => {
    const result = linePointDistance(elbow, createPoint(1.5, 0.5));
    expect(result.ok).toBe(true);
    if (result.ok) expect(result.value).toBeLessThan(oneDegreeKm);
  });

  it("rejects degenerate lines", () => {
    const result = linePointDistance(createLineString([[0, 0]]), createPoint(1, 1));
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("DegenerateGeometry");
  });
});
