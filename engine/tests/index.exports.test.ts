import { describe, expect, it } from "vitest";

import {
  centerOfMass,
  createPoint,
  greatCircleDistance,
  parseGeoObject,
  pointOnSurface,
  unwrap,
} from "../src/index.js";

describe("package entry exports", () => {
  it("exposes the parsing and query surface", () => {
    const polygon = unwrap(
      parseGeoObject({
        type: "Polygon",
        coordinates: [
          [
            [0, 0],
            [2, 0],
            [2, 2],
            [0, 2],
            [0, 0],
          ],
        ],
      })
    );
    expect(unwrap(centerOfMass(polygon))).toEqual(createPoint(1, 1));
    expect(unwrap(pointOnSurface(polygon))).toEqual(createPoint(1, 1));
    expect(greatCircleDistance(0, 0, 0, 90)).toBeCloseTo(10007.543, 2);
  });
});
