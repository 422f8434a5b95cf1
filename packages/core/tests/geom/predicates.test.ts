import { describe, it, expect } from "vitest";
import {
  isAtInfinity,
  isLineAtInfinity,
  linePosition,
  orientation,
  pointInTriangle,
  squaredDistance,
  triangleArea,
} from "../../src/geom/predicates.js";
import { pgLine, pgPoint } from "../../src/plane/pg.js";
import { euclidPoint } from "../../src/models/euclid.js";
import { DegenerateTriangleError, PointAtInfinityError } from "../../src/errors.js";

describe(`orientation`, () => {
  it(`should classify counterclockwise and clockwise triangles`, () => {
    const a = pgPoint([0, 0, 1]);
    const b = pgPoint([1, 0, 1]);
    const c = pgPoint([0, 1, 1]);
    expect(orientation(a, b, c)).toBe(`counterclockwise`);
    expect(orientation(a, c, b)).toBe(`clockwise`);
  });

  it(`should classify collinear points`, () => {
    expect(orientation(pgPoint([0, 0, 1]), pgPoint([1, 1, 1]), pgPoint([2, 2, 1]))).toBe(`collinear`);
  });

  it(`should account for negative weights`, () => {
    const a = pgPoint([0, 0, -1]);
    const b = pgPoint([-1, 0, -1]);
    const c = pgPoint([0, 1, 1]);
    expect(orientation(a, b, c)).toBe(`counterclockwise`);
  });

  it(`should be exact for coordinates near the safe limit`, () => {
    const m = 2 ** 52;
    const a = pgPoint([0, 0, 1]);
    const b = pgPoint([m, m - 1, 1]);
    const c = pgPoint([m - 1, m - 2, 1]);
    expect(orientation(a, b, c)).toBe(`clockwise`);
  });

  it(`should be exact for coordinates beyond the safe limit`, () => {
    const m = 2n ** 80n;
    const a = pgPoint([0, 0, 1]);
    const b = pgPoint([m, m - 1n, 1n]);
    const c = pgPoint([m - 1n, m - 2n, 1n]);
    expect(orientation(a, b, c)).toBe(`clockwise`);
    expect(orientation(a, c, b)).toBe(`counterclockwise`);
  });

  it(`should accept points of any model`, () => {
    expect(orientation(euclidPoint([0, 0, 1]), euclidPoint([1, 0, 1]), euclidPoint([0, 1, 1]))).toBe(
      `counterclockwise`
    );
  });

  it(`should throw for points at infinity`, () => {
    expect(() => orientation(pgPoint([1, 0, 0]), pgPoint([1, 0, 1]), pgPoint([0, 1, 1]))).toThrow(
      PointAtInfinityError
    );
  });
});

describe(`linePosition`, () => {
  const l = pgPoint([0, 0, 1]).meet(pgPoint([1, 0, 1]));

  it(`should put counterclockwise points on the left`, () => {
    expect(linePosition(pgPoint([0, 1, 1]), l)).toBe(`left`);
    expect(linePosition(pgPoint([0, -1, 1]), l)).toBe(`right`);
    expect(linePosition(pgPoint([5, 0, 1]), l)).toBe(`on`);
  });

  it(`should account for a negative weight`, () => {
    expect(linePosition(pgPoint([0, 2, -2]), l)).toBe(`right`);
  });

  it(`should throw for a point at infinity`, () => {
    expect(() => linePosition(pgPoint([1, 1, 0]), l)).toThrow(PointAtInfinityError);
  });
});

describe(`points and lines at infinity`, () => {
  it(`should detect points at infinity`, () => {
    expect(isAtInfinity(pgPoint([1, 2, 0]))).toBe(true);
    expect(isAtInfinity(pgPoint([1, 2, 3]))).toBe(false);
  });

  it(`should detect the line at infinity`, () => {
    expect(isLineAtInfinity(pgLine([0, 0, 3]))).toBe(true);
    expect(isLineAtInfinity(pgLine([0, 1, 0]))).toBe(false);
  });
});

describe(`pointInTriangle`, () => {
  const v1 = pgPoint([0, 0, 1]);
  const v2 = pgPoint([2, 0, 1]);
  const v3 = pgPoint([0, 2, 1]);

  it(`should accept interior points`, () => {
    expect(pointInTriangle(pgPoint([1, 1, 2]), v1, v2, v3)).toBe(true);
  });

  it(`should accept points on an edge or at a vertex`, () => {
    expect(pointInTriangle(pgPoint([1, 0, 1]), v1, v2, v3)).toBe(true);
    expect(pointInTriangle(pgPoint([1, 1, 1]), v1, v2, v3)).toBe(true);
    expect(pointInTriangle(v1, v1, v2, v3)).toBe(true);
  });

  it(`should reject exterior points`, () => {
    expect(pointInTriangle(pgPoint([2, 2, 1]), v1, v2, v3)).toBe(false);
    expect(pointInTriangle(pgPoint([-1, 1, 1]), v1, v2, v3)).toBe(false);
  });

  it(`should reject points on an edge's line beyond the edge`, () => {
    expect(pointInTriangle(pgPoint([3, 0, 1]), v1, v2, v3)).toBe(false);
  });

  it(`should not depend on the vertex order`, () => {
    expect(pointInTriangle(pgPoint([1, 1, 2]), v1, v3, v2)).toBe(true);
    expect(pointInTriangle(pgPoint([2, 2, 1]), v1, v3, v2)).toBe(false);
  });

  it(`should account for negative weights`, () => {
    expect(pointInTriangle(pgPoint([-1, -1, -2]), v1, pgPoint([-2, 0, -1]), v3)).toBe(true);
    expect(pointInTriangle(pgPoint([-2, -2, -1]), v1, pgPoint([-2, 0, -1]), v3)).toBe(false);
  });

  it(`should throw on a degenerate triangle`, () => {
    expect(() => pointInTriangle(v1, v1, pgPoint([1, 1, 1]), pgPoint([2, 2, 1]))).toThrow(DegenerateTriangleError);
  });

  it(`should throw for a point at infinity`, () => {
    expect(() => pointInTriangle(pgPoint([1, 1, 0]), v1, v2, v3)).toThrow(PointAtInfinityError);
  });
});

describe(`triangleArea`, () => {
  it(`should be positive for a counterclockwise triangle`, () => {
    expect(triangleArea(pgPoint([0, 0, 1]), pgPoint([2, 0, 1]), pgPoint([0, 2, 1]))).toEqual({
      numerator: 2n,
      denominator: 1n,
    });
  });

  it(`should be negative for a clockwise triangle`, () => {
    expect(triangleArea(pgPoint([0, 0, 1]), pgPoint([0, 2, 1]), pgPoint([2, 0, 1]))).toEqual({
      numerator: -2n,
      denominator: 1n,
    });
  });

  it(`should return a fraction in lowest terms`, () => {
    expect(triangleArea(pgPoint([0, 0, 1]), pgPoint([1, 0, 1]), pgPoint([0, 1, 2]))).toEqual({
      numerator: 1n,
      denominator: 4n,
    });
  });

  it(`should account for negative weights`, () => {
    expect(triangleArea(pgPoint([0, 0, -1]), pgPoint([-2, 0, -1]), pgPoint([0, 2, 1]))).toEqual({
      numerator: 2n,
      denominator: 1n,
    });
  });

  it(`should be zero for collinear points`, () => {
    expect(triangleArea(pgPoint([0, 0, 1]), pgPoint([1, 1, 1]), pgPoint([2, 2, 1]))).toEqual({
      numerator: 0n,
      denominator: 1n,
    });
  });

  it(`should throw for a point at infinity`, () => {
    expect(() => triangleArea(pgPoint([0, 0, 1]), pgPoint([1, 0, 0]), pgPoint([0, 1, 1]))).toThrow(
      PointAtInfinityError
    );
  });
});

describe(`squaredDistance`, () => {
  it(`should compute integer distances`, () => {
    expect(squaredDistance(pgPoint([0, 0, 1]), pgPoint([3, 4, 1]))).toEqual({ numerator: 25n, denominator: 1n });
    expect(squaredDistance(pgPoint([-1, -1, 1]), pgPoint([2, 2, 1]))).toEqual({ numerator: 18n, denominator: 1n });
  });

  it(`should be zero for equal points`, () => {
    expect(squaredDistance(pgPoint([1, 1, 1]), pgPoint([2, 2, 2]))).toEqual({ numerator: 0n, denominator: 1n });
  });

  it(`should return a fraction for non-unit weights`, () => {
    expect(squaredDistance(pgPoint([1, 0, 2]), pgPoint([0, 1, -2]))).toEqual({ numerator: 1n, denominator: 2n });
  });

  it(`should throw for a point at infinity`, () => {
    expect(() => squaredDistance(pgPoint([1, 0, 0]), pgPoint([0, 0, 1]))).toThrow(PointAtInfinityError);
  });
});
