import { describe, it, expect } from "vitest";
import {
  cross2,
  crossProduct,
  dot2,
  dotProduct,
  isZero3,
  normalizeHomogeneous,
  plucker,
  scale3,
  toNonZeroVec3I,
  toVec3I,
} from "../../src/num/vec3i.js";
import {
  DegenerateObjectError,
  InvalidCoordinateError,
  InvalidDimensionError,
} from "../../src/errors.js";

describe(`vec3i`, () => {
  describe(`products`, () => {
    it(`should compute the cross product`, () => {
      expect(crossProduct([1, 2, 3], [3, 4, 5])).toEqual([-2n, 4n, -2n]);
    });

    it(`should compute the dot product`, () => {
      expect(dotProduct([1, 2, 3], [3, 4, 5])).toBe(26n);
    });

    it(`should compute planar dot and cross products`, () => {
      expect(dot2([1, 2], [3, 4])).toBe(11n);
      expect(cross2([1, 2], [3, 4])).toBe(-2n);
    });

    it(`should not round products beyond 2^53`, () => {
      const big = 2n ** 60n + 1n;
      expect(dotProduct([big, 0, 0], [big, 0, 0])).toBe(2n ** 120n + 2n ** 61n + 1n);
      expect(crossProduct([big, 0, 0], [0, big, 0])).toEqual([0n, 0n, big * big]);
    });

    it(`should compute the Plücker combination`, () => {
      expect(plucker(1, [1, 2, 3], -1, [3, 4, 5])).toEqual([-2n, -2n, -2n]);
      expect(plucker(2n, [1n, 0n, 0n], 3n, [0n, 1n, 0n])).toEqual([2n, 3n, 0n]);
    });

    it(`should scale component-wise`, () => {
      expect(scale3([1n, 1n, -1n], [4n, 5n, 6n])).toEqual([4n, 5n, -6n]);
    });
  });

  describe(`dimension checks`, () => {
    it(`should reject vectors of the wrong length`, () => {
      expect(() => dotProduct([1, 2], [3, 4, 5])).toThrow(InvalidDimensionError);
      expect(() => crossProduct([1, 2, 3, 4], [3, 4, 5])).toThrow(InvalidDimensionError);
      expect(() => plucker(1, [1, 2, 3], 1, [1])).toThrow(InvalidDimensionError);
    });

    it(`should require exactly two components in planar products`, () => {
      expect(() => dot2([1], [3, 4])).toThrow(InvalidDimensionError);
      expect(() => cross2([1, 2], [])).toThrow(InvalidDimensionError);
      expect(() => dot2([1, 2, 3], [3, 4, 5])).toThrow(InvalidDimensionError);
      expect(() => cross2([1, 2, 9], [3, 4])).toThrow(InvalidDimensionError);
    });

    it(`should report expected and actual lengths`, () => {
      try {
        toVec3I([1, 2]);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidDimensionError);
        if (error instanceof InvalidDimensionError) {
          expect(error.expected).toBe(3);
          expect(error.actual).toBe(2);
          expect(error.message).toBe(`Expected a vector of length 3, got 2`);
        }
      }
    });
  });

  describe(`toVec3I`, () => {
    it(`should copy a valid triple`, () => {
      const source = [1, -2, 3];
      const v = toVec3I(source);
      source[0] = 9;
      expect(v).toEqual([1n, -2n, 3n]);
    });

    it(`should accept bigints and numbers together`, () => {
      expect(toVec3I([1n, -2, 2n ** 70n])).toEqual([1n, -2n, 2n ** 70n]);
    });

    it(`should reject non-integers and unsafe integers`, () => {
      expect(() => toVec3I([1.5, 0, 0])).toThrow(InvalidCoordinateError);
      expect(() => toVec3I([NaN, 0, 0])).toThrow(InvalidCoordinateError);
      expect(() => toVec3I([2 ** 53, 0, 0])).toThrow(InvalidCoordinateError);
    });

    it(`should read negative zero as zero`, () => {
      expect(toVec3I([-0, 1, 2])).toEqual([0n, 1n, 2n]);
    });

    it(`should reject the zero triple where a point or line is required`, () => {
      expect(() => toNonZeroVec3I([0, 0, 0])).toThrow(DegenerateObjectError);
      expect(toNonZeroVec3I([0, 0, 1])).toEqual([0n, 0n, 1n]);
      expect(isZero3([0n, 0n, 0n])).toBe(true);
    });
  });

  describe(`normalizeHomogeneous`, () => {
    it(`should divide by the gcd and make the last non-zero component positive`, () => {
      expect(normalizeHomogeneous([2n, 4n, -6n])).toEqual([-1n, -2n, 3n]);
      expect(normalizeHomogeneous([-3n, 0n, 0n])).toEqual([1n, 0n, 0n]);
      expect(normalizeHomogeneous([4n, -6n, 0n])).toEqual([-2n, 3n, 0n]);
    });

    it(`should map proportional triples to the same result`, () => {
      expect(normalizeHomogeneous([3n, 6n, 9n])).toEqual(normalizeHomogeneous([-1n, -2n, -3n]));
    });

    it(`should leave the zero triple unchanged`, () => {
      expect(normalizeHomogeneous([0n, 0n, 0n])).toEqual([0n, 0n, 0n]);
    });
  });
});
