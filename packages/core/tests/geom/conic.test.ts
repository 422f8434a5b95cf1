import { describe, it, expect } from "vitest";
import { Conic, conicModel } from "../../src/geom/conic.js";
import { ckPoint } from "../../src/ck/CkObject.js";
import { orthocenter } from "../../src/ck/cayleyKlein.js";
import { pgLine, pgPoint, PgLine, PgPoint } from "../../src/plane/pg.js";
import { normalizeHomogeneous } from "../../src/num/vec3i.js";
import { InvalidCoordinateError, InvalidDimensionError, NotOnConicError } from "../../src/errors.js";

describe(`Conic`, () => {
  const unit = Conic.unitCircle();

  describe(`construction`, () => {
    it(`should build the unit circle`, () => {
      expect(unit.matrix).toEqual([
        [1n, 0n, 0n],
        [0n, 1n, 0n],
        [0n, 0n, -1n],
      ]);
      expect(unit.toString()).toBe(`Conic([1, 0, 0], [0, 1, 0], [0, 0, -1])`);
    });

    it(`should build a circle from centre and squared radius`, () => {
      const c = Conic.circle(1, 2, 4);
      expect(c.matrix).toEqual([
        [1n, 0n, -1n],
        [0n, 1n, -2n],
        [-1n, -2n, 1n],
      ]);
    });

    it(`should reject a non-symmetric matrix`, () => {
      expect(() => new Conic([[1, 2, 0], [0, 1, 0], [0, 0, -1]])).toThrow(InvalidCoordinateError);
    });

    it(`should reject a matrix that is not 3x3`, () => {
      expect(() => new Conic([[1, 0, 0], [0, 1, 0]])).toThrow(InvalidDimensionError);
    });
  });

  describe(`membership`, () => {
    it(`should contain points on the circle`, () => {
      const c = Conic.circle(1, 2, 4);
      expect(c.contains(pgPoint([3, 2, 1]))).toBe(true);
      expect(c.contains(pgPoint([2, 8, 2]))).toBe(true);
      expect(c.contains(pgPoint([0, 0, 1]))).toBe(false);
      expect(c.evaluate(pgPoint([0, 0, 1]))).toBe(1n);
    });
  });

  describe(`polarity`, () => {
    it(`should compute the polar of a point`, () => {
      const polar = unit.polar(pgPoint([2, 0, 1]));
      expect(polar).toBeInstanceOf(PgLine);
      expect(polar.coord).toEqual([2n, 0n, -1n]);
    });

    it(`should compute the pole of a line`, () => {
      const pole = unit.pole(pgLine([2, 0, -1]));
      expect(pole).toBeInstanceOf(PgPoint);
      expect(pole.equals(pgPoint([2, 0, 1]))).toBe(true);
    });

    it(`should invert polar with pole`, () => {
      const c = Conic.circle(1, 2, 4);
      const p = pgPoint([5, -3, 2]);
      expect(c.pole(c.polar(p)).equals(p)).toBe(true);
    });

    it(`should give the tangent at a point of the conic`, () => {
      const t = unit.tangent(pgPoint([1, 0, 1]));
      expect(t.coord).toEqual([1n, 0n, -1n]);
      expect(t.incident(pgPoint([1, 0, 1]))).toBe(true);
    });

    it(`should throw for a tangent at a point off the conic`, () => {
      expect(() => unit.tangent(pgPoint([2, 0, 1]))).toThrow(NotOnConicError);
    });
  });

  describe(`classification`, () => {
    it(`should classify by the discriminant`, () => {
      expect(unit.discriminant()).toBe(1n);
      expect(unit.conicType()).toBe(`ellipse`);
      expect(new Conic([[0, 1, 0], [1, 0, 0], [0, 0, -2]]).conicType()).toBe(`hyperbola`);
      expect(new Conic([[2, 0, 0], [0, 0, -1], [0, -1, 0]]).conicType()).toBe(`parabola`);
    });

    it(`should detect degenerate conics`, () => {
      expect(unit.determinant()).toBe(-1n);
      expect(unit.isDegenerate()).toBe(false);
      expect(new Conic([[1, 0, 0], [0, -1, 0], [0, 0, 0]]).isDegenerate()).toBe(true);
    });
  });
});

describe(`conicModel`, () => {
  it(`should reproduce the hyperbolic orthocenter from the unit circle`, () => {
    const model = conicModel(Conic.unitCircle(), `unit-disk`, `UnitDisk`);
    const o = orthocenter([ckPoint(model, [1, 0, 3]), ckPoint(model, [2, 5, 1]), ckPoint(model, [-3, 1, 4])]);
    expect(normalizeHomogeneous(o.coord)).toEqual([33n, -11n, 25n]);
    expect(o.toString().startsWith(`UnitDiskPoint(`)).toBe(true);
  });

  it(`should make the polar of a point the model perp`, () => {
    const conic = Conic.circle(1, 2, 4);
    const model = conicModel(conic, `circle`, `Circle`);
    const p = ckPoint(model, [5, -3, 2]);
    expect(conic.polar(p).equals(p.perp())).toBe(true);
  });
});
