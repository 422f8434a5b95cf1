/**
 * Cross ratio of four collinear points (or, dually, four concurrent lines)
 *
 * With a and b as base points, every x on the line a∘b is α·a + β·b for
 * integers proportional to
 *   α = (x × b)·(a × b),  β = (a × x)·(a × b)
 * and CR(a, b; c, d) = (β_c·α_d) / (α_c·β_d). The ratio is returned
 * unreduced.
 */

import { DegenerateObjectError, NonCollinearPointsError } from '../errors.js';
import { ratioEquals, type Ratio } from '../num/ratio.js';
import { crossProduct, dotProduct, isZero3, type Vec3I } from '../num/vec3i.js';

/** Denominator zero when c = b or d = a */
export type CrossRatio = Ratio;

interface Homogeneous {
  readonly kind: 'point' | 'line';
  readonly coord: Vec3I;
}

/**
 * @throws DegenerateObjectError if a and b are equal
 * @throws NonCollinearPointsError if c or d is off the line a∘b
 */
export function crossRatio<T extends Homogeneous>(a: T, b: T, c: T, d: T): CrossRatio {
  const ab = crossProduct(a.coord, b.coord);
  if (isZero3(ab)) {
    throw new DegenerateObjectError('Cross ratio base points coincide');
  }
  if (dotProduct(ab, c.coord) !== 0n || dotProduct(ab, d.coord) !== 0n) {
    throw new NonCollinearPointsError();
  }
  const alpha = (x: Vec3I): bigint => dotProduct(crossProduct(x, b.coord), ab);
  const beta = (x: Vec3I): bigint => dotProduct(crossProduct(a.coord, x), ab);
  return {
    numerator: beta(c.coord) * alpha(d.coord),
    denominator: alpha(c.coord) * beta(d.coord),
  };
}

const HARMONIC: CrossRatio = { numerator: -1n, denominator: 1n };

/**
 * Whether (a, b; c, d) is a harmonic range: cross ratio −1
 */
export function isHarmonicDivision<T extends Homogeneous>(a: T, b: T, c: T, d: T): boolean {
  return ratioEquals(crossRatio(a, b, c, d), HARMONIC);
}
