/**
 * Integer vector primitives for homogeneous coordinates
 *
 * Vectors are tuples of bigints. All operations are pure functions and
 * exact; inputs are validated for length and converted on the way in.
 */

import { DegenerateObjectError, InvalidDimensionError } from '../errors.js';
import { gcd, toInteger, type IntegerInput } from './integer.js';

// ============================================================================
// Types
// ============================================================================

/** Homogeneous coordinate triple */
export type Vec3I = readonly [bigint, bigint, bigint];

/** Input accepted where a Vec3I is validated */
export type CoordInput = ArrayLike<IntegerInput>;

// ============================================================================
// Validation
// ============================================================================

function assertLength(v: CoordInput, expected: number): void {
  if (v.length !== expected) {
    throw new InvalidDimensionError(expected, v.length);
  }
}

/**
 * Validate and copy a coordinate triple
 *
 * @throws InvalidDimensionError unless there are exactly three components
 * @throws InvalidCoordinateError for a number that is not a safe integer
 */
export function toVec3I(coords: CoordInput): Vec3I {
  assertLength(coords, 3);
  return [toInteger(coords[0]), toInteger(coords[1]), toInteger(coords[2])];
}

/**
 * Validate a triple that must name a point or line: not all zero
 */
export function toNonZeroVec3I(coords: CoordInput): Vec3I {
  const v = toVec3I(coords);
  if (isZero3(v)) {
    throw new DegenerateObjectError();
  }
  return v;
}

export function isZero3(v: Vec3I): boolean {
  return v[0] === 0n && v[1] === 0n && v[2] === 0n;
}

// ============================================================================
// Products
// ============================================================================

/**
 * Dot product: a · b
 */
export function dotProduct(a: CoordInput, b: CoordInput): bigint {
  const [a0, a1, a2] = toVec3I(a);
  const [b0, b1, b2] = toVec3I(b);
  return a0 * b0 + a1 * b1 + a2 * b2;
}

/**
 * Dot product of two planar vectors
 */
export function dot2(a: CoordInput, b: CoordInput): bigint {
  assertLength(a, 2);
  assertLength(b, 2);
  return toInteger(a[0]) * toInteger(b[0]) + toInteger(a[1]) * toInteger(b[1]);
}

/**
 * Cross product (2D): z-component of the 3D cross product
 */
export function cross2(a: CoordInput, b: CoordInput): bigint {
  assertLength(a, 2);
  assertLength(b, 2);
  return toInteger(a[0]) * toInteger(b[1]) - toInteger(a[1]) * toInteger(b[0]);
}

/**
 * Cross product: a × b
 */
export function crossProduct(a: CoordInput, b: CoordInput): Vec3I {
  const [a0, a1, a2] = toVec3I(a);
  const [b0, b1, b2] = toVec3I(b);
  return [a1 * b2 - a2 * b1, a2 * b0 - a0 * b2, a0 * b1 - a1 * b0];
}

/**
 * Plücker operation: lambda·a + mu·b
 */
export function plucker(lambda: IntegerInput, a: CoordInput, mu: IntegerInput, b: CoordInput): Vec3I {
  const l = toInteger(lambda);
  const m = toInteger(mu);
  const [a0, a1, a2] = toVec3I(a);
  const [b0, b1, b2] = toVec3I(b);
  return [l * a0 + m * b0, l * a1 + m * b1, l * a2 + m * b2];
}

/**
 * Component-wise product: scale[i]·v[i]
 */
export function scale3(scale: Vec3I, v: Vec3I): Vec3I {
  return [scale[0] * v[0], scale[1] * v[1], scale[2] * v[2]];
}

// ============================================================================
// Canonical form
// ============================================================================

/**
 * Reduce a triple by the gcd of its components and flip its sign so the
 * last non-zero component is positive. Proportional triples map to the
 * same result; the zero triple maps to itself.
 */
export function normalizeHomogeneous(v: Vec3I): Vec3I {
  const g = gcd(gcd(v[0], v[1]), v[2]);
  if (g === 0n) {
    return [0n, 0n, 0n];
  }
  const last = v[2] !== 0n ? v[2] : v[1] !== 0n ? v[1] : v[0];
  const s = last < 0n ? -g : g;
  return [v[0] / s, v[1] / s, v[2] / s];
}
