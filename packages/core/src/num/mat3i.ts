/**
 * 3x3 integer matrix operations
 *
 * Matrices are tuples of three rows. All operations are pure functions
 * over exact bigint arithmetic.
 */

import { InvalidDimensionError } from '../errors.js';
import { crossProduct, dotProduct, toVec3I, type CoordInput, type Vec3I } from './vec3i.js';

export type Mat3I = readonly [Vec3I, Vec3I, Vec3I];

/**
 * Validate and copy a matrix given as three rows
 */
export function toMat3I(rows: ArrayLike<CoordInput>): Mat3I {
  if (rows.length !== 3) {
    throw new InvalidDimensionError(3, rows.length);
  }
  return [toVec3I(rows[0]), toVec3I(rows[1]), toVec3I(rows[2])];
}

export function identity3(): Mat3I {
  return [
    [1n, 0n, 0n],
    [0n, 1n, 0n],
    [0n, 0n, 1n],
  ];
}

export function transpose3(m: Mat3I): Mat3I {
  return [
    [m[0][0], m[1][0], m[2][0]],
    [m[0][1], m[1][1], m[2][1]],
    [m[0][2], m[1][2], m[2][2]],
  ];
}

/**
 * Matrix-vector product: M * v
 */
export function mulMat3Vec(m: Mat3I, v: Vec3I): Vec3I {
  return [dotProduct(m[0], v), dotProduct(m[1], v), dotProduct(m[2], v)];
}

/**
 * Matrix product: A * B
 */
export function mul3(a: Mat3I, b: Mat3I): Mat3I {
  const bt = transpose3(b);
  return [
    [dotProduct(a[0], bt[0]), dotProduct(a[0], bt[1]), dotProduct(a[0], bt[2])],
    [dotProduct(a[1], bt[0]), dotProduct(a[1], bt[1]), dotProduct(a[1], bt[2])],
    [dotProduct(a[2], bt[0]), dotProduct(a[2], bt[1]), dotProduct(a[2], bt[2])],
  ];
}

export function det3(m: Mat3I): bigint {
  return dotProduct(m[0], crossProduct(m[1], m[2]));
}

/**
 * Adjugate: adj(M) * M = det(M) * I
 *
 * Its columns are the cross products of pairs of rows of M, so it is an
 * inverse up to scale that stays in the integers.
 */
export function adjugate3(m: Mat3I): Mat3I {
  return transpose3([crossProduct(m[1], m[2]), crossProduct(m[2], m[0]), crossProduct(m[0], m[1])]);
}

export function isSymmetric3(m: Mat3I): boolean {
  return m[0][1] === m[1][0] && m[0][2] === m[2][0] && m[1][2] === m[2][1];
}

export function equals3(a: Mat3I, b: Mat3I): boolean {
  for (let i = 0; i < 3; i++) {
    for (let j = 0; j < 3; j++) {
      if (a[i][j] !== b[i][j]) return false;
    }
  }
  return true;
}
