/**
 * Geometric predicates
 *
 * Classification and measurement of affine points. Points at infinity have
 * no side, orientation, area or distance and are rejected.
 *
 * Orientation tries the adaptive-precision orient3d from
 * mourner/robust-predicates first, which is exact for coordinates that fit
 * in a double, and falls back to the bigint determinant for larger ones.
 * Areas and squared distances are fractions of the coordinates, returned as
 * reduced ratios.
 */

import { orient3d } from 'robust-predicates';
import { DegenerateTriangleError, PointAtInfinityError } from '../errors.js';
import { isSafe, sign } from '../num/integer.js';
import { reduceRatio, type Ratio } from '../num/ratio.js';
import { crossProduct, dotProduct, type Vec3I } from '../num/vec3i.js';

/** Any point type: a point of the plain plane or of a model */
export interface HomogeneousPoint {
  readonly kind: 'point';
  readonly coord: Vec3I;
}

export interface HomogeneousLine {
  readonly kind: 'line';
  readonly coord: Vec3I;
}

export type Orientation = 'counterclockwise' | 'clockwise' | 'collinear';
export type LineSide = 'left' | 'right' | 'on';

export function isAtInfinity(p: HomogeneousPoint): boolean {
  return p.coord[2] === 0n;
}

/**
 * Whether l is the line z = 0
 */
export function isLineAtInfinity(l: HomogeneousLine): boolean {
  return l.coord[0] === 0n && l.coord[1] === 0n && l.coord[2] !== 0n;
}

function assertAffine(p: HomogeneousPoint): void {
  if (isAtInfinity(p)) {
    throw new PointAtInfinityError(`Point (${p.coord.join(', ')}) is at infinity`);
  }
}

/** Sign of det[p; q; r] */
function determinantSign(p: Vec3I, q: Vec3I, r: Vec3I): -1 | 0 | 1 {
  if ([...p, ...q, ...r].every(isSafe)) {
    // orient3d(a, b, c, origin) is det[a; b; c]
    const det = orient3d(
      Number(p[0]), Number(p[1]), Number(p[2]),
      Number(q[0]), Number(q[1]), Number(q[2]),
      Number(r[0]), Number(r[1]), Number(r[2]),
      0, 0, 0
    );
    return det === 0 ? 0 : det > 0 ? 1 : -1;
  }
  return sign(dotProduct(p, crossProduct(q, r)));
}

/**
 * Orientation of the affine triangle p, q, r
 *
 * @throws PointAtInfinityError if any point has z = 0
 */
export function orientation(p: HomogeneousPoint, q: HomogeneousPoint, r: HomogeneousPoint): Orientation {
  assertAffine(p);
  assertAffine(q);
  assertAffine(r);
  const det = determinantSign(p.coord, q.coord, r.coord);
  if (det === 0) {
    return 'collinear';
  }
  const weights = sign(p.coord[2]) * sign(q.coord[2]) * sign(r.coord[2]);
  return det * weights > 0 ? 'counterclockwise' : 'clockwise';
}

/**
 * Side of the affine point p relative to l. The line a.meet(b) has the
 * points counterclockwise of a→b on its left.
 *
 * @throws PointAtInfinityError if p has z = 0
 */
export function linePosition(p: HomogeneousPoint, l: HomogeneousLine): LineSide {
  assertAffine(p);
  const side = sign(dotProduct(p.coord, l.coord)) * sign(p.coord[2]);
  if (side === 0) {
    return 'on';
  }
  return side > 0 ? 'left' : 'right';
}

/**
 * Whether p lies inside the triangle a, b, c or on its boundary
 *
 * @throws PointAtInfinityError if any point has z = 0
 * @throws DegenerateTriangleError if a, b, c are collinear
 */
export function pointInTriangle(
  p: HomogeneousPoint,
  a: HomogeneousPoint,
  b: HomogeneousPoint,
  c: HomogeneousPoint
): boolean {
  const turn = orientation(a, b, c);
  if (turn === 'collinear') {
    throw new DegenerateTriangleError();
  }
  const opposite: Orientation = turn === 'counterclockwise' ? 'clockwise' : 'counterclockwise';
  return (
    orientation(a, b, p) !== opposite &&
    orientation(b, c, p) !== opposite &&
    orientation(c, a, p) !== opposite
  );
}

/**
 * Signed area of the affine triangle p, q, r: positive when
 * counterclockwise
 *
 * @throws PointAtInfinityError if any point has z = 0
 */
export function triangleArea(p: HomogeneousPoint, q: HomogeneousPoint, r: HomogeneousPoint): Ratio {
  assertAffine(p);
  assertAffine(q);
  assertAffine(r);
  const det = dotProduct(p.coord, crossProduct(q.coord, r.coord));
  return reduceRatio(det, 2n * p.coord[2] * q.coord[2] * r.coord[2]);
}

/**
 * Squared Euclidean distance between two affine points
 *
 * @throws PointAtInfinityError if either point has z = 0
 */
export function squaredDistance(p: HomogeneousPoint, q: HomogeneousPoint): Ratio {
  assertAffine(p);
  assertAffine(q);
  const [px, py, pz] = p.coord;
  const [qx, qy, qz] = q.coord;
  const dx = qx * pz - px * qz;
  const dy = qy * pz - py * qz;
  const w = pz * qz;
  return reduceRatio(dx * dx + dy * dy, w * w);
}
