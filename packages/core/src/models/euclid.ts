/**
 * Euclidean geometry
 *
 * The polarity is degenerate: every point maps to the line at infinity,
 * and a line ax + by + c = 0 maps to its normal direction (a, b, 0).
 */

import { ckLine, ckPoint, type CayleyKleinModel, type CkLine, type CkPoint } from '../ck/CkObject.js';
import { cross2, dot2, type CoordInput, type Vec3I } from '../num/vec3i.js';

const L_INF: Vec3I = [0n, 0n, 1n];

export const EUCLID: CayleyKleinModel<'euclid'> = {
  name: 'euclid',
  label: 'Euclid',
  pointToLine: () => L_INF,
  lineToPoint: ([a, b]) => [a, b, 0n],
};

export type EuclidPoint = CkPoint<'euclid'>;
export type EuclidLine = CkLine<'euclid'>;

export function euclidPoint(coord: CoordInput): EuclidPoint {
  return ckPoint(EUCLID, coord);
}

export function euclidLine(coord: CoordInput): EuclidLine {
  return ckLine(EUCLID, coord);
}

/** The line at infinity z = 0 */
export const EUCLID_LINE_AT_INFINITY: EuclidLine = euclidLine(L_INF);

export function isParallelEuclid(l1: EuclidLine, l2: EuclidLine): boolean {
  return cross2(l1.coord.slice(0, 2), l2.coord.slice(0, 2)) === 0n;
}

export function isPerpendicularEuclid(l1: EuclidLine, l2: EuclidLine): boolean {
  return dot2(l1.coord.slice(0, 2), l2.coord.slice(0, 2)) === 0n;
}

/**
 * Midpoint, weighting each point by the other's z so the sum needs no division
 */
export function midpointEuclid(p: EuclidPoint, q: EuclidPoint): EuclidPoint {
  return p.parametrize(q.coord[2], q, p.coord[2]);
}
