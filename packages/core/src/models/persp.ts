/**
 * Perspective geometry
 *
 * A projective image of the Euclidean plane: the line at infinity is
 * L_INF = [0, -1, 1] and the circular points are I_RE ± i·I_IM.
 */

import { ckLine, ckPoint, type CayleyKleinModel, type CkLine, type CkPoint } from '../ck/CkObject.js';
import { dotProduct, plucker, type CoordInput, type Vec3I } from '../num/vec3i.js';

const I_RE: Vec3I = [0n, 1n, 1n];
const I_IM: Vec3I = [1n, 0n, 0n];
const L_INF: Vec3I = [0n, -1n, 1n];

export const PERSP: CayleyKleinModel<'persp'> = {
  name: 'persp',
  label: 'Persp',
  pointToLine: () => L_INF,
  lineToPoint: (coord) => plucker(dotProduct(I_RE, coord), I_RE, dotProduct(I_IM, coord), I_IM),
};

export type PerspPoint = CkPoint<'persp'>;
export type PerspLine = CkLine<'persp'>;

export function perspPoint(coord: CoordInput): PerspPoint {
  return ckPoint(PERSP, coord);
}

export function perspLine(coord: CoordInput): PerspLine {
  return ckLine(PERSP, coord);
}

export const PERSP_LINE_AT_INFINITY: PerspLine = perspLine(L_INF);

/**
 * Lines are parallel when they meet on the line at infinity
 */
export function isParallelPersp(l1: PerspLine, l2: PerspLine): boolean {
  return PERSP_LINE_AT_INFINITY.dot(l1.meet(l2)) === 0n;
}

export function midpointPersp(p: PerspPoint, q: PerspPoint): PerspPoint {
  const alpha = PERSP_LINE_AT_INFINITY.dot(q);
  const beta = PERSP_LINE_AT_INFINITY.dot(p);
  return p.parametrize(alpha, q, beta);
}
