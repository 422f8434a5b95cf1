/**
 * Elliptic geometry: the polarity is the identity
 */

import { ckLine, ckPoint, diagonalPolarity, type CayleyKleinModel, type CkLine, type CkPoint } from '../ck/CkObject.js';
import type { CoordInput } from '../num/vec3i.js';

export const ELLIPTIC: CayleyKleinModel<'elliptic'> = {
  name: 'elliptic',
  label: 'Elliptic',
  ...diagonalPolarity([1n, 1n, 1n], [1n, 1n, 1n]),
};

export type EllipticPoint = CkPoint<'elliptic'>;
export type EllipticLine = CkLine<'elliptic'>;

export function ellipticPoint(coord: CoordInput): EllipticPoint {
  return ckPoint(ELLIPTIC, coord);
}

export function ellipticLine(coord: CoordInput): EllipticLine {
  return ckLine(ELLIPTIC, coord);
}
