/**
 * A custom Cayley-Klein metric with different point and line coefficients.
 * The two diagonals multiply to a multiple of the identity, so applying
 * both polarities returns a proportional triple.
 */

import { ckLine, ckPoint, diagonalPolarity, type CayleyKleinModel, type CkLine, type CkPoint } from '../ck/CkObject.js';
import type { CoordInput } from '../num/vec3i.js';

export const MYCK: CayleyKleinModel<'myck'> = {
  name: 'myck',
  label: 'MyCK',
  ...diagonalPolarity([-2n, 1n, -2n], [-1n, 2n, -1n]),
};

export type MyCKPoint = CkPoint<'myck'>;
export type MyCKLine = CkLine<'myck'>;

export function myckPoint(coord: CoordInput): MyCKPoint {
  return ckPoint(MYCK, coord);
}

export function myckLine(coord: CoordInput): MyCKLine {
  return ckLine(MYCK, coord);
}
