/**
 * Hyperbolic geometry: absolute conic x² + y² - z² = 0
 */

import { ckLine, ckPoint, diagonalPolarity, type CayleyKleinModel, type CkLine, type CkPoint } from '../ck/CkObject.js';
import type { CoordInput } from '../num/vec3i.js';

export const HYPERBOLIC: CayleyKleinModel<'hyperbolic'> = {
  name: 'hyperbolic',
  label: 'Hyperbolic',
  ...diagonalPolarity([1n, 1n, -1n], [1n, 1n, -1n]),
};

export type HyperbolicPoint = CkPoint<'hyperbolic'>;
export type HyperbolicLine = CkLine<'hyperbolic'>;

export function hyperbolicPoint(coord: CoordInput): HyperbolicPoint {
  return ckPoint(HYPERBOLIC, coord);
}

export function hyperbolicLine(coord: CoordInput): HyperbolicLine {
  return ckLine(HYPERBOLIC, coord);
}
