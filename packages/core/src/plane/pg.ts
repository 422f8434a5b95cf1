/**
 * Plain projective plane: points and lines with no metric
 */

import { toNonZeroVec3I, type CoordInput } from '../num/vec3i.js';
import { HomogeneousObject } from './HomogeneousObject.js';

export class PgPoint extends HomogeneousObject<PgPoint, PgLine> {
  readonly kind = 'point';

  withCoord(coord: CoordInput): PgPoint {
    return new PgPoint(coord);
  }

  protected dualWithCoord(coord: CoordInput): PgLine {
    return new PgLine(coord);
  }

  protected label(): string {
    return 'PgPoint';
  }
}

export class PgLine extends HomogeneousObject<PgLine, PgPoint> {
  readonly kind = 'line';

  withCoord(coord: CoordInput): PgLine {
    return new PgLine(coord);
  }

  protected dualWithCoord(coord: CoordInput): PgPoint {
    return new PgPoint(coord);
  }

  protected label(): string {
    return 'PgLine';
  }
}

/**
 * Create a point, rejecting the zero triple
 */
export function pgPoint(coord: CoordInput): PgPoint {
  return new PgPoint(toNonZeroVec3I(coord));
}

/**
 * Create a line, rejecting the zero triple
 */
export function pgLine(coord: CoordInput): PgLine {
  return new PgLine(toNonZeroVec3I(coord));
}
