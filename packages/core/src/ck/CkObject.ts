/**
 * Cayley-Klein points and lines
 *
 * One generic point/line pair serves every metric model. A model is plain
 * data: a name and the two halves of its polarity. `CkPoint<'euclid'>` and
 * `CkPoint<'hyperbolic'>` are distinct types, so objects of different
 * models cannot be combined.
 */

import { HomogeneousObject } from '../plane/HomogeneousObject.js';
import type { CayleyKleinPlane } from '../plane/types.js';
import { scale3, toNonZeroVec3I, type CoordInput, type Vec3I } from '../num/vec3i.js';

// ============================================================================
// Models
// ============================================================================

/**
 * A polarity: a map from points to lines and back
 */
export interface Polarity {
  pointToLine(coord: Vec3I): Vec3I;
  lineToPoint(coord: Vec3I): Vec3I;
}

export interface CayleyKleinModel<N extends string = string> extends Polarity {
  readonly name: N;
  /** Prefix for printed object names, e.g. "Euclid" → "EuclidPoint(...)" */
  readonly label: string;
}

/**
 * Polarity given by a diagonal matrix for each direction
 */
export function diagonalPolarity(pointScale: Vec3I, lineScale: Vec3I): Polarity {
  return {
    pointToLine: (coord) => scale3(pointScale, coord),
    lineToPoint: (coord) => scale3(lineScale, coord),
  };
}

// ============================================================================
// Objects
// ============================================================================

export class CkPoint<N extends string = string>
  extends HomogeneousObject<CkPoint<N>, CkLine<N>>
  implements CayleyKleinPlane<CkPoint<N>, CkLine<N>>
{
  readonly kind = 'point';
  readonly model: CayleyKleinModel<N>;

  constructor(model: CayleyKleinModel<N>, coord: CoordInput) {
    super(coord);
    this.model = model;
  }

  withCoord(coord: CoordInput): CkPoint<N> {
    return new CkPoint(this.model, coord);
  }

  protected dualWithCoord(coord: CoordInput): CkLine<N> {
    return new CkLine(this.model, coord);
  }

  protected label(): string {
    return `${this.model.label}Point`;
  }

  /** The polar line of this point */
  perp(): CkLine<N> {
    return new CkLine(this.model, this.model.pointToLine(this.coord));
  }
}

export class CkLine<N extends string = string>
  extends HomogeneousObject<CkLine<N>, CkPoint<N>>
  implements CayleyKleinPlane<CkLine<N>, CkPoint<N>>
{
  readonly kind = 'line';
  readonly model: CayleyKleinModel<N>;

  constructor(model: CayleyKleinModel<N>, coord: CoordInput) {
    super(coord);
    this.model = model;
  }

  withCoord(coord: CoordInput): CkLine<N> {
    return new CkLine(this.model, coord);
  }

  protected dualWithCoord(coord: CoordInput): CkPoint<N> {
    return new CkPoint(this.model, coord);
  }

  protected label(): string {
    return `${this.model.label}Line`;
  }

  /** The pole of this line */
  perp(): CkPoint<N> {
    return new CkPoint(this.model, this.model.lineToPoint(this.coord));
  }
}

// ============================================================================
// Factories
// ============================================================================

/**
 * Create a point of a model, rejecting the zero triple
 */
export function ckPoint<N extends string>(model: CayleyKleinModel<N>, coord: CoordInput): CkPoint<N> {
  return new CkPoint(model, toNonZeroVec3I(coord));
}

/**
 * Create a line of a model, rejecting the zero triple
 */
export function ckLine<N extends string>(model: CayleyKleinModel<N>, coord: CoordInput): CkLine<N> {
  return new CkLine(model, toNonZeroVec3I(coord));
}
