/**
 * HomogeneousObject - shared implementation of a point or line
 *
 * Every model's Point and Line types extend this class. It wraps one
 * validated coordinate triple and implements meet, incidence, dot,
 * aux, parametrize and projective equality once for all of them; a
 * subclass only says how to build itself and its dual from a triple.
 */

import type { IntegerInput } from '../num/integer.js';
import {
  crossProduct,
  dotProduct,
  isZero3,
  normalizeHomogeneous,
  plucker,
  toVec3I,
  type CoordInput,
  type Vec3I,
} from '../num/vec3i.js';
import type { HomogeneousPlane } from './types.js';

export abstract class HomogeneousObject<
  Self extends HomogeneousObject<Self, Dual>,
  Dual extends HomogeneousObject<Dual, Self>,
> implements HomogeneousPlane<Self, Dual>
{
  abstract readonly kind: 'point' | 'line';

  /** Homogeneous coordinates */
  readonly coord: Vec3I;

  /**
   * @throws InvalidDimensionError unless `coord` has exactly three components
   * @throws InvalidCoordinateError if a number component is not a safe integer
   */
  constructor(coord: CoordInput) {
    this.coord = toVec3I(coord);
  }

  /** An object of the same type and model with new coordinates */
  abstract withCoord(coord: CoordInput): Self;

  protected abstract dualWithCoord(coord: CoordInput): Dual;

  protected abstract label(): string;

  meet(other: Self): Dual {
    return this.dualWithCoord(crossProduct(this.coord, other.coord));
  }

  incident(dual: Dual): boolean {
    return dotProduct(this.coord, dual.coord) === 0n;
  }

  dot(dual: Dual): bigint {
    return dotProduct(this.coord, dual.coord);
  }

  /**
   * The dual object with the same coordinates. It is never incident with
   * `this` for a non-zero triple, since x·x > 0 over the integers.
   */
  aux(): Dual {
    return this.dualWithCoord(this.coord);
  }

  parametrize(lambda: IntegerInput, other: Self, mu: IntegerInput): Self {
    return this.withCoord(plucker(lambda, this.coord, mu, other.coord));
  }

  /**
   * Projective equality: the coordinate triples are proportional.
   * A degenerate (zero) object names nothing and equals nothing, itself
   * included, which keeps `equals` consistent with `hashKey`.
   */
  equals(other: Self): boolean {
    if (this.isDegenerate() || other.isDegenerate()) {
      return false;
    }
    return isZero3(crossProduct(this.coord, other.coord));
  }

  /** True for the all-zero triple, which names no point or line */
  isDegenerate(): boolean {
    return isZero3(this.coord);
  }

  /**
   * Key that is equal for equal objects: the reduced, sign-normalized
   * coordinates, prefixed by the type label
   */
  hashKey(): string {
    return `${this.label()}:${normalizeHomogeneous(this.coord).join(',')}`;
  }

  toString(): string {
    return `${this.label()}(${this.coord.join(', ')})`;
  }
}
