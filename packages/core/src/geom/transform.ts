/**
 * Projective transformations over integer matrices
 *
 * A projectivity moves points by M·p. Lines move by the inverse transpose,
 * taken here as adj(M)ᵀ (equal up to scale), so incidence and every
 * construction built on it are preserved exactly.
 */

import { adjugate3, det3, identity3, mul3, mulMat3Vec, toMat3I, transpose3, type Mat3I } from '../num/mat3i.js';
import type { IntegerInput } from '../num/integer.js';
import type { CoordInput, Vec3I } from '../num/vec3i.js';

/** A point or line of any model */
export interface Transformable<T> {
  readonly kind: 'point' | 'line';
  readonly coord: Vec3I;
  withCoord(coord: CoordInput): T;
}

export class Projectivity {
  readonly matrix: Mat3I;

  /**
   * @throws InvalidDimensionError unless the matrix is 3x3
   */
  constructor(matrix: ArrayLike<CoordInput>) {
    this.matrix = toMat3I(matrix);
  }

  static identity(): Projectivity {
    return new Projectivity(identity3());
  }

  static translation(tx: IntegerInput, ty: IntegerInput): Projectivity {
    return new Projectivity([
      [1, 0, tx],
      [0, 1, ty],
      [0, 0, 1],
    ]);
  }

  static scaling(sx: IntegerInput, sy: IntegerInput): Projectivity {
    return new Projectivity([
      [sx, 0, 0],
      [0, sy, 0],
      [0, 0, 1],
    ]);
  }

  static fromRows(rows: ArrayLike<CoordInput>): Projectivity {
    return new Projectivity(rows);
  }

  /**
   * `other` first, then this
   */
  compose(other: Projectivity): Projectivity {
    return new Projectivity(mul3(this.matrix, other.matrix));
  }

  determinant(): bigint {
    return det3(this.matrix);
  }

  /** A singular matrix collapses the plane onto a line or a point */
  isSingular(): boolean {
    return this.determinant() === 0n;
  }

  /**
   * The inverse up to the scale det(M)
   */
  adjugate(): Projectivity {
    return new Projectivity(adjugate3(this.matrix));
  }

  apply<T extends Transformable<T>>(obj: T): T {
    if (obj.kind === 'point') {
      return obj.withCoord(mulMat3Vec(this.matrix, obj.coord));
    }
    return obj.withCoord(mulMat3Vec(transpose3(adjugate3(this.matrix)), obj.coord));
  }

  toString(): string {
    return `Projectivity(${this.matrix.map((row) => `[${row.join(', ')}]`).join(', ')})`;
  }
}
