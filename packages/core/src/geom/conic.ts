/**
 * Conics as integer symmetric matrices
 *
 * A conic is the set of points p with pᵀ·Q·p = 0. Q maps a point to its
 * polar line and adj(Q) maps a line back to its pole, which keeps the
 * pole exact without dividing by det(Q).
 */

import { InvalidCoordinateError, NotOnConicError } from '../errors.js';
import { toInteger, type IntegerInput } from '../num/integer.js';
import { adjugate3, det3, isSymmetric3, mulMat3Vec, toMat3I, type Mat3I } from '../num/mat3i.js';
import { dotProduct, type CoordInput, type Vec3I } from '../num/vec3i.js';
import type { CayleyKleinModel } from '../ck/CkObject.js';
import type { HomogeneousOf, HomogeneousPlane } from '../plane/types.js';
import type { HomogeneousPoint } from './predicates.js';

export type ConicType = 'ellipse' | 'parabola' | 'hyperbola';

export class Conic {
  readonly matrix: Mat3I;

  /**
   * @throws InvalidDimensionError unless the matrix is 3x3
   * @throws InvalidCoordinateError if it is not symmetric
   */
  constructor(matrix: ArrayLike<CoordInput>) {
    const m = toMat3I(matrix);
    if (!isSymmetric3(m)) {
      throw new InvalidCoordinateError('Conic matrix must be symmetric');
    }
    this.matrix = m;
  }

  /**
   * Circle (x - cx)² + (y - cy)² = r2
   */
  static circle(cx: IntegerInput, cy: IntegerInput, r2: IntegerInput): Conic {
    const x = toInteger(cx);
    const y = toInteger(cy);
    const c = x * x + y * y - toInteger(r2);
    return new Conic([
      [1n, 0n, -x],
      [0n, 1n, -y],
      [-x, -y, c],
    ]);
  }

  static unitCircle(): Conic {
    return Conic.circle(0, 0, 1);
  }

  /** pᵀ·Q·p */
  evaluate(p: HomogeneousPoint): bigint {
    return this.quadraticForm(p.coord);
  }

  private quadraticForm(coord: Vec3I): bigint {
    return dotProduct(coord, mulMat3Vec(this.matrix, coord));
  }

  contains(p: HomogeneousPoint): boolean {
    return this.evaluate(p) === 0n;
  }

  /**
   * Polar line of p
   */
  polar<P extends HomogeneousPlane<P, L>, L extends HomogeneousPlane<L, P>>(p: HomogeneousOf<P, L>): L {
    return p.aux().withCoord(mulMat3Vec(this.matrix, p.coord));
  }

  /**
   * Pole of l, the inverse of `polar` up to scale for a non-degenerate conic
   */
  pole<L extends HomogeneousPlane<L, P>, P extends HomogeneousPlane<P, L>>(l: HomogeneousOf<L, P>): P {
    return l.aux().withCoord(mulMat3Vec(adjugate3(this.matrix), l.coord));
  }

  /**
   * Tangent line at a point of the conic
   *
   * @throws NotOnConicError if p is not on the conic
   */
  tangent<P extends HomogeneousPlane<P, L>, L extends HomogeneousPlane<L, P>>(p: HomogeneousOf<P, L>): L {
    if (this.quadraticForm(p.coord) !== 0n) {
      throw new NotOnConicError(`Point (${p.coord.join(', ')}) does not lie on the conic`);
    }
    return this.polar<P, L>(p);
  }

  /**
   * Q00·Q11 − Q01², the sign of which classifies the conic
   */
  discriminant(): bigint {
    const m = this.matrix;
    return m[0][0] * m[1][1] - m[0][1] * m[1][0];
  }

  conicType(): ConicType {
    const d = this.discriminant();
    if (d > 0n) return 'ellipse';
    if (d < 0n) return 'hyperbola';
    return 'parabola';
  }

  determinant(): bigint {
    return det3(this.matrix);
  }

  /** A pair of lines, a double line or a point */
  isDegenerate(): boolean {
    return this.determinant() === 0n;
  }

  toString(): string {
    return `Conic(${this.matrix.map((row) => `[${row.join(', ')}]`).join(', ')})`;
  }
}

/**
 * Cayley-Klein model whose absolute is the given conic: polarity by Q for
 * points and adj(Q) for lines
 */
export function conicModel<N extends string>(conic: Conic, name: N, label: string): CayleyKleinModel<N> {
  const adj = adjugate3(conic.matrix);
  return {
    name,
    label,
    pointToLine: (coord) => mulMat3Vec(conic.matrix, coord),
    lineToPoint: (coord) => mulMat3Vec(adj, coord),
  };
}
