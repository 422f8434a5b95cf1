/**
 * Cayley-Klein plane algorithms
 *
 * Constructions that depend on the polarity (`perp`) of a model. They are
 * written once and specialize to elliptic, hyperbolic, Euclidean and the
 * other models through the model's polarity.
 */

import { DegenerateTriangleError } from '../errors.js';
import { coincident, involution, triDual } from '../plane/projective.js';
import type { CayleyKleinOf, CayleyKleinPlane, Triangle, Trilateral } from '../plane/types.js';

/**
 * Whether m2 passes through the pole of m1
 */
export function isPerpendicular<L extends CayleyKleinPlane<L, P>, P extends CayleyKleinPlane<P, L>>(
  m1: CayleyKleinOf<L, P>,
  m2: CayleyKleinOf<L, P>
): boolean {
  return m1.perp().incident(m2);
}

/**
 * The line through p perpendicular to m
 */
export function altitude<P extends CayleyKleinPlane<P, L>, L extends CayleyKleinPlane<L, P>>(
  p: CayleyKleinOf<P, L>,
  m: L
): L {
  return m.perp().meet(p);
}

/**
 * Intersection of the altitudes of a triangle
 *
 * @throws DegenerateTriangleError if the vertices are collinear
 */
export function orthocenter<P extends CayleyKleinPlane<P, L>, L extends CayleyKleinPlane<L, P>>(
  tri: Triangle<CayleyKleinOf<P, L>>
): P {
  const [a1, a2, a3] = tri;
  if (coincident<P, L>(a1, a2, a3)) {
    throw new DegenerateTriangleError();
  }
  const t1 = altitude<P, L>(a1, a2.meet(a3));
  const t2 = altitude<P, L>(a2, a3.meet(a1));
  return t1.meet(t2);
}

/**
 * The three altitudes of a triangle, one per vertex
 *
 * @throws DegenerateTriangleError if the vertices are collinear
 */
export function triAltitude<P extends CayleyKleinPlane<P, L>, L extends CayleyKleinPlane<L, P>>(
  tri: Triangle<CayleyKleinOf<P, L>>
): Trilateral<L> {
  const [l1, l2, l3] = triDual<P, L>(tri);
  const [a1, a2, a3] = tri;
  return [altitude<P, L>(a1, l1), altitude<P, L>(a2, l2), altitude<P, L>(a3, l3)];
}

/**
 * Reflection of p in the line `mirror`
 */
export function reflect<P extends CayleyKleinPlane<P, L>, L extends CayleyKleinPlane<L, P>>(
  mirror: L,
  p: CayleyKleinOf<P, L>
): P {
  return involution<P, L>(mirror.perp(), mirror, p);
}
