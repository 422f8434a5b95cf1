/**
 * Projective plane algorithms
 *
 * Free functions over any point/line pair implementing the capability
 * interfaces. Each one is stated for points; by duality it applies to
 * lines unchanged (pass lines as P and points as L).
 */

import { DegenerateTriangleError, NonCollinearPointsError } from '../errors.js';
import type { IntegerInput } from '../num/integer.js';
import type {
  PlaneOf,
  PrimitiveOf,
  ProjectivePlane,
  ProjectivePlanePrimitive,
  Triangle,
  Trilateral,
} from './types.js';

/**
 * Options for the configuration theorem checks
 */
export interface ConfigurationCheckOptions {
  /** Log the intermediate constructions (default: false) */
  verbose?: boolean;
}

export const DEFAULT_CHECK_OPTIONS: Required<ConfigurationCheckOptions> = {
  verbose: false,
};

// ============================================================================
// Incidence
// ============================================================================

/**
 * Whether three points lie on one line (or three lines pass through one point)
 *
 * @example
 * coincident(pgPoint([1, 2, 3]), pgPoint([4, 5, 6]), pgPoint([7, 8, 9])); // true
 */
export function coincident<P extends ProjectivePlanePrimitive<P, L>, L extends ProjectivePlanePrimitive<L, P>>(
  p: PrimitiveOf<P, L>,
  q: PrimitiveOf<P, L>,
  r: PrimitiveOf<P, L>
): boolean {
  return p.meet(q).incident(r);
}

/**
 * The three sides of a triangle, each opposite the vertex with the same index
 *
 * @throws DegenerateTriangleError if the vertices are collinear
 */
export function triDual<P extends ProjectivePlanePrimitive<P, L>, L extends ProjectivePlanePrimitive<L, P>>(
  tri: Triangle<PrimitiveOf<P, L>>
): Trilateral<L> {
  const [a1, a2, a3] = tri;
  if (coincident<P, L>(a1, a2, a3)) {
    throw new DegenerateTriangleError();
  }
  return [a2.meet(a3), a1.meet(a3), a1.meet(a2)];
}

/**
 * Whether two triangles are perspective from a point: the lines joining
 * corresponding vertices are concurrent
 */
export function persp<P extends ProjectivePlanePrimitive<P, L>, L extends ProjectivePlanePrimitive<L, P>>(
  tri1: Triangle<PrimitiveOf<P, L>>,
  tri2: Triangle<PrimitiveOf<P, L>>
): boolean {
  const [a, b, c] = tri1;
  const [d, e, f] = tri2;
  const o = a.meet(d).meet(b.meet(e));
  return c.meet(f).incident(o);
}

// ============================================================================
// Configuration theorems
// ============================================================================

/**
 * Desargues' theorem for a pair of triangles: perspective from a point
 * exactly when perspective from a line.
 *
 * @throws DegenerateTriangleError if either triangle is degenerate
 */
export function checkDesargue<P extends ProjectivePlanePrimitive<P, L>, L extends ProjectivePlanePrimitive<L, P>>(
  tri1: Triangle<PrimitiveOf<P, L>>,
  tri2: Triangle<PrimitiveOf<P, L>>,
  options?: ConfigurationCheckOptions
): boolean {
  const opts = { ...DEFAULT_CHECK_OPTIONS, ...options };
  const trid1 = triDual<P, L>(tri1);
  const trid2 = triDual<P, L>(tri2);
  const fromPoint = persp<P, L>(tri1, tri2);
  const fromLine = persp<L, P>(trid1, trid2);
  if (opts.verbose) {
    console.log(`[desargues] sides 1: ${trid1.join(' ')}`);
    console.log(`[desargues] sides 2: ${trid2.join(' ')}`);
    console.log(`[desargues] perspective from point: ${fromPoint}, from line: ${fromLine}`);
  }
  return fromPoint === fromLine;
}

/**
 * Pappus' theorem: for points a, b, c on one line and d, e, f on another,
 * the cross joins (ae·bd), (af·cd), (bf·ce) are collinear.
 */
export function checkPappus<P extends ProjectivePlanePrimitive<P, L>, L extends ProjectivePlanePrimitive<L, P>>(
  co1: Triangle<PrimitiveOf<P, L>>,
  co2: Triangle<PrimitiveOf<P, L>>,
  options?: ConfigurationCheckOptions
): boolean {
  const opts = { ...DEFAULT_CHECK_OPTIONS, ...options };
  const [a, b, c] = co1;
  const [d, e, f] = co2;
  const g = a.meet(e).meet(b.meet(d));
  const h = a.meet(f).meet(c.meet(d));
  const i = b.meet(f).meet(c.meet(e));
  if (opts.verbose) {
    console.log(`[pappus] cross points: ${g} ${h} ${i}`);
  }
  return coincident<P, L>(g, h, i);
}

/**
 * Sanity check of the incidence axioms on a sample p, q, l
 */
export function checkAxiom<P extends ProjectivePlanePrimitive<P, L>, L extends ProjectivePlanePrimitive<L, P>>(
  p: PrimitiveOf<P, L>,
  q: PrimitiveOf<P, L>,
  l: L
): boolean {
  const m = p.meet(q);
  return (
    p.equals(q) === q.equals(p) &&
    p.incident(l) === l.incident(p) &&
    m.equals(q.meet(p)) &&
    m.incident(p) &&
    m.incident(q)
  );
}

/**
 * Sanity check of the measurement axioms on a sample p, q, l and weights
 */
export function checkAxiom2<P extends ProjectivePlane<P, L>, L extends ProjectivePlane<L, P>>(
  p: PlaneOf<P, L>,
  q: PlaneOf<P, L>,
  l: L,
  lambda: IntegerInput,
  mu: IntegerInput
): boolean {
  return (
    p.dot(l) === l.dot(p) &&
    !p.aux().incident(p) &&
    p.meet(q).incident(p.parametrize(lambda, q, mu))
  );
}

// ============================================================================
// Harmonic conjugates
// ============================================================================

/**
 * The harmonic conjugate of c with respect to a and b
 *
 * Applying it twice returns a point equal to c.
 *
 * @throws NonCollinearPointsError if a, b, c are not collinear
 */
export function harmConj<P extends ProjectivePlane<P, L>, L extends ProjectivePlane<L, P>>(
  a: PlaneOf<P, L>,
  b: PlaneOf<P, L>,
  c: PlaneOf<P, L>
): P {
  if (!coincident<P, L>(a, b, c)) {
    throw new NonCollinearPointsError();
  }
  const lc = a.meet(b).aux().meet(c);
  return a.parametrize(lc.dot(b), b, lc.dot(a));
}

/**
 * Whether d is the harmonic conjugate of c with respect to a and b
 *
 * @throws NonCollinearPointsError if a, b, c are not collinear
 */
export function isHarmonic<P extends ProjectivePlane<P, L>, L extends ProjectivePlane<L, P>>(
  a: PlaneOf<P, L>,
  b: PlaneOf<P, L>,
  c: PlaneOf<P, L>,
  d: P
): boolean {
  return harmConj<P, L>(a, b, c).equals(d);
}

/**
 * Harmonic homology with centre `origin` and axis `mirror`, applied to p
 */
export function involution<P extends ProjectivePlane<P, L>, L extends ProjectivePlane<L, P>>(
  origin: PlaneOf<P, L>,
  mirror: L,
  p: PlaneOf<P, L>
): P {
  const b = p.meet(origin).meet(mirror);
  return harmConj<P, L>(origin, b, p);
}
