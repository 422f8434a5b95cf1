/**
 * Capability interfaces for projective and Cayley-Klein planes
 *
 * Points and lines are dual: every interface is written once with the
 * object type P and its dual L, and a line type implements the same
 * interface with the roles swapped (`ProjectivePlane<L, P>`).
 *
 * Generic algorithms take their arguments as `PrimitiveOf<P, L>` (and
 * friends) rather than bare `P`. The intersection gives the compiler a
 * place to infer the dual type L from the argument alone, so a call such
 * as `triDual(triangle)` returns the model's own line type.
 */

import type { IntegerInput } from '../num/integer.js';

/**
 * Incidence structure: join/meet and incidence
 */
export interface ProjectivePlanePrimitive<P, L> {
  readonly kind: 'point' | 'line';
  /** Join of two points, or meet of two lines */
  meet(other: P): L;
  incident(dual: L): boolean;
  /** Projective equality (proportional coordinates) */
  equals(other: P): boolean;
}

/**
 * Incidence structure with measurement and linear combination
 */
export interface ProjectivePlane<P, L> extends ProjectivePlanePrimitive<P, L> {
  /** A dual object not incident with this one */
  aux(): L;
  dot(dual: L): bigint;
  /** lambda·this + mu·other */
  parametrize(lambda: IntegerInput, other: P, mu: IntegerInput): P;
}

/**
 * Projective plane with a polarity
 */
export interface CayleyKleinPlane<P, L> extends ProjectivePlane<P, L> {
  perp(): L;
}

/**
 * Projective plane object with readable coordinates, for maps that act on
 * the coordinates directly (conics, projectivities)
 */
export interface HomogeneousPlane<P, L> extends ProjectivePlane<P, L> {
  readonly coord: readonly [bigint, bigint, bigint];
  withCoord(coord: ArrayLike<IntegerInput>): P;
}

export type PrimitiveOf<P, L> = P & ProjectivePlanePrimitive<P, L>;
export type PlaneOf<P, L> = P & ProjectivePlane<P, L>;
export type CayleyKleinOf<P, L> = P & CayleyKleinPlane<P, L>;
export type HomogeneousOf<P, L> = P & HomogeneousPlane<P, L>;

/** Three vertices */
export type Triangle<P> = readonly [P, P, P];

/** Three sides (the dual of a triangle) */
export type Trilateral<L> = readonly [L, L, L];
