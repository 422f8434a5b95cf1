/**
 * Integer ratios
 *
 * Quantities that are fractions of coordinates (cross ratios, areas,
 * squared distances) are returned as a numerator over a denominator so
 * they stay exact without a rational number type.
 */

import { gcd } from './integer.js';

export interface Ratio {
  readonly numerator: bigint;
  /** Zero for an infinite value */
  readonly denominator: bigint;
}

/**
 * Lowest terms with a positive denominator. A zero denominator is kept,
 * with the numerator reduced to its sign.
 */
export function reduceRatio(numerator: bigint, denominator: bigint): Ratio {
  const g = gcd(numerator, denominator);
  if (g === 0n) {
    return { numerator: 0n, denominator: 0n };
  }
  const s = denominator < 0n ? -g : g;
  return { numerator: numerator / s, denominator: denominator / s };
}

/**
 * Equality by cross-multiplication
 */
export function ratioEquals(r: Ratio, s: Ratio): boolean {
  return r.numerator * s.denominator === s.numerator * r.denominator;
}
