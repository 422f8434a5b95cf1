/**
 * Exact integer helpers
 *
 * Coordinates are bigints, so sums and products never round or overflow
 * however far a construction grows them. Plain numbers are accepted at the
 * edges of the API when they are safe integers.
 */

import { InvalidCoordinateError } from '../errors.js';

/** An integer given as a bigint or as a safe-integer number */
export type IntegerInput = bigint | number;

/**
 * Validate and convert one integer
 *
 * @throws InvalidCoordinateError for a number that is not a safe integer
 */
export function toInteger(value: IntegerInput): bigint {
  if (typeof value === 'bigint') {
    return value;
  }
  if (!Number.isSafeInteger(value)) {
    throw new InvalidCoordinateError(`Coordinate ${value} is not a safe integer`);
  }
  return BigInt(value);
}

export function abs(a: bigint): bigint {
  return a < 0n ? -a : a;
}

export function sign(a: bigint): -1 | 0 | 1 {
  if (a === 0n) return 0;
  return a > 0n ? 1 : -1;
}

/**
 * Greatest common divisor of absolute values (gcd(0, 0) = 0)
 */
export function gcd(a: bigint, b: bigint): bigint {
  let x = abs(a);
  let y = abs(b);
  while (y !== 0n) {
    const t = x % y;
    x = y;
    y = t;
  }
  return x;
}

/** Whether |a| fits in a double without rounding */
export function isSafe(a: bigint): boolean {
  return abs(a) <= BigInt(Number.MAX_SAFE_INTEGER);
}
