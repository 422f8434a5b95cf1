/**
 * Result type for geometric computations
 *
 * Every precondition failure in this package is thrown as a GeometryError.
 * Callers that would rather branch on values than catch can wrap a
 * computation with `attempt`.
 *
 * Usage:
 * ```ts
 * const result = attempt(() => orthocenter(triangle));
 * if (result.ok) {
 *   draw(result.value);
 * } else {
 *   console.error(result.error.code, result.error.message);
 * }
 * ```
 */

import { isGeometryError, type GeometryError } from './errors.js';

export type GeometryResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: GeometryError };

// ============================================================================
// Result Constructors
// ============================================================================

export function success<T>(value: T): GeometryResult<T> {
  return { ok: true, value };
}

export function failure<T>(error: GeometryError): GeometryResult<T> {
  return { ok: false, error };
}

/**
 * Run a computation, turning a thrown GeometryError into a failed result.
 * Any other exception is rethrown unchanged.
 */
export function attempt<T>(fn: () => T): GeometryResult<T> {
  try {
    return success(fn());
  } catch (error) {
    if (isGeometryError(error)) {
      return failure(error);
    }
    throw error;
  }
}

/**
 * Unwrap a result, throwing its error if it failed
 */
export function unwrap<T>(result: GeometryResult<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
