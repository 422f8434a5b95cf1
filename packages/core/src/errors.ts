/**
 * Geometry Error Types
 *
 * Typed errors for precondition and arithmetic failures.
 * Use these instead of throwing generic Error objects.
 */

export type GeometryErrorCode =
  | 'INVALID_DIMENSION'
  | 'INVALID_COORDINATE'
  | 'DEGENERATE_OBJECT'
  | 'DEGENERATE_TRIANGLE'
  | 'NON_COLLINEAR_POINTS'
  | 'POINT_AT_INFINITY'
  | 'NOT_ON_CONIC'
  | 'INVALID_INPUT';

/**
 * Base class for geometry errors with a stable code
 */
export abstract class GeometryError extends Error {
  abstract readonly code: GeometryErrorCode;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * A coordinate vector does not have the required length
 */
export class InvalidDimensionError extends GeometryError {
  readonly code = 'INVALID_DIMENSION';
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super(`Expected a vector of length ${expected}, got ${actual}`);
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * A coordinate component is not an integer
 */
export class InvalidCoordinateError extends GeometryError {
  readonly code = 'INVALID_COORDINATE';

  constructor(message = 'Coordinates must be integers') {
    super(message);
  }
}

/**
 * Homogeneous coordinates are all zero
 */
export class DegenerateObjectError extends GeometryError {
  readonly code = 'DEGENERATE_OBJECT';

  constructor(message = 'Invalid homogeneous coordinates (all zeros)') {
    super(message);
  }
}

/**
 * The vertices of a triangle are collinear
 */
export class DegenerateTriangleError extends GeometryError {
  readonly code = 'DEGENERATE_TRIANGLE';

  constructor(message = 'Invalid triangle (collinear points)') {
    super(message);
  }
}

/**
 * Points that must lie on one line do not
 */
export class NonCollinearPointsError extends GeometryError {
  readonly code = 'NON_COLLINEAR_POINTS';

  constructor(message = 'Points are not collinear') {
    super(message);
  }
}

/**
 * An affine computation received a point at infinity
 */
export class PointAtInfinityError extends GeometryError {
  readonly code = 'POINT_AT_INFINITY';

  constructor(message = 'Point is at infinity') {
    super(message);
  }
}

/**
 * A point expected on a conic is not on it
 */
export class NotOnConicError extends GeometryError {
  readonly code = 'NOT_ON_CONIC';

  constructor(message = 'Point does not lie on the conic') {
    super(message);
  }
}

/**
 * Serialized input does not have the shape of a geometric object
 */
export class InvalidInputError extends GeometryError {
  readonly code = 'INVALID_INPUT';

  constructor(message = 'Invalid serialized object') {
    super(message);
  }
}

export function isGeometryError(value: unknown): value is GeometryError {
  return value instanceof GeometryError;
}
