/**
 * @projective-plane/core - exact projective geometry on integer coordinates
 *
 * Coordinates are bigints; factories also take safe-integer numbers.
 *
 * ## Objects
 * - PgPoint / PgLine: the plain projective plane
 * - CkPoint<N> / CkLine<N>: points and lines of a Cayley-Klein model
 *   (elliptic, hyperbolic, MyCK, Euclid, persp, or one built from a conic)
 *
 * ## Algorithms
 * - plane/projective: incidence, Desargues, Pappus, harmonic conjugates
 * - ck/cayleyKlein: perpendicularity, altitudes, orthocenter, reflection
 * - geom: predicates, cross ratio, conics, projectivities
 * - io: zod schemas for the wire form
 */

// =============================================================================
// Errors and results
// =============================================================================
export {
  GeometryError,
  InvalidDimensionError,
  InvalidCoordinateError,
  DegenerateObjectError,
  DegenerateTriangleError,
  NonCollinearPointsError,
  PointAtInfinityError,
  NotOnConicError,
  InvalidInputError,
  isGeometryError,
  type GeometryErrorCode,
} from './errors.js';
export { success, failure, attempt, unwrap, type GeometryResult } from './result.js';

// =============================================================================
// Numerics
// =============================================================================
export { toInteger, gcd, type IntegerInput } from './num/integer.js';
export { reduceRatio, ratioEquals, type Ratio } from './num/ratio.js';
export {
  toVec3I,
  dotProduct,
  dot2,
  cross2,
  crossProduct,
  plucker,
  normalizeHomogeneous,
  type Vec3I,
  type CoordInput,
} from './num/vec3i.js';
export { type Mat3I } from './num/mat3i.js';

// =============================================================================
// Projective plane
// =============================================================================
export type {
  ProjectivePlanePrimitive,
  ProjectivePlane,
  CayleyKleinPlane,
  HomogeneousPlane,
  Triangle,
  Trilateral,
} from './plane/types.js';
export { HomogeneousObject } from './plane/HomogeneousObject.js';
export { PgPoint, PgLine, pgPoint, pgLine } from './plane/pg.js';
export {
  coincident,
  triDual,
  persp,
  checkDesargue,
  checkPappus,
  checkAxiom,
  checkAxiom2,
  harmConj,
  isHarmonic,
  involution,
  DEFAULT_CHECK_OPTIONS,
  type ConfigurationCheckOptions,
} from './plane/projective.js';

// =============================================================================
// Cayley-Klein planes
// =============================================================================
export {
  CkPoint,
  CkLine,
  ckPoint,
  ckLine,
  diagonalPolarity,
  type Polarity,
  type CayleyKleinModel,
} from './ck/CkObject.js';
export { isPerpendicular, altitude, orthocenter, triAltitude, reflect } from './ck/cayleyKlein.js';

export * from './models/elliptic.js';
export * from './models/hyperbolic.js';
export * from './models/myck.js';
export * from './models/euclid.js';
export * from './models/persp.js';

// =============================================================================
// Predicates, cross ratio, conics, projectivities
// =============================================================================
export {
  isAtInfinity,
  isLineAtInfinity,
  orientation,
  linePosition,
  pointInTriangle,
  triangleArea,
  squaredDistance,
  type HomogeneousPoint,
  type HomogeneousLine,
  type Orientation,
  type LineSide,
} from './geom/predicates.js';
export { crossRatio, isHarmonicDivision, type CrossRatio } from './geom/crossRatio.js';
export { Conic, conicModel, type ConicType } from './geom/conic.js';
export { Projectivity, type Transformable } from './geom/transform.js';

// =============================================================================
// Serialization
// =============================================================================
export {
  ckModelNameSchema,
  modelNameSchema,
  objectKindSchema,
  coordinateSchema,
  geometryObjectSchema,
  serializeObject,
  parseObject,
  parseObjectJson,
  type CkModelName,
  type ModelName,
  type SerializedObject,
  type AnyGeometryObject,
} from './io/schema.js';
