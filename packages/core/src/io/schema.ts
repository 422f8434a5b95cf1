/**
 * Zod schemas for serialized points and lines
 *
 * Wire form: `{ model, kind, coord }`. A coordinate is a JSON number, or a
 * decimal string once it no longer fits in a double. The schema checks the
 * shape only; coordinates are validated by the same factories as user code.
 */

import { z } from 'zod/v4';
import { ckLine, ckPoint, type CayleyKleinModel, type CkLine, type CkPoint } from '../ck/CkObject.js';
import { InvalidInputError } from '../errors.js';
import { isSafe } from '../num/integer.js';
import { ELLIPTIC } from '../models/elliptic.js';
import { EUCLID } from '../models/euclid.js';
import { HYPERBOLIC } from '../models/hyperbolic.js';
import { MYCK } from '../models/myck.js';
import { PERSP } from '../models/persp.js';
import { pgLine, pgPoint, type PgLine, type PgPoint } from '../plane/pg.js';
import { attempt, failure, type GeometryResult } from '../result.js';

// ============================================================================
// Schemas
// ============================================================================

export const ckModelNameSchema = z.enum(['elliptic', 'hyperbolic', 'myck', 'euclid', 'persp']);
export const modelNameSchema = z.enum(['pg', 'elliptic', 'hyperbolic', 'myck', 'euclid', 'persp']);
export const objectKindSchema = z.enum(['point', 'line']);

export const coordinateSchema = z.union([
  z.number(),
  z.bigint(),
  z.string().regex(/^-?\d+$/, 'Expected a decimal integer string').transform((s) => BigInt(s)),
]);

export const geometryObjectSchema = z.object({
  model: modelNameSchema,
  kind: objectKindSchema,
  coord: z.array(coordinateSchema),
});

export type CkModelName = z.infer<typeof ckModelNameSchema>;
export type ModelName = z.infer<typeof modelNameSchema>;

/** Serialized form, safe to pass to JSON.stringify */
export interface SerializedObject {
  model: ModelName;
  kind: z.infer<typeof objectKindSchema>;
  coord: (number | string)[];
}

type ParsedObject = z.output<typeof geometryObjectSchema>;

/** Any point or line of a built-in model */
export type AnyGeometryObject = PgPoint | PgLine | CkPoint<CkModelName> | CkLine<CkModelName>;

const CK_MODELS: Record<CkModelName, CayleyKleinModel<CkModelName>> = {
  elliptic: ELLIPTIC,
  hyperbolic: HYPERBOLIC,
  myck: MYCK,
  euclid: EUCLID,
  persp: PERSP,
};

// ============================================================================
// Serialization
// ============================================================================

export function serializeObject(obj: AnyGeometryObject): SerializedObject {
  return {
    model: 'model' in obj ? obj.model.name : 'pg',
    kind: obj.kind,
    coord: obj.coord.map((c) => (isSafe(c) ? Number(c) : c.toString())),
  };
}

function buildObject(data: ParsedObject): AnyGeometryObject {
  if (data.model === 'pg') {
    return data.kind === 'point' ? pgPoint(data.coord) : pgLine(data.coord);
  }
  const model = CK_MODELS[data.model];
  return data.kind === 'point' ? ckPoint(model, data.coord) : ckLine(model, data.coord);
}

/**
 * Parse a serialized object
 *
 * Fails with InvalidInputError for a wrong shape, and with the factory's
 * error (InvalidDimensionError, InvalidCoordinateError,
 * DegenerateObjectError) for bad coordinates.
 */
export function parseObject(input: unknown): GeometryResult<AnyGeometryObject> {
  const parsed = geometryObjectSchema.safeParse(input);
  if (!parsed.success) {
    return failure(new InvalidInputError(z.prettifyError(parsed.error)));
  }
  return attempt(() => buildObject(parsed.data));
}

export function parseObjectJson(text: string): GeometryResult<AnyGeometryObject> {
  let input: unknown;
  try {
    input = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return failure(new InvalidInputError(`Invalid JSON: ${message}`));
  }
  return parseObject(input);
}
