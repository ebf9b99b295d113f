import type { ZodType, ZodTypeDef } from 'zod';
import { CodecError, ValidationError } from './errors.js';

/** Parses `value` against a zod schema; issues map to `{ code, field, message }`. */
export function parseWithSchema<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown): T {
  const result = schema.safeParse(value);
  if (result.success) return result.data;
  throw new ValidationError(result.error.errors.map((e) => ({
    code: e.code,
    field: e.path.join('.'),
    message: e.message,
  })));
}

export function parseJson(content: string, what = 'JSON'): unknown {
  try {
    return JSON.parse(content);
  } catch (e) {
    throw new CodecError(`Invalid ${what}: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
}
