import { ProblemJobSchema, type ProblemJob } from '../types/models';
import type { JsonValue } from '../types/common';
import { formatIssues } from './decode';
import { RequestValidationError } from './errors';

type NumericArray =
  | Int8Array
  | Uint8Array
  | Uint8ClampedArray
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | Float32Array
  | Float64Array
  | BigInt64Array
  | BigUint64Array;

function isNumericArray(value: unknown): value is NumericArray {
  return ArrayBuffer.isView(value) && !(value instanceof DataView);
}

function toNumber(value: bigint): number {
  const number = Number(value);
  if (!Number.isSafeInteger(number)) {
    throw new RequestValidationError(`Integer ${value} cannot be represented exactly in JSON`, {
      extras: { value: value.toString() },
    });
  }
  return number;
}

function coerce(value: unknown, ancestors: Set<object>): JsonValue | undefined {
  if (value === null) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'bigint') return toNumber(value);
  if (typeof value !== 'object') return undefined;

  if (value instanceof Date) return value.toISOString();
  if (isNumericArray(value)) {
    return Array.from<number | bigint, number>(value, (x) => (typeof x === 'bigint' ? toNumber(x) : x));
  }
  if (ancestors.has(value)) {
    throw new RequestValidationError('Cannot serialize a value that contains itself');
  }

  ancestors.add(value);
  try {
    if (Array.isArray(value) || value instanceof Set) {
      return Array.from<unknown, JsonValue>(value, (item) => coerce(item, ancestors) ?? null);
    }

    const entries: Iterable<[unknown, unknown]> = value instanceof Map ? value.entries() : Object.entries(value);
    const result: { [key: string]: JsonValue } = {};
    for (const [key, item] of entries) {
      const coerced = coerce(item, ancestors);
      if (coerced !== undefined) result[String(key)] = coerced;
    }
    return result;
  } finally {
    ancestors.delete(value);
  }
}

/**
 * Reduce a value to plain JSON: bigints become numbers, typed arrays and
 * Buffers become number arrays, Sets become arrays, Maps become objects with
 * string keys and Dates become ISO strings. Non-finite numbers become null.
 * Returns undefined for values JSON drops (functions, symbols, undefined).
 *
 * Throws `RequestValidationError` for integers outside the safe range and
 * for cyclic values.
 */
export function coerceToJson(value: unknown): JsonValue | undefined {
  return coerce(value, new Set());
}

/**
 * Validate one job and serialize it on its own, so a batch body can be
 * assembled piecewise.
 */
export function encodeProblemJob(job: ProblemJob, index?: number): string {
  const parse = ProblemJobSchema.safeParse(job);
  if (!parse.success) {
    const where = index === undefined ? '' : ` at index ${index}`;
    throw new RequestValidationError(`Invalid problem job${where}`, {
      extras: { issues: formatIssues(parse.error) },
    });
  }
  return JSON.stringify(coerceToJson(parse.data));
}
