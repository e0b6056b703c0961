import { z } from 'zod';
import { decode } from './decode';
import { ResponseDecodingError } from './errors';

export type BatchResult<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type Variant = 'success' | 'error';

function isRecord(raw: unknown): raw is Record<string, unknown> {
  return typeof raw === 'object' && raw !== null && !Array.isArray(raw);
}

/**
 * Batch responses mix accepted and rejected items. An item that carries a
 * `status` key is a success, anything else is an error.
 */
export function classify(raw: unknown): Variant {
  return isRecord(raw) && 'status' in raw ? 'success' : 'error';
}

export function decodeBatch<S extends z.ZodTypeAny, E extends z.ZodTypeAny>(
  raw: unknown,
  expectedLength: number,
  schemas: { success: S; error: E },
  what: string,
): BatchResult<z.output<S>, z.output<E>>[] {
  if (!Array.isArray(raw)) {
    throw new ResponseDecodingError(`Expected a list of ${what} results in response`);
  }
  if (raw.length !== expectedLength) {
    throw new ResponseDecodingError(`Expected ${expectedLength} ${what} results, got ${raw.length}`, {
      extras: { expected: expectedLength, received: raw.length },
    });
  }

  return raw.map((item: unknown, index): BatchResult<z.output<S>, z.output<E>> => {
    if (!isRecord(item)) {
      throw new ResponseDecodingError(`Malformed ${what} result at index ${index} in response`);
    }
    if (classify(item) === 'success') {
      return { ok: true, value: decode(schemas.success, item, `${what} result at index ${index}`) };
    }
    return { ok: false, error: decode(schemas.error, item, `${what} error at index ${index}`) };
  });
}
