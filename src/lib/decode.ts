import { z } from 'zod';
import { ResponseDecodingError } from './errors';

export function formatIssues(error: z.ZodError) {
  return error.issues.map((i) => ({
    path: i.path.join('.'),
    message: i.message,
  }));
}

export function decode<S extends z.ZodTypeAny>(schema: S, raw: unknown, what: string): z.output<S> {
  const parse = schema.safeParse(raw);
  if (!parse.success) {
    throw new ResponseDecodingError(`Malformed ${what} in response`, {
      extras: { issues: formatIssues(parse.error) },
      cause: parse.error,
    });
  }
  return parse.data;
}

export function decodeList<S extends z.ZodTypeAny>(schema: S, raw: unknown, what: string): z.output<S>[] {
  if (!Array.isArray(raw)) {
    throw new ResponseDecodingError(`Expected a list of ${what} in response`);
  }
  return raw.map((item, index) => decode(schema, item, `${what} at index ${index}`));
}
