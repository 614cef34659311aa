import type { z } from 'zod';
import { OutOfRangeError } from './errors.js';

function valueAtPath(input: unknown, path: ReadonlyArray<string | number>): unknown {
  let current: unknown = input;
  for (const key of path) {
    if (current === null || typeof current !== 'object') return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}

/**
 * Parse `input` against `schema`, turning the first validation issue into an
 * OutOfRangeError that names the offending field.
 */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, input: unknown, label: string): z.output<T> {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }
  const issue = result.error.issues[0];
  const path = issue ? issue.path : [];
  const field = path.length > 0 ? `${label}.${path.join('.')}` : label;
  throw new OutOfRangeError(field, valueAtPath(input, path), issue?.message ?? 'invalid value', {
    cause: result.error,
  });
}
