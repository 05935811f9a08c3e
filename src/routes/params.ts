import { z } from 'zod';
import { fromZodError } from '../lib/errors';

const idSchema = z.coerce.number().int().positive();

export function parseId(value: string, name = 'id'): number {
  return parseWith(idSchema, value, `Invalid ${name}`);
}

// Repeated or nested query parameters are ignored
export function queryString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Parse a request body or query with a zod schema.
 * @throws ValidationError listing each issue
 */
export function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown, message?: string): z.infer<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw fromZodError(parsed.error, message);
  }
  return parsed.data;
}
