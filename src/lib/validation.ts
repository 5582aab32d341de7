import type { z } from 'zod';
import { ValidationError } from '@/lib/errors';

/**
 * Parse service input, raising ValidationError with every zod issue
 */
export function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw ValidationError.fromIssues(result.error.issues);
  }
  return result.data;
}
