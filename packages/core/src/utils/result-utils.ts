import { err, ok, type Result } from 'neverthrow';
import type { ZodError, ZodSchema, ZodTypeDef } from 'zod';

/**
 * Extract a message from an unknown thrown value
 */
export function getErrorMessage(error: unknown, defaultMessage?: string): string {
  if (error instanceof Error) {
    return error.message;
  }
  return defaultMessage ?? String(error);
}

/**
 * Validate input against a zod schema and return a neverthrow Result.
 */
export function fromZod<T>(schema: ZodSchema<T, ZodTypeDef, unknown>, input: unknown): Result<T, ZodError> {
  const parsed = schema.safeParse(input);
  return parsed.success ? ok(parsed.data) : err(parsed.error);
}

/**
 * Flatten zod issues into one line per issue: `path: message`
 */
export function formatZodIssues(error: ZodError): string {
  return error.issues.map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`).join('\n');
}
