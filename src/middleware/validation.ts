import { z } from 'zod';
import { ValidationError } from '../core/errors';

/**
 * Parses request input against a schema, throwing a ValidationError listing every issue.
 */
export function validate<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(issue => ({
      path: issue.path.join('.') || '(root)',
      message: issue.message
    }));
    throw new ValidationError(
      `Validation failed: ${issues.map(issue => `${issue.path}: ${issue.message}`).join('; ')}`,
      issues
    );
  }
  return result.data;
}
