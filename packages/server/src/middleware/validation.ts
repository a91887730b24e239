import { zValidator } from '@hono/zod-validator';
import type { ValidationTargets } from 'hono';
import type { ZodSchema } from 'zod';
import { AuthFailure } from '../errors/auth-failure.js';
import { formatIssues } from '../config/index.js';

/**
 * zValidator that answers with the standard validation error body
 */
export function validate<T extends ZodSchema, Target extends keyof ValidationTargets>(
  target: Target,
  schema: T
) {
  return zValidator(target, schema, (result, c) => {
    if (!result.success) {
      return c.json(AuthFailure.validation(formatIssues(result.error).join(', ')).toJSON(), 400);
    }
  });
}
