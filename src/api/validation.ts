/**
 * Minutes Insights - Request Validation
 */

import type { z } from 'zod';

import { formatValidationErrors } from '../config/schema.js';
import { ValidationError } from '../utils/types.js';

/**
 * Parse a request part against a schema, raising a 400 with the zod messages
 */
export function parseRequest<S extends z.ZodTypeAny>(schema: S, input: unknown, what = 'request body'): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(`Invalid ${what}`, formatValidationErrors(result.error));
  }
  return result.data;
}
