import { z } from 'zod';
import { ValidationError } from '../../utils/errors';

/**
 * Parse a request body, turning zod issues into a ValidationError
 */
export function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  try {
    return schema.parse(body);
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new ValidationError('Invalid request data', error.errors);
    }
    throw error;
  }
}
