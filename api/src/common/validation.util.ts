import { BadRequestException } from '@nestjs/common';
import { ZodError } from 'zod';

/**
 * Rethrow a zod parse failure as a 400 listing every issue as
 * `path: message`. Anything else is rethrown untouched.
 */
export function handleValidationError(error: unknown): never {
  if (error instanceof ZodError) {
    throw new BadRequestException({
      message: 'Validation failed',
      errors: error.issues.map((e) => `${e.path.join('.')}: ${e.message}`),
    });
  }
  throw error;
}
