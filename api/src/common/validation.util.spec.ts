import { BadRequestException } from '@nestjs/common';
import { z } from 'zod';
import { handleValidationError } from './validation.util';

describe('handleValidationError', () => {
  it('should turn a ZodError into a BadRequestException', () => {
    const result = z.object({ title: z.string().min(3) }).safeParse({ title: 'x' });
    if (result.success) throw new Error('expected a parse failure');

    let thrown: unknown;
    try {
      handleValidationError(result.error);
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(BadRequestException);
    if (!(thrown instanceof BadRequestException)) return;
    expect(thrown.getResponse()).toEqual({
      message: 'Validation failed',
      errors: ['title: String must contain at least 3 character(s)'],
    });
  });

  it('should rethrow other errors unchanged', () => {
    const error = new Error('connection refused');

    expect(() => handleValidationError(error)).toThrow(error);
  });
});
