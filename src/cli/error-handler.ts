/**
 * Maps anything thrown to a structured error payload.
 * AppError subclasses keep their code and details; unknown errors become
 * INTERNAL_ERROR without their original message.
 */

import { AppError } from '../errors.js';
import type { ErrorPayload } from '../types/api.js';

export function describeError(err: unknown): ErrorPayload {
  if (err instanceof AppError) {
    return {
      error: {
        code: err.code,
        message: err.message,
        ...(err.details && { details: err.details }),
      },
    };
  }

  return {
    error: {
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    },
  };
}
