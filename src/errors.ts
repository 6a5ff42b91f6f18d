/**
 * Application error taxonomy.
 * Every fault the advisor raises on purpose is an AppError with a stable code.
 * Low confidence, ambiguity and empty collections are outcomes, not errors.
 */

import type { ErrorCode } from './types/api.js';

export class AppError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION_FAILED', message, details);
  }
}

/** A knowledge-base or corpus entry that cannot be indexed. */
export class InvalidDocumentError extends AppError {
  constructor(
    collection: string,
    index: number,
    errors: string[],
    id?: string
  ) {
    const label = id ? `"${id}"` : `#${index}`;
    super(
      'INVALID_DOCUMENT',
      `Invalid ${collection} entry ${label}: ${errors.join('; ')}`,
      { collection, index, ...(id !== undefined && { id }), errors }
    );
  }
}

export class ComposerError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('COMPOSER_FAILED', message, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message);
  }
}
