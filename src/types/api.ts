/**
 * Advisor request/response shapes.
 * This is the structured output the CLI renders; the core never formats text.
 */

import type { Metadata } from './models.js';

// ── Requests ──

export interface AdvisorRequest {
  text: string;
  metadata?: Metadata;
}

// ── Responses ──

export type AdvisorStatus = 'auto_sent' | 'needs_review';

export interface RankedMatch {
  id: string;
  subject: string;
  score: number;
}

export interface AdvisorReference {
  id: string;
  title: string;
  url?: string;
  snippet: string;
  score: number;
}

export interface AdvisorResponse {
  status: AdvisorStatus;
  subject: string;
  body: string;
  matchedEntryId: string | null;
  confidence: number;
  /** Audit trail, in the order the facts were established. */
  reasons: string[];
  topMatches: RankedMatch[];
  references: AdvisorReference[];
  followUpQuestions: string[];
  /** Template fields as resolved for this reply. */
  fields: Record<string, string>;
}

// ── Errors ──

export type ErrorCode =
  | 'VALIDATION_FAILED'
  | 'INVALID_DOCUMENT'
  | 'COMPOSER_FAILED'
  | 'NOT_FOUND'
  | 'INTERNAL_ERROR';

export interface ErrorPayload {
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}
