/**
 * Advisor settings: decision thresholds, retrieval tuning and the template
 * fields that are always available. Defaults can be overridden in code or
 * through ADVISOR_* environment variables.
 */

import { ValidationError } from './errors.js';

export interface AdvisorSettings {
  /** Minimum top-match confidence for a reply to go out without review. */
  autoSendThreshold: number;
  /** Below this the top match is not drafted at all; a holding reply goes out. */
  reviewThreshold: number;
  /** Top-two score gap below which the match counts as ambiguous. */
  ambiguityMargin: number;
  /** Both top-two scores must exceed this for the ambiguity check to apply. */
  relevanceFloor: number;
  /** λ in the reference re-ranking. */
  diversityWeight: number;
  tagBoost: number;
  maxReferences: number;
  topMatchLimit: number;
  /** Template fields that resolve even when nothing else supplies them. */
  defaultFields: Readonly<Record<string, string>>;
}

export const DEFAULT_SETTINGS: Readonly<AdvisorSettings> = Object.freeze({
  autoSendThreshold: 0.95,
  reviewThreshold: 0.55,
  ambiguityMargin: 0.05,
  relevanceFloor: 0.3,
  diversityWeight: 0.5,
  tagBoost: 0.1,
  maxReferences: 3,
  topMatchLimit: 3,
  defaultFields: Object.freeze({
    student_name: 'Student',
    advisor_name: 'Academic Advising',
    advising_email: 'advising@university.edu',
  }),
});

const UNIT_INTERVAL_FIELDS = [
  'autoSendThreshold',
  'reviewThreshold',
  'ambiguityMargin',
  'relevanceFloor',
  'diversityWeight',
  'tagBoost',
] as const;

const ENV_VARIABLES = {
  autoSendThreshold: 'ADVISOR_AUTO_SEND_THRESHOLD',
  reviewThreshold: 'ADVISOR_REVIEW_THRESHOLD',
  ambiguityMargin: 'ADVISOR_AMBIGUITY_MARGIN',
  relevanceFloor: 'ADVISOR_RELEVANCE_FLOOR',
  diversityWeight: 'ADVISOR_DIVERSITY_WEIGHT',
  tagBoost: 'ADVISOR_TAG_BOOST',
  maxReferences: 'ADVISOR_MAX_REFERENCES',
} as const;

export function resolveSettings(overrides: Partial<AdvisorSettings> = {}): AdvisorSettings {
  const settings: AdvisorSettings = {
    ...DEFAULT_SETTINGS,
    ...overrides,
    defaultFields: { ...DEFAULT_SETTINGS.defaultFields, ...overrides.defaultFields },
  };

  const errors: string[] = [];

  for (const field of UNIT_INTERVAL_FIELDS) {
    const value = settings[field];
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      errors.push(`${field} must be between 0 and 1`);
    }
  }
  if (settings.relevanceFloor > settings.autoSendThreshold) {
    errors.push('relevanceFloor must not exceed autoSendThreshold');
  }
  if (settings.reviewThreshold > settings.autoSendThreshold) {
    errors.push('reviewThreshold must not exceed autoSendThreshold');
  }
  if (!Number.isInteger(settings.maxReferences) || settings.maxReferences < 0) {
    errors.push('maxReferences must be a non-negative integer');
  }
  if (!Number.isInteger(settings.topMatchLimit) || settings.topMatchLimit < 1) {
    errors.push('topMatchLimit must be a positive integer');
  }

  if (errors.length > 0) {
    throw new ValidationError(errors.join('; '), { fields: errors });
  }

  return settings;
}

/** Read numeric overrides from the environment. Unset variables keep defaults. */
export function settingsFromEnv(
  env: Readonly<Record<string, string | undefined>> = process.env
): Partial<AdvisorSettings> {
  const overrides: Partial<AdvisorSettings> = {};

  for (const [field, variable] of Object.entries(ENV_VARIABLES)) {
    const raw = env[variable]?.trim();
    if (!raw) continue;

    const value = Number(raw);
    if (Number.isNaN(value)) {
      throw new ValidationError(`${variable} must be a number, got "${raw}"`);
    }
    if (isTunable(field)) overrides[field] = value;
  }

  return overrides;
}

function isTunable(field: string): field is keyof typeof ENV_VARIABLES {
  return field in ENV_VARIABLES;
}
