/**
 * Static token tables: stop words and domain synonyms.
 * Loaded once at startup and never mutated afterwards.
 */

import { ValidationError } from '../errors.js';
import { readJsonFile } from '../loaders/json.js';
import type { LexiconRecord } from '../types/records.js';
import { isRecord, validateFields } from '../validation/schema.js';

export interface Lexicon {
  readonly stopWords: ReadonlySet<string>;
  /** token → canonical tokens it also stands for */
  readonly synonyms: ReadonlyMap<string, readonly string[]>;
}

export const DEFAULT_LEXICON_PATH = new URL('../../data/lexicon.json', import.meta.url);

export function createLexicon(record: LexiconRecord): Lexicon {
  const synonyms = new Map<string, readonly string[]>();
  for (const [token, canonical] of Object.entries(record.synonyms)) {
    synonyms.set(
      token.toLowerCase(),
      Object.freeze(canonical.map((c) => c.toLowerCase()))
    );
  }

  return Object.freeze({
    stopWords: new Set(record.stopWords.map((w) => w.toLowerCase())),
    synonyms,
  });
}

export function parseLexicon(payload: unknown): Lexicon {
  if (!isRecord(payload)) {
    throw new ValidationError('lexicon must be a JSON object');
  }

  const errors = validateFields(payload, {
    stopWords: { type: 'array', required: true, items: 'string' },
    synonyms: { type: 'object', required: true },
  });

  const synonyms: Record<string, string[]> = {};
  if (isRecord(payload.synonyms)) {
    for (const [token, canonical] of Object.entries(payload.synonyms)) {
      if (!Array.isArray(canonical) || canonical.some((c) => typeof c !== 'string')) {
        errors.push(`synonyms.${token} must be an array of strings`);
        continue;
      }
      synonyms[token] = canonical.map(String);
    }
  }

  if (errors.length > 0 || !Array.isArray(payload.stopWords)) {
    throw new ValidationError('Invalid lexicon', { fields: errors });
  }

  return createLexicon({ stopWords: payload.stopWords.map(String), synonyms });
}

export async function loadLexicon(path: string | URL = DEFAULT_LEXICON_PATH): Promise<Lexicon> {
  return parseLexicon(await readJsonFile(path));
}
