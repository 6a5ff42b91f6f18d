/**
 * Turns raw text into the token stream every vector is built from.
 *
 * Lower-cases, strips punctuation, drops stop words, then augments each token
 * that has a synonym entry with its canonical form(s). The original token is
 * kept, so augmentation adds recall without rewriting anything stored.
 */

import type { Lexicon } from './lexicon.js';

const APOSTROPHES = /['’]/g;
const NON_WORD = /[^a-z0-9\s]+/g;

export class TextNormalizer {
  constructor(private readonly lexicon: Lexicon) {}

  normalize(text: string): string[] {
    const words = text
      .toLowerCase()
      .replace(APOSTROPHES, '')
      .replace(NON_WORD, ' ')
      .split(/\s+/)
      .filter((word) => word.length > 0 && !this.lexicon.stopWords.has(word));

    const tokens: string[] = [];
    for (const word of words) {
      tokens.push(word);
      for (const canonical of this.lexicon.synonyms.get(word) ?? []) {
        if (canonical !== word) tokens.push(canonical);
      }
    }
    return tokens;
  }

  /** Distinct tokens, for membership checks such as tag matching. */
  tokenSet(text: string): Set<string> {
    return new Set(this.normalize(text));
  }
}
