/**
 * Metadata extraction from free-form student messages.
 *
 * Finds the academic term, dated deadlines and the student's name, each as a
 * fact with a human-readable reason. Facts only fill template fields the
 * caller left empty; the reasons always go into the audit trail.
 */

import type { MetadataFact } from '../types/models.js';

const TERM_PATTERN = /\b(spring|summer|fall|winter)\s*(20\d{2})\b/gi;

const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

const MONTH_DAY_PATTERN =
  /\b(jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sept?(?:ember)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)\.?\s+(\d{1,2})(?:st|nd|rd|th)?\b/gi;

const NUMERIC_DATE_PATTERN =
  /\b(0?[1-9]|1[0-2])[/-](0?[1-9]|[12]\d|3[01])(?:[/-](20\d{2}))?\b/g;

const NAME_PATTERN = /\b(?:my\s+name\s+is|this\s+is)\s+([a-z]+(?:\s+[a-z]+){0,2})\b/gi;

const WITHDRAW_WORDS = new Set(['withdraw', 'withdrawal', 'drop', 'dropped', 'remove', 'removed']);
const REGISTRATION_WORDS = new Set(['register', 'registration', 'enroll', 'enrollment', 'add']);

export interface MetadataExtractorOptions {
  /** Characters either side of a date searched for deadline keywords. */
  contextWindow?: number;
  /** Words that end a captured name ("this is about..." names nobody). */
  stopWords?: Iterable<string>;
}

export class MetadataExtractor {
  private readonly contextWindow: number;
  private readonly stopWords: ReadonlySet<string>;

  constructor(options?: MetadataExtractorOptions) {
    this.contextWindow = options?.contextWindow ?? 48;
    this.stopWords = new Set([...(options?.stopWords ?? [])].map((w) => w.toLowerCase()));
  }

  extract(text: string): MetadataFact[] {
    return [
      ...this.extractTerms(text),
      ...this.extractDates(text),
      ...this.extractNames(text),
    ];
  }

  // ── Private ──

  private extractTerms(text: string): MetadataFact[] {
    return [...text.matchAll(TERM_PATTERN)].map((match) => {
      const season = match[1];
      const term = `${season.charAt(0).toUpperCase()}${season.slice(1).toLowerCase()} ${match[2]}`;
      return {
        key: 'term',
        value: term,
        reason: `Detected academic term '${term}' from student email.`,
      };
    });
  }

  private extractDates(text: string): MetadataFact[] {
    const lower = text.toLowerCase();
    const facts: MetadataFact[] = [];

    for (const match of text.matchAll(MONTH_DAY_PATTERN)) {
      const month = MONTHS.find((name) =>
        name.toLowerCase().startsWith(match[1].toLowerCase().slice(0, 3))
      );
      if (!month || match.index === undefined) continue;
      const value = `${month} ${Number(match[2])}`;
      facts.push(...this.classifyDeadline(lower, match.index, match.index + match[0].length, value));
    }

    for (const match of text.matchAll(NUMERIC_DATE_PATTERN)) {
      if (match.index === undefined) continue;
      const month = MONTHS[Number(match[1]) - 1];
      const day = Number(match[2]);
      const value = match[3] ? `${month} ${day}, ${match[3]}` : `${month} ${day}`;
      facts.push(...this.classifyDeadline(lower, match.index, match.index + match[0].length, value));
    }

    return facts;
  }

  private classifyDeadline(
    lower: string,
    start: number,
    end: number,
    value: string
  ): MetadataFact[] {
    const window = lower.slice(
      Math.max(0, start - this.contextWindow),
      Math.min(lower.length, end + this.contextWindow)
    );
    const words = new Set(window.match(/[a-z]+/g) ?? []);
    const mentions = (vocabulary: Set<string>) => [...vocabulary].some((w) => words.has(w));

    const facts: MetadataFact[] = [];
    const withdrawal = mentions(WITHDRAW_WORDS);
    const registration = mentions(REGISTRATION_WORDS);

    if (withdrawal) {
      facts.push({
        key: 'withdrawal_deadline',
        value,
        reason: `Identified withdrawal deadline '${value}' in message context.`,
      });
    }
    if (registration) {
      facts.push({
        key: 'registration_deadline',
        value,
        reason: `Identified registration deadline '${value}' in message context.`,
      });
    }
    if (!withdrawal && !registration && words.has('deadline')) {
      facts.push({
        key: 'deadline',
        value,
        reason: `Detected deadline reference '${value}'.`,
      });
    }
    return facts;
  }

  private extractNames(text: string): MetadataFact[] {
    const facts: MetadataFact[] = [];
    for (const match of text.matchAll(NAME_PATTERN)) {
      const words: string[] = [];
      for (const word of match[1].split(/\s+/)) {
        if (this.stopWords.has(word.toLowerCase())) break;
        words.push(`${word.charAt(0).toUpperCase()}${word.slice(1).toLowerCase()}`);
      }
      const name = words.join(' ');
      if (name.length < 2) continue;
      facts.push({
        key: 'student_name',
        value: name,
        reason: `Captured student name '${name}' from greeting.`,
      });
    }
    return facts;
  }
}
