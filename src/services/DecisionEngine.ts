/**
 * Auto-send vs. review decision over a ranked knowledge-base match list.
 *
 * Rules run in order:
 *   1. nothing scored            → needs_review, no entry
 *   2. top two too close to call → needs_review, no entry
 *   3. top score under review    → needs_review, no entry
 *   4. top score under auto-send → needs_review, entry drafted
 *   5. template field unresolved → needs_review, entry drafted
 *   6. otherwise                 → auto_sent
 * Rules 1 to 3 stop evaluation. Once an entry is chosen, 4 and 5 are both
 * checked so the reviewer sees every problem with the draft. Inferred-metadata
 * facts land in the reasons trail whatever the outcome.
 */

import { listPlaceholders } from '../composers/placeholders.js';
import type { AdvisorSettings } from '../config.js';
import type { AdvisorStatus, RankedMatch } from '../types/api.js';
import type {
  KnowledgeArticle,
  MatchResult,
  Metadata,
  MetadataFact,
} from '../types/models.js';

export type DecisionSettings = Pick<
  AdvisorSettings,
  | 'autoSendThreshold'
  | 'reviewThreshold'
  | 'ambiguityMargin'
  | 'relevanceFloor'
  | 'topMatchLimit'
  | 'defaultFields'
>;

export interface DecisionInput {
  matches: readonly MatchResult<KnowledgeArticle>[];
  /** Caller-supplied metadata; wins over anything inferred. */
  metadata: Metadata;
  facts: readonly MetadataFact[];
}

export interface Decision {
  status: AdvisorStatus;
  /** The entry to draft from; null when no single entry could be chosen. */
  entry: KnowledgeArticle | null;
  confidence: number;
  reasons: string[];
  topMatches: RankedMatch[];
  fields: Record<string, string>;
  missingFields: string[];
}

export const NO_MATCH_REASON = 'no relevant match found';

export class DecisionEngine {
  constructor(private readonly settings: DecisionSettings) {}

  decide(input: DecisionInput): Decision {
    const reasons: string[] = [];
    const fields = this.resolveFields(input, reasons);
    const topMatches = input.matches.slice(0, this.settings.topMatchLimit).map((m) => ({
      id: m.documentId,
      subject: m.document.subject,
      score: m.score,
    }));

    const [top, second] = input.matches;
    const base = { topMatches, fields, reasons };

    if (!top || top.score === 0) {
      reasons.push(NO_MATCH_REASON);
      return { ...base, status: 'needs_review', entry: null, confidence: 0, missingFields: [] };
    }

    reasons.push(`top match '${top.documentId}' scored ${top.score.toFixed(3)}`);

    if (second && this.isAmbiguous(top.score, second.score)) {
      reasons.push(
        `ambiguous match: candidates ${top.documentId}, ${second.documentId} scored similarly`
      );
      return {
        ...base,
        status: 'needs_review',
        entry: null,
        confidence: top.score,
        missingFields: [],
      };
    }

    const { autoSendThreshold, reviewThreshold } = this.settings;
    if (top.score < reviewThreshold) {
      reasons.push(
        `confidence below review threshold: ${top.score.toFixed(3)} < ${reviewThreshold.toFixed(3)}`
      );
      return {
        ...base,
        status: 'needs_review',
        entry: null,
        confidence: top.score,
        missingFields: [],
      };
    }

    const confident = top.score >= autoSendThreshold;
    if (!confident) {
      reasons.push(
        `confidence below auto-send threshold: ${top.score.toFixed(3)} < ${autoSendThreshold.toFixed(3)}`
      );
    }

    const missingFields = listPlaceholders(
      top.document.subject,
      top.document.responseTemplate
    ).filter((name) => !Object.hasOwn(fields, name));
    if (missingFields.length > 0) {
      reasons.push(`missing template field(s): ${missingFields.join(', ')}`);
    }

    const autoSend = confident && missingFields.length === 0;
    if (autoSend) {
      reasons.push(
        `confidence ${top.score.toFixed(3)} meets auto-send threshold ${autoSendThreshold.toFixed(3)}`
      );
    }

    return {
      ...base,
      status: autoSend ? 'auto_sent' : 'needs_review',
      entry: top.document,
      confidence: top.score,
      missingFields,
    };
  }

  // ── Private ──

  private isAmbiguous(top: number, second: number): boolean {
    const { ambiguityMargin, relevanceFloor } = this.settings;
    return (
      top - second < ambiguityMargin &&
      top > relevanceFloor &&
      second > relevanceFloor
    );
  }

  /**
   * Merge always-available fields, inferred facts (first fact per key) and
   * caller metadata, in increasing order of precedence.
   */
  private resolveFields(input: DecisionInput, reasons: string[]): Record<string, string> {
    const inferred: Record<string, string> = {};
    for (const fact of input.facts) {
      reasons.push(fact.reason);
      if (!Object.hasOwn(inferred, fact.key)) inferred[fact.key] = fact.value;
    }

    const provided: Record<string, string> = {};
    for (const [key, value] of Object.entries(input.metadata)) {
      const trimmed = value.trim();
      if (trimmed === '') continue;
      provided[key] = trimmed;
      const guess = inferred[key];
      if (guess !== undefined && guess !== trimmed) {
        reasons.push(
          `Caller-provided ${key} '${trimmed}' takes precedence over inferred '${guess}'.`
        );
      }
    }

    return { ...this.settings.defaultFields, ...inferred, ...provided };
  }
}
