/**
 * Supporting-reference retrieval over the reference corpus.
 *
 * Candidates are scored by cosine similarity, nudged up when one of their
 * tags appears in the question, then picked greedily by maximal marginal
 * relevance: each pick maximises `score − λ × (closest similarity to an
 * already-picked reference)`, which keeps near-duplicates out of the list.
 * When the knowledge-base entry behind the reply is known, its subject and
 * categories are searched alongside the question.
 */

import type { ILogProvider } from '../providers/ILogProvider.js';
import type { TextNormalizer } from '../text/TextNormalizer.js';
import type { AdvisorReference } from '../types/api.js';
import type { KnowledgeArticle, ReferenceDocument } from '../types/models.js';
import { assertReferenceDocuments } from '../validation/documents.js';
import { VectorSpaceModel } from './VectorSpaceModel.js';

const SNIPPET_LENGTH = 200;
const SENTENCE_BREAK = /(?<=[.!?])\s+/;

export interface ReferenceRetrieverOptions {
  /** λ: how hard near-duplicates of already-picked references are penalised. */
  diversityWeight: number;
  /** Added to a candidate's score when a tag matches the question. */
  tagBoost: number;
}

interface Candidate {
  index: number;
  score: number;
}

export class ReferenceRetriever {
  private readonly model: VectorSpaceModel;
  private readonly documents: readonly ReferenceDocument[];
  private readonly tagTokens: readonly ReadonlySet<string>[];

  constructor(
    documents: readonly ReferenceDocument[],
    private readonly normalizer: TextNormalizer,
    private readonly options: ReferenceRetrieverOptions,
    logProvider?: ILogProvider
  ) {
    assertReferenceDocuments(documents);
    this.documents = Object.freeze([...documents]);
    this.model = new VectorSpaceModel(
      this.documents.map((doc) => ({ id: doc.id, text: `${doc.title}\n${doc.content}` })),
      normalizer
    );
    this.tagTokens = this.documents.map(
      (doc) => new Set(doc.tags.flatMap((tag) => normalizer.normalize(tag)))
    );

    logProvider?.debug('reference corpus indexed', {
      documents: this.documents.length,
      terms: this.model.vocabulary.size,
    });
  }

  get size(): number {
    return this.documents.length;
  }

  retrieve(
    question: string,
    maxReferences: number,
    entry?: KnowledgeArticle | null
  ): AdvisorReference[] {
    if (maxReferences <= 0 || this.documents.length === 0) return [];

    const query = entry ? [question, entry.subject, ...entry.categories].join('\n') : question;
    const queryTokens = this.normalizer.tokenSet(query);
    const candidates = this.scoreCandidates(query, queryTokens);

    return this.selectDiverse(candidates, maxReferences).map(({ index, score }) => {
      const doc = this.documents[index];
      return {
        id: doc.id,
        title: doc.title,
        ...(doc.url !== undefined && { url: doc.url }),
        snippet: this.buildSnippet(doc.content, queryTokens),
        score,
      };
    });
  }

  // ── Private ──

  private scoreCandidates(query: string, queryTokens: ReadonlySet<string>): Candidate[] {
    return this.model
      .scores(query)
      .map((base, index) => {
        const tagged = [...this.tagTokens[index]].some((t) => queryTokens.has(t));
        const score = tagged ? Math.min(1, base + this.options.tagBoost) : base;
        return { index, score };
      })
      .filter((candidate) => candidate.score > 0)
      .sort((a, b) => b.score - a.score);
  }

  private selectDiverse(candidates: Candidate[], limit: number): Candidate[] {
    const remaining = [...candidates];
    const selected: Candidate[] = [];

    while (remaining.length > 0 && selected.length < limit) {
      let bestPosition = 0;
      let bestValue = Number.NEGATIVE_INFINITY;

      remaining.forEach((candidate, position) => {
        const redundancy = selected.reduce(
          (max, picked) =>
            Math.max(max, this.model.documentSimilarity(candidate.index, picked.index)),
          0
        );
        const value = candidate.score - this.options.diversityWeight * redundancy;
        if (value > bestValue) {
          bestValue = value;
          bestPosition = position;
        }
      });

      selected.push(...remaining.splice(bestPosition, 1));
    }

    return selected;
  }

  private buildSnippet(content: string, queryTokens: ReadonlySet<string>): string {
    const sentences = content
      .split(SENTENCE_BREAK)
      .map((s) => s.trim())
      .filter((s) => s.length > 0);

    const relevant = sentences.find((sentence) =>
      this.normalizer.normalize(sentence).some((token) => queryTokens.has(token))
    );
    if (relevant) return relevant.slice(0, SNIPPET_LENGTH).trim();

    const trimmed = content.trim();
    if (trimmed.length <= SNIPPET_LENGTH) return trimmed;
    const cut = trimmed.slice(0, SNIPPET_LENGTH);
    const boundary = cut.lastIndexOf(' ');
    return `${boundary > 0 ? cut.slice(0, boundary) : cut}...`;
  }
}
