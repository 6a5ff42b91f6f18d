/**
 * TF-IDF vector space over a fixed document collection.
 *
 * The vocabulary, IDF table and document vectors are built once in the
 * constructor and never change, so one instance can serve any number of
 * queries. Vocabulary indices follow first-seen token order, which keeps
 * every vector and score reproducible run to run.
 *
 *   TF(t, d)  = count(t in d) / |tokens(d)|
 *   IDF(t)    = ln((1 + N) / (1 + df(t))) + 1
 *   W(t, d)   = TF(t, d) × IDF(t)
 */

import type { TextNormalizer } from '../text/TextNormalizer.js';
import type { IndexedDocument, SparseVector } from '../types/models.js';

export class VectorSpaceModel {
  readonly vocabulary: ReadonlyMap<string, number>;
  readonly idf: readonly number[];
  private readonly documentVectors: readonly SparseVector[];

  constructor(
    readonly documents: readonly IndexedDocument[],
    private readonly normalizer: TextNormalizer
  ) {
    const vocabulary = new Map<string, number>();
    const tokenized = documents.map((doc) => {
      const tokens = normalizer.normalize(doc.text);
      for (const token of tokens) {
        if (!vocabulary.has(token)) vocabulary.set(token, vocabulary.size);
      }
      return tokens;
    });

    const documentFrequency = new Array<number>(vocabulary.size).fill(0);
    for (const tokens of tokenized) {
      for (const token of new Set(tokens)) {
        const index = vocabulary.get(token);
        if (index !== undefined) documentFrequency[index]++;
      }
    }

    const n = documents.length;
    this.vocabulary = vocabulary;
    this.idf = documentFrequency.map((df) => Math.log((1 + n) / (1 + df)) + 1);
    this.documentVectors = tokenized.map((tokens) => this.weigh(tokens));
  }

  get size(): number {
    return this.documents.length;
  }

  /** Query vector; tokens outside the vocabulary are dropped. */
  vectorize(text: string): SparseVector {
    return this.weigh(this.normalizer.normalize(text));
  }

  documentVector(index: number): SparseVector {
    return this.documentVectors[index] ?? new Map<number, number>();
  }

  /** Cosine similarity of `text` against every document, in collection order. */
  scores(text: string): number[] {
    const query = this.vectorize(text);
    return this.documentVectors.map((vector) => cosineSimilarity(query, vector));
  }

  /** Pairwise similarity between two indexed documents. */
  documentSimilarity(a: number, b: number): number {
    return cosineSimilarity(this.documentVector(a), this.documentVector(b));
  }

  // ── Private ──

  private weigh(tokens: readonly string[]): SparseVector {
    const vector = new Map<number, number>();
    if (tokens.length === 0) return vector;

    const counts = new Map<number, number>();
    for (const token of tokens) {
      const index = this.vocabulary.get(token);
      if (index === undefined) continue;
      counts.set(index, (counts.get(index) ?? 0) + 1);
    }

    for (const [index, count] of counts) {
      vector.set(index, (count / tokens.length) * this.idf[index]);
    }
    return vector;
  }
}

/**
 * Cosine of the angle between two non-negative sparse vectors, in [0, 1].
 * Zero when either vector has no weight.
 */
export function cosineSimilarity(a: SparseVector, b: SparseVector): number {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];

  // Summed in index order so that (a, b) and (b, a) agree bit for bit.
  const shared = [...small.keys()].filter((index) => large.has(index)).sort((x, y) => x - y);
  let dot = 0;
  for (const index of shared) {
    dot += (a.get(index) ?? 0) * (b.get(index) ?? 0);
  }
  if (dot === 0) return 0;

  const denominator = norm(a) * norm(b);
  if (denominator === 0) return 0;
  return Math.min(1, Math.max(0, dot / denominator));
}

function norm(vector: SparseVector): number {
  let sum = 0;
  for (const weight of vector.values()) sum += weight * weight;
  return Math.sqrt(sum);
}
