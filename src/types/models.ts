/**
 * Domain models — the knowledge base and reference corpus as the advisor
 * understands them. Decoupled from the JSON record shapes on disk.
 */

// ── Knowledge Base ──

export interface KnowledgeArticle {
  id: string;
  subject: string;
  categories: readonly string[];
  /** Sample phrasings of the question this article answers. */
  utterances: readonly string[];
  /** Reply body with `{placeholder}` markers. */
  responseTemplate: string;
  followUpQuestions: readonly string[];
}

// ── Reference Corpus ──

export interface ReferenceDocument {
  id: string;
  title: string;
  content: string;
  url?: string;
  tags: readonly string[];
}

// ── Retrieval ──

/** A document as the vector space model sees it. */
export interface IndexedDocument {
  id: string;
  text: string;
}

/** Sparse TF-IDF weights keyed by vocabulary index. */
export type SparseVector = ReadonlyMap<number, number>;

export interface MatchResult<T> {
  documentId: string;
  /** Cosine similarity in [0, 1]. */
  score: number;
  document: T;
}

// ── Metadata ──

/** A metadata value inferred from the student's message. */
export interface MetadataFact {
  key: string;
  value: string;
  reason: string;
}

export type Metadata = Readonly<Record<string, string>>;
