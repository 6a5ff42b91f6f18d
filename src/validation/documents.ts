/**
 * Document validation for the two indexed collections.
 * A malformed entry fails the whole load instead of being skipped, so a bad
 * record can never quietly shrink what the retrievers can find.
 */

import { InvalidDocumentError, ValidationError } from '../errors.js';
import type { KnowledgeArticle, ReferenceDocument } from '../types/models.js';
import type { KnowledgeArticleRecord, ReferenceDocumentRecord } from '../types/records.js';
import { isRecord, validateFields, type FieldSchema, type RecordSchema } from './schema.js';

export const KNOWLEDGE_BASE = 'knowledge base';
export const REFERENCE_CORPUS = 'reference corpus';

const ARTICLE_RECORD_SCHEMA: Record<keyof KnowledgeArticleRecord, FieldSchema> = {
  id: { type: 'string', required: true, nonEmpty: true },
  subject: { type: 'string', required: true, nonEmpty: true },
  categories: { type: 'array', items: 'string' },
  utterances: { type: 'array', required: true, nonEmpty: true, items: 'string' },
  response_template: { type: 'string', required: true, nonEmpty: true },
  follow_up_questions: { type: 'array', items: 'string' },
};

const ARTICLE_MODEL_SCHEMA: RecordSchema = {
  id: ARTICLE_RECORD_SCHEMA.id,
  subject: ARTICLE_RECORD_SCHEMA.subject,
  utterances: ARTICLE_RECORD_SCHEMA.utterances,
  responseTemplate: ARTICLE_RECORD_SCHEMA.response_template,
};

const REFERENCE_SCHEMA: Record<keyof ReferenceDocumentRecord, FieldSchema> = {
  id: { type: 'string', required: true, nonEmpty: true },
  title: { type: 'string', required: true, nonEmpty: true },
  content: { type: 'string', required: true },
  url: { type: 'string' },
  tags: { type: 'array', items: 'string' },
};

// ── Raw payloads (from JSON files) ──

export function parseKnowledgeArticles(payload: unknown): KnowledgeArticle[] {
  const articles = parseRecords(payload, KNOWLEDGE_BASE, ARTICLE_RECORD_SCHEMA).map(
    (record): KnowledgeArticle => ({
      id: String(record.id),
      subject: String(record.subject),
      categories: stringList(record.categories),
      utterances: stringList(record.utterances),
      responseTemplate: String(record.response_template),
      followUpQuestions: stringList(record.follow_up_questions),
    })
  );
  assertKnowledgeArticles(articles);
  return articles;
}

export function parseReferenceDocuments(payload: unknown): ReferenceDocument[] {
  const documents = parseRecords(payload, REFERENCE_CORPUS, REFERENCE_SCHEMA).map(
    (record): ReferenceDocument => ({
      id: String(record.id),
      title: String(record.title),
      content: String(record.content),
      ...(typeof record.url === 'string' && { url: record.url }),
      tags: stringList(record.tags),
    })
  );
  assertReferenceDocuments(documents);
  return documents;
}

// ── Typed collections (from callers) ──

export function assertKnowledgeArticles(
  articles: readonly KnowledgeArticle[]
): void {
  articles.forEach((article, index) => {
    const errors = validateFields({ ...article }, ARTICLE_MODEL_SCHEMA);
    if (errors.length === 0 && article.utterances.every((u) => u.trim() === '')) {
      errors.push('utterances must contain text');
    }
    if (errors.length > 0) {
      throw new InvalidDocumentError(KNOWLEDGE_BASE, index, errors, article.id || undefined);
    }
  });
  assertUniqueIds(articles, KNOWLEDGE_BASE);
}

export function assertReferenceDocuments(
  documents: readonly ReferenceDocument[]
): void {
  documents.forEach((document, index) => {
    const errors = validateFields({ ...document }, REFERENCE_SCHEMA);
    if (errors.length > 0) {
      throw new InvalidDocumentError(REFERENCE_CORPUS, index, errors, document.id || undefined);
    }
  });
  assertUniqueIds(documents, REFERENCE_CORPUS);
}

// ── Private ──

function parseRecords(
  payload: unknown,
  collection: string,
  schema: RecordSchema
): Record<string, unknown>[] {
  if (!Array.isArray(payload)) {
    throw new ValidationError(`${collection} must be a JSON array`);
  }

  return payload.map((entry: unknown, index) => {
    if (!isRecord(entry)) {
      throw new InvalidDocumentError(collection, index, ['entry must be an object']);
    }
    const errors = validateFields(entry, schema);
    if (errors.length > 0) {
      const id = typeof entry.id === 'string' && entry.id ? entry.id : undefined;
      throw new InvalidDocumentError(collection, index, errors, id);
    }
    return entry;
  });
}

function assertUniqueIds(
  entries: ReadonlyArray<{ id: string }>,
  collection: string
): void {
  const seen = new Set<string>();
  entries.forEach((entry, index) => {
    if (seen.has(entry.id)) {
      throw new InvalidDocumentError(collection, index, ['duplicate id'], entry.id);
    }
    seen.add(entry.id);
  });
}

function stringList(value: unknown): string[] {
  return Array.isArray(value)
    ? value.filter((v): v is string => typeof v === 'string')
    : [];
}
