/**
 * Loads the knowledge base and reference corpus from their JSON files.
 */

import type { KnowledgeArticle, ReferenceDocument } from '../types/models.js';
import {
  parseKnowledgeArticles,
  parseReferenceDocuments,
} from '../validation/documents.js';
import { readJsonFile } from './json.js';

export const DEFAULT_KNOWLEDGE_BASE_PATH = new URL('../../data/knowledge_base.json', import.meta.url);
export const DEFAULT_REFERENCE_CORPUS_PATH = new URL('../../data/reference_corpus.json', import.meta.url);

export async function loadKnowledgeBase(
  path: string | URL = DEFAULT_KNOWLEDGE_BASE_PATH
): Promise<KnowledgeArticle[]> {
  return parseKnowledgeArticles(await readJsonFile(path));
}

export async function loadReferenceCorpus(
  path: string | URL = DEFAULT_REFERENCE_CORPUS_PATH
): Promise<ReferenceDocument[]> {
  return parseReferenceDocuments(await readJsonFile(path));
}
