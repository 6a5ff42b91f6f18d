/**
 * On-disk record types — mirror the JSON data files.
 * Field names use snake_case to match the files as they are authored.
 */

export interface KnowledgeArticleRecord {
  id: string;
  subject: string;
  categories?: string[];
  utterances: string[];
  response_template: string;
  follow_up_questions?: string[];
}

export interface ReferenceDocumentRecord {
  id: string;
  title: string;
  content: string;
  url?: string;
  tags?: string[];
}

export interface LexiconRecord {
  stopWords: string[];
  synonyms: Record<string, string[]>;
}
