import type { AdvisorReference } from '../types/api.js';
import type { KnowledgeArticle } from '../types/models.js';

export interface ComposeContext {
  question: string;
  entry: KnowledgeArticle;
  /** Resolved template fields. */
  fields: Readonly<Record<string, string>>;
  references: readonly AdvisorReference[];
}

export interface ComposedEmail {
  subject: string;
  body: string;
}

/** Turns a chosen knowledge-base entry into a reply. */
export interface IEmailComposer {
  compose(context: ComposeContext): Promise<ComposedEmail>;
}
