/**
 * Answers one student message end to end: infers metadata, ranks the
 * knowledge base, decides between auto-send and review, gathers supporting
 * references and composes the reply or review draft.
 */

import { ComposerError } from '../errors.js';
import type { ComposedEmail, IEmailComposer } from '../composers/IEmailComposer.js';
import { fillPlaceholders } from '../composers/placeholders.js';
import { TemplateEmailComposer } from '../composers/TemplateEmailComposer.js';
import { DEFAULT_SETTINGS } from '../config.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { KnowledgeRetriever } from '../retrieval/KnowledgeRetriever.js';
import type { ReferenceRetriever } from '../retrieval/ReferenceRetriever.js';
import type {
  AdvisorReference,
  AdvisorRequest,
  AdvisorResponse,
  AdvisorStatus,
  RankedMatch,
} from '../types/api.js';
import type { DecisionEngine } from './DecisionEngine.js';
import type { MetadataExtractor } from './MetadataExtractor.js';

export const HOLDING_SUBJECT = 'Re: your advising question';
export const HOLDING_TEMPLATE =
  'Hi {student_name},\n\n' +
  'Thanks for reaching out. An advisor will review your message and reply shortly.\n\n' +
  '{advisor_name}';

export class AdvisorService {
  private readonly fallbackComposer = new TemplateEmailComposer();

  constructor(
    private readonly knowledgeRetriever: KnowledgeRetriever,
    private readonly decisionEngine: DecisionEngine,
    private readonly metadataExtractor: MetadataExtractor,
    private readonly composer: IEmailComposer,
    private readonly logProvider: ILogProvider,
    private readonly referenceRetriever?: ReferenceRetriever,
    private readonly maxReferences: number = DEFAULT_SETTINGS.maxReferences
  ) {}

  /** Every knowledge-base entry with its score, best first. */
  rankEntries(text: string): RankedMatch[] {
    return this.knowledgeRetriever.rank(text).map((match) => ({
      id: match.documentId,
      subject: match.document.subject,
      score: match.score,
    }));
  }

  async advise(request: AdvisorRequest): Promise<AdvisorResponse> {
    const { text } = request;
    const facts = this.metadataExtractor.extract(text);
    const matches = this.knowledgeRetriever.rank(text);
    const decision = this.decisionEngine.decide({
      matches,
      metadata: request.metadata ?? {},
      facts,
    });

    const references =
      this.referenceRetriever?.retrieve(text, this.maxReferences, decision.entry) ?? [];
    const reasons = [...decision.reasons];
    let status: AdvisorStatus = decision.status;
    let email: ComposedEmail;

    if (decision.entry) {
      const context = { question: text, entry: decision.entry, fields: decision.fields, references };
      try {
        email = await this.composer.compose(context);
      } catch (err) {
        if (!(err instanceof ComposerError)) throw err;
        this.logProvider.warn('composer failed, drafting from template', {
          entryId: decision.entry.id,
          code: err.code,
          error: err.message,
        });
        reasons.push(`composer failed (${err.message}); drafted from template instead`);
        status = 'needs_review';
        email = await this.fallbackComposer.compose(context);
      }

      if (status === 'needs_review') {
        reasons.push(`Draft prepared from '${decision.entry.id}' for advisor review.`);
      }
      email = { ...email, body: appendReferences(email.body, references) };
    } else {
      email = {
        subject: HOLDING_SUBJECT,
        body: fillPlaceholders(HOLDING_TEMPLATE, decision.fields),
      };
    }

    this.logProvider.info('advisor decision', {
      status,
      matchedEntryId: decision.entry?.id ?? null,
      confidence: decision.confidence,
      references: references.length,
    });

    return {
      status,
      subject: email.subject,
      body: email.body,
      matchedEntryId: decision.entry?.id ?? null,
      confidence: decision.confidence,
      reasons,
      topMatches: decision.topMatches,
      references,
      followUpQuestions: [...(decision.entry?.followUpQuestions ?? [])],
      fields: decision.fields,
    };
  }
}

function appendReferences(body: string, references: readonly AdvisorReference[]): string {
  if (references.length === 0) return body;

  const lines = references.map(
    (ref, i) => `[${i + 1}] ${ref.title}${ref.url ? ` (${ref.url})` : ''}`
  );
  return `${body}\n\nReferences:\n${lines.join('\n')}`;
}
