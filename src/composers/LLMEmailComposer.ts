/**
 * Composer that asks a language model to phrase the reply.
 *
 * The model sees the student's question, the matched template with its
 * fields already filled, and the numbered references it may cite as [n].
 * Its reply must be a JSON object with non-empty string `subject` and `body`;
 * anything else is a ComposerError.
 */

import { AppError, ComposerError } from '../errors.js';
import type { ICompletionProvider } from '../providers/ICompletionProvider.js';
import { isRecord } from '../validation/schema.js';
import type { ComposeContext, ComposedEmail, IEmailComposer } from './IEmailComposer.js';
import { fillPlaceholders } from './placeholders.js';

export const COMPOSER_INSTRUCTIONS =
  'You write replies to students on behalf of an academic advising office. ' +
  'Keep every fact from the approved template, stay concise and friendly, ' +
  'and cite references as [n] when you use them. ' +
  'Respond with a JSON object of the form {"subject": string, "body": string}.';

export class LLMEmailComposer implements IEmailComposer {
  constructor(private readonly completionProvider: ICompletionProvider) {}

  async compose(context: ComposeContext): Promise<ComposedEmail> {
    let reply: string;
    try {
      reply = await this.completionProvider.complete({
        system: COMPOSER_INSTRUCTIONS,
        prompt: buildPrompt(context),
      });
    } catch (err) {
      if (err instanceof AppError) throw err;
      throw new ComposerError('Completion request failed', {
        cause: err instanceof Error ? err.message : String(err),
      });
    }

    return parseReply(reply);
  }
}

export function buildPrompt({ question, entry, fields, references }: ComposeContext): string {
  const lines = [
    'Student message:',
    question.trim(),
    '',
    `Approved subject: ${fillPlaceholders(entry.subject, fields)}`,
    'Approved template:',
    fillPlaceholders(entry.responseTemplate, fields).trim(),
  ];

  if (references.length > 0) {
    lines.push('', 'References:');
    references.forEach((ref, i) => {
      lines.push(`[${i + 1}] ${ref.title}: ${ref.snippet}`);
    });
  }

  return lines.join('\n');
}

function parseReply(reply: string): ComposedEmail {
  let parsed: unknown;
  try {
    parsed = JSON.parse(reply);
  } catch {
    throw new ComposerError('Composer reply is not valid JSON');
  }

  if (!isRecord(parsed)) {
    throw new ComposerError('Composer reply must be a JSON object');
  }

  const { subject, body } = parsed;
  const missing = [
    ...(typeof subject === 'string' && subject.trim() ? [] : ['subject']),
    ...(typeof body === 'string' && body.trim() ? [] : ['body']),
  ];
  if (missing.length > 0 || typeof subject !== 'string' || typeof body !== 'string') {
    throw new ComposerError('Composer reply is missing required fields', { missing });
  }

  return { subject: subject.trim(), body: body.trim() };
}
