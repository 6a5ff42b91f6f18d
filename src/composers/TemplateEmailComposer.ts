/**
 * Deterministic composer: fills the entry's subject and template from the
 * resolved fields. Markers with no value stay visible for the reviewer.
 */

import type { ComposeContext, ComposedEmail, IEmailComposer } from './IEmailComposer.js';
import { fillPlaceholders } from './placeholders.js';

export class TemplateEmailComposer implements IEmailComposer {
  async compose({ entry, fields }: ComposeContext): Promise<ComposedEmail> {
    return {
      subject: fillPlaceholders(entry.subject, fields),
      body: fillPlaceholders(entry.responseTemplate, fields).trim(),
    };
  }
}
