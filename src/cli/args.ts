import { parseArgs } from 'node:util';
import { isComposerKind, type ComposerKind } from '../container.production.js';
import { ValidationError } from '../errors.js';

export interface CliOptions {
  help: boolean;
  question: string;
  metadata: Record<string, string>;
  json: boolean;
  knowledgeBasePath?: string;
  referenceCorpusPath?: string;
  disableReferences: boolean;
  composer?: ComposerKind;
}

export const USAGE = `Usage: email-advisor "<question>" [options]

Options:
  -m, --meta key=value   Metadata for template fields (repeatable)
      --json             Print the full response as JSON
      --kb <path>        Knowledge base JSON file
      --corpus <path>    Reference corpus JSON file
      --no-references    Skip reference retrieval
      --composer <kind>  template (default) or llm
  -h, --help             Show this help`;

function readArgv(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      meta: { type: 'string', short: 'm', multiple: true },
      json: { type: 'boolean', default: false },
      kb: { type: 'string' },
      corpus: { type: 'string' },
      'no-references': { type: 'boolean', default: false },
      composer: { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });
}

export function parseCliArgs(argv: string[]): CliOptions {
  let parsed: ReturnType<typeof readArgv>;
  try {
    parsed = readArgv(argv);
  } catch (err) {
    throw new ValidationError(err instanceof Error ? err.message : String(err));
  }
  const { values, positionals } = parsed;

  const question = positionals.join(' ').trim();
  if (!values.help && question === '') {
    throw new ValidationError('A question is required');
  }

  let composer: ComposerKind | undefined;
  if (values.composer !== undefined) {
    if (!isComposerKind(values.composer)) {
      throw new ValidationError(`--composer must be template or llm, got "${values.composer}"`);
    }
    composer = values.composer;
  }

  return {
    help: values.help ?? false,
    question,
    metadata: parseMetadata(values.meta ?? []),
    json: values.json ?? false,
    ...(values.kb !== undefined && { knowledgeBasePath: values.kb }),
    ...(values.corpus !== undefined && { referenceCorpusPath: values.corpus }),
    disableReferences: values['no-references'] ?? false,
    ...(composer !== undefined && { composer }),
  };
}

function parseMetadata(pairs: string[]): Record<string, string> {
  const metadata: Record<string, string> = {};
  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    const key = separator > 0 ? pair.slice(0, separator).trim() : '';
    if (key === '') {
      throw new ValidationError(`--meta expects key=value, got "${pair}"`);
    }
    metadata[key] = pair.slice(separator + 1).trim();
  }
  return metadata;
}
