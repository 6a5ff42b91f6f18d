/**
 * Production container — loads the data files and picks the composer and
 * log level from the environment.
 */

import { createContainer, type Container } from './container.js';
import { settingsFromEnv } from './config.js';
import type { IEmailComposer } from './composers/IEmailComposer.js';
import { LLMEmailComposer } from './composers/LLMEmailComposer.js';
import { TemplateEmailComposer } from './composers/TemplateEmailComposer.js';
import { ValidationError } from './errors.js';
import { loadKnowledgeBase, loadReferenceCorpus } from './loaders/knowledge-base.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import { isLogLevel, LOG_LEVELS } from './providers/ILogProvider.js';
import { OpenAICompletionProvider } from './providers/OpenAICompletionProvider.js';
import { loadLexicon } from './text/lexicon.js';

export type ComposerKind = 'template' | 'llm';

export function isComposerKind(value: string): value is ComposerKind {
  return value === 'template' || value === 'llm';
}

export interface ProductionOptions {
  knowledgeBasePath?: string;
  referenceCorpusPath?: string;
  lexiconPath?: string;
  composer?: ComposerKind;
  /** Skip loading the reference corpus entirely. */
  disableReferences?: boolean;
}

type Env = Readonly<Record<string, string | undefined>>;

const ENV_PREFIXES = ['ADVISOR_', 'OPENAI_'];

let cached: { key: string; container: Container } | null = null;

/** Reuses the last container while the options and relevant env are unchanged. */
export async function getProductionContainer(
  options: ProductionOptions = {},
  env: Env = process.env
): Promise<Container> {
  const key = cacheKey(options, env);
  if (cached?.key === key) return cached.container;

  const container = await buildProductionContainer(options, env);
  cached = { key, container };
  return container;
}

/** Uncached variant; every call reloads the data files. */
export async function buildProductionContainer(
  options: ProductionOptions = {},
  env: Env = process.env
): Promise<Container> {
  const logLevel = env.ADVISOR_LOG_LEVEL ?? 'warn';
  if (!isLogLevel(logLevel)) {
    throw new ValidationError(`ADVISOR_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${logLevel}"`);
  }
  const logProvider = new ConsoleLogProvider({ outputToConsole: true, minLevel: logLevel });

  const corpusPath = options.referenceCorpusPath ?? env.ADVISOR_REFERENCE_CORPUS;
  const [knowledgeBase, referenceCorpus, lexicon] = await Promise.all([
    loadKnowledgeBase(options.knowledgeBasePath ?? env.ADVISOR_KNOWLEDGE_BASE),
    options.disableReferences ? Promise.resolve(undefined) : loadReferenceCorpus(corpusPath),
    loadLexicon(options.lexiconPath ?? env.ADVISOR_LEXICON),
  ]);

  return createContainer({
    knowledgeBase,
    referenceCorpus,
    lexicon,
    logProvider,
    composer: selectComposer(options.composer ?? env.ADVISOR_COMPOSER, env),
    settings: settingsFromEnv(env),
  });
}

function cacheKey(options: ProductionOptions, env: Env): string {
  const variables = Object.keys(env)
    .filter((name) => ENV_PREFIXES.some((prefix) => name.startsWith(prefix)))
    .sort()
    .map((name) => [name, env[name]]);
  return `${JSON.stringify(options, Object.keys(options).sort())}|${JSON.stringify(variables)}`;
}

function selectComposer(kind: string | undefined, env: Env): IEmailComposer {
  if (kind === undefined) return new TemplateEmailComposer();
  if (!isComposerKind(kind)) {
    throw new ValidationError(`Unknown composer "${kind}" (expected template or llm)`);
  }
  if (kind === 'template') return new TemplateEmailComposer();

  if (!env.OPENAI_API_KEY) {
    throw new ValidationError('OPENAI_API_KEY is required for the llm composer');
  }
  return new LLMEmailComposer(
    new OpenAICompletionProvider({
      apiKey: env.OPENAI_API_KEY,
      model: env.OPENAI_MODEL,
    })
  );
}
