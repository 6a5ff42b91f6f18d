/**
 * Dependency wiring.
 * Builds the retrievers once from already-loaded collections and hands out
 * services that share them read-only. Tests pass fixtures and mocks here.
 */

import { resolveSettings, type AdvisorSettings } from './config.js';
import type { IEmailComposer } from './composers/IEmailComposer.js';
import { TemplateEmailComposer } from './composers/TemplateEmailComposer.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import { KnowledgeRetriever } from './retrieval/KnowledgeRetriever.js';
import { ReferenceRetriever } from './retrieval/ReferenceRetriever.js';
import { AdvisorService } from './services/AdvisorService.js';
import { DecisionEngine } from './services/DecisionEngine.js';
import { MetadataExtractor } from './services/MetadataExtractor.js';
import type { Lexicon } from './text/lexicon.js';
import { TextNormalizer } from './text/TextNormalizer.js';
import type { KnowledgeArticle, ReferenceDocument } from './types/models.js';

export interface Container {
  settings: AdvisorSettings;
  normalizer: TextNormalizer;
  knowledgeRetriever: KnowledgeRetriever;
  /** Absent when reference retrieval is disabled. */
  referenceRetriever?: ReferenceRetriever;
  decisionEngine: DecisionEngine;
  metadataExtractor: MetadataExtractor;
  advisorService: AdvisorService;
  logProvider: ILogProvider;
}

export function createContainer(deps: {
  knowledgeBase: readonly KnowledgeArticle[];
  referenceCorpus?: readonly ReferenceDocument[];
  lexicon: Lexicon;
  logProvider: ILogProvider;
  composer?: IEmailComposer;
  settings?: Partial<AdvisorSettings>;
}): Container {
  const settings = resolveSettings(deps.settings);
  const normalizer = new TextNormalizer(deps.lexicon);

  const knowledgeRetriever = new KnowledgeRetriever(
    deps.knowledgeBase,
    normalizer,
    deps.logProvider
  );
  const referenceRetriever = deps.referenceCorpus
    ? new ReferenceRetriever(
        deps.referenceCorpus,
        normalizer,
        { diversityWeight: settings.diversityWeight, tagBoost: settings.tagBoost },
        deps.logProvider
      )
    : undefined;

  const decisionEngine = new DecisionEngine(settings);
  const metadataExtractor = new MetadataExtractor({ stopWords: deps.lexicon.stopWords });
  const advisorService = new AdvisorService(
    knowledgeRetriever,
    decisionEngine,
    metadataExtractor,
    deps.composer ?? new TemplateEmailComposer(),
    deps.logProvider,
    referenceRetriever,
    settings.maxReferences
  );

  return {
    settings,
    normalizer,
    knowledgeRetriever,
    ...(referenceRetriever && { referenceRetriever }),
    decisionEngine,
    metadataExtractor,
    advisorService,
    logProvider: deps.logProvider,
  };
}
