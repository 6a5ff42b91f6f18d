export { createContainer, type Container } from './container.js';
export {
  buildProductionContainer,
  getProductionContainer,
  type ProductionOptions,
} from './container.production.js';
export {
  DEFAULT_SETTINGS,
  resolveSettings,
  settingsFromEnv,
  type AdvisorSettings,
} from './config.js';
export {
  AppError,
  ComposerError,
  InvalidDocumentError,
  NotFoundError,
  ValidationError,
} from './errors.js';
export type { ComposeContext, ComposedEmail, IEmailComposer } from './composers/IEmailComposer.js';
export { TemplateEmailComposer } from './composers/TemplateEmailComposer.js';
export { LLMEmailComposer } from './composers/LLMEmailComposer.js';
export * from './providers/index.js';
export { loadKnowledgeBase, loadReferenceCorpus } from './loaders/knowledge-base.js';
export { createLexicon, loadLexicon, parseLexicon, type Lexicon } from './text/lexicon.js';
export { TextNormalizer } from './text/TextNormalizer.js';
export { VectorSpaceModel, cosineSimilarity } from './retrieval/VectorSpaceModel.js';
export { KnowledgeRetriever } from './retrieval/KnowledgeRetriever.js';
export { ReferenceRetriever, type ReferenceRetrieverOptions } from './retrieval/ReferenceRetriever.js';
export { DecisionEngine, type Decision, type DecisionInput } from './services/DecisionEngine.js';
export { MetadataExtractor } from './services/MetadataExtractor.js';
export { AdvisorService } from './services/AdvisorService.js';
export type * from './types/api.js';
export type * from './types/models.js';
