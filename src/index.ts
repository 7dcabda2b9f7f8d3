export { createApp, type App, type AppConfig, type AppOverrides } from './app';
export { env, parseEnv, type Env } from './config/env';
export { FALLBACK_ORDER, TAXONOMIC_LEVELS, type TaxonomicLevel } from './config/constants';
export * from './services/batch';
export * from './services/disambiguation';
export * from './services/matching';
export * from './services/taxonomy';
export { createGeminiDisambiguator, listGenerationModels } from './services/gemini';
export type {
  CandidateHierarchy,
  MatchCandidate,
  MatchSource,
  OriginalNames,
  ParsedQuery,
  QueryShape,
  TaxonEntry,
  TaxonHit,
} from './types/taxonomy';
export {
  AppError,
  BadRequestError,
  NotFoundError,
  ProviderError,
  TaxonomyLoadError,
  type ProviderErrorKind,
} from './utils/errors';
