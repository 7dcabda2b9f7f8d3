export { createDisambiguator, type DisambiguatorConfig } from './factory';
export type {
  DisambiguationFailure,
  DisambiguationRequest,
  DisambiguationResult,
  DisambiguationSuccess,
  TaxonomyDisambiguator,
} from './provider.interface';
