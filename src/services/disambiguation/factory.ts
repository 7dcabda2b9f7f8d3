import { createGeminiDisambiguator } from '../gemini';
import type { TaxonomyDisambiguator } from './provider.interface';

export interface DisambiguatorConfig {
  provider: 'gemini';
  model: string;
  apiKey?: string;
}

export function createDisambiguator(config: DisambiguatorConfig): TaxonomyDisambiguator {
  switch (config.provider) {
    default:
      return createGeminiDisambiguator({ apiKey: config.apiKey, model: config.model });
  }
}
