export {
  createGeminiDisambiguator,
  parseSuggestion,
  stripCodeFence,
  toProviderError,
  type GeminiDisambiguatorOptions,
} from './client';
export {
  createContentGenerator,
  listGenerationModels,
  type ContentGenerator,
  type ContentGeneratorFactory,
  type GenerateRequest,
  type GenerateResponse,
} from './core';
