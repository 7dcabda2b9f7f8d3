/**
 * Gemini-specific JSON schema for hierarchy suggestions.
 * Mirrors the response contract in prompts/taxonomy/suggestHierarchies.
 */
import { GeminiType } from '../core';

const hierarchySchema = {
  type: GeminiType.OBJECT,
  properties: {
    class: { type: GeminiType.STRING },
    order: { type: GeminiType.STRING },
    family: { type: GeminiType.STRING },
    genus: { type: GeminiType.STRING },
    species: { type: GeminiType.STRING },
    confidence: { type: GeminiType.NUMBER },
  },
};

export const suggestHierarchiesResponseSchema = {
  type: GeminiType.ARRAY,
  items: {
    type: GeminiType.OBJECT,
    properties: {
      input_text: { type: GeminiType.STRING },
      candidates: {
        type: GeminiType.ARRAY,
        items: hierarchySchema,
      },
      suggested_common: { type: GeminiType.STRING },
    },
    required: ['input_text', 'candidates'],
  },
};
