/**
 * Shared Gemini API client module.
 *
 * Everything that touches @google/genai directly lives here; the rest of
 * the code talks to the narrow ContentGenerator interface so tests can
 * substitute an in-process stand-in.
 */

import { GoogleGenAI } from '@google/genai';

export interface GenerateRequest {
  model: string;
  contents: string;
  config: {
    responseMimeType: string;
    responseJsonSchema: unknown;
    temperature?: number;
    abortSignal?: AbortSignal;
  };
}

export interface GenerateResponse {
  text?: string;
  candidates?: unknown[];
  promptFeedback?: { blockReason?: string };
}

export interface ContentGenerator {
  generateContent(request: GenerateRequest): Promise<GenerateResponse>;
}

export type ContentGeneratorFactory = (apiKey: string) => ContentGenerator;

/**
 * Build a generator bound to one API key.
 */
export function createContentGenerator(apiKey: string): ContentGenerator {
  const client = new GoogleGenAI({ apiKey });
  return {
    generateContent: (request) => client.models.generateContent(request),
  };
}

/**
 * List models usable for content generation with the given key.
 */
export async function listGenerationModels(apiKey: string): Promise<string[]> {
  const client = new GoogleGenAI({ apiKey });
  const pager = await client.models.list();
  const names: string[] = [];

  for await (const model of pager) {
    if (model.name && model.supportedActions?.includes('generateContent')) {
      names.push(model.name);
    }
  }

  return names;
}

/**
 * Type constants for Gemini schema definitions.
 * Mirrors @google/genai Type enum in JSON-schema casing.
 */
export const GeminiType = {
  STRING: 'string',
  NUMBER: 'number',
  INTEGER: 'integer',
  BOOLEAN: 'boolean',
  ARRAY: 'array',
  OBJECT: 'object',
} as const;
