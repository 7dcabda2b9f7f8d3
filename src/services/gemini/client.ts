/**
 * Gemini-backed taxonomy disambiguator.
 * Thin wrapper handling the API call, response parsing, and error mapping.
 *
 * No retries: a failed call degrades only its own row, and the user can
 * retry by reprocessing the unlocked row.
 */

import { z } from 'zod';
import { suggestHierarchiesPrompt } from '../../prompts/taxonomy';
import type { CandidateHierarchy } from '../../types/taxonomy';
import { ProviderError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { normalizeName } from '../../utils/text';
import type {
  DisambiguationRequest,
  DisambiguationResult,
  DisambiguationSuccess,
  TaxonomyDisambiguator,
} from '../disambiguation';
import {
  type ContentGenerator,
  type ContentGeneratorFactory,
  createContentGenerator,
  type GenerateResponse,
} from './core';
import { suggestHierarchiesResponseSchema } from './schemas/taxonomy';

export interface GeminiDisambiguatorOptions {
  /** Configured key; sessions may override per call */
  apiKey?: string;
  model?: string;
  generatorFactory?: ContentGeneratorFactory;
}

// ========== Response Validation ==========

const rankName = z
  .string()
  .nullish()
  .transform((value) => value?.trim() || undefined);

const hierarchySchema = z.object({
  class: rankName,
  order: rankName,
  family: rankName,
  genus: rankName,
  species: rankName,
  confidence: z
    .number()
    .nullish()
    .transform((value) => value ?? undefined),
});

const suggestionSchema = z.object({
  input_text: z.string().nullish(),
  candidates: z.array(hierarchySchema.nullable()).nullish(),
  // Older prompt versions returned bare binomials
  candidate_latin_names: z.array(z.string()).nullish(),
  suggested_common: z.string().nullish(),
});

type Suggestion = z.infer<typeof suggestionSchema>;

const responseSchema = z
  .union([z.array(suggestionSchema), suggestionSchema])
  .transform((value) => (Array.isArray(value) ? value : [value]));

// ========== Disambiguator ==========

export function createGeminiDisambiguator(
  options: GeminiDisambiguatorOptions = {},
): TaxonomyDisambiguator {
  const configuredKey = options.apiKey || undefined;
  const model = options.model ?? suggestHierarchiesPrompt.model;
  const factory = options.generatorFactory ?? createContentGenerator;
  let defaultGenerator: ContentGenerator | null = null;

  function generatorFor(apiKey?: string): ContentGenerator | null {
    // Session overrides are never cached
    if (apiKey) return factory(apiKey);
    if (!configuredKey) return null;
    if (!defaultGenerator) defaultGenerator = factory(configuredKey);
    return defaultGenerator;
  }

  return {
    name: 'gemini',
    model,

    isAvailable(apiKey?: string): boolean {
      return Boolean(apiKey || configuredKey);
    },

    async suggest(request: DisambiguationRequest): Promise<DisambiguationResult> {
      const generator = generatorFor(request.apiKey);
      if (!generator) {
        return {
          ok: false,
          kind: 'unavailable',
          message: 'Gemini API key not configured',
          model,
        };
      }

      const prompt = suggestHierarchiesPrompt.build({
        terms: [request.queryText],
        location: request.location || undefined,
      });

      try {
        const result = await generator.generateContent({
          model,
          contents: prompt,
          config: {
            responseMimeType: 'application/json',
            responseJsonSchema: suggestHierarchiesResponseSchema,
            temperature: 0,
            abortSignal: request.signal,
          },
        });

        const suggestion = parseSuggestion(responseText(result), request.queryText, model);

        logger.debug(
          {
            queryText: request.queryText,
            promptId: suggestHierarchiesPrompt.id,
            promptVersion: suggestHierarchiesPrompt.version,
            candidateCount: suggestion.candidates.length,
          },
          'Hierarchy suggestions parsed',
        );

        return suggestion;
      } catch (error) {
        const providerError = toProviderError(error, model);
        logger.warn(
          { queryText: request.queryText, kind: providerError.kind, model, error: providerError.message },
          'Hierarchy suggestion failed',
        );
        return {
          ok: false,
          kind: providerError.kind,
          message: providerError.message,
          model,
        };
      }
    },
  };
}

// ========== Parsing ==========

function responseText(result: GenerateResponse): string {
  if (!result.candidates?.length) {
    const blockReason = result.promptFeedback?.blockReason;
    if (blockReason) {
      throw new ProviderError('blocked', `Content blocked: ${blockReason}`, '');
    }
  }

  const text = result.text;
  if (!text?.trim()) {
    throw new ProviderError('invalid_response', 'Empty response text', '');
  }
  return text;
}

/**
 * Parse the model's JSON, tolerating a ```json fence around it, and pick
 * the item answering `queryText`.
 */
export function parseSuggestion(text: string, queryText: string, model: string): DisambiguationSuccess {
  let data: unknown;
  try {
    data = JSON.parse(stripCodeFence(text));
  } catch {
    throw new ProviderError('invalid_response', 'Failed to parse hierarchy response as JSON', model);
  }

  const parsed = responseSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ProviderError('invalid_response', `Malformed hierarchy response: ${issues.join('; ')}`, model);
  }

  const items = parsed.data;
  const wanted = normalizeName(queryText);
  const item = items.find((i) => i.input_text && normalizeName(i.input_text) === wanted) ?? items[0];

  if (!item) {
    return { ok: true, candidates: [] };
  }

  return {
    ok: true,
    candidates: candidatesOf(item),
    suggestedCommon: item.suggested_common?.trim() || undefined,
  };
}

function candidatesOf(item: Suggestion): CandidateHierarchy[] {
  const candidates = (item.candidates ?? []).filter(
    (c): c is NonNullable<typeof c> => c !== null,
  );
  if (candidates.length > 0 || !item.candidate_latin_names) {
    return candidates;
  }

  return item.candidate_latin_names.map((name) => {
    const [genus, species] = name.trim().split(/\s+/);
    return { genus, species };
  });
}

export function stripCodeFence(text: string): string {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/);
  return (fenced ? fenced[1] : text).trim();
}

// ========== Error Mapping ==========

function errorStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/**
 * Convert provider errors to classified ProviderErrors. Model-not-found
 * names the model so misconfiguration is obvious.
 */
export function toProviderError(error: unknown, model: string): ProviderError {
  if (error instanceof ProviderError) {
    return new ProviderError(error.kind, error.message, model);
  }

  const message = error instanceof Error ? error.message : String(error);
  const lower = message.toLowerCase();
  const status = errorStatus(error);

  if (error instanceof Error && error.name === 'AbortError') {
    return new ProviderError('timeout', `Request to ${model} was aborted`, model);
  }
  if (status === 404 || lower.includes('not found')) {
    return new ProviderError(
      'model_not_found',
      `Model "${model}" was not found or does not support generateContent. Run "npm run models:list" to see available models.`,
      model,
    );
  }
  if (lower.includes('quota')) {
    return new ProviderError('quota', `API quota exceeded for ${model}`, model);
  }
  if (status === 429 || lower.includes('rate limit')) {
    return new ProviderError('rate_limited', `Rate limit exceeded for ${model}`, model);
  }

  return new ProviderError('provider_error', `${model} request failed: ${message || 'Unknown error'}`, model);
}
