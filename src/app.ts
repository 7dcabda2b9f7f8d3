import type { Env } from './config/env';
import { env } from './config/env';
import { createSessionRegistry, type SessionRegistry } from './services/batch';
import { createDisambiguator, type TaxonomyDisambiguator } from './services/disambiguation';
import { createResolutionEngine, type ResolutionEngine } from './services/matching';
import { loadTaxonomy, type TaxonomyIndex } from './services/taxonomy';
import { logger } from './utils/logger';

export type AppConfig = Pick<
  Env,
  'TAXONOMY_PATH' | 'LLM_PROVIDER' | 'GEMINI_API_KEY' | 'GEMINI_MODEL' | 'LLM_TIMEOUT_MS' | 'LLM_CONCURRENCY'
>;

export interface AppOverrides {
  disambiguator?: TaxonomyDisambiguator;
}

export interface App {
  index: TaxonomyIndex;
  disambiguator: TaxonomyDisambiguator;
  engine: ResolutionEngine;
  sessions: SessionRegistry;
}

/**
 * Load the taxonomy once and wire the shared services. Rejects with
 * TaxonomyLoadError when the taxonomy cannot be loaded.
 */
export async function createApp(config: AppConfig = env, overrides: AppOverrides = {}): Promise<App> {
  const index = await loadTaxonomy(config.TAXONOMY_PATH);

  const disambiguator =
    overrides.disambiguator ??
    createDisambiguator({
      provider: config.LLM_PROVIDER,
      model: config.GEMINI_MODEL,
      apiKey: config.GEMINI_API_KEY,
    });

  if (!disambiguator.isAvailable()) {
    logger.warn(
      { provider: disambiguator.name },
      'LLM API key not configured; only exact and heuristic matching will run',
    );
  }

  const engine = createResolutionEngine({
    index,
    disambiguator,
    concurrency: config.LLM_CONCURRENCY,
    timeoutMs: config.LLM_TIMEOUT_MS,
  });

  return { index, disambiguator, engine, sessions: createSessionRegistry(engine) };
}
