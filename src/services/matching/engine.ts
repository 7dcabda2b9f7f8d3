/**
 * Resolution engine: runs many rows through per-row resolution, then
 * applies uniqueness arbitration once over the whole set.
 *
 * Flow:
 * 1. Per-row resolution in a bounded worker pool (LLM calls are the only
 *    suspending work, so the pool size is the provider concurrency limit)
 * 2. Barrier: wait for every row
 * 3. Uniqueness arbitration across new claims plus locked claims
 */

import {
  DEFAULT_LLM_CONCURRENCY,
  DEFAULT_LLM_TIMEOUT_MS,
} from '../../config/constants';
import { mapWithConcurrency } from '../../utils/concurrency';
import { logger } from '../../utils/logger';
import type { TaxonomyDisambiguator } from '../disambiguation';
import type { TaxonomyIndex } from '../taxonomy';
import {
  type Contention,
  type ProviderIssue,
  type RowOutcome,
  type RowResolution,
  type UniquenessClaim,
  UNRESOLVED_REASONS,
} from './matching.types';
import { resolveQuery } from './resolution';
import { arbitrateUniqueness } from './uniquenessResolver';

export interface ResolutionEngineOptions {
  index: TaxonomyIndex;
  disambiguator: TaxonomyDisambiguator;
  concurrency?: number;
  timeoutMs?: number;
}

export interface RowInput {
  rowId: string;
  rawInput: string;
}

export interface ResolveRowsContext {
  location?: string;
  apiKey?: string;
  /** Higher-level taxa already held by locked rows */
  lockedClaims?: UniquenessClaim[];
}

export interface ResolveRowsResult {
  outcomes: RowOutcome[];
  contested: Contention[];
  /** Distinct provider failures seen during the run */
  providerIssues: ProviderIssue[];
}

export interface ResolutionEngine {
  readonly index: TaxonomyIndex;
  readonly disambiguator: TaxonomyDisambiguator;
  resolveRows(inputs: readonly RowInput[], context?: ResolveRowsContext): Promise<ResolveRowsResult>;
}

export function createResolutionEngine(options: ResolutionEngineOptions): ResolutionEngine {
  const {
    index,
    disambiguator,
    concurrency = DEFAULT_LLM_CONCURRENCY,
    timeoutMs = DEFAULT_LLM_TIMEOUT_MS,
  } = options;

  async function resolveRows(
    inputs: readonly RowInput[],
    context: ResolveRowsContext = {},
  ): Promise<ResolveRowsResult> {
    const { location, apiKey, lockedClaims = [] } = context;

    logger.info(
      { rowCount: inputs.length, lockedClaims: lockedClaims.length, concurrency },
      'Resolution: Starting batch',
    );

    const resolutions = await mapWithConcurrency(inputs, concurrency, (input) =>
      resolveQuery(input.rawInput, { index, disambiguator, timeoutMs, location, apiKey }),
    );

    const claims: UniquenessClaim[] = [...lockedClaims];
    resolutions.forEach((resolution, i) => {
      if (resolution.state.stage === 'resolved') {
        claims.push({ rowId: inputs[i].rowId, candidate: resolution.state.match, locked: false });
      }
    });

    const { ambiguous, contested } = arbitrateUniqueness(claims);
    const outcomes = resolutions.map((resolution, i) =>
      toOutcome(inputs[i], resolution, ambiguous.get(inputs[i].rowId)),
    );
    const providerIssues = collectProviderIssues(resolutions);

    logger.info(
      {
        rowCount: outcomes.length,
        matched: outcomes.filter((o) => o.status === 'matched').length,
        ambiguous: ambiguous.size,
        failed: outcomes.filter((o) => o.status === 'failed').length,
        unresolved: outcomes.filter((o) => o.status === 'unresolved').length,
      },
      'Resolution: Batch complete',
    );

    for (const issue of providerIssues) {
      logger.error(issue, 'Resolution: LLM provider failure');
    }

    return { outcomes, contested, providerIssues };
  }

  return { index, disambiguator, resolveRows };
}

function toOutcome(
  input: RowInput,
  resolution: RowResolution,
  contention: Contention | undefined,
): RowOutcome {
  const { state, trace } = resolution;
  const base = { rowId: input.rowId, rawInput: input.rawInput, names: state.names, trace };

  if (state.stage === 'failed') {
    return {
      ...base,
      status: UNRESOLVED_REASONS.has(state.reason) ? 'unresolved' : 'failed',
      mapping: null,
      reason: state.reason,
    };
  }

  if (contention) {
    return { ...base, status: 'ambiguous', mapping: null, contention };
  }

  return { ...base, status: 'matched', mapping: state.match };
}

function collectProviderIssues(resolutions: readonly RowResolution[]): ProviderIssue[] {
  const seen = new Map<string, ProviderIssue>();
  for (const { state } of resolutions) {
    if (state.stage !== 'failed' || !state.providerIssue) continue;
    const key = `${state.providerIssue.kind}:${state.providerIssue.model}`;
    if (!seen.has(key)) seen.set(key, state.providerIssue);
  }
  return [...seen.values()];
}
