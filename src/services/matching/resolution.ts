/**
 * Per-row resolution as an explicit state machine.
 *
 * Every transition returns a new tagged state and records what it saw in
 * the trace, so the verbose CLI and the uniqueness pass can audit exactly
 * how each row arrived at its result.
 */

import { TimeoutError, withTimeout } from '../../utils/concurrency';
import { logger } from '../../utils/logger';
import type {
  DisambiguationResult,
  TaxonomyDisambiguator,
} from '../disambiguation';
import type { TaxonomyIndex } from '../taxonomy';
import { candidateFromEntry, exactMatch } from './exactMatcher';
import { heuristicMatch } from './heuristicMatcher';
import { resolveHierarchy } from './hierarchicalResolver';
import { defaultNames, parseInput } from './inputParser';
import type {
  ResolutionEvent,
  ResolutionState,
  RowResolution,
  TerminalState,
} from './matching.types';

export interface ResolveContext {
  index: TaxonomyIndex;
  disambiguator: TaxonomyDisambiguator;
  timeoutMs: number;
  location?: string;
  apiKey?: string;
}

export function isTerminal(state: ResolutionState): state is TerminalState {
  return state.stage === 'resolved' || state.stage === 'failed';
}

export function initialState(rawText: string): ResolutionState {
  const query = parseInput(rawText);
  return { stage: 'unresolved', query, names: defaultNames(query) };
}

/**
 * Advance one stage. Terminal states are returned unchanged.
 */
export async function step(
  state: ResolutionState,
  ctx: ResolveContext,
  trace: ResolutionEvent[],
): Promise<ResolutionState> {
  switch (state.stage) {
    case 'unresolved': {
      if (state.query.shape === 'empty') {
        return { ...state, stage: 'failed', reason: 'empty_query' };
      }
      const match = exactMatch(state.query, ctx.index);
      trace.push({ type: 'exact', candidate: match?.candidate ?? null });
      if (match) {
        return { stage: 'resolved', query: state.query, names: match.names, match: match.candidate };
      }
      return { ...state, stage: 'exact_checked' };
    }

    case 'exact_checked': {
      const match = heuristicMatch(state.query, ctx.index);
      trace.push({
        type: 'heuristic',
        candidate: match?.candidate ?? null,
        step: match?.step,
      });
      if (match) {
        return { stage: 'resolved', query: state.query, names: match.names, match: match.candidate };
      }
      return { ...state, stage: 'heuristic_checked' };
    }

    case 'heuristic_checked': {
      if (!ctx.disambiguator.isAvailable(ctx.apiKey)) {
        trace.push({ type: 'llm_skipped', reason: 'llm_unavailable' });
        return { ...state, stage: 'failed', reason: 'llm_unavailable' };
      }

      const result = await requestSuggestions(state.query.rawText, ctx);
      trace.push({ type: 'llm_response', result });

      if (!result.ok) {
        return {
          ...state,
          stage: 'failed',
          reason: 'llm_error',
          providerIssue: { kind: result.kind, model: result.model, message: result.message },
        };
      }
      return { ...state, stage: 'llm_checked', suggestion: result };
    }

    case 'llm_checked': {
      const { candidates, suggestedCommon } = state.suggestion;
      const { query, names } = state;

      const hierarchy = resolveHierarchy(candidates, ctx.index);
      trace.push({ type: 'hierarchy', attempts: hierarchy.attempts, candidate: hierarchy.candidate });
      if (hierarchy.candidate) {
        return { stage: 'resolved', query, names, match: hierarchy.candidate };
      }

      if (suggestedCommon) {
        const entry =
          ctx.index.findSpeciesByCommon(suggestedCommon) ??
          ctx.index.findSpeciesByCommon(suggestedCommon, { loose: true });
        const candidate = entry ? candidateFromEntry(entry, 'llm', suggestedCommon) : null;
        trace.push({ type: 'suggested_common', name: suggestedCommon, candidate });
        if (candidate) {
          return { stage: 'resolved', query, names, match: candidate };
        }
      }

      return {
        stage: 'failed',
        query,
        names,
        reason: candidates.length === 0 ? 'no_candidates' : 'no_hierarchical_match',
      };
    }

    case 'resolved':
    case 'failed':
      return state;
  }
}

/**
 * Run one input line through every stage until it settles.
 */
export async function resolveQuery(rawText: string, ctx: ResolveContext): Promise<RowResolution> {
  let state = initialState(rawText);
  const trace: ResolutionEvent[] = [{ type: 'parsed', query: state.query }];

  while (!isTerminal(state)) {
    state = await step(state, ctx, trace);
  }

  return { state, trace };
}

/**
 * Call the disambiguator under a deadline. Anything escaping the boundary
 * is folded into a failure result so one row can never abort the batch.
 */
async function requestSuggestions(
  queryText: string,
  ctx: ResolveContext,
): Promise<DisambiguationResult> {
  const { disambiguator, location, apiKey, timeoutMs } = ctx;

  try {
    return await withTimeout(
      (signal) => disambiguator.suggest({ queryText, location, apiKey, signal }),
      timeoutMs,
    );
  } catch (error) {
    if (error instanceof TimeoutError) {
      logger.warn({ queryText, timeoutMs, model: disambiguator.model }, 'Disambiguation timed out');
      return {
        ok: false,
        kind: 'timeout',
        message: `No response from ${disambiguator.model} within ${timeoutMs}ms`,
        model: disambiguator.model,
      };
    }

    const message = error instanceof Error ? error.message : String(error);
    logger.error({ queryText, error: message, model: disambiguator.model }, 'Disambiguator threw across its boundary');
    return { ok: false, kind: 'provider_error', message, model: disambiguator.model };
  }
}
