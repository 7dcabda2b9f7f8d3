/**
 * Types for per-row resolution.
 *
 * Each row moves through explicit stages:
 *   unresolved -> exact_checked -> heuristic_checked -> llm_checked -> resolved | failed
 * `ambiguous` is only assigned afterwards, by batch-wide uniqueness arbitration.
 */

import type { TaxonomicLevel } from '../../config/constants';
import type {
  MatchCandidate,
  OriginalNames,
  ParsedQuery,
} from '../../types/taxonomy';
import type { ProviderErrorKind } from '../../utils/errors';
import type {
  DisambiguationResult,
  DisambiguationSuccess,
} from '../disambiguation';

export type RowStatus = 'unresolved' | 'matched' | 'ambiguous' | 'failed';

export type FailureReason =
  | 'empty_query' // nothing to match
  | 'llm_unavailable' // no provider configured for this session
  | 'llm_error' // provider call failed (see providerIssue)
  | 'no_candidates' // provider returned nothing usable
  | 'no_hierarchical_match'; // no candidate level exists in the taxonomy

/** Reasons that leave a row retryable rather than definitively failed. */
export const UNRESOLVED_REASONS: ReadonlySet<FailureReason> = new Set([
  'empty_query',
  'llm_unavailable',
  'llm_error',
]);

export interface ProviderIssue {
  kind: ProviderErrorKind;
  model: string;
  message: string;
}

// ========== State Machine ==========

export type ResolutionState =
  | { stage: 'unresolved'; query: ParsedQuery; names: OriginalNames }
  | { stage: 'exact_checked'; query: ParsedQuery; names: OriginalNames }
  | { stage: 'heuristic_checked'; query: ParsedQuery; names: OriginalNames }
  | {
      stage: 'llm_checked';
      query: ParsedQuery;
      names: OriginalNames;
      suggestion: DisambiguationSuccess;
    }
  | {
      stage: 'resolved';
      query: ParsedQuery;
      names: OriginalNames;
      match: MatchCandidate;
    }
  | {
      stage: 'failed';
      query: ParsedQuery;
      names: OriginalNames;
      reason: FailureReason;
      providerIssue?: ProviderIssue;
    };

export type TerminalState = Extract<ResolutionState, { stage: 'resolved' | 'failed' }>;

export type HeuristicStep =
  | 'strip_diacritics'
  | 'remove_punctuation'
  | 'expand_synonyms'
  | 'singularize'
  | 'swap_word_order';

// ========== Hierarchical Resolution ==========

export interface HierarchyAttempt {
  candidateIndex: number;
  /** Levels tried in order, with the name looked up at each */
  tried: Array<{ level: TaxonomicLevel; name: string; found: boolean }>;
}

// ========== Trace ==========

export type ResolutionEvent =
  | { type: 'parsed'; query: ParsedQuery }
  | { type: 'exact'; candidate: MatchCandidate | null }
  | { type: 'heuristic'; candidate: MatchCandidate | null; step?: HeuristicStep }
  | { type: 'llm_skipped'; reason: 'llm_unavailable' }
  | { type: 'llm_response'; result: DisambiguationResult }
  | { type: 'hierarchy'; attempts: HierarchyAttempt[]; candidate: MatchCandidate | null }
  | { type: 'suggested_common'; name: string; candidate: MatchCandidate | null };

export interface RowResolution {
  state: TerminalState;
  trace: ResolutionEvent[];
}

// ========== Uniqueness ==========

export interface UniquenessClaim {
  rowId: string;
  candidate: MatchCandidate;
  locked: boolean;
}

export interface Contention {
  taxonKey: string;
  latin: string;
  level: TaxonomicLevel;
  rowIds: string[];
}

// ========== Engine Output ==========

export interface RowOutcome {
  rowId: string;
  rawInput: string;
  status: RowStatus;
  mapping: MatchCandidate | null;
  names: OriginalNames;
  reason?: FailureReason;
  contention?: Contention;
  trace: ResolutionEvent[];
}
