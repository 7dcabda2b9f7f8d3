/**
 * Matching and resolution engine.
 *
 * Input parser -> exact -> heuristic -> LLM disambiguation -> hierarchical
 * fallback, per row; uniqueness arbitration once per batch.
 */

// Types
export type {
  Contention,
  FailureReason,
  HeuristicStep,
  HierarchyAttempt,
  ProviderIssue,
  ResolutionEvent,
  ResolutionState,
  RowOutcome,
  RowResolution,
  RowStatus,
  TerminalState,
  UniquenessClaim,
} from './matching.types';

export { UNRESOLVED_REASONS } from './matching.types';

// Parsing
export { defaultNames, isLikelyLatin, parseInput, splitQueries } from './inputParser';

// Matchers
export { candidateFromEntry, exactMatch, type QueryMatch } from './exactMatcher';
export {
  expandSynonyms,
  heuristicMatch,
  normalizeForMatching,
  singularize,
  type HeuristicMatch,
} from './heuristicMatcher';

// Resolution
export { nameForLevel, resolveHierarchy, type HierarchyResolution } from './hierarchicalResolver';
export { arbitrateUniqueness, type UniquenessResult } from './uniquenessResolver';
export { initialState, isTerminal, resolveQuery, step, type ResolveContext } from './resolution';

// Engine
export {
  createResolutionEngine,
  type ResolutionEngine,
  type ResolutionEngineOptions,
  type ResolveRowsContext,
  type ResolveRowsResult,
  type RowInput,
} from './engine';
