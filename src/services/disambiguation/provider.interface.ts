import type { CandidateHierarchy } from '../../types/taxonomy';
import type { ProviderErrorKind } from '../../utils/errors';

export interface DisambiguationRequest {
  queryText: string;
  /** Study area, e.g. "Alberta, Canada" */
  location?: string;
  /** Per-session key overriding the configured one */
  apiKey?: string;
  signal?: AbortSignal;
}

export interface DisambiguationSuccess {
  ok: true;
  /** Ranked by the model, most likely first */
  candidates: CandidateHierarchy[];
  suggestedCommon?: string;
}

export interface DisambiguationFailure {
  ok: false;
  kind: ProviderErrorKind;
  message: string;
  model: string;
}

export type DisambiguationResult = DisambiguationSuccess | DisambiguationFailure;

/**
 * Hierarchy-suggestion service consumed as a black box.
 * `suggest` must not throw: provider problems come back as a failure result.
 */
export interface TaxonomyDisambiguator {
  readonly name: string;
  readonly model: string;
  isAvailable(apiKey?: string): boolean;
  suggest(request: DisambiguationRequest): Promise<DisambiguationResult>;
}
