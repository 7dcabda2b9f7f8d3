/**
 * Types for the per-session row state.
 * A batch is an ordered list of rows with stable ids; locked rows are
 * user-confirmed and excluded from automatic reprocessing.
 */

import type { TaxonomicLevel } from '../../config/constants';
import type { MatchCandidate } from '../../types/taxonomy';
import type {
  Contention,
  FailureReason,
  ProviderIssue,
  RowStatus,
} from '../matching';

export interface Row {
  readonly id: string;
  readonly rawInput: string;
  readonly originalCommon: string;
  readonly originalLatin: string;
  readonly mapping: MatchCandidate | null;
  readonly status: RowStatus;
  readonly reason?: FailureReason;
  /** Set on ambiguous rows: the higher-level taxon other rows also claimed */
  readonly contention?: Contention;
  readonly locked: boolean;
}

/**
 * Input line for `process`. Lines carrying an id refer to an existing row;
 * lines without one become new rows.
 */
export interface BatchInputLine {
  id?: string;
  rawInput: string;
}

export type BatchInput = readonly string[] | readonly BatchInputLine[];

export interface RunSummary {
  /** Rows sent through the resolution pipeline */
  processed: number;
  /** Locked rows copied through unchanged */
  keptLocked: number;
  matched: number;
  ambiguous: number;
  failed: number;
  unresolved: number;
  contested: Contention[];
  providerIssues: ProviderIssue[];
}

export interface BatchSnapshot {
  rows: readonly Row[];
  summary: RunSummary;
}

export interface ManualMappingInput {
  latin: string;
  common?: string;
  /** Restrict the lookup to one level; otherwise species first, then coarser */
  level?: TaxonomicLevel;
}

export interface BatchSettings {
  location?: string;
  apiKey?: string;
}

/** Row shape consumed by CSV export. */
export interface OutputRow {
  rawInput: string;
  commonName: string;
  latinName: string;
  matchedLevel: TaxonomicLevel | null;
  status: RowStatus;
  locked: boolean;
  originalCommon: string;
  originalLatin: string;
}
