/**
 * Core taxonomy and matching types shared across services.
 */

import type { TaxonomicLevel } from '../config/constants';

export type { TaxonomicLevel } from '../config/constants';

// ========== Reference Taxonomy ==========

export interface TaxonEntry {
  /** GUID from the taxonomy source */
  readonly id: string;
  /** Most specific level filled in for this entry */
  readonly rank: TaxonomicLevel;
  /** Lower-cased canonical name at `rank` ("certhia americana", "picoides") */
  readonly latin: string;
  readonly class: string;
  readonly order: string;
  readonly family: string;
  readonly genus: string;
  /** Species epithet only, empty above species rank */
  readonly species: string;
  /** Distinct common names in source order */
  readonly commonNames: readonly string[];
  /** First common name listed in the source, '' when none */
  readonly primaryCommon: string;
  /** Full lineage down to `rank`, unique per entry */
  readonly lineage: string;
}

/** A taxon found by a level-scoped lookup. */
export interface TaxonHit {
  level: TaxonomicLevel;
  /** Lower-cased name at `level` (binomial for species) */
  name: string;
  /** Lineage string truncated at `level` */
  taxonKey: string;
  /** The source row for this exact taxon, when the source has one */
  entry?: TaxonEntry;
  /** Every entry whose lineage passes through this taxon */
  members: readonly TaxonEntry[];
}

// ========== Queries ==========

export type QueryShape = 'empty' | 'single' | 'pair';

export interface ParsedQuery {
  rawText: string;
  shape: QueryShape;
  /** For single-name queries both fields hold the same name */
  common?: string;
  latin?: string;
}

// ========== Matches ==========

export type MatchSource = 'exact' | 'heuristic' | 'llm' | 'manual';

export interface MatchCandidate {
  level: TaxonomicLevel;
  taxonKey: string;
  latin: string;
  common: string;
  source: MatchSource;
  confidence?: number;
  /** Text that produced the hit, after any transforms */
  matchedText?: string;
}

/** Which role each piece of the raw input played once matched. */
export interface OriginalNames {
  originalCommon: string;
  originalLatin: string;
}

// ========== LLM Hierarchies ==========

export interface CandidateHierarchy {
  class?: string;
  order?: string;
  family?: string;
  genus?: string;
  species?: string;
  confidence?: number;
}
