/**
 * Exact lookup of a parsed query against species-level taxonomy entries.
 * Latin is tried before common; for pairs the parsed orientation is tried
 * before the swapped one.
 */

import type {
  MatchCandidate,
  MatchSource,
  OriginalNames,
  ParsedQuery,
  TaxonEntry,
} from '../../types/taxonomy';
import type { TaxonomyIndex } from '../taxonomy';

/** One name from the query, tracked through transforms. */
export interface NameSlot {
  /** Current text, possibly transformed */
  text: string;
  /** Text as it appeared in the input */
  original: string;
  /** The other name of a pair, '' for single names */
  partner: string;
}

export interface SlotHit {
  entry: TaxonEntry;
  slot: NameSlot;
  matchedAs: 'latin' | 'common';
}

export interface QueryMatch {
  candidate: MatchCandidate;
  names: OriginalNames;
}

export function slotsFor(query: ParsedQuery): NameSlot[] {
  switch (query.shape) {
    case 'empty':
      return [];
    case 'single': {
      const name = query.latin ?? query.common ?? '';
      return [{ text: name, original: name, partner: '' }];
    }
    case 'pair': {
      const latin = query.latin ?? '';
      const common = query.common ?? '';
      return [
        { text: latin, original: latin, partner: common },
        { text: common, original: common, partner: latin },
      ];
    }
  }
}

export function findInSlots(
  index: TaxonomyIndex,
  slots: readonly NameSlot[],
  loose = false,
): SlotHit | null {
  for (const slot of slots) {
    if (!slot.text) continue;
    const entry = index.findSpeciesByLatin(slot.text, { loose });
    if (entry) return { entry, slot, matchedAs: 'latin' };
  }

  for (const slot of slots) {
    if (!slot.text) continue;
    const entry = index.findSpeciesByCommon(slot.text, { loose });
    if (entry) return { entry, slot, matchedAs: 'common' };
  }

  return null;
}

export function candidateFromEntry(
  entry: TaxonEntry,
  source: MatchSource,
  matchedText?: string,
): MatchCandidate {
  return {
    level: entry.rank,
    taxonKey: entry.lineage,
    latin: entry.latin,
    common: entry.primaryCommon,
    source,
    matchedText,
  };
}

export function namesForHit(hit: SlotHit): OriginalNames {
  const { slot, matchedAs } = hit;
  return matchedAs === 'latin'
    ? { originalLatin: slot.original, originalCommon: slot.partner }
    : { originalCommon: slot.original, originalLatin: slot.partner };
}

export function exactMatch(query: ParsedQuery, index: TaxonomyIndex): QueryMatch | null {
  const hit = findInSlots(index, slotsFor(query));
  if (!hit) return null;

  return {
    candidate: candidateFromEntry(hit.entry, 'exact', hit.slot.text),
    names: namesForHit(hit),
  };
}
