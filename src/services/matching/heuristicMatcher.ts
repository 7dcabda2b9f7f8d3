/**
 * Deterministic string transforms retried against the taxonomy after an
 * exact miss. Transforms are cumulative and applied in a fixed order;
 * the first hit wins. Nothing here guesses: no edit distance, no fuzzy
 * substitution.
 */

import irregularPlurals from '../../../data/irregularPlurals.json';
import synonyms from '../../../data/synonyms.json';
import { NAME_PAIR_DELIMITER } from '../../config/constants';
import type { ParsedQuery } from '../../types/taxonomy';
import { normalizeName, removePunctuation, stripDiacritics } from '../../utils/text';
import type { TaxonomyIndex } from '../taxonomy';
import {
  candidateFromEntry,
  findInSlots,
  type NameSlot,
  namesForHit,
  type QueryMatch,
  slotsFor,
} from './exactMatcher';
import type { HeuristicStep } from './matching.types';

const SYNONYMS: Readonly<Record<string, string>> = synonyms;
const IRREGULAR_PLURALS: Readonly<Record<string, string>> = irregularPlurals;

export interface HeuristicMatch extends QueryMatch {
  step: HeuristicStep;
}

interface Transform {
  step: Exclude<HeuristicStep, 'swap_word_order'>;
  apply: (text: string) => string;
  /** Compare against punctuation-free keys from this step on */
  loose: boolean;
}

const TRANSFORMS: readonly Transform[] = [
  { step: 'strip_diacritics', apply: stripDiacritics, loose: false },
  { step: 'remove_punctuation', apply: removePunctuation, loose: true },
  { step: 'expand_synonyms', apply: expandSynonyms, loose: true },
  { step: 'singularize', apply: singularize, loose: true },
];

export function expandSynonyms(text: string): string {
  return text
    .split(' ')
    .map((word) => SYNONYMS[word.toLowerCase()] ?? word)
    .join(' ');
}

/**
 * Singularize the head noun (last word) of a name.
 */
export function singularize(text: string): string {
  const words = text.split(' ');
  const last = words[words.length - 1];
  words[words.length - 1] = singularWord(last);
  return words.join(' ');
}

function singularWord(word: string): string {
  const lower = word.toLowerCase();
  const irregular = IRREGULAR_PLURALS[lower];
  if (irregular) return irregular;

  if (lower.length > 4 && lower.endsWith('ies')) return `${lower.slice(0, -3)}y`;
  if (/(ch|sh|x|ss|z)es$/.test(lower)) return lower.slice(0, -2);
  if (/[^siu]s$/.test(lower)) return lower.slice(0, -1);
  return word;
}

/**
 * Canonical form of a name under every non-plural transform.
 * Idempotent: normalizing twice gives the same string.
 */
export function normalizeForMatching(text: string): string {
  return normalizeName(expandSynonyms(removePunctuation(stripDiacritics(text))));
}

export function heuristicMatch(query: ParsedQuery, index: TaxonomyIndex): HeuristicMatch | null {
  let slots: NameSlot[] = slotsFor(query);

  for (const transform of TRANSFORMS) {
    slots = slots.map((slot) => ({ ...slot, text: transform.apply(slot.text) }));

    const hit = findInSlots(index, slots, transform.loose);
    if (hit) {
      return {
        candidate: candidateFromEntry(hit.entry, 'heuristic', hit.slot.text),
        names: namesForHit(hit),
        step: transform.step,
      };
    }
  }

  const swapped = swapWordOrder(query);
  if (swapped) {
    const slot: NameSlot = { text: swapped, original: query.rawText, partner: '' };
    const hit = findInSlots(index, [slot], true) ?? findInSlots(index, [{ ...slot, text: singularize(swapped) }], true);
    if (hit) {
      return {
        candidate: candidateFromEntry(hit.entry, 'heuristic', hit.slot.text),
        names: { originalCommon: query.rawText, originalLatin: '' },
        step: 'swap_word_order',
      };
    }
  }

  return null;
}

/**
 * "Creeper, Brown" -> "brown creeper". Only pairs are candidates for a swap.
 */
function swapWordOrder(query: ParsedQuery): string | null {
  if (query.shape !== 'pair') return null;

  const parts = query.rawText
    .split(NAME_PAIR_DELIMITER)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
  if (parts.length < 2) return null;

  return normalizeForMatching(`${parts[1]} ${parts[0]}`);
}
