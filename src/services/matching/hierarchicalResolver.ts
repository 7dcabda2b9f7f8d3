/**
 * Hierarchical fallback over LLM-suggested hierarchies.
 *
 * Candidates are tried in the model's ranked order. Within a candidate,
 * levels go species -> genus -> family -> order -> class and the first level
 * that exists in both the candidate and the taxonomy wins. Ties between
 * equally confident candidates fall to list order.
 */

import { FALLBACK_ORDER, type TaxonomicLevel } from '../../config/constants';
import type { CandidateHierarchy, MatchCandidate } from '../../types/taxonomy';
import { collapseWhitespace } from '../../utils/text';
import type { TaxonomyIndex } from '../taxonomy';
import type { HierarchyAttempt } from './matching.types';

export interface HierarchyResolution {
  candidate: MatchCandidate | null;
  /** Index into the candidate list of the hierarchy that matched */
  candidateIndex: number | null;
  attempts: HierarchyAttempt[];
}

export function resolveHierarchy(
  candidates: readonly CandidateHierarchy[],
  index: TaxonomyIndex,
): HierarchyResolution {
  const attempts: HierarchyAttempt[] = [];

  for (let i = 0; i < candidates.length; i++) {
    const hierarchy = candidates[i];
    const attempt: HierarchyAttempt = { candidateIndex: i, tried: [] };
    attempts.push(attempt);

    for (const level of FALLBACK_ORDER) {
      const name = nameForLevel(hierarchy, level);
      if (!name) continue;

      const hit = index.findAtLevel(level, name);
      attempt.tried.push({ level, name, found: hit !== null });

      if (hit) {
        return {
          candidate: {
            level,
            taxonKey: hit.taxonKey,
            latin: hit.name,
            common: hit.entry?.primaryCommon ?? '',
            source: 'llm',
            confidence: hierarchy.confidence,
            matchedText: name,
          },
          candidateIndex: i,
          attempts,
        };
      }
    }
  }

  return { candidate: null, candidateIndex: null, attempts };
}

/**
 * Name to look up for a level. The species field should be an epithet, but
 * full binomials are accepted too.
 */
export function nameForLevel(hierarchy: CandidateHierarchy, level: TaxonomicLevel): string {
  if (level !== 'species') {
    return clean(hierarchy[level]);
  }

  const genus = clean(hierarchy.genus);
  const species = clean(hierarchy.species);
  if (!species) return '';

  const words = species.split(' ');
  if (words.length >= 2) {
    // "Picoides dorsalis" given as the epithet
    return species;
  }
  return genus ? `${genus} ${species}` : '';
}

function clean(value: string | undefined): string {
  return value ? collapseWhitespace(value) : '';
}
