/**
 * Batch-wide uniqueness arbitration for higher-level matches.
 *
 * A genus/family/order/class match is trusted only when exactly one row in
 * the batch claims that taxon. When several rows claim it, every unlocked
 * claimant becomes ambiguous. Species matches are never arbitrated.
 * Locked rows count as claimants but are never changed.
 */

import type { Contention, UniquenessClaim } from './matching.types';

export interface UniquenessResult {
  /** Unlocked row id -> the taxon it contends for */
  ambiguous: Map<string, Contention>;
  contested: Contention[];
}

export function arbitrateUniqueness(claims: readonly UniquenessClaim[]): UniquenessResult {
  const groups = new Map<string, UniquenessClaim[]>();

  for (const claim of claims) {
    if (claim.candidate.level === 'species') continue;

    const group = groups.get(claim.candidate.taxonKey);
    if (group) {
      group.push(claim);
    } else {
      groups.set(claim.candidate.taxonKey, [claim]);
    }
  }

  const ambiguous = new Map<string, Contention>();
  const contested: Contention[] = [];

  for (const [taxonKey, group] of groups) {
    if (group.length < 2) continue;

    const { latin, level } = group[0].candidate;
    const contention: Contention = {
      taxonKey,
      latin,
      level,
      rowIds: group.map((c) => c.rowId),
    };
    contested.push(contention);

    for (const claim of group) {
      if (!claim.locked) ambiguous.set(claim.rowId, contention);
    }
  }

  return { ambiguous, contested };
}
