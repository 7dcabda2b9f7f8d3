/**
 * Immutable lookup structure over the reference taxonomy.
 *
 * Built once at startup and shared by reference with every session.
 * Nothing mutates it after construction.
 */

import { TAXONOMIC_LEVELS, type TaxonomicLevel } from '../../config/constants';
import type { TaxonEntry, TaxonHit } from '../../types/taxonomy';
import { looseKey, normalizeName } from '../../utils/text';
import { lineageAt, nameAt } from './taxonomy.parser';

export interface SpeciesLookupOptions {
  /** Compare with diacritics and punctuation removed */
  loose?: boolean;
}

type LevelMap<V> = Record<TaxonomicLevel, Map<string, V>>;

function emptyLevelMap<V>(): LevelMap<V> {
  return {
    class: new Map(),
    order: new Map(),
    family: new Map(),
    genus: new Map(),
    species: new Map(),
  };
}

function addFirst<V>(map: Map<string, V>, key: string, value: V): void {
  if (key && !map.has(key)) map.set(key, value);
}

export class TaxonomyIndex {
  private readonly allEntries: readonly TaxonEntry[];
  /** level -> taxon name -> entries whose lineage passes through it */
  private readonly members: LevelMap<TaxonEntry[]>;
  /** level -> taxon name -> the entry ranked exactly at that level */
  private readonly ranked: LevelMap<TaxonEntry>;
  private readonly speciesByCommon = new Map<string, TaxonEntry>();
  private readonly looseSpeciesByLatin = new Map<string, TaxonEntry>();
  private readonly looseSpeciesByCommon = new Map<string, TaxonEntry>();

  constructor(entries: readonly TaxonEntry[]) {
    this.allEntries = Object.freeze([...entries]);
    this.members = emptyLevelMap();
    this.ranked = emptyLevelMap();

    for (const entry of this.allEntries) {
      const depth = TAXONOMIC_LEVELS.indexOf(entry.rank);

      for (const level of TAXONOMIC_LEVELS.slice(0, depth + 1)) {
        const name = nameAt(entry, level);
        if (!name) continue;
        const list = this.members[level].get(name);
        if (list) {
          list.push(entry);
        } else {
          this.members[level].set(name, [entry]);
        }
      }

      addFirst(this.ranked[entry.rank], entry.latin, entry);

      if (entry.rank === 'species') {
        addFirst(this.looseSpeciesByLatin, looseKey(entry.latin), entry);
        for (const common of entry.commonNames) {
          addFirst(this.speciesByCommon, normalizeName(common), entry);
          addFirst(this.looseSpeciesByCommon, looseKey(common), entry);
        }
      }
    }

    Object.freeze(this);
  }

  get size(): number {
    return this.allEntries.length;
  }

  entries(): readonly TaxonEntry[] {
    return this.allEntries;
  }

  /** Number of distinct taxa known at a level. */
  countAtLevel(level: TaxonomicLevel): number {
    return this.members[level].size;
  }

  /**
   * Level-scoped lookup: does `name` exist as a taxon of `level` anywhere
   * in the taxonomy? Species names are binomials ("picoides dorsalis").
   */
  findAtLevel(level: TaxonomicLevel, name: string): TaxonHit | null {
    const key = normalizeName(name);
    if (!key) return null;

    const found = this.members[level].get(key);
    if (!found || found.length === 0) return null;

    const entry = this.ranked[level].get(key);
    const representative = entry ?? found[0];

    return {
      level,
      name: key,
      taxonKey: lineageAt(representative, level),
      entry,
      members: found,
    };
  }

  findSpeciesByLatin(name: string, options: SpeciesLookupOptions = {}): TaxonEntry | null {
    if (options.loose) {
      return this.looseSpeciesByLatin.get(looseKey(name)) ?? null;
    }
    return this.ranked.species.get(normalizeName(name)) ?? null;
  }

  findSpeciesByCommon(name: string, options: SpeciesLookupOptions = {}): TaxonEntry | null {
    if (options.loose) {
      return this.looseSpeciesByCommon.get(looseKey(name)) ?? null;
    }
    return this.speciesByCommon.get(normalizeName(name)) ?? null;
  }
}
