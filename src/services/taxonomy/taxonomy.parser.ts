/**
 * Parser for the line-oriented taxonomy source.
 *
 * Each line: GUID;class;order;family;genus;species;common[;common...]
 * The species column holds the epithet only. A line's rank is the most
 * specific level it fills in, so genus- or family-level rows are allowed.
 */

import {
  LINEAGE_SEPARATOR,
  TAXONOMIC_LEVELS,
  TAXONOMY_FIELD_DELIMITER,
  TAXONOMY_MIN_FIELDS,
  type TaxonomicLevel,
} from '../../config/constants';
import type { TaxonEntry } from '../../types/taxonomy';
import { collapseWhitespace, normalizeName } from '../../utils/text';

export interface ParseTaxonomyResult {
  entries: TaxonEntry[];
  /** Non-blank lines that could not be turned into an entry */
  skipped: number;
}

type LineageFields = Pick<TaxonEntry, TaxonomicLevel>;

interface EntryBuilder {
  id: string;
  rank: TaxonomicLevel;
  fields: LineageFields;
  commonNames: string[];
}

export function parseTaxonomyLines(lines: Iterable<string>): ParseTaxonomyResult {
  const builders = new Map<string, EntryBuilder>();
  let skipped = 0;

  for (const rawLine of lines) {
    const line = rawLine.trim();
    if (!line) continue;

    const parts = line.split(TAXONOMY_FIELD_DELIMITER).map((p) => p.trim());
    if (parts.length < TAXONOMY_MIN_FIELDS) {
      skipped++;
      continue;
    }

    const [id, taxClass, order, family, genus, species, ...commons] = parts;
    const fields: LineageFields = {
      class: normalizeName(taxClass),
      order: normalizeName(order),
      family: normalizeName(family),
      genus: normalizeName(genus),
      species: normalizeName(species),
    };

    const rank = rankOf(fields);
    if (!rank) {
      skipped++;
      continue;
    }

    const commonNames = commons.map(collapseWhitespace).filter((c) => c.length > 0);
    const lineage = lineageAt(fields, rank);
    const existing = builders.get(lineage);

    if (existing) {
      for (const name of commonNames) {
        if (!existing.commonNames.includes(name)) existing.commonNames.push(name);
      }
      continue;
    }

    builders.set(lineage, { id, rank, fields, commonNames });
  }

  const entries = Array.from(builders.values(), toEntry);
  return { entries, skipped };
}

/**
 * Lineage string truncated at `level`. Empty intermediate ranks keep their
 * slot so keys from different branches never collide.
 */
export function lineageAt(fields: LineageFields, level: TaxonomicLevel): string {
  const depth = TAXONOMIC_LEVELS.indexOf(level);
  return TAXONOMIC_LEVELS.slice(0, depth + 1)
    .map((l) => fields[l])
    .join(LINEAGE_SEPARATOR);
}

/** Name of a taxon at `level`; species names are binomials. */
export function nameAt(fields: LineageFields, level: TaxonomicLevel): string {
  if (level === 'species') {
    return fields.genus && fields.species ? `${fields.genus} ${fields.species}` : '';
  }
  return fields[level];
}

function rankOf(fields: LineageFields): TaxonomicLevel | null {
  if (fields.genus && fields.species) return 'species';
  if (fields.genus) return 'genus';
  if (fields.family) return 'family';
  if (fields.order) return 'order';
  if (fields.class) return 'class';
  return null;
}

function toEntry(builder: EntryBuilder): TaxonEntry {
  const { id, rank, fields, commonNames } = builder;
  return Object.freeze({
    id,
    rank,
    latin: nameAt(fields, rank),
    ...fields,
    commonNames: Object.freeze([...commonNames]),
    primaryCommon: commonNames[0] ?? '',
    lineage: lineageAt(fields, rank),
  });
}
