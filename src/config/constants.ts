// Taxonomic levels, broadest first
export const TAXONOMIC_LEVELS = ['class', 'order', 'family', 'genus', 'species'] as const;

export type TaxonomicLevel = (typeof TAXONOMIC_LEVELS)[number];

// Hierarchical fallback order: most specific first
export const FALLBACK_ORDER: readonly TaxonomicLevel[] = ['species', 'genus', 'family', 'order', 'class'];

// Taxonomy source format: GUID;class;order;family;genus;species;common[;common...]
const TAXONOMY_FIELD_DELIMITER = ';';
const TAXONOMY_MIN_FIELDS = 7;
const LINEAGE_SEPARATOR = '>';

// Input splitting
const NAME_PAIR_DELIMITER = ',';
const CLI_QUERY_DELIMITER = ';';

// LLM defaults, overridable through env
const DEFAULT_LLM_MODEL = 'gemini-2.5-flash';
const DEFAULT_LLM_TIMEOUT_MS = 30_000;
const DEFAULT_LLM_CONCURRENCY = 4;

export {
  TAXONOMY_FIELD_DELIMITER,
  TAXONOMY_MIN_FIELDS,
  LINEAGE_SEPARATOR,
  NAME_PAIR_DELIMITER,
  CLI_QUERY_DELIMITER,
  DEFAULT_LLM_MODEL,
  DEFAULT_LLM_TIMEOUT_MS,
  DEFAULT_LLM_CONCURRENCY,
};
