/**
 * Reference taxonomy: parsing, loading and the shared lookup index.
 */

export { loadTaxonomy } from './taxonomy.loader';
export { TaxonomyIndex, type SpeciesLookupOptions } from './taxonomy.lookup';
export {
  lineageAt,
  nameAt,
  parseTaxonomyLines,
  type ParseTaxonomyResult,
} from './taxonomy.parser';
