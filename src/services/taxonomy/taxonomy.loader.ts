import { readFile } from 'node:fs/promises';
import { TaxonomyLoadError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { TaxonomyIndex } from './taxonomy.lookup';
import { parseTaxonomyLines } from './taxonomy.parser';

/**
 * Load the taxonomy source file and build the shared index.
 * Throws TaxonomyLoadError when the file cannot be read or yields no
 * entries. Callers treat that as fatal.
 */
export async function loadTaxonomy(path: string): Promise<TaxonomyIndex> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    const reason = isMissingFile(error) ? 'not found' : 'could not be read';
    throw new TaxonomyLoadError(`Taxonomy file ${reason}: ${path}`, path);
  }

  const { entries, skipped } = parseTaxonomyLines(content.split(/\r?\n/));

  if (entries.length === 0) {
    throw new TaxonomyLoadError(`Taxonomy file contains no parseable entries: ${path}`, path);
  }

  if (skipped > 0) {
    logger.warn({ path, skipped }, 'Skipped malformed taxonomy lines');
  }

  const index = new TaxonomyIndex(entries);

  logger.info(
    {
      path,
      entries: index.size,
      species: index.countAtLevel('species'),
      genera: index.countAtLevel('genus'),
    },
    'Taxonomy loaded',
  );

  return index;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
