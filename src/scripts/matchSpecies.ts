import { parseArgs } from 'node:util';
import { CLI_QUERY_DELIMITER } from '../config/constants';
import { createApp } from '../app';
import type { Row } from '../services/batch';
import type { ResolutionEvent } from '../services/matching';
import { splitQueries } from '../services/matching';
import type { CandidateHierarchy, MatchCandidate } from '../types/taxonomy';
import { TaxonomyLoadError } from '../utils/errors';

const USAGE = 'Usage: npm run match -- --query "brown creeper;Picoides sp." [--location "Ontario"] [--verbose]';

const { values } = parseArgs({
  options: {
    query: { type: 'string', short: 'q' },
    location: { type: 'string', short: 'l' },
    verbose: { type: 'boolean', short: 'v', default: false },
  },
});

if (!values.query) {
  console.error('Please provide at least one name with --query');
  console.error(USAGE);
  process.exit(1);
}

const queries = splitQueries(values.query, CLI_QUERY_DELIMITER);

async function matchSpecies(queryText: string, queries: string[]) {
  try {
    const app = await createApp();

    if (!app.disambiguator.isAvailable()) {
      console.warn('⚠ GEMINI_API_KEY not set: names that need the LLM will stay unresolved');
    }

    const session = app.sessions.create({ location: values.location });
    const { rows, summary } = await session.batch.process(queries);

    for (const row of rows) {
      if (values.verbose) {
        printVerbose(row, session.batch.getTrace(row.id));
      } else {
        console.log(formatRow(row));
      }
    }

    console.log(
      `\n${summary.matched} matched, ${summary.ambiguous} ambiguous, ${summary.failed} failed, ${summary.unresolved} unresolved`,
    );
    for (const issue of summary.providerIssues) {
      console.error(`✗ ${issue.message}`);
    }
    process.exit(0);
  } catch (error) {
    if (error instanceof TaxonomyLoadError) {
      console.error(`✗ ${error.message}`);
      console.error('Set TAXONOMY_PATH to the reference taxonomy file.');
    } else {
      console.error(`Error matching "${queryText}":`, error);
    }
    process.exit(1);
  }
}

// ========== Formatting ==========

function describeMatch(match: MatchCandidate): string {
  const common = match.common ? ` (${match.common})` : '';
  return `${match.latin}${common} [${match.level}, ${match.source}]`;
}

function formatRow(row: Row): string {
  switch (row.status) {
    case 'matched':
      return row.mapping ? `✓ ${row.rawInput} -> ${describeMatch(row.mapping)}` : `✓ ${row.rawInput}`;
    case 'ambiguous': {
      const c = row.contention;
      const detail = c ? `${c.level} ${c.latin} shared by ${c.rowIds.length} rows` : 'shared taxon';
      return `? ${row.rawInput} -> ambiguous (${detail})`;
    }
    case 'failed':
    case 'unresolved':
      return `✗ ${row.rawInput} -> ${row.status}${row.reason ? `: ${row.reason}` : ''}`;
  }
}

function formatHierarchy(candidate: CandidateHierarchy): string {
  const ranks = [candidate.class, candidate.order, candidate.family, candidate.genus, candidate.species]
    .map((name) => name ?? '-')
    .join(' > ');
  return candidate.confidence === undefined ? ranks : `${ranks} (confidence ${candidate.confidence})`;
}

function printEvent(event: ResolutionEvent): void {
  switch (event.type) {
    case 'parsed': {
      const { shape, common, latin } = event.query;
      console.log(`  parsed: ${shape} common="${common ?? ''}" latin="${latin ?? ''}"`);
      return;
    }
    case 'exact':
      console.log(`  exact: ${event.candidate ? describeMatch(event.candidate) : 'no match'}`);
      return;
    case 'heuristic':
      console.log(
        `  heuristic: ${event.candidate ? `${describeMatch(event.candidate)} via ${event.step}` : 'no match'}`,
      );
      return;
    case 'llm_skipped':
      console.log('  llm: skipped, no API key');
      return;
    case 'llm_response':
      if (!event.result.ok) {
        console.log(`  llm: ${event.result.kind}: ${event.result.message}`);
        return;
      }
      console.log(`  llm: ${event.result.candidates.length} candidate(s)`);
      event.result.candidates.forEach((candidate, i) => {
        console.log(`    ${i + 1}. ${formatHierarchy(candidate)}`);
      });
      if (event.result.suggestedCommon) {
        console.log(`    suggested common name: ${event.result.suggestedCommon}`);
      }
      return;
    case 'hierarchy':
      for (const attempt of event.attempts) {
        const tried = attempt.tried.map((t) => `${t.level}=${t.name}${t.found ? ' ✓' : ''}`).join(', ');
        console.log(`  candidate ${attempt.candidateIndex + 1}: ${tried || 'no usable levels'}`);
      }
      console.log(`  hierarchy: ${event.candidate ? `matched at ${event.candidate.level}` : 'no level found'}`);
      return;
    case 'suggested_common':
      console.log(
        `  suggested common "${event.name}": ${event.candidate ? describeMatch(event.candidate) : 'not in taxonomy'}`,
      );
      return;
  }
}

function printVerbose(row: Row, trace: readonly ResolutionEvent[]): void {
  console.log(`\n${row.rawInput}`);
  for (const event of trace) {
    printEvent(event);
  }
  console.log(formatRow(row));
}

void matchSpecies(values.query, queries);
