/**
 * Row state manager for one session's batch.
 *
 * Each `process` call copies locked rows through untouched and sends only
 * the remaining rows through the resolution engine, splicing results back
 * at their positions. Rows are keyed by stable id, never by array index,
 * so edits and reordering in the caller cannot corrupt the merge.
 */

import { randomUUID } from 'node:crypto';
import { FALLBACK_ORDER } from '../../config/constants';
import type { MatchCandidate, TaxonHit } from '../../types/taxonomy';
import { BadRequestError, NotFoundError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import type {
  ResolutionEngine,
  ResolutionEvent,
  RowInput,
  RowOutcome,
  UniquenessClaim,
} from '../matching';
import { toOutputRow } from './batch.output';
import type {
  BatchInput,
  BatchInputLine,
  BatchSettings,
  BatchSnapshot,
  ManualMappingInput,
  OutputRow,
  Row,
  RunSummary,
} from './batch.types';

export interface BatchManagerOptions extends BatchSettings {
  createId?: () => string;
}

type PlannedRow =
  | { kind: 'locked'; row: Row }
  | { kind: 'pending'; input: RowInput };

export class BatchManager {
  private rows: Row[] = [];
  private traces = new Map<string, ResolutionEvent[]>();
  private settings: BatchSettings;
  private readonly createId: () => string;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly engine: ResolutionEngine,
    options: BatchManagerOptions = {},
  ) {
    const { createId = randomUUID, ...settings } = options;
    this.createId = createId;
    this.settings = settings;
  }

  getRows(): readonly Row[] {
    return this.rows;
  }

  getRow(rowId: string): Row {
    const row = this.rows.find((r) => r.id === rowId);
    if (!row) {
      throw new NotFoundError(`Row not found: ${rowId}`);
    }
    return row;
  }

  /** Events recorded the last time this row was resolved. */
  getTrace(rowId: string): readonly ResolutionEvent[] {
    return this.traces.get(rowId) ?? [];
  }

  getSettings(): BatchSettings {
    return { ...this.settings };
  }

  updateSettings(settings: BatchSettings): void {
    this.settings = { ...this.settings, ...settings };
  }

  /**
   * Reprocess the batch against new input. Unlocked rows are re-run even
   * when their text is unchanged; locked rows are never touched.
   */
  process(input: BatchInput): Promise<BatchSnapshot> {
    // Runs are serialized; a failed run rejects only its own caller
    const run = this.queue.then(() => this.run(input));
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async run(input: BatchInput): Promise<BatchSnapshot> {
    const planned = this.plan(toInputLines(input));
    const locked = planned.flatMap((p) => (p.kind === 'locked' ? [p.row] : []));
    const pending = planned.flatMap((p) => (p.kind === 'pending' ? [p.input] : []));

    logger.info(
      { pending: pending.length, locked: locked.length },
      'Batch: Processing unlocked rows',
    );

    const result = await this.engine.resolveRows(pending, {
      location: this.settings.location,
      apiKey: this.settings.apiKey,
      lockedClaims: locked.flatMap(lockedClaim),
    });

    const outcomes = new Map(result.outcomes.map((o) => [o.rowId, o]));
    // Rows may have been locked, unlocked or edited while the engine was running
    const current = new Map(this.rows.map((r) => [r.id, r]));

    this.rows = planned.map((p) => {
      if (p.kind === 'locked') return current.get(p.row.id) ?? p.row;

      const latest = current.get(p.input.rowId);
      if (latest?.locked) return latest;

      const outcome = outcomes.get(p.input.rowId);
      if (!outcome) {
        throw new Error(`Resolution returned no outcome for row ${p.input.rowId}`);
      }
      this.traces.set(outcome.rowId, outcome.trace);
      return rowFromOutcome(outcome);
    });

    const liveIds = new Set(this.rows.map((r) => r.id));
    for (const id of this.traces.keys()) {
      if (!liveIds.has(id)) this.traces.delete(id);
    }

    const summary: RunSummary = {
      processed: pending.length,
      keptLocked: locked.length,
      matched: result.outcomes.filter((o) => o.status === 'matched').length,
      ambiguous: result.outcomes.filter((o) => o.status === 'ambiguous').length,
      failed: result.outcomes.filter((o) => o.status === 'failed').length,
      unresolved: result.outcomes.filter((o) => o.status === 'unresolved').length,
      contested: result.contested,
      providerIssues: result.providerIssues,
    };

    return { rows: this.rows, summary };
  }

  /** Flip a row's lock flag. Nothing else about the row changes. */
  toggleLock(rowId: string): Row {
    const row = this.getRow(rowId);
    return this.replace({ ...row, locked: !row.locked });
  }

  /**
   * Manually override a row's mapping; `null` clears it. The lock flag is
   * left as it was.
   */
  edit(rowId: string, mapping: ManualMappingInput | null): Row {
    const row = this.getRow(rowId);

    if (mapping === null) {
      return this.replace({
        ...row,
        mapping: null,
        status: 'unresolved',
        reason: undefined,
        contention: undefined,
      });
    }

    return this.replace({
      ...row,
      mapping: this.manualCandidate(mapping),
      status: 'matched',
      reason: undefined,
      contention: undefined,
    });
  }

  toOutputRows(): OutputRow[] {
    return this.rows.map(toOutputRow);
  }

  private plan(lines: PlannedLine[]): PlannedRow[] {
    const byId = new Map(this.rows.map((r) => [r.id, r]));
    const used = new Set<string>();
    const planned: PlannedRow[] = [];

    lines.forEach((line, position) => {
      let existing: Row | undefined;
      if (line.id !== undefined) {
        existing = byId.get(line.id);
        if (!existing) {
          throw new NotFoundError(`Row not found: ${line.id}`);
        }
      } else if (line.positional) {
        existing = this.rows[position];
      }

      if (existing && !used.has(existing.id)) {
        used.add(existing.id);
        planned.push(
          existing.locked
            ? { kind: 'locked', row: existing }
            : { kind: 'pending', input: { rowId: existing.id, rawInput: line.rawInput } },
        );
        return;
      }

      planned.push({ kind: 'pending', input: { rowId: this.createId(), rawInput: line.rawInput } });
    });

    // Locked rows the input no longer mentions stay at their old position
    this.rows.forEach((row, originalIndex) => {
      if (!row.locked || used.has(row.id)) return;
      planned.splice(Math.min(originalIndex, planned.length), 0, { kind: 'locked', row });
    });

    return planned;
  }

  private replace(updated: Row): Row {
    this.rows = this.rows.map((r) => (r.id === updated.id ? updated : r));
    return updated;
  }

  private manualCandidate(input: ManualMappingInput): MatchCandidate {
    const levels = input.level ? [input.level] : FALLBACK_ORDER;
    let hit: TaxonHit | null = null;

    for (const level of levels) {
      hit = this.engine.index.findAtLevel(level, input.latin);
      if (hit) break;
    }

    if (!hit) {
      throw new BadRequestError(`"${input.latin}" is not in the reference taxonomy`, 'UNKNOWN_TAXON');
    }

    return {
      level: hit.level,
      taxonKey: hit.taxonKey,
      latin: hit.name,
      common: input.common ?? hit.entry?.primaryCommon ?? '',
      source: 'manual',
    };
  }
}

export function createBatchManager(
  engine: ResolutionEngine,
  options: BatchManagerOptions = {},
): BatchManager {
  return new BatchManager(engine, options);
}

interface PlannedLine extends BatchInputLine {
  /** Plain-string input aligns with existing rows by position */
  positional: boolean;
}

function toInputLines(input: BatchInput): PlannedLine[] {
  const lines: PlannedLine[] = [];
  for (const item of input) {
    const line = typeof item === 'string'
      ? { rawInput: item, positional: true }
      : { ...item, positional: false };
    if (line.rawInput.trim()) lines.push(line);
  }
  return lines;
}

function lockedClaim(row: Row): UniquenessClaim[] {
  if (!row.mapping || row.mapping.level === 'species') return [];
  return [{ rowId: row.id, candidate: row.mapping, locked: true }];
}

function rowFromOutcome(outcome: RowOutcome): Row {
  return {
    id: outcome.rowId,
    rawInput: outcome.rawInput,
    originalCommon: outcome.names.originalCommon,
    originalLatin: outcome.names.originalLatin,
    mapping: outcome.mapping,
    status: outcome.status,
    reason: outcome.reason,
    contention: outcome.contention,
    locked: false,
  };
}
