import { describe, expect, test, vi } from 'vitest';
import { createBatchManager } from '../../services/batch';
import type { DisambiguationResult } from '../../services/disambiguation';
import { createResolutionEngine } from '../../services/matching';
import { BadRequestError, NotFoundError } from '../../utils/errors';
import { buildIndex, createDisambiguatorMock, respondWith, sequentialIds } from '../helpers';

const index = buildIndex();
const picoides = [{ genus: 'Picoides', species: 'tridactylus' }];

function setup(respond = respondWith({ 'three toed woodpecker': picoides, 'woodpecker sp': picoides })) {
  const disambiguator = createDisambiguatorMock({ respond });
  const engine = createResolutionEngine({ index, disambiguator });
  const batch = createBatchManager(engine, { createId: sequentialIds() });
  return { disambiguator, batch };
}

describe('BatchManager', () => {
  describe('process', () => {
    test('creates a row per non-blank line', async () => {
      const { batch } = setup();
      const { rows, summary } = await batch.process(['Brown Creeper', '  ', 'Barred Owls', 'made up bird']);

      expect(rows.map((r) => r.rawInput)).toEqual(['Brown Creeper', 'Barred Owls', 'made up bird']);
      expect(rows.map((r) => r.status)).toEqual(['matched', 'matched', 'failed']);
      expect(rows.every((r) => !r.locked)).toBe(true);
      expect(new Set(rows.map((r) => r.id)).size).toBe(3);
      expect(summary).toMatchObject({ processed: 3, keptLocked: 0, matched: 2, failed: 1 });
    });

    test('records original names and mappings', async () => {
      const { batch } = setup();
      const { rows } = await batch.process(['Certhia americana, Brown Creeper']);

      expect(rows[0]).toMatchObject({
        originalCommon: 'Brown Creeper',
        originalLatin: 'Certhia americana',
        mapping: { latin: 'certhia americana', source: 'exact' },
      });
    });

    test('keeps row ids stable across reprocessing', async () => {
      const { batch } = setup();
      const first = await batch.process(['Brown Creeper', 'Barred Owl']);
      const second = await batch.process(['Brown Creeper', 'Grey Wolf']);

      expect(second.rows.map((r) => r.id)).toEqual(first.rows.map((r) => r.id));
      expect(second.rows[1].mapping?.latin).toBe('canis lupus');
    });

    test('reprocesses unlocked rows even when unchanged', async () => {
      const { batch, disambiguator } = setup();
      await batch.process(['three toed woodpecker']);
      await batch.process(['three toed woodpecker']);
      expect(disambiguator.suggest).toHaveBeenCalledTimes(2);
    });

    test('leaves a fully locked batch untouched', async () => {
      const { batch, disambiguator } = setup();
      const { rows } = await batch.process(['Brown Creeper', 'three toed woodpecker']);
      for (const row of rows) batch.toggleLock(row.id);
      const locked = batch.getRows();

      const again = await batch.process(['Barred Owl', 'Northern Cardinal']);

      expect(again.rows).toHaveLength(2);
      expect(again.rows[0]).toBe(locked[0]);
      expect(again.rows[1]).toBe(locked[1]);
      expect(again.summary).toMatchObject({ processed: 0, keptLocked: 2 });
      expect(disambiguator.suggest).toHaveBeenCalledTimes(1);
    });

    test('reprocesses only the unlocked row among locked siblings', async () => {
      const { batch } = setup();
      const { rows } = await batch.process(['Brown Creeper', 'Barred Owl', 'Canada Goose']);
      batch.toggleLock(rows[0].id);
      batch.toggleLock(rows[2].id);
      const before = batch.getRows();

      const after = await batch.process(['Brown Creeper', 'Grey Wolf', 'Canada Goose']);

      expect(after.rows[0]).toBe(before[0]);
      expect(after.rows[2]).toBe(before[2]);
      expect(after.rows[1].id).toBe(before[1].id);
      expect(after.rows[1].mapping?.latin).toBe('canis lupus');
      expect(after.summary.processed).toBe(1);
    });

    test('keeps locked rows when the input gets shorter', async () => {
      const { batch } = setup();
      const { rows } = await batch.process(['Brown Creeper', 'Barred Owl']);
      const lockedOwl = batch.toggleLock(rows[1].id);

      const after = await batch.process(['Northern Cardinal']);

      expect(after.rows).toHaveLength(2);
      expect(after.rows[0].id).toBe(rows[0].id);
      expect(after.rows[0].mapping?.latin).toBe('cardinalis cardinalis');
      expect(after.rows[1]).toBe(lockedOwl);
    });

    test('drops unlocked rows beyond the new input', async () => {
      const { batch } = setup();
      await batch.process(['Brown Creeper', 'Barred Owl']);
      const after = await batch.process(['Brown Creeper']);
      expect(after.rows.map((r) => r.rawInput)).toEqual(['Brown Creeper']);
    });

    test('counts locked higher-level claims in arbitration', async () => {
      const { batch } = setup();
      const first = await batch.process(['three toed woodpecker']);
      const locked = batch.toggleLock(first.rows[0].id);

      const { rows, summary } = await batch.process(['three toed woodpecker', 'woodpecker sp']);

      expect(rows[0]).toBe(locked);
      expect(rows[0].status).toBe('matched');
      expect(rows[1].status).toBe('ambiguous');
      expect(rows[1].contention?.rowIds).toEqual([locked.id, rows[1].id]);
      expect(summary.contested).toHaveLength(1);
    });

    test('aligns keyed input by id', async () => {
      const { batch } = setup();
      const { rows } = await batch.process(['Brown Creeper', 'Barred Owl']);

      const after = await batch.process([
        { id: rows[1].id, rawInput: 'Grey Wolf' },
        { rawInput: 'Canada Goose' },
      ]);

      expect(after.rows.map((r) => r.id)).toEqual([rows[1].id, expect.any(String)]);
      expect(after.rows[1].id).not.toBe(rows[0].id);
      expect(after.rows.map((r) => r.mapping?.latin)).toEqual(['canis lupus', 'branta canadensis']);
    });

    test('rejects keyed input naming an unknown row', async () => {
      const { batch } = setup();
      await expect(batch.process([{ id: 'missing', rawInput: 'Barred Owl' }])).rejects.toThrow(NotFoundError);
    });

    test('keeps a row that was locked while its run was in flight', async () => {
      let release: (value: DisambiguationResult) => void = () => {};
      const respond = vi.fn(
        () =>
          new Promise<DisambiguationResult>((resolve) => {
            release = resolve;
          }),
      );
      const { batch, disambiguator } = setup(respond);

      const running = batch.process(['three toed woodpecker']);
      await vi.waitFor(() => expect(disambiguator.suggest).toHaveBeenCalledTimes(1));
      release({ ok: true, candidates: picoides });
      const { rows } = await running;

      const second = batch.process(['woodpecker sp']);
      await vi.waitFor(() => expect(disambiguator.suggest).toHaveBeenCalledTimes(2));
      const locked = batch.toggleLock(rows[0].id);
      release({ ok: true, candidates: [] });

      const after = await second;
      expect(after.rows[0]).toBe(locked);
      expect(after.rows[0].rawInput).toBe('three toed woodpecker');
    });

    test('keeps an unlock made while a run was in flight', async () => {
      let release: (value: DisambiguationResult) => void = () => {};
      const respond = vi.fn(
        () =>
          new Promise<DisambiguationResult>((resolve) => {
            release = resolve;
          }),
      );
      const { batch, disambiguator } = setup(respond);

      const first = batch.process(['Brown Creeper', 'three toed woodpecker']);
      await vi.waitFor(() => expect(disambiguator.suggest).toHaveBeenCalledTimes(1));
      release({ ok: true, candidates: picoides });
      const { rows } = await first;
      batch.toggleLock(rows[0].id);

      const second = batch.process(['Brown Creeper', 'woodpecker sp']);
      await vi.waitFor(() => expect(disambiguator.suggest).toHaveBeenCalledTimes(2));
      const unlocked = batch.toggleLock(rows[0].id);
      release({ ok: true, candidates: picoides });

      const after = await second;
      expect(unlocked.locked).toBe(false);
      expect(after.rows[0]).toBe(unlocked);
      expect(batch.getRow(rows[0].id).locked).toBe(false);
    });

    test('keeps an edit to a locked row made while a run was in flight', async () => {
      let release: (value: DisambiguationResult) => void = () => {};
      const respond = vi.fn(
        () =>
          new Promise<DisambiguationResult>((resolve) => {
            release = resolve;
          }),
      );
      const { batch, disambiguator } = setup(respond);

      const first = batch.process(['Brown Creeper', 'three toed woodpecker']);
      await vi.waitFor(() => expect(disambiguator.suggest).toHaveBeenCalledTimes(1));
      release({ ok: true, candidates: picoides });
      const { rows } = await first;
      batch.toggleLock(rows[0].id);

      const second = batch.process(['Brown Creeper', 'woodpecker sp']);
      await vi.waitFor(() => expect(disambiguator.suggest).toHaveBeenCalledTimes(2));
      batch.edit(rows[0].id, { latin: 'Strix varia' });
      release({ ok: true, candidates: picoides });

      const after = await second;
      expect(after.rows[0].locked).toBe(true);
      expect(after.rows[0].mapping?.latin).toBe('strix varia');
      expect(batch.getRow(rows[0].id).mapping?.latin).toBe('strix varia');
    });

    test('serializes overlapping runs', async () => {
      const { batch } = setup();
      const [first, second] = await Promise.all([
        batch.process(['Brown Creeper']),
        batch.process(['Barred Owl']),
      ]);

      expect(first.rows[0].mapping?.latin).toBe('certhia americana');
      expect(second.rows[0].id).toBe(first.rows[0].id);
      expect(batch.getRows()[0].mapping?.latin).toBe('strix varia');
    });
  });

  describe('toggleLock', () => {
    test('flips only the lock flag', async () => {
      const { batch } = setup();
      const { rows } = await batch.process(['Brown Creeper']);

      const locked = batch.toggleLock(rows[0].id);
      expect(locked).toEqual({ ...rows[0], locked: true });
      expect(batch.toggleLock(rows[0].id).locked).toBe(false);
    });

    test('throws for an unknown row', () => {
      const { batch } = setup();
      expect(() => batch.toggleLock('missing')).toThrow(NotFoundError);
    });
  });

  describe('edit', () => {
    test('sets a manual species mapping', async () => {
      const { batch } = setup();
      const { rows } = await batch.process(['made up bird']);

      const edited = batch.edit(rows[0].id, { latin: 'Strix varia' });

      expect(edited.status).toBe('matched');
      expect(edited.reason).toBeUndefined();
      expect(edited.locked).toBe(false);
      expect(edited.mapping).toEqual({
        level: 'species',
        taxonKey: 'aves>strigiformes>strigidae>strix>varia',
        latin: 'strix varia',
        common: 'Barred Owl',
        source: 'manual',
      });
    });

    test('accepts a higher-level taxon and a custom common name', async () => {
      const { batch } = setup();
      const { rows } = await batch.process(['woodpecker sp', 'three toed woodpecker']);
      expect(rows[0].status).toBe('ambiguous');

      const edited = batch.edit(rows[0].id, { latin: 'Picoides', level: 'genus', common: 'woodpecker' });

      expect(edited.status).toBe('matched');
      expect(edited.contention).toBeUndefined();
      expect(edited.mapping).toMatchObject({ level: 'genus', latin: 'picoides', common: 'woodpecker' });
    });

    test('leaves the lock flag as it was', async () => {
      const { batch } = setup();
      const { rows } = await batch.process(['Brown Creeper']);
      batch.toggleLock(rows[0].id);

      expect(batch.edit(rows[0].id, { latin: 'Strix varia' }).locked).toBe(true);
    });

    test('rejects names outside the taxonomy', async () => {
      const { batch } = setup();
      const { rows } = await batch.process(['Brown Creeper']);

      expect(() => batch.edit(rows[0].id, { latin: 'Nonexistus madeupus' })).toThrow(BadRequestError);
      expect(() => batch.edit(rows[0].id, { latin: 'Picoides', level: 'family' })).toThrow(BadRequestError);
      expect(batch.getRow(rows[0].id)).toBe(rows[0]);
    });

    test('clears a mapping', async () => {
      const { batch } = setup();
      const { rows } = await batch.process(['Brown Creeper']);

      const cleared = batch.edit(rows[0].id, null);
      expect(cleared.mapping).toBeNull();
      expect(cleared.status).toBe('unresolved');
    });
  });

  describe('getTrace', () => {
    test('returns the events of the last resolution', async () => {
      const { batch } = setup();
      const { rows } = await batch.process(['Barred Owls']);
      expect(batch.getTrace(rows[0].id).map((e) => e.type)).toEqual(['parsed', 'exact', 'heuristic']);
      expect(batch.getTrace('missing')).toEqual([]);
    });
  });

  describe('updateSettings', () => {
    test('passes location and key to later runs', async () => {
      const { batch, disambiguator } = setup();
      batch.updateSettings({ location: 'Yukon', apiKey: 'test-key' });
      await batch.process(['three toed woodpecker']);

      expect(disambiguator.suggest.mock.calls[0][0]).toMatchObject({ location: 'Yukon', apiKey: 'test-key' });
      expect(batch.getSettings()).toEqual({ location: 'Yukon', apiKey: 'test-key' });
    });
  });

  describe('toOutputRows', () => {
    test('flattens rows for export', async () => {
      const { batch } = setup();
      const { rows } = await batch.process(['Brown Creeper', 'made up bird']);
      batch.toggleLock(rows[0].id);

      expect(batch.toOutputRows()).toEqual([
        {
          rawInput: 'Brown Creeper',
          commonName: 'Brown Creeper',
          latinName: 'certhia americana',
          matchedLevel: 'species',
          status: 'matched',
          locked: true,
          originalCommon: 'Brown Creeper',
          originalLatin: '',
        },
        {
          rawInput: 'made up bird',
          commonName: '',
          latinName: '',
          matchedLevel: null,
          status: 'failed',
          locked: false,
          originalCommon: 'made up bird',
          originalLatin: '',
        },
      ]);
    });
  });
});
