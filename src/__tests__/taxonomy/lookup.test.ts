import { describe, expect, test } from 'vitest';
import { buildIndex } from '../helpers';

const index = buildIndex();

describe('TaxonomyIndex', () => {
  test('counts entries and distinct taxa per level', () => {
    expect(index.size).toBe(13);
    expect(index.countAtLevel('species')).toBe(11);
    expect(index.countAtLevel('genus')).toBe(11);
    expect(index.countAtLevel('family')).toBe(11);
    expect(index.countAtLevel('class')).toBe(2);
  });

  test('is frozen after construction', () => {
    expect(Object.isFrozen(index)).toBe(true);
  });

  describe('findAtLevel', () => {
    test('finds a genus with its own ranked entry', () => {
      const hit = index.findAtLevel('genus', 'Picoides');
      expect(hit?.level).toBe('genus');
      expect(hit?.name).toBe('picoides');
      expect(hit?.taxonKey).toBe('aves>piciformes>picidae>picoides');
      expect(hit?.entry?.id).toBe('t-005');
      expect(hit?.members.map((m) => m.id)).toEqual(['t-003', 't-004', 't-005']);
    });

    test('finds a genus known only through its species', () => {
      const hit = index.findAtLevel('genus', 'certhia');
      expect(hit?.taxonKey).toBe('aves>passeriformes>certhiidae>certhia');
      expect(hit?.entry).toBeUndefined();
      expect(hit?.members.map((m) => m.id)).toEqual(['t-001']);
    });

    test('finds species by binomial', () => {
      const hit = index.findAtLevel('species', '  Picoides   Dorsalis ');
      expect(hit?.taxonKey).toBe('aves>piciformes>picidae>picoides>dorsalis');
      expect(hit?.entry?.primaryCommon).toBe('American Three-toed Woodpecker');
    });

    test('scopes the lookup to one level', () => {
      expect(index.findAtLevel('genus', 'picoides dorsalis')).toBeNull();
      expect(index.findAtLevel('family', 'picoides')).toBeNull();
      expect(index.findAtLevel('family', 'Picidae')?.taxonKey).toBe('aves>piciformes>picidae');
    });

    test('returns null for blank names', () => {
      expect(index.findAtLevel('species', '   ')).toBeNull();
    });
  });

  describe('findSpeciesByLatin', () => {
    test('matches case and whitespace insensitively', () => {
      expect(index.findSpeciesByLatin('CERTHIA   americana')?.id).toBe('t-001');
    });

    test('ignores entries ranked above species', () => {
      expect(index.findSpeciesByLatin('picoides')).toBeNull();
    });
  });

  describe('findSpeciesByCommon', () => {
    test('matches any common name of the species', () => {
      expect(index.findSpeciesByCommon('american tree-creeper')?.id).toBe('t-001');
      expect(index.findSpeciesByCommon('Timber Wolf')?.id).toBe('t-011');
    });

    test('requires punctuation to match unless loose', () => {
      expect(index.findSpeciesByCommon('Coopers Hawk')).toBeNull();
      expect(index.findSpeciesByCommon('Coopers Hawk', { loose: true })?.id).toBe('t-006');
    });

    test('does not index genus-level common names', () => {
      expect(index.findSpeciesByCommon('Three-toed Woodpeckers')).toBeNull();
    });
  });
});
