import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  sanitizeSheetName,
  SheetNameAllocator,
  MAX_SHEET_NAME_LENGTH,
  DEFAULT_SHEET_NAME,
} from './sheet-name.js';

const FORBIDDEN = [':', '\\', '/', '?', '*', '[', ']'];

// Labels heavy in forbidden characters, quotes and blanks
const awkwardLabelArb = fc.stringOf(
  fc.constantFrom(...FORBIDDEN, "'", ' ', 'a', 'B', '1', '_'),
  { maxLength: 45 }
);

const labelArb = fc.oneof(
  fc.string({ maxLength: 60 }),
  fc.string({ unit: 'grapheme', maxLength: 40 }),
  awkwardLabelArb
);

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

const usedNamesArb = fc.array(fc.oneof(fc.string({ maxLength: 31 }), fc.constantFrom('data', 'sheet', 'sheet_1')), {
  maxLength: 10,
});

describe('sanitizeSheetName', () => {
  describe('examples', () => {
    it('replaces forbidden characters with underscores', () => {
      expect(sanitizeSheetName('Reports:Q1/2024', new Set())).toBe('Reports_Q1_2024');
      expect(sanitizeSheetName('a\\b?c*d[e]f', new Set())).toBe('a_b_c_d_e_f');
    });

    it('turns project labels into readable names', () => {
      expect(sanitizeSheetName('my-project::gke_clusters', new Set())).toBe('my-project__gke_clusters');
    });

    it('appends the smallest free numeric suffix', () => {
      expect(sanitizeSheetName('data', new Set(['data']))).toBe('data_1');
      expect(sanitizeSheetName('data', new Set(['data', 'data_1']))).toBe('data_2');
      expect(sanitizeSheetName('data', new Set(['data', 'data_2']))).toBe('data_1');
    });

    it('keeps counting past single digit suffixes', () => {
      const used = new Set(['data', ...Array.from({ length: 9 }, (_, i) => `data_${i + 1}`)]);
      expect(sanitizeSheetName('data', used)).toBe('data_10');
    });

    it('truncates to 31 characters', () => {
      const name = sanitizeSheetName('x'.repeat(40), new Set());
      expect(name).toBe('x'.repeat(31));
    });

    it('does not split a surrogate pair when truncating', () => {
      expect(sanitizeSheetName('a'.repeat(30) + '\u{1F600}', new Set())).toBe('a'.repeat(30));
      expect(sanitizeSheetName('a'.repeat(29) + '\u{1F600}', new Set())).toBe('a'.repeat(29) + '\u{1F600}');
    });

    it('does not split a surrogate pair when shortening for a suffix', () => {
      const base = 'a'.repeat(28) + '\u{1F600}b';
      expect(sanitizeSheetName(base, new Set([base]))).toBe('a'.repeat(28) + '_1');
    });

    it('disambiguates labels that only collide after truncation', () => {
      const used = new Set<string>();
      const first = sanitizeSheetName('a'.repeat(31) + 'X', used);
      const second = sanitizeSheetName('a'.repeat(31) + 'Y', used);

      expect(first).toBe('a'.repeat(31));
      expect(second).toBe('a'.repeat(29) + '_1');
    });

    it('shortens the base so a long suffix still fits', () => {
      const base = 'b'.repeat(31);
      const used = new Set([base, ...Array.from({ length: 9 }, (_, i) => `${'b'.repeat(29)}_${i + 1}`)]);

      expect(sanitizeSheetName(base, used)).toBe('b'.repeat(28) + '_10');
    });

    it('uses the default name for labels with nothing to keep', () => {
      expect(sanitizeSheetName(':::', new Set())).toBe(DEFAULT_SHEET_NAME);
      expect(sanitizeSheetName('', new Set())).toBe('sheet');
      expect(sanitizeSheetName("' '", new Set())).toBe('sheet');
    });

    it('disambiguates repeated empty labels', () => {
      const used = new Set<string>();
      expect(sanitizeSheetName('', used)).toBe('sheet');
      expect(sanitizeSheetName(':::', used)).toBe('sheet_1');
      expect(sanitizeSheetName('[]', used)).toBe('sheet_2');
    });

    it('compares names case-insensitively', () => {
      expect(sanitizeSheetName('data', new Set(['DATA']))).toBe('data_1');
    });

    it('strips apostrophes at either end', () => {
      expect(sanitizeSheetName("'quoted'", new Set())).toBe('quoted');
      expect(sanitizeSheetName("it's", new Set())).toBe("it's");
    });

    it('never returns the reserved History name', () => {
      expect(sanitizeSheetName('History', new Set())).toBe('History_1');
      expect(sanitizeSheetName('history', new Set())).toBe('history_1');
    });

    it('records the chosen name in the used set', () => {
      const used = new Set<string>();
      const name = sanitizeSheetName('compute', used);
      expect(used.has(name)).toBe(true);
    });
  });

  describe('properties', () => {
    it('produces a valid name that was not already used', () => {
      fc.assert(
        fc.property(labelArb, usedNamesArb, (label, usedNames) => {
          const used = new Set(usedNames);
          const before = new Set(usedNames.map(name => name.toLowerCase()));

          const name = sanitizeSheetName(label, used);

          expect(name.length).toBeGreaterThan(0);
          expect(name.length).toBeLessThanOrEqual(MAX_SHEET_NAME_LENGTH);
          for (const ch of FORBIDDEN) {
            expect(name.includes(ch)).toBe(false);
          }
          expect(LONE_SURROGATE.test(name)).toBe(false);
          expect(name.startsWith("'")).toBe(false);
          expect(name.endsWith("'")).toBe(false);
          expect(before.has(name.toLowerCase())).toBe(false);
          expect(used.has(name)).toBe(true);
        }),
        { numRuns: 200 }
      );
    });

    it('yields distinct names when called twice with the same set', () => {
      fc.assert(
        fc.property(labelArb, usedNamesArb, (label, usedNames) => {
          const used = new Set(usedNames);
          const first = sanitizeSheetName(label, used);
          const second = sanitizeSheetName(label, used);
          expect(first.toLowerCase()).not.toBe(second.toLowerCase());
        }),
        { numRuns: 200 }
      );
    });
  });
});

describe('SheetNameAllocator', () => {
  it('allocates unique names within one allocator', () => {
    const names = new SheetNameAllocator();
    expect(names.allocate('p::compute')).toBe('p__compute');
    expect(names.allocate('p//compute')).toBe('p__compute_1');
    expect(names.allocate('P::COMPUTE')).toBe('P__COMPUTE_2');
  });

  it('starts empty for each run', () => {
    expect(new SheetNameAllocator().allocate('data')).toBe('data');
    expect(new SheetNameAllocator().allocate('data')).toBe('data');
  });

  it('makes a released name available again', () => {
    const names = new SheetNameAllocator();
    const name = names.allocate('data');
    names.release(name);
    expect(names.allocate('data')).toBe('data');
  });
});
