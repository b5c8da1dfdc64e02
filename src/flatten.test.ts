import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { flattenRecords, collectColumns, toCellValue } from './flatten.js';
import { toRecords } from './records.js';
import type { InventoryRecord, JsonValue } from './types.js';

const fieldNameArb = fc.constantFrom('name', 'zone', 'status', 'labels', 'createTime', 'id', 'tags');

const primitiveArb = fc.oneof(fc.string(), fc.integer(), fc.boolean(), fc.constant(null));

const nestedArb: fc.Arbitrary<JsonValue> = fc.oneof(
  fc.array(primitiveArb, { maxLength: 3 }),
  fc.dictionary(fc.string({ minLength: 1, maxLength: 8 }), primitiveArb, { maxKeys: 3 }),
  fc.dictionary(fc.string({ minLength: 1, maxLength: 8 }), fc.array(primitiveArb, { maxLength: 3 }), { maxKeys: 2 })
);

const jsonValueArb: fc.Arbitrary<JsonValue> = fc.oneof(primitiveArb, nestedArb);

const recordArb: fc.Arbitrary<InventoryRecord> = fc.dictionary(fieldNameArb, jsonValueArb, { maxKeys: 5 });

describe('toCellValue', () => {
  it('keeps primitives as they are', () => {
    expect(toCellValue('vm-1')).toBe('vm-1');
    expect(toCellValue(42)).toBe(42);
    expect(toCellValue(false)).toBe(false);
  });

  it('renders null and missing values as empty cells', () => {
    expect(toCellValue(null)).toBeNull();
    expect(toCellValue(undefined)).toBeNull();
  });

  it('serializes nested values as JSON text', () => {
    expect(toCellValue({ env: 'prod' })).toBe('{"env":"prod"}');
    expect(toCellValue(['a', 1])).toBe('["a",1]');
    expect(toCellValue([])).toBe('[]');
  });
});

describe('flattenRecords', () => {
  it('uses the union of fields as columns, in order of first appearance', () => {
    const table = flattenRecords([
      { name: 'vm-1', zone: 'us-central1-a' },
      { name: 'vm-2', status: 'RUNNING' },
      { zone: 'europe-west1-b', id: 7 },
    ]);

    expect(table.columns).toEqual(['name', 'zone', 'status', 'id']);
    expect(table.rows).toEqual([
      ['vm-1', 'us-central1-a', null, null],
      ['vm-2', null, 'RUNNING', null],
      [null, 'europe-west1-b', null, 7],
    ]);
  });

  it('keeps nested values in a single cell that decodes back', () => {
    const labels = { env: 'prod', team: 'data' };
    const disks = [{ boot: true, sizeGb: '10' }, { boot: false, sizeGb: '200' }];

    const table = flattenRecords([{ name: 'vm-1', labels, disks }]);

    expect(table.columns).toEqual(['name', 'labels', 'disks']);
    const [row] = table.rows;
    expect(JSON.parse(String(row[1]))).toEqual(labels);
    expect(JSON.parse(String(row[2]))).toEqual(disks);
  });

  it('gives a __proto__ field its own column', () => {
    const records = toRecords(JSON.parse('[{"__proto__":{"x":1},"b":2}]'));

    expect(flattenRecords(records)).toEqual({ columns: ['__proto__', 'b'], rows: [['{"x":1}', 2]] });
  });

  it('produces an empty table for no records', () => {
    expect(flattenRecords([])).toEqual({ columns: [], rows: [] });
  });

  it('produces a row without columns for an empty record', () => {
    expect(flattenRecords([{}])).toEqual({ columns: [], rows: [[]] });
  });

  it('column set is the union of all record fields', () => {
    fc.assert(
      fc.property(fc.array(recordArb, { maxLength: 8 }), records => {
        const table = flattenRecords(records);
        const expected = new Set(records.flatMap(record => Object.keys(record)));

        expect(new Set(table.columns)).toEqual(expected);
        expect(table.columns.length).toBe(expected.size);
        expect(table.rows.length).toBe(records.length);
      })
    );
  });

  it('every cell matches its record field', () => {
    fc.assert(
      fc.property(fc.array(recordArb, { maxLength: 8 }), records => {
        const table = flattenRecords(records);

        records.forEach((record, r) => {
          table.columns.forEach((column, c) => {
            const cell = table.rows[r][c];
            const value = record[column];
            if (!(column in record) || value === null) {
              expect(cell).toBeNull();
            } else if (typeof value === 'object') {
              expect(JSON.parse(String(cell))).toEqual(value);
            } else {
              expect(cell).toBe(value);
            }
          });
        });
      })
    );
  });
});

describe('collectColumns', () => {
  it('lists each field once', () => {
    expect(collectColumns([{ a: 1, b: 2 }, { b: 3, a: 4 }])).toEqual(['a', 'b']);
  });
});
