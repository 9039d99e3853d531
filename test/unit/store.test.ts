/**
 * Unit tests for the record store (src/compare/store.ts).
 */
import { describe, it, expect } from 'vitest';
import { RecordStore, THUNK_SIZE } from '../../src/compare/store.js';
import type { OrigRow } from '../../src/compare/schema.js';
import { InconsistentInputError } from '../../src/core/error.js';
import { SymbolType } from '../../src/core/types.js';

/** Every non-null address occurs at most once on each side. */
function expectUnique(store: RecordStore): void {
  const orig = store.records().map((r) => r.origAddr).filter((a) => a !== null);
  const recomp = store.records().map((r) => r.recompAddr).filter((a) => a !== null);
  expect(new Set(orig).size).toBe(orig.length);
  expect(new Set(recomp).size).toBe(recomp.length);
}

describe('RecordStore ingestion', () => {
  it('ignores a second insert at the same original address', () => {
    const store = new RecordStore();
    expect(store.insertOrig(0x1000, SymbolType.FUNCTION, 'first')).toBe(true);
    expect(store.insertOrig(0x1000, SymbolType.DATA, 'second')).toBe(false);
    expect(store.size).toBe(1);
    expect(store.getRecordByOrig(0x1000)?.name).toBe('first');
  });

  it('ignores a second insert at the same recompiled address', () => {
    const store = new RecordStore();
    store.insertRecomp(0x2000, SymbolType.FUNCTION, '_strlwr', '__strlwr_decorated');
    store.insertRecomp(0x2000, SymbolType.FUNCTION, '__strlwr');
    expect(store.size).toBe(1);
    expect(store.getRecordByRecomp(0x2000)?.name).toBe('_strlwr');
  });

  it('keeps the two sides independent', () => {
    const store = new RecordStore();
    store.insertOrig(0x1000);
    store.insertRecomp(0x1000);
    expect(store.size).toBe(2);
    expect(store.getRecordByOrig(0x1000)?.recompAddr).toBeNull();
    expect(store.getRecordByRecomp(0x1000)?.origAddr).toBeNull();
  });

  it('bulk inserts recompiled rows and counts the ones added', () => {
    const store = new RecordStore();
    const added = store.bulkInsertRecomp([
      { addr: 0x2000, type: SymbolType.FUNCTION, name: 'Foo::Bar', symbol: '?Bar@Foo@@QAEXXZ', size: 16 },
      { addr: 0x2010, type: SymbolType.DATA, name: 'g_value', size: 4 },
      { addr: 0x2000, type: SymbolType.FUNCTION, name: 'duplicate' },
    ]);
    expect(added).toBe(2);
    const rec = store.getRecordByRecomp(0x2000);
    expect(rec?.decoratedName).toBe('?Bar@Foo@@QAEXXZ');
    expect(rec?.size).toBe(16);
  });

  it('bulk inserts original rows', () => {
    const store = new RecordStore();
    expect(store.bulkInsertOrig([{ addr: 0x1000 }, { addr: 0x1010, name: 'x', size: 8 }])).toBe(2);
    expect(store.getRecordByOrig(0x1010)?.size).toBe(8);
  });

  it('inserts pre-paired array rows unless either address is taken', () => {
    const store = new RecordStore();
    store.insertOrig(0x1100);
    store.insertRecomp(0x2200);
    const added = store.bulkInsertArray([
      { orig: 0x1000, recomp: 0x2000, name: 'array[0]' },
      { orig: 0x1100, recomp: 0x2100, name: 'orig taken' },
      { orig: 0x1200, recomp: 0x2200, name: 'recomp taken' },
    ]);
    expect(added).toBe(1);
    const rec = store.getRecordByOrig(0x1000);
    expect(rec?.recompAddr).toBe(0x2000);
    expect(rec?.isMatched()).toBe(true);
    expect(store.getRecordByRecomp(0x2100)).toBeUndefined();
    expectUnique(store);
  });

  it('rejects malformed producer rows', () => {
    const store = new RecordStore();
    expect(() => store.bulkInsertRecomp([{ addr: -1 }])).toThrow(InconsistentInputError);
    expect(() => store.bulkInsertRecomp([{ addr: 1.5 }])).toThrow('recompiled symbol row: addr');
    // Rows as a producer would hand them over, straight from its JSON output.
    const rows: OrigRow[] = JSON.parse('[{"addr": 16, "type": 99}]');
    expect(() => store.bulkInsertOrig(rows)).toThrow('original symbol row: type');
  });
});

describe('RecordStore pairing', () => {
  it('setPair fills the original address of the recompiled record', () => {
    const store = new RecordStore();
    store.insertRecomp(0x2000, null, 'Foo');
    expect(store.setPair(0x1000, 0x2000, SymbolType.FUNCTION)).toBe(true);
    const rec = store.getRecordByRecomp(0x2000);
    expect(rec?.origAddr).toBe(0x1000);
    expect(rec?.type).toBe(SymbolType.FUNCTION);
    expect(store.getRecordByOrig(0x1000)).toBe(rec);
  });

  it('setPair succeeds once and then fails without changes', () => {
    const store = new RecordStore();
    store.insertRecomp(0x2000);
    expect(store.setPair(0x1000, 0x2000)).toBe(true);
    expect(store.setPair(0x1000, 0x2000)).toBe(false);
    expect(store.getRecordByRecomp(0x2000)?.origAddr).toBe(0x1000);
  });

  it('setPair fails when the original address is paired with another record', () => {
    const store = new RecordStore();
    store.insertRecomp(0x2000);
    store.insertRecomp(0x2100);
    store.setPair(0x1000, 0x2000);
    expect(store.setPair(0x1000, 0x2100)).toBe(false);
    expect(store.getRecordByRecomp(0x2100)?.origAddr).toBeNull();
    expect(store.getRecordByOrig(0x1000)?.recompAddr).toBe(0x2000);
    expectUnique(store);
  });

  it('setPair fails when the original address belongs to a pre-paired array row', () => {
    const store = new RecordStore();
    store.bulkInsertArray([{ orig: 0x1000, recomp: 0x3000, name: 'table' }]);
    store.insertRecomp(0x2000);
    expect(store.setPair(0x1000, 0x2000)).toBe(false);
  });

  it('setPair absorbs an original-only placeholder at the address', () => {
    const store = new RecordStore();
    store.insertOrig(0x1000, SymbolType.FUNCTION, 'orig name', 12);
    store.insertRecomp(0x2000, null, 'recomp name');
    expect(store.setPair(0x1000, 0x2000)).toBe(true);
    expect(store.size).toBe(1);
    const rec = store.getRecordByOrig(0x1000);
    expect(rec).toBe(store.getRecordByRecomp(0x2000));
    expect(rec?.name).toBe('recomp name');
    expect(rec?.type).toBe(SymbolType.FUNCTION);
    expect(rec?.size).toBe(12);
    expect(store.findPotentialMatch('orig name', SymbolType.FUNCTION)).toBeUndefined();
    expectUnique(store);
  });

  it('setPair fails when no record holds the recompiled address', () => {
    const store = new RecordStore();
    expect(store.setPair(0x1000, 0x2000)).toBe(false);
    expect(store.origUsed(0x1000)).toBe(false);
    expect(store.recompUsed(0x2000)).toBe(false);
  });

  it('setPair never moves a matched record to another original address', () => {
    const store = new RecordStore();
    store.insertRecomp(0x2000);
    store.setPair(0x1000, 0x2000);
    expect(store.setPair(0x1004, 0x2000)).toBe(false);
    expect(store.getRecordByRecomp(0x2000)?.origAddr).toBe(0x1000);
    expect(store.origUsed(0x1004)).toBe(false);
    expect(store.recompUsed(0x2000)).toBe(true);
  });

  it('setPair overwrites the classification when one is given', () => {
    const store = new RecordStore();
    store.insertRecomp(0x2000, SymbolType.DATA);
    store.setPair(0x1000, 0x2000, SymbolType.POINTER);
    expect(store.getRecordByRecomp(0x2000)?.type).toBe(SymbolType.POINTER);
  });

  it('setPair without a classification keeps the existing one', () => {
    const store = new RecordStore();
    store.insertRecomp(0x2000, SymbolType.DATA);
    store.setPair(0x1000, 0x2000);
    expect(store.getRecordByRecomp(0x2000)?.type).toBe(SymbolType.DATA);
  });

  it('setPairTentative does not override a confirmed pairing', () => {
    const store = new RecordStore();
    store.insertRecomp(0x2000);
    expect(store.setPair(0x1000, 0x2000)).toBe(true);
    expect(store.setPairTentative(0x1008, 0x2000)).toBe(false);
    expect(store.getRecordByRecomp(0x2000)?.origAddr).toBe(0x1000);
  });

  it('setPairTentative only fills a missing classification', () => {
    const store = new RecordStore();
    store.insertRecomp(0x2000, SymbolType.DATA);
    store.insertRecomp(0x2004);
    expect(store.setPairTentative(0x1000, 0x2000, SymbolType.POINTER)).toBe(true);
    expect(store.setPairTentative(0x1004, 0x2004, SymbolType.POINTER)).toBe(true);
    expect(store.getRecordByRecomp(0x2000)?.type).toBe(SymbolType.DATA);
    expect(store.getRecordByRecomp(0x2004)?.type).toBe(SymbolType.POINTER);
  });

  it('setPairTentative fails when the original address is paired elsewhere', () => {
    const store = new RecordStore();
    store.insertRecomp(0x2000);
    store.insertRecomp(0x2100);
    store.setPairTentative(0x1000, 0x2000);
    expect(store.setPairTentative(0x1000, 0x2100)).toBe(false);
    expect(store.getRecordByRecomp(0x2100)?.origAddr).toBeNull();
  });

  it('setPairTentative absorbs a placeholder but keeps the recompiled classification', () => {
    const store = new RecordStore();
    store.insertOrig(0x1000, SymbolType.POINTER);
    store.insertRecomp(0x2000, SymbolType.DATA);
    expect(store.setPairTentative(0x1000, 0x2000, SymbolType.FLOAT)).toBe(true);
    expect(store.getRecordByOrig(0x1000)?.type).toBe(SymbolType.DATA);
  });

  it('setFunctionPair classifies the record as a function', () => {
    const store = new RecordStore();
    store.insertRecomp(0x2000);
    expect(store.setFunctionPair(0x1000, 0x2000)).toBe(true);
    expect(store.getRecordByOrig(0x1000)?.type).toBe(SymbolType.FUNCTION);
  });

  it('keeps addresses unique through a mixed sequence', () => {
    const store = new RecordStore();
    for (let i = 0; i < 8; i++) {
      store.insertOrig(0x1000 + i * 0x10);
      store.insertRecomp(0x2000 + i * 0x10);
    }
    store.bulkInsertArray([{ orig: 0x1000, recomp: 0x3000, name: 'a' }]);
    for (let i = 0; i < 8; i++) {
      store.setPair(0x1000 + i * 0x10, 0x2000 + i * 0x10);
      store.setPairTentative(0x5000 + i, 0x2000 + ((i + 1) % 8) * 0x10);
      store.setPair(0x6000, 0x2000 + i * 0x10);
    }
    store.createOrigThunk(0x1010, 'x');
    store.createRecompThunk(0x2010, 'x');
    expectUnique(store);
  });
});

describe('RecordStore thunks', () => {
  it('creates a recompiled thunk once', () => {
    const store = new RecordStore();
    expect(store.createRecompThunk(0x3000, 'Baz::Qux')).toBe(true);
    expect(store.createRecompThunk(0x3000, 'Baz::Qux')).toBe(false);
    const rec = store.getRecordByRecomp(0x3000);
    expect(rec?.name).toBe("Thunk of 'Baz::Qux'");
    expect(rec?.type).toBe(SymbolType.FUNCTION);
    expect(rec?.size).toBe(THUNK_SIZE);
    expect(rec?.origAddr).toBeNull();
  });

  it('creates an original thunk unless the address is used', () => {
    const store = new RecordStore();
    store.insertOrig(0x1000);
    expect(store.createOrigThunk(0x1000, 'f')).toBe(false);
    expect(store.createOrigThunk(0x1005, 'f')).toBe(true);
    expect(store.getRecordByOrig(0x1005)?.size).toBe(5);
  });
});

describe('RecordStore name lookup', () => {
  it('finds an unpaired record by plain name', () => {
    const store = new RecordStore();
    store.insertRecomp(0x2000, SymbolType.FUNCTION, 'Foo::Bar', '?Bar@Foo@@QAEXXZ');
    expect(store.findPotentialMatch('Foo::Bar', SymbolType.FUNCTION)).toBe(0x2000);
    expect(store.findPotentialMatch('Foo::Bar', SymbolType.DATA)).toBeUndefined();
  });

  it('looks up mangled names by decorated name', () => {
    const store = new RecordStore();
    store.insertRecomp(0x2000, SymbolType.FUNCTION, 'Foo::Bar', '?Bar@Foo@@QAEXXZ');
    expect(store.findPotentialMatch('?Bar@Foo@@QAEXXZ', SymbolType.FUNCTION)).toBe(0x2000);
  });

  it('never treats a string value as a decorated name', () => {
    const store = new RecordStore();
    store.insertRecomp(0x2000, SymbolType.STRING, '?what', '?what');
    store.insertRecomp(0x2010, SymbolType.STRING, 'other', '?who');
    expect(store.findPotentialMatch('?what', SymbolType.STRING)).toBe(0x2000);
    expect(store.findPotentialMatch('?who', SymbolType.STRING)).toBeUndefined();
  });

  it('accepts records with unknown classification', () => {
    const store = new RecordStore();
    store.insertRecomp(0x2000, null, 'g_thing');
    expect(store.findPotentialMatch('g_thing', SymbolType.DATA)).toBe(0x2000);
  });

  it('skips paired records', () => {
    const store = new RecordStore();
    store.insertRecomp(0x2000, SymbolType.FUNCTION, 'f');
    store.setPair(0x1000, 0x2000);
    expect(store.findPotentialMatch('f', SymbolType.FUNCTION)).toBeUndefined();
  });

  it('picks the lowest recompiled address among equal names', () => {
    const store = new RecordStore();
    store.insertRecomp(0x2300, SymbolType.DATA, 'dup');
    store.insertRecomp(0x2100, SymbolType.DATA, 'dup');
    store.insertRecomp(0x2200, SymbolType.DATA, 'dup');
    expect(store.findPotentialMatch('dup', SymbolType.DATA)).toBe(0x2100);
  });

  it('rename moves the record in the name index', () => {
    const store = new RecordStore();
    store.insertRecomp(0x2000, SymbolType.FUNCTION, 'old');
    const rec = store.getRecordByRecomp(0x2000);
    if (rec === undefined) throw new Error('record missing');
    store.rename(rec, 'new');
    expect(store.findPotentialMatch('old', SymbolType.FUNCTION)).toBeUndefined();
    expect(store.findPotentialMatch('new', SymbolType.FUNCTION)).toBe(0x2000);
  });
});
