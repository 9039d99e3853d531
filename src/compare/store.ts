/**
 * @file store.ts
 * @description Address-indexed record store.
 *
 * Every record lives in one arena.  Two sorted indices map original and
 * recompiled addresses to their record; both are partial unique keys, a
 * missing address never collides.  Two hash indices map plain and decorated
 * names to the records carrying them, for the engine's name lookups.
 *
 * Ingestion follows first-writer-wins: inserting an address that is already
 * known on that side is a silent no-op, since extractors overlap routinely.
 *
 * The original-side scanner only knows where symbols start.  Its records are
 * placeholders: pairing a recompiled record with an original address held by
 * an unpaired original-only record merges that record into the recompiled
 * one, which then stands for the symbol on both sides.
 */

import { SortedMap, numericOrder } from '../util/sorted-map.js';
import { SymbolType, hex, type uint4 } from '../core/types.js';
import type { Logger } from '../core/log.js';
import { SymbolRecord } from './record.js';
import {
  arrayRowSchema,
  origRowSchema,
  parseRow,
  recompRowSchema,
  type ArrayRow,
  type OrigRow,
  type RecompRow,
} from './schema.js';

/** Byte length of a near relative jump, the only thunk form recognized. */
export const THUNK_SIZE = 5;

/** First character of every decorated (mangled) name. */
export const MANGLED_PREFIX = '?';

/** Name given to a synthesized thunk record. */
export function thunkName(name: string): string {
  return `Thunk of '${name}'`;
}

function addToIndex(index: Map<string, SymbolRecord[]>, key: string, rec: SymbolRecord): void {
  const list = index.get(key);
  if (list === undefined) {
    index.set(key, [rec]);
  } else {
    list.push(rec);
  }
}

function removeFromIndex(index: Map<string, SymbolRecord[]>, key: string, rec: SymbolRecord): void {
  const list = index.get(key);
  if (list === undefined) return;
  const i = list.indexOf(rec);
  if (i >= 0) list.splice(i, 1);
  if (list.length === 0) index.delete(key);
}

export class RecordStore {
  private readonly arena: SymbolRecord[] = [];
  private readonly byOrig = new SortedMap<uint4, SymbolRecord>(numericOrder);
  private readonly byRecomp = new SortedMap<uint4, SymbolRecord>(numericOrder);
  private readonly byName = new Map<string, SymbolRecord[]>();
  private readonly byDecorated = new Map<string, SymbolRecord[]>();
  /** Placeholders merged into a recompiled record by a pairing. */
  private readonly merged = new Set<SymbolRecord>();
  private readonly log: Logger | undefined;

  constructor(log?: Logger) {
    this.log = log;
  }

  /** Number of live records. */
  get size(): number {
    return this.arena.length - this.merged.size;
  }

  // -- Ingestion ----------------------------------------------------------

  private addRecord(
    origAddr: uint4 | null,
    recompAddr: uint4 | null,
    type: SymbolType | null,
    name: string | null,
    decoratedName: string | null,
    size: number | null,
  ): SymbolRecord {
    const rec = new SymbolRecord(this.arena.length, origAddr, recompAddr, type, name, decoratedName, size);
    this.arena.push(rec);
    if (origAddr !== null) this.byOrig.insert(origAddr, rec);
    if (recompAddr !== null) this.byRecomp.insert(recompAddr, rec);
    if (name !== null) addToIndex(this.byName, name, rec);
    if (decoratedName !== null) addToIndex(this.byDecorated, decoratedName, rec);
    return rec;
  }

  /** Add an original-side symbol.  @returns false if the address is already known */
  insertOrig(addr: uint4, type?: SymbolType | null, name?: string | null, size?: number | null): boolean {
    if (this.byOrig.has(addr)) return false;
    this.addRecord(addr, null, type ?? null, name ?? null, null, size ?? null);
    return true;
  }

  /**
   * Add a recompiled-side symbol.  The same recompiled address often comes
   * with several names (`_strlwr` and `__strlwr`); the first one is kept.
   * @returns false if the address is already known
   */
  insertRecomp(
    addr: uint4,
    type?: SymbolType | null,
    name?: string | null,
    decoratedName?: string | null,
    size?: number | null,
  ): boolean {
    if (this.byRecomp.has(addr)) return false;
    this.addRecord(null, addr, type ?? null, name ?? null, decoratedName ?? null, size ?? null);
    return true;
  }

  /** Ingest rows from the original-binary scanner.  @returns rows added */
  bulkInsertOrig(rows: Iterable<OrigRow>): number {
    let added = 0;
    for (const raw of rows) {
      const row = parseRow(origRowSchema, 'original symbol row', raw);
      if (this.insertOrig(row.addr, row.type, row.name, row.size)) added++;
    }
    return added;
  }

  /** Ingest rows from the recompiled debug-info scanner.  @returns rows added */
  bulkInsertRecomp(rows: Iterable<RecompRow>): number {
    let added = 0;
    for (const raw of rows) {
      const row = parseRow(recompRowSchema, 'recompiled symbol row', raw);
      if (this.insertRecomp(row.addr, row.type, row.name, row.symbol, row.size)) added++;
    }
    return added;
  }

  /**
   * Ingest compiler-generated array and jump-table symbols whose addresses
   * are already known to correspond.  A row whose original or recompiled
   * address is taken is skipped.
   * @returns rows added
   */
  bulkInsertArray(rows: Iterable<ArrayRow>): number {
    let added = 0;
    for (const raw of rows) {
      const row = parseRow(arrayRowSchema, 'array row', raw);
      if (this.byOrig.has(row.orig) || this.byRecomp.has(row.recomp)) continue;
      this.addRecord(row.orig, row.recomp, null, row.name ?? null, null, null);
      added++;
    }
    return added;
  }

  // -- Pairing ------------------------------------------------------------

  origUsed(addr: uint4): boolean {
    return this.byOrig.has(addr);
  }

  recompUsed(addr: uint4): boolean {
    return this.byRecomp.has(addr);
  }

  /**
   * Record holding `orig` that stops a pairing: any record except an
   * original-only placeholder, which the pairing absorbs.
   */
  private origClaim(orig: uint4): { blocked: boolean; placeholder?: SymbolRecord } {
    const holder = this.byOrig.get(orig);
    if (holder === undefined) return { blocked: false };
    if (holder.recompAddr !== null) return { blocked: true };
    return { blocked: false, placeholder: holder };
  }

  private assignOrig(rec: SymbolRecord, orig: uint4, placeholder: SymbolRecord | undefined): void {
    rec.origAddr = orig;
    if (placeholder === undefined) {
      this.byOrig.insert(orig, rec);
      return;
    }
    // The recompiled side's debug data wins; the placeholder only fills gaps.
    this.byOrig.replace(orig, rec);
    this.merged.add(placeholder);
    if (placeholder.name !== null) removeFromIndex(this.byName, placeholder.name, placeholder);
    if (rec.type === null) rec.type = placeholder.type;
    if (rec.name === null && placeholder.name !== null) this.rename(rec, placeholder.name);
    if (rec.size === null) rec.size = placeholder.size;
  }

  /**
   * Give the record at recompiled address `recomp` the original address
   * `orig`.  Used for high-confidence sources: explicit markers and
   * entry-point correlation.  A supplied `type` replaces the record's
   * classification.
   *
   * @returns false, changing nothing, if `orig` is already paired with
   * another record, no record holds `recomp`, or that record is already
   * paired
   */
  setPair(orig: uint4, recomp: uint4, type?: SymbolType | null): boolean {
    const claim = this.origClaim(orig);
    if (claim.blocked) {
      this.log?.debug('Original address %s not unique!', hex(orig));
      return false;
    }
    const rec = this.byRecomp.get(recomp);
    if (rec === undefined || rec.origAddr !== null) return false;

    this.assignOrig(rec, orig, claim.placeholder);
    if (type !== undefined && type !== null) rec.type = type;
    return true;
  }

  /**
   * Pairing for matches found by automated analysis.  Same guards as
   * setPair, but the classification is only filled when it was unknown, so
   * an operator-provided classification is never replaced.
   */
  setPairTentative(orig: uint4, recomp: uint4, type?: SymbolType | null): boolean {
    // Taken original addresses are expected here; no log line.
    const claim = this.origClaim(orig);
    if (claim.blocked) return false;
    const rec = this.byRecomp.get(recomp);
    if (rec === undefined || rec.origAddr !== null) return false;

    this.assignOrig(rec, orig, claim.placeholder);
    if (rec.type === null && type !== undefined) rec.type = type;
    return true;
  }

  /** setPair for a line-reference or entry-point function match. */
  setFunctionPair(orig: uint4, recomp: uint4): boolean {
    return this.setPair(orig, recomp, SymbolType.FUNCTION);
  }

  // -- Thunks -------------------------------------------------------------

  /**
   * The thunked function matched, but the original has a thunk the
   * recompiled build lacks.  Adds an original-only FUNCTION record.
   */
  createOrigThunk(addr: uint4, name: string): boolean {
    if (this.byOrig.has(addr)) return false;
    this.addRecord(addr, null, SymbolType.FUNCTION, thunkName(name), null, THUNK_SIZE);
    return true;
  }

  /**
   * Adds a recompiled-only FUNCTION record for a thunk.  Its original
   * address can then be pulled in by a regular function match on the
   * thunk name.
   */
  createRecompThunk(addr: uint4, name: string): boolean {
    if (this.byRecomp.has(addr)) return false;
    this.addRecord(null, addr, SymbolType.FUNCTION, thunkName(name), null, THUNK_SIZE);
    return true;
  }

  // -- Lookup -------------------------------------------------------------

  getRecordByOrig(addr: uint4): SymbolRecord | undefined {
    return this.byOrig.get(addr);
  }

  getRecordByRecomp(addr: uint4): SymbolRecord | undefined {
    return this.byRecomp.get(addr);
  }

  /** Entry with the greatest original address ≤ `addr`. */
  floorOrig(addr: uint4): SymbolRecord | undefined {
    return this.byOrig.floor(addr)?.[1];
  }

  /** Entry with the greatest recompiled address ≤ `addr`. */
  floorRecomp(addr: uint4): SymbolRecord | undefined {
    return this.byRecomp.floor(addr)?.[1];
  }

  /** Smallest original address strictly greater than `addr`. */
  nextOrigAddr(addr: uint4): uint4 | undefined {
    return this.byOrig.higher(addr)?.[0];
  }

  /**
   * Records in projection order: by original address, then every record
   * without one in ingestion order.
   */
  *ordered(): IterableIterator<SymbolRecord> {
    yield* this.byOrig.values();
    for (const rec of this.arena) {
      if (rec.origAddr === null) yield rec;
    }
  }

  /** Live records in ingestion order. */
  records(): SymbolRecord[] {
    return this.arena.filter((rec) => !this.merged.has(rec));
  }

  /**
   * Unpaired record named `name` (decorated name when `name` is mangled and
   * the lookup is not for a string) whose classification is unknown or
   * `type`.  Among several, the lowest recompiled address wins.
   *
   * @returns the candidate's recompiled address
   */
  findPotentialMatch(name: string, type: SymbolType): uint4 | undefined {
    const matchDecorated = type !== SymbolType.STRING && name.startsWith(MANGLED_PREFIX);
    const candidates = (matchDecorated ? this.byDecorated : this.byName).get(name);
    if (candidates === undefined) return undefined;

    let best: uint4 | undefined;
    for (const rec of candidates) {
      if (rec.origAddr !== null || rec.recompAddr === null) continue;
      if (rec.type !== null && rec.type !== type) continue;
      if (best === undefined || rec.recompAddr < best) best = rec.recompAddr;
    }
    return best;
  }

  /** Replace a record's display name. */
  rename(rec: SymbolRecord, name: string): void {
    if (rec.name !== null) removeFromIndex(this.byName, rec.name, rec);
    rec.name = name;
    addToIndex(this.byName, name, rec);
  }
}
