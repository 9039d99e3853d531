/**
 * @file query.ts
 * @description Read-only projections over the record store.
 *
 * Rows are built on each call from the live records; nothing is cached.
 * Ordering is by original address, with records lacking one at the end.
 */

import { SymbolType, type uint4 } from '../core/types.js';
import type { MatchInfo, SymbolRecord } from './record.js';
import type { RecordStore } from './store.js';

export class QueryLayer {
  constructor(private readonly store: RecordStore) {}

  private *rows(filter: (rec: SymbolRecord) => boolean): IterableIterator<MatchInfo> {
    for (const rec of this.store.ordered()) {
      if (filter(rec)) yield rec.toMatchInfo();
    }
  }

  /**
   * Row at original address `addr`.  When `exact` is false, the row at the
   * greatest known original address ≤ `addr` instead, matched or not: the
   * symbol an address falls inside or after.
   */
  getByOrig(addr: uint4, exact = true): MatchInfo | undefined {
    const rec = exact ? this.store.getRecordByOrig(addr) : this.store.floorOrig(addr);
    return rec?.toMatchInfo();
  }

  /** As getByOrig, on the recompiled side. */
  getByRecomp(addr: uint4, exact = true): MatchInfo | undefined {
    const rec = exact ? this.store.getRecordByRecomp(addr) : this.store.floorRecomp(addr);
    return rec?.toMatchInfo();
  }

  /** The matched row at original address `addr`, if that record is matched. */
  getOneMatch(addr: uint4): MatchInfo | undefined {
    const rec = this.store.getRecordByOrig(addr);
    return rec !== undefined && rec.isMatched() ? rec.toMatchInfo() : undefined;
  }

  getAll(): MatchInfo[] {
    return [...this.rows(() => true)];
  }

  getMatches(): MatchInfo[] {
    return [...this.rows((rec) => rec.isMatched())];
  }

  getMatchesByType(type: SymbolType): MatchInfo[] {
    return [...this.rows((rec) => rec.type === type && rec.isMatched())];
  }

  getFunctions(): MatchInfo[] {
    return this.getMatchesByType(SymbolType.FUNCTION);
  }

  /** String literals from the recompiled build the original scanner never located. */
  getUnmatchedStrings(): string[] {
    const strings: string[] = [];
    for (const rec of this.store.records()) {
      if (rec.type === SymbolType.STRING && rec.origAddr === null && rec.name !== null) {
        strings.push(rec.name);
      }
    }
    return strings;
  }

  /**
   * The original address (matched or not) following `addr`.  Bounds the
   * region a function's comparison may read.
   */
  getNextOrigAddr(addr: uint4): uint4 | undefined {
    return this.store.nextOrigAddr(addr);
  }
}
