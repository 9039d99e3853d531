/**
 * @file markers.ts
 * @description Dispatch of source annotations ("markers") to the matching
 * engine.
 *
 * This is the call site where failed matches are reported.  Markers are
 * applied in the order given: confirmed pairings must come before tentative
 * ones that could otherwise claim the same recompiled address first.
 */

import { hex, type SymbolType, type uint4 } from '../core/types.js';
import type { Logger } from '../core/log.js';
import type { CompareDb } from './db.js';

export type Marker =
  | { kind: 'function'; addr: uint4; name: string; stub?: boolean; skip?: boolean }
  | { kind: 'variable'; addr: uint4; name: string }
  | { kind: 'string'; addr: uint4; value: string }
  | { kind: 'vtable'; addr: uint4; className: string; baseClass?: string }
  | { kind: 'static'; addr: uint4; name: string; functionAddr: uint4 }
  | { kind: 'pair'; orig: uint4; recomp: uint4; type?: SymbolType; tentative?: boolean };

export interface MarkerReport {
  matched: number;
  failed: Marker[];
}

export class MarkerMatcher {
  private readonly log: Logger;

  constructor(
    private readonly db: CompareDb,
    log?: Logger,
  ) {
    this.log = log ?? db.log.child({ component: 'markers' });
  }

  /** Apply one marker.  @returns whether its symbol was paired */
  apply(marker: Marker): boolean {
    const engine = this.db.engine;
    switch (marker.kind) {
      case 'function': {
        if (marker.stub) engine.markStub(marker.addr);
        if (marker.skip) engine.skipCompare(marker.addr);
        const ok = engine.matchFunction(marker.addr, marker.name);
        if (!ok) this.log.error('Failed to find function symbol with name: %s', marker.name);
        return ok;
      }
      case 'variable': {
        const ok = engine.matchVariable(marker.addr, marker.name);
        if (!ok) this.log.error('Failed to find variable: %s', marker.name);
        return ok;
      }
      case 'string': {
        const ok = engine.matchString(marker.addr, marker.value);
        if (!ok) this.log.error('Failed to find string: %s', JSON.stringify(marker.value));
        return ok;
      }
      case 'vtable': {
        const ok = engine.matchVtable(marker.addr, marker.className, marker.baseClass);
        if (!ok) this.log.error('Failed to find vtable for class: %s', marker.className);
        return ok;
      }
      case 'static': {
        const ok = engine.matchStaticVariable(marker.addr, marker.name, marker.functionAddr);
        if (!ok) {
          this.log.error(
            'Failed to match static variable %s from function %s',
            marker.name,
            hex(marker.functionAddr),
          );
        }
        return ok;
      }
      case 'pair': {
        const store = this.db.store;
        const ok = marker.tentative
          ? store.setPairTentative(marker.orig, marker.recomp, marker.type)
          : store.setPair(marker.orig, marker.recomp, marker.type);
        if (!ok) this.log.error('Failed to pair %s with %s', hex(marker.orig), hex(marker.recomp));
        return ok;
      }
    }
  }

  /** Apply markers in order, continuing past failures. */
  applyAll(markers: Iterable<Marker>): MarkerReport {
    const report: MarkerReport = { matched: 0, failed: [] };
    for (const marker of markers) {
      if (this.apply(marker)) {
        report.matched++;
      } else {
        report.failed.push(marker);
      }
    }
    this.log.info({ matched: report.matched, failed: report.failed.length }, 'markers applied');
    return report;
  }
}
