/**
 * @file engine.ts
 * @description Matching strategies that pair original addresses with
 * recompiled records.
 *
 * Every strategy ends in RecordStore.setPair, and every one reports only
 * success or failure.  A failed match is routine; the caller decides how to
 * report it (see MarkerMatcher).
 */

import { DEFAULT_NAME_LIMIT } from '../core/config.js';
import { SymbolType, type uint4 } from '../core/types.js';
import type { Logger } from '../core/log.js';
import { getVtordispName } from '../cvdump/demangler.js';
import type { MatchOptionsStore } from './options.js';
import type { RecordStore } from './store.js';

export interface MatchingEngineOptions {
  log?: Logger;
  /** Names are cut to this many characters before lookup. */
  nameLimit?: number;
}

/** Name of a class's primary vtable: ``Foo::`vftable'``. */
export function vftableName(className: string): string {
  return `${className}::\`vftable'`;
}

/** Name of the vtable fragment for one base: ``Foo::`vftable'{for `Bar'}``. */
export function vftableForName(className: string, forClass: string): string {
  return `${className}::\`vftable'{for \`${forClass}'}`;
}

/** First `limit` characters of `name`, counted in code points. */
export function truncateName(name: string, limit: number): string {
  if (name.length <= limit) return name;
  return Array.from(name).slice(0, limit).join('');
}

/**
 * Whether a decorated name holds `variableName` followed later by the
 * enclosing function's decorated name.  A static local's mangled name embeds
 * its function's:
 *
 *   function  ?Tick@GameApp@@QAEXH@Z
 *   variable  ?g_startupDelay@?1??Tick@GameApp@@QAEXH@Z@4HA
 */
export function isStaticOf(decorated: string, variableName: string, functionSymbol: string): boolean {
  const at = decorated.indexOf(variableName);
  return at >= 0 && decorated.includes(functionSymbol, at + variableName.length);
}

export class MatchingEngine {
  private readonly log: Logger | undefined;
  private readonly nameLimit: number;

  constructor(
    private readonly store: RecordStore,
    private readonly options: MatchOptionsStore,
    opts: MatchingEngineOptions = {},
  ) {
    this.log = opts.log;
    this.nameLimit = opts.nameLimit ?? DEFAULT_NAME_LIMIT;
  }

  /**
   * Look `name` up among unpaired records of `type` and pair the first
   * candidate with `addr`.  The classification is written as well, since the
   * caller's marker states what the symbol is.
   */
  private matchOn(type: SymbolType, addr: uint4, name: string): boolean {
    // The original's debug symbols cannot hold more than nameLimit characters,
    // so only that prefix can ever match.
    const key = truncateName(name, this.nameLimit);
    this.log?.debug('Looking for %s %s', SymbolType[type].toLowerCase(), key);
    const recomp = this.store.findPotentialMatch(key, type);
    if (recomp === undefined) return false;
    return this.store.setPair(addr, recomp, type);
  }

  matchFunction(addr: uint4, name: string): boolean {
    return this.matchOn(SymbolType.FUNCTION, addr, name);
  }

  /** Tries DATA, then POINTER. */
  matchVariable(addr: uint4, name: string): boolean {
    return this.matchOn(SymbolType.DATA, addr, name) || this.matchOn(SymbolType.POINTER, addr, name);
  }

  /** String literals are looked up by value, never as a decorated name. */
  matchString(addr: uint4, value: string): boolean {
    return this.matchOn(SymbolType.STRING, addr, value);
  }

  /**
   * Pair the vtable of `className`.  With `baseClass`, this is the fragment
   * the class carries for that base.  The qualified form
   * ``C::`vftable'{for `B'}`` is tried first; the bare ``C::`vftable'`` only
   * stands for the derived class's own primary vtable.
   */
  matchVtable(addr: uint4, className: string, baseClass?: string): boolean {
    const forName = vftableForName(className, baseClass ?? className);
    let recomp = this.store.findPotentialMatch(forName, SymbolType.VTABLE);
    if (recomp !== undefined) {
      return this.store.setPair(addr, recomp, SymbolType.VTABLE);
    }

    if (baseClass === undefined || baseClass === className) {
      recomp = this.store.findPotentialMatch(vftableName(className), SymbolType.VTABLE);
      if (recomp !== undefined) {
        return this.store.setPair(addr, recomp, SymbolType.VTABLE);
      }
    }
    return false;
  }

  /**
   * Pair a function-scope static variable.  Its name alone is ambiguous, so
   * the candidate's decorated name must embed the decorated name of the
   * function at `functionAddr`, which therefore has to be matched already.
   */
  matchStaticVariable(addr: uint4, variableName: string, functionAddr: uint4): boolean {
    const func = this.store.getRecordByOrig(functionAddr);
    if (func === undefined || !func.isMatched() || func.decoratedName === null) {
      return false;
    }
    const functionSymbol = func.decoratedName;

    let best: uint4 | undefined;
    for (const rec of this.store.records()) {
      if (rec.origAddr !== null || rec.recompAddr === null || rec.decoratedName === null) continue;
      if (rec.type !== null && rec.type !== SymbolType.DATA) continue;
      if (!isStaticOf(rec.decoratedName, variableName, functionSymbol)) continue;
      if (best === undefined || rec.recompAddr < best) best = rec.recompAddr;
    }
    if (best === undefined) return false;
    return this.store.setPair(addr, best, SymbolType.DATA);
  }

  createOrigThunk(addr: uint4, name: string): boolean {
    return this.store.createOrigThunk(addr, name);
  }

  createRecompThunk(addr: uint4, name: string): boolean {
    return this.store.createRecompThunk(addr, name);
  }

  /**
   * Whether the function at `recompAddr` is a vtordisp thunk.  When its name
   * lacks the `vtordisp` part that its decorated name encodes, the name is
   * rewritten from the decorated name.
   */
  isVtordisp(recompAddr: uint4): boolean {
    const rec = this.store.getRecordByRecomp(recompAddr);
    if (rec === undefined) return false;
    if (rec.name !== null && rec.name.includes('`vtordisp')) return true;

    // Debug builds have thunks without a decorated name.
    if (rec.decoratedName === null) return false;

    const name = getVtordispName(rec.decoratedName);
    if (name === null) return false;
    this.store.rename(rec, name);
    return true;
  }

  markStub(addr: uint4): void {
    this.options.markStub(addr);
  }

  skipCompare(addr: uint4): void {
    this.options.skipCompare(addr);
  }
}
