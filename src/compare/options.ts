/**
 * @file options.ts
 * @description Sparse per-address flags consumed by the report generator.
 *
 * A flag is keyed by `(address, name)`.  No entry means unset; an entry with
 * a null value is a boolean flag that is set.  Addresses are not checked
 * against the record store.
 */

import type { uint4 } from '../core/types.js';

/** Function is a stub in the recompiled build; do not compare its bytes. */
export const OPT_STUB = 'stub';
/** Function diverges on purpose; leave it out of comparison. */
export const OPT_SKIP = 'skip';

export type MatchOptionValue = string | true;

export class MatchOptionsStore {
  private readonly options = new Map<uint4, Map<string, string | null>>();

  /** Set `name` to a text value, replacing any previous value. */
  setOption(addr: uint4, name: string, value: string): void {
    this.flags(addr).set(name, value);
  }

  /**
   * Turn a boolean flag on or off.  Turning on a flag that already exists
   * keeps what is stored.
   */
  setOptBool(addr: uint4, name: string, enabled = true): void {
    if (enabled) {
      const flags = this.flags(addr);
      if (!flags.has(name)) flags.set(name, null);
      return;
    }
    const flags = this.options.get(addr);
    if (flags === undefined) return;
    flags.delete(name);
    if (flags.size === 0) this.options.delete(addr);
  }

  markStub(addr: uint4): void {
    this.setOptBool(addr, OPT_STUB);
  }

  skipCompare(addr: uint4): void {
    this.setOptBool(addr, OPT_SKIP);
  }

  /** Value of one flag: its text, `true` for a boolean flag, or undefined. */
  getOption(addr: uint4, name: string): MatchOptionValue | undefined {
    const flags = this.options.get(addr);
    if (flags === undefined || !flags.has(name)) return undefined;
    return flags.get(name) ?? true;
  }

  /** Every flag set on `addr`. */
  getMatchOptions(addr: uint4): Record<string, MatchOptionValue> {
    const flags = this.options.get(addr);
    if (flags === undefined) return {};
    return Object.fromEntries(
      Array.from(flags, ([name, value]): [string, MatchOptionValue] => [name, value ?? true]),
    );
  }

  private flags(addr: uint4): Map<string, string | null> {
    let flags = this.options.get(addr);
    if (flags === undefined) {
      flags = new Map();
      this.options.set(addr, flags);
    }
    return flags;
  }
}
