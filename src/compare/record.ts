/**
 * @file record.ts
 * @description The symbol record held by the store and the read-only
 * MatchInfo row handed to report generators.
 */

import { SymbolType, symbolTypeName, type uint4 } from '../core/types.js';

/**
 * One known symbol.  Either address may be missing until the matching engine
 * fills it in; a record with both addresses is a match.
 *
 * Addresses are assigned through RecordStore only, which keeps its indices in
 * step with these fields.
 */
export class SymbolRecord {
  /** Position in the store's arena (ingestion order). */
  readonly id: number;
  origAddr: uint4 | null;
  recompAddr: uint4 | null;
  type: SymbolType | null;
  name: string | null;
  /** Mangled name, only ever known from the recompiled side. */
  readonly decoratedName: string | null;
  size: number | null;

  constructor(
    id: number,
    origAddr: uint4 | null,
    recompAddr: uint4 | null,
    type: SymbolType | null,
    name: string | null,
    decoratedName: string | null,
    size: number | null,
  ) {
    this.id = id;
    this.origAddr = origAddr;
    this.recompAddr = recompAddr;
    this.type = type;
    this.name = name;
    this.decoratedName = decoratedName;
    this.size = size;
  }

  isMatched(): boolean {
    return this.origAddr !== null && this.recompAddr !== null;
  }

  toMatchInfo(): MatchInfo {
    return new MatchInfo(this.type, this.origAddr, this.recompAddr, this.name, this.size);
  }
}

/**
 * Projection of a record to `(type, origAddr, recompAddr, name, size)`.
 * Built on every read, never stored.
 */
export class MatchInfo {
  constructor(
    readonly type: SymbolType | null,
    readonly origAddr: uint4 | null,
    readonly recompAddr: uint4 | null,
    readonly name: string | null,
    readonly size: number | null,
  ) {}

  /**
   * Name plus classification, e.g. `Foo::Bar (FUNCTION)`, so a diff line
   * shows what kind of symbol it belongs to.  String values are quoted.
   */
  matchName(): string | null {
    if (this.name === null) return null;
    const name = this.type === SymbolType.STRING ? JSON.stringify(this.name) : this.name;
    return `${name} (${symbolTypeName(this.type)})`;
  }

  /** Label for an address `ofs` bytes into this symbol. */
  offsetName(ofs: number): string | null {
    if (this.name === null) return null;
    return `${this.name}+${ofs} (OFFSET)`;
  }
}
