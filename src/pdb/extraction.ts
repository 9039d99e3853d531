/**
 * @file extraction.ts
 * @description Function signatures for matched functions, built from the
 * recompiled build's debug-info type records.
 *
 * The type records come from a producer outside this package.  Lookup misses
 * are logged and skipped, but a record that contradicts itself (argument
 * count against argument list, unknown calling convention) is a producer bug
 * and raises InconsistentInputError.
 */

import { z } from 'zod';
import { InconsistentInputError } from '../core/error.js';
import { hex, type int4, type uint4 } from '../core/types.js';
import type { Logger } from '../core/log.js';
import type { MatchInfo } from '../compare/record.js';
import type { MatchOptionsStore } from '../compare/options.js';
import { OPT_STUB } from '../compare/options.js';
import type { QueryLayer } from '../compare/query.js';

// ---------------------------------------------------------------------------
// Producer input
// ---------------------------------------------------------------------------

export interface StackSymbolEntry {
  /** `S_REGISTER`, `S_BPREL32`, or another record kind (ignored). */
  symbolType: string;
  name: string;
  dataType: string;
  /** Register name, or `[<hex offset>]` for a frame-relative slot. */
  location: string;
}

export interface SymbolsEntry {
  name: string;
  /** Type id of the function type, e.g. `0x1234` or `T_NOTYPE(0000)`. */
  funcType: string;
  framePointerPresent: boolean;
  stackSymbols: StackSymbolEntry[];
}

/** A function in the debug-info analysis, keyed by recompiled address. */
export interface FunctionNode {
  addr: uint4;
  symbolEntry: SymbolsEntry | null;
}

/** Type records, keyed by lower-case type id. */
export type TypeTable = ReadonlyMap<string, unknown>;

/** Whether an address lies inside the original binary's image. */
export interface OriginalImage {
  isValidAddress(addr: uint4): boolean;
}

const functionTypeSchema = z.object({
  callType: z.string(),
  returnType: z.string(),
  classType: z.string().optional(),
  argListType: z.string().optional(),
  thisAdjust: z.string().optional(),
});

const argListSchema = z.object({
  argcount: z.number().int().nonnegative(),
  args: z.array(z.string()).optional(),
});

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

export interface StackOrRegisterSymbol {
  name: string;
  dataType: string;
}

export interface StackSymbol extends StackOrRegisterSymbol {
  kind: 'stack';
  stackOffset: int4;
}

export interface RegisterSymbol extends StackOrRegisterSymbol {
  kind: 'register';
  /** Lower case. */
  register: string;
}

export interface FunctionSignature {
  originalFunctionSymbol: SymbolsEntry;
  callType: string;
  arglist: string[];
  returnType: string;
  classType: string | null;
  stackSymbols: (StackSymbol | RegisterSymbol)[];
  /** Non-zero: offset applied to `this` in a __thiscall. */
  thisAdjust: number;
}

export interface PdbFunction {
  matchInfo: MatchInfo;
  /** Null for thunks, which carry no type record. */
  signature: FunctionSignature | null;
  isStub: boolean;
}

const CALL_TYPES: Readonly<Record<string, string>> = {
  ThisCall: '__thiscall',
  'C Near': 'default',
  'STD Near': '__stdcall',
};

const NOTYPE = 'T_NOTYPE(0000)';

// ---------------------------------------------------------------------------
// PdbFunctionExtractor
// ---------------------------------------------------------------------------

export class PdbFunctionExtractor {
  private readonly nodesByAddr = new Map<uint4, FunctionNode>();

  constructor(
    private readonly query: QueryLayer,
    private readonly options: MatchOptionsStore,
    private readonly types: TypeTable,
    nodes: Iterable<FunctionNode>,
    private readonly image: OriginalImage,
    private readonly log?: Logger,
  ) {
    for (const node of nodes) {
      if (!this.nodesByAddr.has(node.addr)) this.nodesByAddr.set(node.addr, node);
    }
  }

  private typeRecord<S extends z.ZodTypeAny>(schema: S, typeId: string): z.output<S> | undefined {
    const raw = this.types.get(typeId.toLowerCase());
    if (raw === undefined) return undefined;
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new InconsistentInputError(`type ${typeId}`, parsed.error.issues[0].message);
    }
    return parsed.data;
  }

  /**
   * Build the signature of one function.
   * @returns null for a thunk (no type) or an unknown function type
   * @throws InconsistentInputError for a self-contradicting type record
   */
  getFuncSignature(fn: SymbolsEntry): FunctionSignature | null {
    if (fn.funcType === NOTYPE) {
      this.log?.debug('Treating NOTYPE function as thunk: %s', fn.name);
      return null;
    }

    const functionType = this.typeRecord(functionTypeSchema, fn.funcType);
    if (functionType === undefined) {
      this.log?.error('Could not find function type %s for function %s', fn.funcType, fn.name);
      return null;
    }

    const source = `function type ${fn.funcType}`;
    if (functionType.argListType === undefined) {
      throw new InconsistentInputError(source, 'no argument list type');
    }
    const argList = this.typeRecord(argListSchema, functionType.argListType);
    if (argList === undefined) {
      throw new InconsistentInputError(source, `argument list ${functionType.argListType} not found`);
    }
    const args = argList.args ?? [];
    if (argList.argcount !== args.length) {
      throw new InconsistentInputError(
        source,
        `argument count ${argList.argcount} does not match ${args.length} listed arguments`,
      );
    }

    const callType = CALL_TYPES[functionType.callType];
    if (callType === undefined) {
      throw new InconsistentInputError(source, `unknown call type ${functionType.callType}`);
    }

    // The reported offset of arguments (ebp + n) is off by 4 when the frame
    // pointer is present.  Locals (ebp - n) are not affected.
    const stackOffsetDelta = fn.framePointerPresent ? -4 : 0;
    const stackSymbols: (StackSymbol | RegisterSymbol)[] = [];
    for (const sym of fn.stackSymbols) {
      if (sym.symbolType === 'S_REGISTER') {
        stackSymbols.push({
          kind: 'register',
          name: sym.name,
          dataType: sym.dataType,
          register: sym.location.toLowerCase(),
        });
      } else if (sym.symbolType === 'S_BPREL32') {
        stackSymbols.push({
          kind: 'stack',
          name: sym.name,
          dataType: sym.dataType,
          stackOffset: parseFrameOffset(sym.location, source) + stackOffsetDelta,
        });
      }
    }

    return {
      originalFunctionSymbol: fn,
      callType,
      arglist: args,
      returnType: functionType.returnType,
      classType: functionType.classType ?? null,
      stackSymbols,
      thisAdjust: parseHex(functionType.thisAdjust ?? '0', source),
    };
  }

  /**
   * One entry per matched function.  A function with no debug-info node is
   * either a thunk (kept, no signature) or an import outside the original
   * image (dropped).  A node without a symbol entry comes from the publics
   * table only and is dropped.
   */
  handleMatchedFunction(match: MatchInfo): PdbFunction | null {
    if (match.origAddr === null || match.recompAddr === null) return null;
    const isStub = this.options.getOption(match.origAddr, OPT_STUB) !== undefined;

    const node = this.nodesByAddr.get(match.recompAddr);
    if (node === undefined) {
      if (this.image.isValidAddress(match.origAddr)) {
        return { matchInfo: match, signature: null, isStub };
      }
      this.log?.debug(
        'Skipping external function %s (address %s not in original binary)',
        match.name,
        hex(match.origAddr),
      );
      return null;
    }

    if (node.symbolEntry === null) {
      this.log?.debug('Could not find function symbol (likely a PUBLICS entry): %s', match.name);
      return null;
    }

    return { matchInfo: match, signature: this.getFuncSignature(node.symbolEntry), isStub };
  }

  getFunctionList(): PdbFunction[] {
    const result: PdbFunction[] = [];
    for (const match of this.query.getFunctions()) {
      const fn = this.handleMatchedFunction(match);
      if (fn !== null) result.push(fn);
    }
    return result;
  }
}

function parseHex(text: string, source: string): number {
  if (!/^(0x)?[0-9a-f]+$/i.test(text)) {
    throw new InconsistentInputError(source, `not a hex number: ${text}`);
  }
  return parseInt(text, 16);
}

/** `[0008]` → 8, `[FFFFFFF8]` → -8 (frame offsets are signed 32-bit). */
function parseFrameOffset(location: string, source: string): int4 {
  if (!location.startsWith('[') || !location.endsWith(']')) {
    throw new InconsistentInputError(source, `bad stack location ${location}`);
  }
  const digits = location.slice(1, -1);
  if (digits.length > 8) {
    throw new InconsistentInputError(source, `stack location ${location} wider than 32 bits`);
  }
  return parseHex(digits, source) | 0;
}
