/**
 * @file types.ts
 * @description Shared scalar types and the symbol classification enum.
 *
 * Both binaries are 32-bit images, so every virtual address fits in a JS
 * number:
 *   uint4 → number (unsigned 32-bit virtual address)
 *   int4  → number (signed 32-bit offset)
 */

// ---- Small integer types (fit in JS number) ----

/** Signed 32-bit integer */
export type int4 = number;
/** Unsigned 32-bit integer, used for virtual addresses */
export type uint4 = number;

// ---- Symbol classification ----

/**
 * What kind of symbol a record describes.  Name lookups are scoped by this
 * value so that a function name is never matched against a string.
 */
export enum SymbolType {
  FUNCTION = 1,
  DATA = 2,
  POINTER = 3,
  STRING = 4,
  VTABLE = 5,
  FLOAT = 6,
}

/** Upper-case label for a classification, `UNK` when unknown. */
export function symbolTypeName(type: SymbolType | null): string {
  if (type === null) return 'UNK';
  return SymbolType[type] ?? 'UNK';
}

/** Format an address the way log lines and reports print it: `0x1000`. */
export function hex(addr: uint4): string {
  return '0x' + addr.toString(16);
}
