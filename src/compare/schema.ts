/**
 * @file schema.ts
 * @description zod schemas for the rows producers hand to the record store.
 *
 * A row that does not parse is a producer defect and stops the run.
 */

import { z } from 'zod';
import { InconsistentInputError } from '../core/error.js';
import { SymbolType } from '../core/types.js';

const address = z.number().int().nonnegative().max(0xffffffff);
const symbolType = z.nativeEnum(SymbolType).nullish();
const text = z.string().nullish();
const size = z.number().int().nonnegative().nullish();

/** Original-binary scanner row. */
export const origRowSchema = z.object({
  addr: address,
  type: symbolType,
  name: text,
  size,
});

/** Recompiled debug-info row; `symbol` is the decorated name. */
export const recompRowSchema = z.object({
  addr: address,
  type: symbolType,
  name: text,
  symbol: text,
  size,
});

/** Compiler array / jump-table row, already paired. */
export const arrayRowSchema = z.object({
  orig: address,
  recomp: address,
  name: text,
});

export type OrigRow = z.input<typeof origRowSchema>;
export type RecompRow = z.input<typeof recompRowSchema>;
export type ArrayRow = z.input<typeof arrayRowSchema>;

/**
 * Parse one producer row.
 * @throws InconsistentInputError naming the producer and the offending field
 */
export function parseRow<S extends z.ZodTypeAny>(
  schema: S,
  source: string,
  row: unknown,
): z.output<S> {
  const parsed = schema.safeParse(row);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.length > 0 ? issue.path.join('.') : 'row';
    throw new InconsistentInputError(source, `${field}: ${issue.message}`);
  }
  return parsed.data;
}
