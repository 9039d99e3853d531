/**
 * @file demangler.ts
 * @description Recovery of vtordisp thunk names from decorated names.
 *
 * The debug data often names a vtordisp adjuster thunk after the function it
 * adjusts for, dropping the `vtordisp{x,y}` part that its decorated name
 * still carries:
 *
 *   ?ClassName@AnimActor@@$4PPPPPPPM@A@BEPBDXZ
 *     → AnimActor::ClassName`vtordisp{4294967292,0}'
 *
 * Only plain scoped names are decoded.  Templates, operators and name
 * back-references yield null.
 */

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** `$0` .. `$5`: vtordisp thunk for private, protected or public, near or far. */
const VTORDISP_CODES = '012345';

/**
 * Decode one number in the decorated-name encoding, starting at `pos`.
 *
 *   `0`-`9`        → 1-10
 *   `A`-`P`... `@` → hex digits 0-15, terminated by `@`
 *   leading `?`    → negative
 *
 * @returns the value and the position after it, or null if malformed
 */
export function parseEncodedNumber(text: string, pos: number): [number, number] | null {
  let negative = false;
  if (text[pos] === '?') {
    negative = true;
    pos++;
  }
  const c = text.charCodeAt(pos);
  let value: number;
  if (c >= 0x30 && c <= 0x39) {
    value = c - 0x30 + 1;
    pos++;
  } else {
    let digits = 0;
    value = 0;
    while (pos < text.length && text[pos] !== '@') {
      const d = text.charCodeAt(pos) - 0x41;
      if (d < 0 || d > 15) return null;
      value = value * 16 + d;
      digits++;
      pos++;
    }
    if (digits === 0 || pos >= text.length) return null;
    pos++; // '@'
  }
  return [negative ? -value : value, pos];
}

/**
 * Display name of a vtordisp thunk, derived from its decorated name.
 * @returns null when the decorated name is not a vtordisp thunk this
 * decoder understands
 */
export function getVtordispName(decorated: string): string | null {
  if (!decorated.startsWith('?')) return null;
  const scopeEnd = decorated.indexOf('@@');
  if (scopeEnd < 0) return null;

  const parts = decorated.slice(1, scopeEnd).split('@');
  if (parts.length < 2 || !parts.every((p) => IDENTIFIER.test(p))) return null;

  const rest = decorated.slice(scopeEnd + 2);
  if (rest[0] !== '$' || rest.length < 2 || !VTORDISP_CODES.includes(rest[1])) return null;

  const first = parseEncodedNumber(rest, 2);
  if (first === null) return null;
  const second = parseEncodedNumber(rest, first[1]);
  if (second === null) return null;
  // The function type encoding must follow.
  if (second[1] >= rest.length) return null;

  const [func, ...scopes] = parts;
  const owner = scopes.reverse().join('::');
  return `${owner}::${func}\`vtordisp{${first[0]},${second[0]}}'`;
}
