/**
 * Escape Tables
 * Single-letter escape codes and the characters they produce
 */

import { createCodePointTable } from './helpers.js';

/** Escape letter code point to the code point it produces */
export type EscapeTable = ReadonlyMap<number, number>;

/**
 * Build an escape table from letter/character pairs.
 *
 * @throws TypeError if a key or value is not exactly one code point
 */
export function createEscapeTable(
  entries: Readonly<Record<string, string>>
): EscapeTable {
  return createCodePointTable(
    Object.entries(entries).map(([letter, replacement]): [number, number] => [
      singleCodePoint(letter),
      singleCodePoint(replacement),
    ])
  );
}

/** Layer `overrides` on top of `base` */
export function extendEscapeTable(
  base: EscapeTable,
  overrides: Readonly<Record<string, string>>
): EscapeTable {
  return createCodePointTable([...base, ...createEscapeTable(overrides)]);
}

function singleCodePoint(text: string): number {
  const chars = Array.from(text);
  const first = chars[0];
  if (chars.length !== 1 || first === undefined) {
    throw new TypeError(`Expected a single character, got: ${JSON.stringify(text)}`);
  }
  return first.codePointAt(0) ?? 0;
}

/** \a \b \f \n \r \t \v */
export const DEFAULT_ESCAPES: EscapeTable = createEscapeTable({
  a: '\x07',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  v: '\v',
});
