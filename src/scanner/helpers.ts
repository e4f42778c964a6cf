/**
 * Scanner Helper Functions
 * Code point access and character classification
 */

/** Code point at offset, or -1 at end of input */
export function codePointAt(source: string, offset: number): number {
  return source.codePointAt(offset) ?? -1;
}

/** Number of UTF-16 code units a code point occupies */
export function codePointSize(codePoint: number): number {
  return codePoint > 0xffff ? 2 : 1;
}

export function isDigitCode(code: number): boolean {
  return code >= 0x30 && code <= 0x39;
}

/** Value of a hex digit character code, or -1 */
export function hexValue(code: number): number {
  if (code >= 0x30 && code <= 0x39) return code - 0x30;
  if (code >= 0x61 && code <= 0x66) return code - 0x61 + 10;
  if (code >= 0x41 && code <= 0x46) return code - 0x41 + 10;
  return -1;
}

const PUNCTUATION = /^\p{P}$/u;

/** True for any code point in the Unicode punctuation categories */
export function isPunctuation(codePoint: number): boolean {
  return codePoint >= 0 && PUNCTUATION.test(String.fromCodePoint(codePoint));
}

/** True for UTF-16 surrogate code points, which cannot stand alone in text */
export function isSurrogate(codePoint: number): boolean {
  return codePoint >= 0xd800 && codePoint <= 0xdfff;
}

// ============================================================
// CODE POINT TABLES
// ============================================================

/**
 * Frozen code point lookup. Only reads and iteration are exposed; the
 * backing map is not reachable from the returned object.
 */
export function createCodePointTable(
  entries: Iterable<readonly [number, number]>
): ReadonlyMap<number, number> {
  const byCode = new Map<number, number>(entries);
  const table: ReadonlyMap<number, number> = {
    get size() {
      return byCode.size;
    },
    get: (key) => byCode.get(key),
    has: (key) => byCode.has(key),
    forEach(callback, thisArg) {
      byCode.forEach((value, key) => callback.call(thisArg, value, key, table));
    },
    entries: () => byCode.entries(),
    keys: () => byCode.keys(),
    values: () => byCode.values(),
    [Symbol.iterator]: () => byCode[Symbol.iterator](),
  };
  return Object.freeze(table);
}

/**
 * Table from a string of opener/closer pairs, e.g. `'()[]{}'`. Pairs are
 * read by code point, so astral characters count as one.
 *
 * @throws TypeError if the string has an odd number of code points
 */
export function pairTable(pairs: string): ReadonlyMap<number, number> {
  const codes = Array.from(pairs, (ch) => ch.codePointAt(0) ?? 0);
  if (codes.length % 2 !== 0) {
    throw new TypeError(`Unpaired delimiter in: ${pairs}`);
  }
  const entries: Array<[number, number]> = [];
  for (let i = 0; i < codes.length; i += 2) {
    entries.push([codes[i] ?? 0, codes[i + 1] ?? 0]);
  }
  return createCodePointTable(entries);
}
