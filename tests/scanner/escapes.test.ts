/**
 * Escape Table Tests
 */

import { describe, expect, it } from 'vitest';

import {
  createEscapeTable,
  DEFAULT_ESCAPES,
  extendEscapeTable,
  parseLiteral,
  unicodeStringLiteral,
} from '../../src/index.js';

const cp = (ch: string): number => ch.codePointAt(0) ?? -1;

describe('DEFAULT_ESCAPES', () => {
  it('maps the seven control-character letters', () => {
    expect(DEFAULT_ESCAPES.size).toBe(7);
    expect(DEFAULT_ESCAPES.get(cp('a'))).toBe(0x07);
    expect(DEFAULT_ESCAPES.get(cp('b'))).toBe(0x08);
    expect(DEFAULT_ESCAPES.get(cp('f'))).toBe(0x0c);
    expect(DEFAULT_ESCAPES.get(cp('n'))).toBe(0x0a);
    expect(DEFAULT_ESCAPES.get(cp('r'))).toBe(0x0d);
    expect(DEFAULT_ESCAPES.get(cp('t'))).toBe(0x09);
    expect(DEFAULT_ESCAPES.get(cp('v'))).toBe(0x0b);
  });

  it('has no entry for u or the backslash', () => {
    expect(DEFAULT_ESCAPES.has(cp('u'))).toBe(false);
    expect(DEFAULT_ESCAPES.has(cp('\\'))).toBe(false);
  });

  it('cannot be modified by callers', () => {
    expect(DEFAULT_ESCAPES).not.toBeInstanceOf(Map);
    expect(Object.isFrozen(DEFAULT_ESCAPES)).toBe(true);
    expect(Reflect.get(DEFAULT_ESCAPES, 'set')).toBeUndefined();
    expect(Reflect.get(DEFAULT_ESCAPES, 'delete')).toBeUndefined();
    expect(Reflect.set(DEFAULT_ESCAPES, 'get', () => 0x21)).toBe(false);

    expect(parseLiteral('"\\q"', unicodeStringLiteral()).value.text).toBe('\\q');
    expect(DEFAULT_ESCAPES.size).toBe(7);
  });

  it('iterates its entries in insertion order', () => {
    expect([...DEFAULT_ESCAPES.keys()].map((key) => String.fromCodePoint(key))).toEqual(
      ['a', 'b', 'f', 'n', 'r', 't', 'v']
    );
    const seen: number[] = [];
    DEFAULT_ESCAPES.forEach((value, _key, table) => {
      expect(table).toBe(DEFAULT_ESCAPES);
      seen.push(value);
    });
    expect(seen).toEqual([0x07, 0x08, 0x0c, 0x0a, 0x0d, 0x09, 0x0b]);
  });
});

describe('createEscapeTable', () => {
  it('builds a table from letter/character pairs', () => {
    const table = createEscapeTable({ e: '\x1b', '0': '\0' });
    expect(table.get(cp('e'))).toBe(0x1b);
    expect(table.get(cp('0'))).toBe(0);
  });

  it('accepts astral characters as a single character', () => {
    const table = createEscapeTable({ s: '😀' });
    expect(table.get(cp('s'))).toBe(0x1f600);
  });

  it('rejects keys longer than one character', () => {
    expect(() => createEscapeTable({ ab: 'x' })).toThrow(
      'Expected a single character, got: "ab"'
    );
  });

  it('rejects empty replacements', () => {
    expect(() => createEscapeTable({ e: '' })).toThrow(TypeError);
  });
});

describe('extendEscapeTable', () => {
  it('layers overrides without touching the base table', () => {
    const table = extendEscapeTable(DEFAULT_ESCAPES, { n: 'N', e: '\x1b' });
    expect(table.get(cp('n'))).toBe(cp('N'));
    expect(table.get(cp('e'))).toBe(0x1b);
    expect(table.get(cp('t'))).toBe(0x09);
    expect(DEFAULT_ESCAPES.get(cp('n'))).toBe(0x0a);
  });

  it('returns a table that cannot be modified', () => {
    const table = extendEscapeTable(DEFAULT_ESCAPES, { e: '\x1b' });
    expect(table.size).toBe(8);
    expect(Object.isFrozen(table)).toBe(true);
    expect(Reflect.get(table, 'set')).toBeUndefined();
  });
});
