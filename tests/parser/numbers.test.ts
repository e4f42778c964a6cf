/**
 * Number Literal Parser Tests
 */

import { describe, expect, it } from 'vitest';

import {
  createScanState,
  numberLiteral,
  parseLiteral,
  tryParseLiteral,
} from '../../src/index.js';

const number = numberLiteral();

function valueOf(source: string) {
  return parseLiteral(source, number).value;
}

function expectNumberError(source: string, offset = 0): void {
  const state = createScanState(source);
  expect(number.parse(state)).toBeNull();
  expect(state.error).toEqual({ errorId: 'LIT-S004', expected: 'number', offset });
  expect(state.pos).toBe(0);
}

describe('numberLiteral', () => {
  describe('integers', () => {
    it('parses an unsigned integer', () => {
      const node = parseLiteral('42', number);
      expect(node.type).toBe('NumberLiteral');
      expect(node.value).toEqual({ kind: 'integer', value: 42n });
      expect(node.start).toBe(0);
      expect(node.end).toBe(2);
    });

    it('parses signed integers', () => {
      expect(valueOf('+5')).toEqual({ kind: 'integer', value: 5n });
      expect(valueOf('-17')).toEqual({ kind: 'integer', value: -17n });
    });

    it('accepts the signed 64-bit bounds', () => {
      expect(valueOf('9223372036854775807')).toEqual({
        kind: 'integer',
        value: 9223372036854775807n,
      });
      expect(valueOf('-9223372036854775808')).toEqual({
        kind: 'integer',
        value: -9223372036854775808n,
      });
    });

    it('rejects integers beyond 64 bits', () => {
      expectNumberError('9223372036854775808');
      expectNumberError('-9223372036854775809');
    });
  });

  describe('floats', () => {
    it('parses a signed decimal', () => {
      expect(valueOf('-3.14')).toEqual({ kind: 'float', value: -3.14 });
    });

    it('parses an exponent as a float', () => {
      expect(valueOf('1e10')).toEqual({ kind: 'float', value: 1e10 });
      expect(valueOf('2E-3')).toEqual({ kind: 'float', value: 0.002 });
      expect(valueOf('6.02e+23')).toEqual({ kind: 'float', value: 6.02e23 });
    });

    it('parses a leading or trailing dot', () => {
      expect(valueOf('.5')).toEqual({ kind: 'float', value: 0.5 });
      expect(valueOf('1.')).toEqual({ kind: 'float', value: 1 });
    });

    it('rejects floats that overflow', () => {
      expectNumberError('1e400');
    });
  });

  describe('failures', () => {
    it('rejects a bare dot or sign', () => {
      expectNumberError('.');
      expectNumberError('-');
      expectNumberError('+.');
    });

    it('rejects an exponent without digits', () => {
      expectNumberError('1e');
      expectNumberError('2e+');
    });

    it('rejects non-numeric input', () => {
      expectNumberError('abc');
      expectNumberError('');
    });

    it('reports the failure after leading whitespace', () => {
      expectNumberError('   x', 3);
    });

    it('formats the error message', () => {
      const result = tryParseLiteral('-', number);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('Expected number at 1:1');
      }
    });
  });

  describe('cursor', () => {
    it('records the consumed range after whitespace', () => {
      const node = parseLiteral('  7', number);
      expect(node.start).toBe(2);
      expect(node.end).toBe(3);
    });

    it('stops at the first character that cannot continue the number', () => {
      const state = createScanState('12abc');
      const node = number.parse(state);
      expect(node?.value).toEqual({ kind: 'integer', value: 12n });
      expect(state.pos).toBe(2);
    });

    it('names itself', () => {
      expect(number.name).toBe('number literal');
    });
  });
});
