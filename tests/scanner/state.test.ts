/**
 * Scan State Tests
 * Furthest-error sink, whitespace hooks and location lookup
 */

import { describe, expect, it } from 'vitest';

import {
  createScanState,
  errorHere,
  locate,
  recordError,
  ScanError,
  skipAsciiWhitespace,
  skipNothing,
  toScanError,
} from '../../src/index.js';

describe('createScanState', () => {
  it('starts at offset 0 with no error', () => {
    const state = createScanState('abc');
    expect(state.pos).toBe(0);
    expect(state.error).toBeNull();
    expect(state.skipWhitespace).toBe(skipAsciiWhitespace);
  });

  it('accepts an initial offset and whitespace hook', () => {
    const state = createScanState('abc', { pos: 2, skipWhitespace: skipNothing });
    expect(state.pos).toBe(2);
    expect(state.skipWhitespace).toBe(skipNothing);
  });
});

describe('recordError', () => {
  it('keeps the furthest failure', () => {
    const state = createScanState('some input');
    recordError(state, 'LIT-S001', 'first', 5);
    recordError(state, 'LIT-S004', 'earlier', 3);
    expect(state.error).toEqual({
      errorId: 'LIT-S001',
      expected: 'first',
      offset: 5,
    });

    recordError(state, 'LIT-S002', 'same place', 5);
    expect(state.error?.expected).toBe('same place');

    recordError(state, 'LIT-S003', 'further', 8);
    expect(state.error).toEqual({
      errorId: 'LIT-S003',
      expected: 'further',
      offset: 8,
    });
  });

  it('errorHere records at the cursor', () => {
    const state = createScanState('abc', { pos: 2 });
    errorHere(state, 'LIT-S001', 'quote');
    expect(state.error?.offset).toBe(2);
  });
});

describe('whitespace hooks', () => {
  it('skipAsciiWhitespace skips spaces, tabs, CR and LF', () => {
    const state = createScanState(' \t\r\nx ');
    skipAsciiWhitespace(state);
    expect(state.pos).toBe(4);
  });

  it('skipAsciiWhitespace stops at end of input', () => {
    const state = createScanState('   ');
    skipAsciiWhitespace(state);
    expect(state.pos).toBe(3);
  });

  it('skipNothing leaves the cursor alone', () => {
    const state = createScanState('  x');
    skipNothing(state);
    expect(state.pos).toBe(0);
  });
});

describe('locate', () => {
  const state = createScanState('ab\ncd');

  it('resolves offsets on the first line', () => {
    expect(locate(state, 0)).toEqual({ line: 1, column: 1, offset: 0 });
    expect(locate(state, 2)).toEqual({ line: 1, column: 3, offset: 2 });
  });

  it('resolves offsets after a newline', () => {
    expect(locate(state, 3)).toEqual({ line: 2, column: 1, offset: 3 });
    expect(locate(state, 5)).toEqual({ line: 2, column: 3, offset: 5 });
  });

  it('handles many lines', () => {
    const many = createScanState('a\nb\nc\nd\ne');
    expect(locate(many, 8)).toEqual({ line: 5, column: 1, offset: 8 });
    expect(locate(many, 5)).toEqual({ line: 3, column: 2, offset: 5 });
  });

  it('builds the line index on first use and keeps it', () => {
    const lazy = createScanState('x\ny');
    expect(lazy.lineStarts).toBeNull();
    locate(lazy, 2);
    const starts = lazy.lineStarts;
    expect(starts).toEqual([0, 2]);
    locate(lazy, 0);
    expect(lazy.lineStarts).toBe(starts);
  });
});

describe('toScanError', () => {
  it('returns null when nothing failed', () => {
    expect(toScanError(createScanState('x'))).toBeNull();
  });

  it('converts the furthest failure with its location', () => {
    const state = createScanState('ab\ncd');
    recordError(state, 'LIT-S002', '"', 4);
    const error = toScanError(state);

    expect(error).toBeInstanceOf(ScanError);
    expect(error?.errorId).toBe('LIT-S002');
    expect(error?.message).toBe('Expected closing " at 2:2');
    expect(error?.location).toEqual({ line: 2, column: 2, offset: 4 });
  });
});
