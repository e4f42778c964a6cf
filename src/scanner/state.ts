/**
 * Scan State
 * Shared cursor, furthest-error sink and location lookup for one parse attempt
 */

import type { SourceLocation, SourceSpan } from '../source-location.js';
import type { ScanErrorId } from '../error-registry.js';
import { createError, ScanError } from '../error-classes.js';

// ============================================================
// SCAN STATE
// ============================================================

/** The furthest failure recorded during a parse attempt */
export interface ScanErrorRecord {
  readonly errorId: ScanErrorId;
  /** Human-readable description of what was expected */
  readonly expected: string;
  readonly offset: number;
}

/** Whitespace policy, invoked once at the start of each literal parse */
export type WhitespaceHook = (state: ScanState) => void;

export interface ScanState {
  readonly source: string;
  /** Cursor as a UTF-16 code-unit offset into source */
  pos: number;
  /** Furthest error seen so far, or null */
  error: ScanErrorRecord | null;
  readonly skipWhitespace: WhitespaceHook;
  /** Offsets of line starts, built on first location lookup */
  lineStarts: number[] | null;
}

export interface ScanStateOptions {
  /** Whitespace hook (defaults to skipping ASCII whitespace) */
  skipWhitespace?: WhitespaceHook | undefined;
  /** Initial cursor offset */
  pos?: number | undefined;
}

export function createScanState(
  source: string,
  options: ScanStateOptions = {}
): ScanState {
  return {
    source,
    pos: options.pos ?? 0,
    error: null,
    skipWhitespace: options.skipWhitespace ?? skipAsciiWhitespace,
    lineStarts: null,
  };
}

// ============================================================
// WHITESPACE HOOKS
// ============================================================

/** Skips spaces, tabs, carriage returns and newlines */
export function skipAsciiWhitespace(state: ScanState): void {
  const { source } = state;
  while (state.pos < source.length) {
    const ch = source.charCodeAt(state.pos);
    if (ch !== 0x20 && ch !== 0x09 && ch !== 0x0d && ch !== 0x0a) break;
    state.pos++;
  }
}

export function skipNothing(_state: ScanState): void {}

// ============================================================
// ERROR SINK
// ============================================================

/**
 * Record a failure. A failure at or beyond the furthest recorded offset
 * replaces it; earlier failures are dropped.
 */
export function recordError(
  state: ScanState,
  errorId: ScanErrorId,
  expected: string,
  offset: number
): void {
  if (state.error !== null && offset < state.error.offset) return;
  state.error = { errorId, expected, offset };
}

/** Record a failure at the cursor */
export function errorHere(
  state: ScanState,
  errorId: ScanErrorId,
  expected: string
): void {
  recordError(state, errorId, expected, state.pos);
}

/** Convert the furthest recorded failure into a ScanError */
export function toScanError(state: ScanState): ScanError | null {
  const record = state.error;
  if (record === null) return null;

  const error = createError(
    record.errorId,
    { expected: record.expected },
    locate(state, record.offset)
  );
  if (!(error instanceof ScanError)) {
    throw new TypeError(`Expected scan error ID, got: ${record.errorId}`);
  }
  return error;
}

// ============================================================
// LOCATIONS
// ============================================================

function buildLineStarts(source: string): number[] {
  const starts = [0];
  let index = source.indexOf('\n');
  while (index !== -1) {
    starts.push(index + 1);
    index = source.indexOf('\n', index + 1);
  }
  return starts;
}

/** Resolve an offset to a 1-based line and column */
export function locate(state: ScanState, offset: number): SourceLocation {
  if (state.lineStarts === null) {
    state.lineStarts = buildLineStarts(state.source);
  }
  const starts = state.lineStarts;

  // Last line start <= offset
  let low = 0;
  let high = starts.length - 1;
  while (low < high) {
    const mid = (low + high + 1) >> 1;
    if ((starts[mid] ?? 0) <= offset) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }

  return {
    line: low + 1,
    column: offset - (starts[low] ?? 0) + 1,
    offset,
  };
}

export function makeSpan(
  state: ScanState,
  start: number,
  end: number
): SourceSpan {
  return { start: locate(state, start), end: locate(state, end) };
}
