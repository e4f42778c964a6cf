/**
 * Literal Parsers
 * Main entry points and re-exports
 */

import type { LiteralNode, LiteralValue } from '../types.js';
import { SCAN_ERRORS } from '../error-registry.js';
import type { ScanError } from '../error-classes.js';
import {
  createScanState,
  errorHere,
  toScanError,
  type ScanStateOptions,
} from '../scanner/state.js';
import type { LiteralParser } from './parser.js';

// ============================================================
// MAIN ENTRY POINTS
// ============================================================

export interface ParseLiteralOptions extends ScanStateOptions {
  /** Accept input left over after the literal (default false) */
  allowTrailing?: boolean | undefined;
}

export type ParseResult<V extends LiteralValue = LiteralValue> =
  | { readonly success: true; readonly node: LiteralNode<V>; readonly end: number }
  | { readonly success: false; readonly error: ScanError };

/**
 * Run one literal parser over `source` and report the outcome.
 *
 * Unless `allowTrailing` is set, the literal (plus trailing whitespace)
 * must cover the rest of the source.
 *
 * @example
 * ```typescript
 * const result = tryParseLiteral('"abc', stringLiteral('"'));
 * if (!result.success) console.log(result.error.message);
 * // Expected closing " at 1:5
 * ```
 */
export function tryParseLiteral<V extends LiteralValue>(
  source: string,
  parser: LiteralParser<V>,
  options: ParseLiteralOptions = {}
): ParseResult<V> {
  const state = createScanState(source, options);
  const node = parser.parse(state);

  if (node !== null) {
    const end = state.pos;
    if (options.allowTrailing === true) {
      return { success: true, node, end };
    }
    state.skipWhitespace(state);
    if (state.pos >= source.length) {
      return { success: true, node, end };
    }
    errorHere(state, SCAN_ERRORS.TRAILING_INPUT, 'end of input');
  }

  // A parser that fails without recording anything reports its own name
  if (state.error === null) {
    errorHere(state, SCAN_ERRORS.DELIMITER_EXPECTED, parser.name);
  }
  const error = toScanError(state);
  if (error === null) {
    throw new Error(`${parser.name} failed without an error`);
  }
  return { success: false, error };
}

/**
 * Parse a single literal, throwing ScanError at the furthest failure.
 *
 * @example
 * ```typescript
 * parseLiteral('/foo/bar/', unicodeRegexpReplaceLiteral());
 * ```
 */
export function parseLiteral<V extends LiteralValue>(
  source: string,
  parser: LiteralParser<V>,
  options: ParseLiteralOptions = {}
): LiteralNode<V> {
  const result = tryParseLiteral(source, parser, options);
  if (!result.success) throw result.error;
  return result.node;
}

// ============================================================
// RE-EXPORTS
// ============================================================

export { createParser, makeNode, type LiteralParser } from './parser.js';
export {
  customStringLiteral,
  stringLiteral,
  unicodeStringLiteral,
} from './parser-strings.js';
export { numberLiteral } from './parser-numbers.js';
export {
  regexpMatchLiteral,
  regexpReplaceLiteral,
  unicodeRegexpMatchLiteral,
  unicodeRegexpReplaceLiteral,
} from './parser-regexp.js';
