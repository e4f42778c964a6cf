/**
 * Parser Helpers
 * Opening-delimiter validation shared by the delimited literal parsers
 * @internal This module contains internal parser utilities
 */

import type { LiteralNode, LiteralNodeType, TextValue } from '../types.js';
import { SCAN_ERRORS } from '../error-registry.js';
import type { DelimiterMatcher } from '../scanner/delimiters.js';
import type { EscapeTable } from '../scanner/escapes.js';
import { codePointAt, codePointSize } from '../scanner/helpers.js';
import { scanSegment } from '../scanner/segment.js';
import { recordError, type ScanState } from '../scanner/state.js';
import { makeNode } from './parser.js';

/** A validated opening delimiter */
export interface Opening {
  /** Offset of the opener */
  readonly start: number;
  readonly opener: number;
  readonly closer: number;
  /** Offset just past the opener */
  readonly contentStart: number;
}

/**
 * Read the code point at the cursor and validate it as an opener.
 * Records a delimiter error under `label` and returns null when invalid.
 * @internal
 */
export function readOpening(
  state: ScanState,
  matcher: DelimiterMatcher,
  label: string
): Opening | null {
  const start = state.pos;
  const opener = codePointAt(state.source, start);
  const closer = opener < 0 ? null : matcher.match(opener);
  if (closer === null) {
    recordError(state, SCAN_ERRORS.DELIMITER_EXPECTED, label, start);
    return null;
  }
  return {
    start,
    opener,
    closer,
    contentStart: start + codePointSize(opener),
  };
}

/**
 * Single-segment literal: whitespace, opener, segment, closer.
 *
 * Nothing is consumed on failure. A scan failure is always further along
 * than the opener, so the segment scanner's error is the one that stands.
 * @internal
 */
export function parseDelimitedText(
  state: ScanState,
  type: LiteralNodeType,
  matcher: DelimiterMatcher,
  escapes: EscapeTable,
  label: string
): LiteralNode<TextValue> | null {
  const origin = state.pos;
  state.skipWhitespace(state);

  const opening = readOpening(state, matcher, label);
  if (opening === null) {
    state.pos = origin;
    return null;
  }

  const segment = scanSegment(
    state,
    opening.contentStart,
    opening.closer,
    escapes
  );
  if (segment === null) {
    state.pos = origin;
    return null;
  }

  return makeNode(state, type, opening.start, state.pos, {
    kind: 'text',
    text: segment.text,
  });
}
