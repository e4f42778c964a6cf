/**
 * Regexp Literal Parsers
 * Match literals (one segment) and replace literals (pattern + replacement)
 */

import type { LiteralNode, PairValue, TextValue } from '../types.js';
import { SCAN_ERRORS } from '../error-registry.js';
import {
  matchDelimiter,
  unicodeDelimiters,
  type DelimiterMatcher,
} from '../scanner/delimiters.js';
import { DEFAULT_ESCAPES, type EscapeTable } from '../scanner/escapes.js';
import { codePointAt, codePointSize } from '../scanner/helpers.js';
import { scanSegment } from '../scanner/segment.js';
import { recordError, type ScanState } from '../scanner/state.js';
import { parseDelimitedText, readOpening } from './helpers.js';
import { createParser, makeNode, type LiteralParser } from './parser.js';

const REGEXP_DELIMITER = 'regexp delimiter';

/** Regexp pattern in any delimiter `matcher` accepts, e.g. /a+b/ or {a+b} */
export function regexpMatchLiteral(
  matcher: DelimiterMatcher = unicodeDelimiters,
  escapes: EscapeTable = DEFAULT_ESCAPES
): LiteralParser<TextValue> {
  return createParser('regexp match literal', (state) =>
    parseDelimitedText(
      state,
      'RegexpMatchLiteral',
      matcher,
      escapes,
      REGEXP_DELIMITER
    )
  );
}

function parseReplace(
  state: ScanState,
  matcher: DelimiterMatcher,
  escapes: EscapeTable
): LiteralNode<PairValue> | null {
  const origin = state.pos;
  state.skipWhitespace(state);

  const opening = readOpening(state, matcher, REGEXP_DELIMITER);
  if (opening === null) {
    state.pos = origin;
    return null;
  }
  state.pos = opening.contentStart;

  const pattern = scanSegment(state, state.pos, opening.closer, escapes);
  if (pattern === null) return null;

  let closer = opening.closer;
  if (opening.opener !== opening.closer) {
    const second = codePointAt(state.source, state.pos);
    const secondCloser = second < 0 ? null : matchDelimiter(second);
    if (secondCloser === null) {
      recordError(
        state,
        SCAN_ERRORS.SECOND_DELIMITER_EXPECTED,
        REGEXP_DELIMITER,
        state.pos
      );
      return null;
    }
    state.pos += codePointSize(second);
    closer = secondCloser;
  }

  const replacementStart = state.pos;
  const replacement = scanSegment(
    state,
    replacementStart,
    closer,
    DEFAULT_ESCAPES
  );
  if (replacement === null) return null;

  const value: PairValue = {
    kind: 'pair',
    pattern: makeNode(
      state,
      'Segment',
      opening.contentStart,
      pattern.end,
      { kind: 'text', text: pattern.text }
    ),
    replacement: makeNode(
      state,
      'Segment',
      replacementStart,
      replacement.end,
      { kind: 'text', text: replacement.text }
    ),
  };
  return makeNode(state, 'RegexpReplaceLiteral', opening.start, state.pos, value);
}

/**
 * Pattern and replacement, e.g. /foo/bar/ or (foo)[bar].
 *
 * With a self-closing delimiter the pattern's closer also opens the
 * replacement. With a bracket pair the replacement needs its own opener,
 * validated against the Unicode delimiter tables. The replacement always
 * uses the default escapes.
 *
 * A failure after the first opener leaves the cursor where scanning
 * stopped.
 */
export function regexpReplaceLiteral(
  matcher: DelimiterMatcher = unicodeDelimiters,
  escapes: EscapeTable = DEFAULT_ESCAPES
): LiteralParser<PairValue> {
  return createParser('regexp replace literal', (state) =>
    parseReplace(state, matcher, escapes)
  );
}

export function unicodeRegexpMatchLiteral(): LiteralParser<TextValue> {
  return regexpMatchLiteral(unicodeDelimiters, DEFAULT_ESCAPES);
}

export function unicodeRegexpReplaceLiteral(): LiteralParser<PairValue> {
  return regexpReplaceLiteral(unicodeDelimiters, DEFAULT_ESCAPES);
}
