/**
 * String Literal Parsers
 */

import type { TextValue } from '../types.js';
import {
  quoteSetMatcher,
  unicodeDelimiters,
  type DelimiterMatcher,
} from '../scanner/delimiters.js';
import { DEFAULT_ESCAPES, type EscapeTable } from '../scanner/escapes.js';
import { parseDelimitedText } from './helpers.js';
import { createParser, type LiteralParser } from './parser.js';

/**
 * Quoted string whose opening and closing quote are the same character,
 * taken from `allowedQuotes`. Supports the default escapes, `\uXXXX` and an
 * escaped quote.
 *
 * @example
 * ```typescript
 * parseLiteral('"a\\tb"', stringLiteral('"\'')).value // { kind: 'text', text: 'a\tb' }
 * ```
 */
export function stringLiteral(allowedQuotes: string): LiteralParser<TextValue> {
  const matcher = quoteSetMatcher(allowedQuotes);
  return createParser('string literal', (state) =>
    parseDelimitedText(
      state,
      'StringLiteral',
      matcher,
      DEFAULT_ESCAPES,
      matcher.label
    )
  );
}

/**
 * Quoted string with delimiters validated by `matcher`. Only the escapes in
 * `escapes`, `\uXXXX` and the escaped closer are decoded. A rejected opener
 * is reported with the matcher's label.
 */
export function customStringLiteral(
  matcher: DelimiterMatcher,
  escapes: EscapeTable = DEFAULT_ESCAPES
): LiteralParser<TextValue> {
  return createParser('string literal', (state) =>
    parseDelimitedText(
      state,
      'StringLiteral',
      matcher,
      escapes,
      matcher.label
    )
  );
}

/**
 * Quoted string opened by a Unicode quote or bracket (closing with its
 * partner), < (closing with >), or any other punctuation character
 * (closing with itself).
 */
export function unicodeStringLiteral(): LiteralParser<TextValue> {
  return customStringLiteral(unicodeDelimiters, DEFAULT_ESCAPES);
}
