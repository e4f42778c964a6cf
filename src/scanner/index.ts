/**
 * Scanner Module
 * Scan state, delimiter matching, escapes and the segment scanner
 */

export {
  createScanState,
  errorHere,
  locate,
  makeSpan,
  recordError,
  skipAsciiWhitespace,
  skipNothing,
  toScanError,
  type ScanErrorRecord,
  type ScanState,
  type ScanStateOptions,
  type WhitespaceHook,
} from './state.js';
export {
  createEscapeTable,
  DEFAULT_ESCAPES,
  extendEscapeTable,
  type EscapeTable,
} from './escapes.js';
export {
  matchDelimiter,
  predicateMatcher,
  quoteSetMatcher,
  unicodeDelimiters,
  type DelimiterMatcher,
} from './delimiters.js';
export {
  HEX_DIGIT_LABEL,
  scanSegment,
  type SegmentResult,
} from './segment.js';
