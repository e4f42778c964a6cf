/**
 * litscan
 * Literal scanners for recursive-descent parsers: strings, numbers and
 * regexp match/replace literals
 */

export {
  createParser,
  customStringLiteral,
  makeNode,
  numberLiteral,
  parseLiteral,
  regexpMatchLiteral,
  regexpReplaceLiteral,
  stringLiteral,
  tryParseLiteral,
  unicodeRegexpMatchLiteral,
  unicodeRegexpReplaceLiteral,
  unicodeStringLiteral,
  type LiteralParser,
  type ParseLiteralOptions,
  type ParseResult,
} from './parser/index.js';

export {
  createEscapeTable,
  createScanState,
  DEFAULT_ESCAPES,
  errorHere,
  extendEscapeTable,
  HEX_DIGIT_LABEL,
  locate,
  makeSpan,
  matchDelimiter,
  predicateMatcher,
  quoteSetMatcher,
  recordError,
  scanSegment,
  skipAsciiWhitespace,
  skipNothing,
  toScanError,
  unicodeDelimiters,
  type DelimiterMatcher,
  type EscapeTable,
  type ScanErrorRecord,
  type ScanState,
  type ScanStateOptions,
  type SegmentResult,
  type WhitespaceHook,
} from './scanner/index.js';

// ============================================================
// CONFIGURATION
// ============================================================
export {
  createDefaultConfig,
  loadLiteralConfig,
  resolveConfig,
  validateConfig,
  type LiteralConfig,
  type ResolvedConfig,
  type WhitespaceMode,
} from './config.js';

export * from './types.js';
