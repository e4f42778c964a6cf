/**
 * Delimiter Matching
 * Opening delimiter validation and closer lookup
 */

import { isPunctuation, pairTable } from './helpers.js';

// ============================================================
// PAIRING TABLES
// ============================================================

/** Initial/final quotation marks (Pi with Pf) */
const INITIAL_FINAL = pairTable('«»‘’“”‹›⸂⸃⸄⸅⸉⸊⸌⸍⸜⸝⸠⸡');

/** Low-9 quotation marks open with the final quote (Ps with Pf) */
const LOW_QUOTES = pairTable('‚’„”');

/** Opening/closing brackets (Ps with Pe) */
const OPEN_CLOSE = pairTable(
  '()[]{}༺༻༼༽᚛᚜⁅⁆⁽⁾₍₎❨❩❪❫❬❭' +
  '❮❯❰❱❲❳❴❵⟅⟆⟦⟧⟨⟩⟪⟫⦃⦄⦅⦆⦇⦈⦉⦊' +
  '⦋⦌⦑⦒⦓⦔⦕⦖⦗⦘⧘⧙⧚⧛⧼⧽〈〉《》「」『』' +
  '【】〔〕〖〗〘〙〚〛〝〞︗︘︵︶︷︸︹︺︻︼︽︾' +
  '︿﹀﹁﹂﹃﹄﹇﹈﹙﹚﹛﹜﹝﹞（）［］｛｝｟｠｢｣' +
  '⸨⸩'
);

/** Math symbols that pair (Sm with Sm) */
const SYMMETRIC = pairTable('<>');

/** Lookup order for the pairing classes */
const PAIR_TABLES = [INITIAL_FINAL, LOW_QUOTES, OPEN_CLOSE, SYMMETRIC];

const GREATER_THAN = 0x3e;

/**
 * Closing delimiter for `opener`, or null when it cannot open a literal.
 *
 * Known quote and bracket pairs close with their partner (« with », ( with ),
 * < with >). Any other punctuation character, and >, closes with itself.
 */
export function matchDelimiter(opener: number): number | null {
  for (const table of PAIR_TABLES) {
    const closer = table.get(opener);
    if (closer !== undefined) return closer;
  }
  if (isPunctuation(opener) || opener === GREATER_THAN) {
    return opener;
  }
  return null;
}

// ============================================================
// MATCHERS
// ============================================================

/** Decides whether a code point opens a literal, and what closes it */
export interface DelimiterMatcher {
  /** Closer for `opener`, or null if `opener` is not a valid delimiter */
  match(opener: number): number | null;
  /** Description of the accepted delimiters, used in diagnostics */
  readonly label: string;
}

/**
 * Accepts only the characters of `allowedQuotes`; each closes itself.
 *
 * @throws TypeError if `allowedQuotes` is empty
 */
export function quoteSetMatcher(allowedQuotes: string): DelimiterMatcher {
  if (allowedQuotes.length === 0) {
    throw new TypeError('Expected at least one quote character');
  }
  const quotes = new Set<number>();
  for (const ch of allowedQuotes) {
    quotes.add(ch.codePointAt(0) ?? 0);
  }
  return {
    label: allowedQuotes,
    match: (opener) => (quotes.has(opener) ? opener : null),
  };
}

/** Wrap an arbitrary opener-to-closer function */
export function predicateMatcher(
  match: (opener: number) => number | null,
  label = 'string delimiter'
): DelimiterMatcher {
  return { label, match };
}

/** Unicode pairing tables plus the punctuation fallback */
export const unicodeDelimiters: DelimiterMatcher =
  predicateMatcher(matchDelimiter);
