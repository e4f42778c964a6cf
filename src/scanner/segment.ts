/**
 * Segment Scanner
 * Scans one delimited run of text up to its closer, decoding escapes
 */

import { SCAN_ERRORS } from '../error-registry.js';
import type { EscapeTable } from './escapes.js';
import {
  codePointAt,
  codePointSize,
  hexValue,
  isSurrogate,
} from './helpers.js';
import { recordError, type ScanState } from './state.js';

const BACKSLASH = 0x5c;
const LOWER_U = 0x75;
const REPLACEMENT_CHARACTER = 0xfffd;

/** Expectation label for a \u escape digit */
export const HEX_DIGIT_LABEL = '[a-fA-F0-9]';

export interface SegmentResult {
  /** Decoded segment text */
  readonly text: string;
  /** Offset of the closer */
  readonly end: number;
  /** False when text is a slice of the source (no escape was seen) */
  readonly copied: boolean;
}

/**
 * Decode four hex digits starting at `offset`. Returns the code point, or
 * records a failure at the first missing or invalid digit and returns -1.
 */
function readHexQuad(state: ScanState, offset: number): number {
  const { source } = state;
  let value = 0;
  for (let i = 0; i < 4; i++) {
    const digit =
      offset + i < source.length ? hexValue(source.charCodeAt(offset + i)) : -1;
    if (digit < 0) {
      recordError(
        state,
        SCAN_ERRORS.HEX_DIGIT_EXPECTED,
        HEX_DIGIT_LABEL,
        offset + i
      );
      return -1;
    }
    value = (value << 4) | digit;
  }
  return value;
}

/**
 * Scan from `start` to the first unescaped `closer`.
 *
 * Escapes: `\uXXXX` decodes a code point (a surrogate becomes U+FFFD), a
 * backslash before the closer yields the closer, table letters yield their
 * mapped character, and any other `\X` is kept as written. The text is a
 * plain slice of the source until the first escape; only then is a buffer
 * started.
 *
 * On success the cursor moves past the closer. On failure the furthest
 * error is recorded, the cursor is left alone and null is returned.
 */
export function scanSegment(
  state: ScanState,
  start: number,
  closer: number,
  escapes: EscapeTable
): SegmentResult | null {
  const { source } = state;
  const closerText = String.fromCodePoint(closer);
  let chunks: string[] | null = null;
  let end = start;

  while (end < source.length) {
    const current = codePointAt(source, end);
    const size = codePointSize(current);

    if (current === BACKSLASH) {
      if (end + size >= source.length) {
        recordError(state, SCAN_ERRORS.CLOSER_EXPECTED, closerText, end);
        return null;
      }

      if (chunks === null) {
        chunks = [source.slice(start, end)];
      }

      const next = codePointAt(source, end + size);
      const nextSize = codePointSize(next);

      if (next === LOWER_U) {
        const digitsAt = end + size + nextSize;
        const decoded = readHexQuad(state, digitsAt);
        if (decoded < 0) return null;
        chunks.push(
          String.fromCodePoint(
            isSurrogate(decoded) ? REPLACEMENT_CHARACTER : decoded
          )
        );
        end = digitsAt + 4;
        continue;
      }

      const replacement = next === closer ? closer : escapes.get(next);
      if (replacement !== undefined) {
        chunks.push(String.fromCodePoint(replacement));
      } else {
        chunks.push('\\', String.fromCodePoint(next));
      }
      end += size + nextSize;
      continue;
    }

    if (current === closer) {
      state.pos = end + size;
      if (chunks === null) {
        return { text: source.slice(start, end), end, copied: false };
      }
      return { text: chunks.join(''), end, copied: true };
    }

    end += size;
    if (chunks !== null) {
      chunks.push(String.fromCodePoint(current));
    }
  }

  recordError(state, SCAN_ERRORS.CLOSER_EXPECTED, closerText, end);
  return null;
}
