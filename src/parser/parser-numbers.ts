/**
 * Number Literal Parser
 */

import type { FloatValue, IntegerValue } from '../types.js';
import { SCAN_ERRORS } from '../error-registry.js';
import { isDigitCode } from '../scanner/helpers.js';
import { recordError, type ScanState } from '../scanner/state.js';
import { createParser, makeNode, type LiteralParser } from './parser.js';

const MIN_INT64 = -(2n ** 63n);
const MAX_INT64 = 2n ** 63n - 1n;

const PLUS = 0x2b;
const MINUS = 0x2d;
const DOT = 0x2e;
const LOWER_E = 0x65;
const UPPER_E = 0x45;

/** Scanned extent of a number, before conversion */
interface NumberScan {
  readonly end: number;
  readonly digits: number;
  readonly float: boolean;
}

function scanNumber(source: string, start: number): NumberScan {
  let end = start;
  let digits = 0;
  let float = false;

  const at = (offset: number): number =>
    offset < source.length ? source.charCodeAt(offset) : -1;
  const skipSign = (): void => {
    if (at(end) === PLUS || at(end) === MINUS) end++;
  };
  const skipDigits = (): void => {
    while (isDigitCode(at(end))) {
      end++;
      digits++;
    }
  };

  skipSign();
  skipDigits();

  if (at(end) === DOT) {
    float = true;
    end++;
    skipDigits();
  }

  if (at(end) === LOWER_E || at(end) === UPPER_E) {
    float = true;
    end++;
    skipSign();
    skipDigits();
  }

  return { end, digits, float };
}

/** Converts the scanned slice, or returns null when it is out of range */
function convert(text: string, float: boolean): IntegerValue | FloatValue | null {
  if (float) {
    const value = Number(text);
    return Number.isFinite(value) ? { kind: 'float', value } : null;
  }
  const value = BigInt(text);
  return value >= MIN_INT64 && value <= MAX_INT64
    ? { kind: 'integer', value }
    : null;
}

/**
 * Signed integer or float: `[+-]? digits ('.' digits)? ([eE] [+-]? digits)?`.
 *
 * A fraction or exponent makes the literal a float. Integers must fit a
 * signed 64-bit range and floats must be finite. Escapes are not decoded.
 */
export function numberLiteral(): LiteralParser<IntegerValue | FloatValue> {
  return createParser('number literal', (state: ScanState) => {
    const origin = state.pos;
    state.skipWhitespace(state);

    const start = state.pos;
    const scan = scanNumber(state.source, start);
    const value =
      scan.digits === 0
        ? null
        : convert(state.source.slice(start, scan.end), scan.float);

    if (value === null) {
      recordError(state, SCAN_ERRORS.NUMBER_EXPECTED, 'number', start);
      state.pos = origin;
      return null;
    }

    state.pos = scan.end;
    return makeNode(state, 'NumberLiteral', start, scan.end, value);
  });
}
