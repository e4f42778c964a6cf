/**
 * Literal Parser Core
 *
 * A LiteralParser is a leaf parser: it reads one literal at the cursor of a
 * ScanState and either returns a node (cursor advanced past the literal) or
 * returns null after recording the furthest error.
 */

import type { LiteralNode, LiteralNodeType, LiteralValue } from '../types.js';
import { makeSpan, type ScanState } from '../scanner/state.js';

export interface LiteralParser<V extends LiteralValue = LiteralValue> {
  /** Human-readable name, e.g. "string literal" */
  readonly name: string;
  parse(state: ScanState): LiteralNode<V> | null;
}

/** @internal */
export function createParser<V extends LiteralValue>(
  name: string,
  parse: (state: ScanState) => LiteralNode<V> | null
): LiteralParser<V> {
  return { name, parse };
}

/** @internal */
export function makeNode<V extends LiteralValue>(
  state: ScanState,
  type: LiteralNodeType,
  start: number,
  end: number,
  value: V
): LiteralNode<V> {
  return { type, start, end, span: makeSpan(state, start, end), value };
}
