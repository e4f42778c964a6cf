/**
 * Literal AST Nodes
 */

import type { SourceSpan } from './source-location.js';

// ============================================================
// LITERAL VALUES
// ============================================================

/** Decoded string or regexp segment */
export interface TextValue {
  readonly kind: 'text';
  readonly text: string;
}

/** Signed 64-bit integer */
export interface IntegerValue {
  readonly kind: 'integer';
  readonly value: bigint;
}

/** 64-bit floating point number */
export interface FloatValue {
  readonly kind: 'float';
  readonly value: number;
}

/** Pattern and replacement segments of a replace literal, in that order */
export interface PairValue {
  readonly kind: 'pair';
  readonly pattern: LiteralNode;
  readonly replacement: LiteralNode;
}

export type LiteralValue = TextValue | IntegerValue | FloatValue | PairValue;

// ============================================================
// LITERAL NODE
// ============================================================

export type LiteralNodeType =
  | 'StringLiteral'
  | 'NumberLiteral'
  | 'RegexpMatchLiteral'
  | 'RegexpReplaceLiteral'
  | 'Segment';

/**
 * Output of a literal parse. `start`/`end` are code-unit offsets. Top-level
 * nodes cover the whole literal including its delimiters; `Segment` nodes
 * cover the text between the delimiters.
 */
export interface LiteralNode<V extends LiteralValue = LiteralValue> {
  readonly type: LiteralNodeType;
  readonly start: number;
  readonly end: number;
  readonly span: SourceSpan;
  readonly value: V;
}
