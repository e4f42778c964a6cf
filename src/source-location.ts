// ============================================================
// SOURCE LOCATION
// ============================================================

/**
 * A position in source text. `offset` is a UTF-16 code-unit index into the
 * source string; `line` and `column` are 1-based, with columns counted in
 * code units.
 */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}
