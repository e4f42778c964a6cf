/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'scan' | 'config';

/**
 * Example demonstrating an error condition.
 * Used in error documentation to show common scenarios.
 */
export interface ErrorExample {
  /** Description of the example scenario */
  readonly description: string;
  /** Example input demonstrating the error */
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: LIT-{category}{3-digit} (e.g., LIT-S001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
  readonly examples?: readonly ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: readonly ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

/** Error IDs raised while scanning literals */
export const SCAN_ERRORS = {
  DELIMITER_EXPECTED: 'LIT-S001',
  CLOSER_EXPECTED: 'LIT-S002',
  HEX_DIGIT_EXPECTED: 'LIT-S003',
  NUMBER_EXPECTED: 'LIT-S004',
  SECOND_DELIMITER_EXPECTED: 'LIT-S005',
  TRAILING_INPUT: 'LIT-S006',
} as const;

export type ScanErrorId = (typeof SCAN_ERRORS)[keyof typeof SCAN_ERRORS];

/** Error IDs raised while loading configuration */
export const CONFIG_ERRORS = {
  INVALID_CONFIG: 'LIT-C001',
  UNREADABLE_CONFIG: 'LIT-C002',
} as const;

export type ConfigErrorId = (typeof CONFIG_ERRORS)[keyof typeof CONFIG_ERRORS];

const ERROR_DEFINITIONS: readonly ErrorDefinition[] = [
  // Scan Errors (LIT-S0xx)
  {
    errorId: SCAN_ERRORS.DELIMITER_EXPECTED,
    category: 'scan',
    description: 'Delimiter expected',
    messageTemplate: 'Expected {expected}',
    cause:
      'The character at the start of the literal is not an accepted opening delimiter.',
    resolution:
      'Open the literal with one of the allowed quotes, or with a punctuation character.',
    examples: [
      { description: 'Letter used as a quote', code: 'xhellox' },
      { description: 'Quote outside the allowed set', code: "'hello'" },
    ],
  },
  {
    errorId: SCAN_ERRORS.CLOSER_EXPECTED,
    category: 'scan',
    description: 'Closing delimiter expected',
    messageTemplate: 'Expected closing {expected}',
    cause:
      'End of input was reached before the closing delimiter, or the input ends with a backslash.',
    resolution: 'Add the closing delimiter, or escape the trailing backslash.',
    examples: [
      { description: 'Missing closing quote', code: '"abc' },
      { description: 'Dangling escape', code: '"abc\\' },
    ],
  },
  {
    errorId: SCAN_ERRORS.HEX_DIGIT_EXPECTED,
    category: 'scan',
    description: 'Hex digit expected',
    messageTemplate: 'Expected {expected} in unicode escape',
    cause: 'A \\u escape is not followed by four hexadecimal digits.',
    resolution: 'Write exactly four hex digits after \\u, e.g. \\u00e9.',
    examples: [
      { description: 'Too few digits', code: '"\\u12"' },
      { description: 'Non-hex digit', code: '"\\u12g4"' },
    ],
  },
  {
    errorId: SCAN_ERRORS.NUMBER_EXPECTED,
    category: 'scan',
    description: 'Number expected',
    messageTemplate: 'Expected {expected}',
    cause:
      'No digits were found, or the number does not fit a 64-bit integer or a finite float.',
    resolution: 'Write at least one digit; keep integers within 64 bits.',
    examples: [
      { description: 'Bare sign', code: '-' },
      { description: 'Integer overflow', code: '9223372036854775808' },
    ],
  },
  {
    errorId: SCAN_ERRORS.SECOND_DELIMITER_EXPECTED,
    category: 'scan',
    description: 'Second delimiter expected',
    messageTemplate: 'Expected {expected} to open the replacement',
    cause:
      'A replace literal opened with a bracket pair must open its replacement with a fresh delimiter.',
    resolution: 'Follow the closing bracket with another delimiter, e.g. (a)[b].',
    examples: [{ description: 'Letter after the pattern', code: '(foo)bar' }],
  },
  {
    errorId: SCAN_ERRORS.TRAILING_INPUT,
    category: 'scan',
    description: 'Unexpected trailing input',
    messageTemplate: 'Expected {expected} after literal',
    cause: 'The literal ended before the end of the source.',
    resolution: 'Remove the characters following the literal.',
    examples: [{ description: 'Text after the closing quote', code: '"a"b' }],
  },

  // Config Errors (LIT-C0xx)
  {
    errorId: CONFIG_ERRORS.INVALID_CONFIG,
    category: 'config',
    description: 'Invalid configuration',
    messageTemplate: 'Invalid configuration: {reason}',
    cause: 'The configuration file has an unknown key or a value of the wrong shape.',
    resolution:
      'Use only the keys quotes, escapes and whitespace with the documented value types.',
  },
  {
    errorId: CONFIG_ERRORS.UNREADABLE_CONFIG,
    category: 'config',
    description: 'Configuration file unreadable',
    messageTemplate: 'Cannot read configuration {path}: {reason}',
    cause: 'The configuration file is missing, unreadable or not valid YAML.',
    resolution: 'Check the path and the YAML syntax of the file.',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Non-string values are coerced via String().
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("Expected {expected}", { expected: '"' })
 * // Returns: 'Expected "'
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{' && template.charAt(i + 1) !== '{') {
      let j = i + 1;
      while (j < template.length && template.charAt(j) !== '}') {
        j++;
      }

      if (j >= template.length) {
        return template;
      }

      const value = context[template.slice(i + 1, j)];
      if (value !== undefined) {
        try {
          result += String(value);
        } catch {
          // String() throws for objects with a hostile toPrimitive
          result += Object.prototype.toString.call(value);
        }
      }

      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
