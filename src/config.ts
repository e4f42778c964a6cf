/**
 * Configuration Loader
 * Loads and validates literal scanner settings from YAML (or JSON) files.
 */

import { readFileSync } from 'node:fs';
import * as yaml from 'yaml';
import { CONFIG_ERRORS } from './error-registry.js';
import { createError, type LiteralError } from './error-classes.js';
import { quoteSetMatcher, type DelimiterMatcher } from './scanner/delimiters.js';
import {
  DEFAULT_ESCAPES,
  extendEscapeTable,
  type EscapeTable,
} from './scanner/escapes.js';
import {
  skipAsciiWhitespace,
  skipNothing,
  type WhitespaceHook,
} from './scanner/state.js';

// ============================================================
// TYPES
// ============================================================

export type WhitespaceMode = 'default' | 'none';

export interface LiteralConfig {
  /** Quote characters accepted by the fixed-quote string parser */
  readonly quotes: string;
  /** Extra escape letters, layered over the default table */
  readonly escapes: Readonly<Record<string, string>>;
  /** Whitespace skipped before each literal */
  readonly whitespace: WhitespaceMode;
}

/** Settings ready to hand to the parsers */
export interface ResolvedConfig {
  readonly quotes: DelimiterMatcher;
  readonly escapes: EscapeTable;
  readonly skipWhitespace: WhitespaceHook;
}

const KNOWN_KEYS = new Set(['quotes', 'escapes', 'whitespace']);

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

export function createDefaultConfig(): LiteralConfig {
  return { quotes: '"\'', escapes: {}, whitespace: 'default' };
}

// ============================================================
// VALIDATION
// ============================================================

function invalid(reason: string): LiteralError {
  return createError(CONFIG_ERRORS.INVALID_CONFIG, { reason });
}

function isSingleCharacter(value: unknown): value is string {
  return typeof value === 'string' && Array.from(value).length === 1;
}

function isWhitespaceMode(value: unknown): value is WhitespaceMode {
  return value === 'default' || value === 'none';
}

/**
 * Validate a parsed configuration document. A null document (empty file)
 * yields the defaults; missing keys take their default values.
 *
 * @throws ConfigError (LIT-C001) on unknown keys or malformed values
 */
export function validateConfig(data: unknown): LiteralConfig {
  const defaults = createDefaultConfig();
  if (data === null || data === undefined) return defaults;

  if (typeof data !== 'object' || Array.isArray(data)) {
    throw invalid('must be an object');
  }
  const fields = new Map<string, unknown>(Object.entries(data));

  for (const key of fields.keys()) {
    if (!KNOWN_KEYS.has(key)) {
      throw invalid(`unknown key ${key}`);
    }
  }

  const quotes = fields.get('quotes') ?? defaults.quotes;
  if (typeof quotes !== 'string' || quotes.length === 0) {
    throw invalid('quotes must be a non-empty string');
  }

  const escapesField = fields.get('escapes') ?? {};
  if (
    typeof escapesField !== 'object' ||
    escapesField === null ||
    Array.isArray(escapesField)
  ) {
    throw invalid('escapes must be a mapping');
  }
  const escapes: Record<string, string> = {};
  const escapeEntries = new Map<string, unknown>(Object.entries(escapesField));
  for (const [letter, replacement] of escapeEntries) {
    if (!isSingleCharacter(letter) || !isSingleCharacter(replacement)) {
      throw invalid(`escape ${letter} must map one character to one character`);
    }
    if (letter === 'u') {
      throw invalid('escape u is reserved for unicode escapes');
    }
    escapes[letter] = replacement;
  }

  const whitespace = fields.get('whitespace') ?? defaults.whitespace;
  if (!isWhitespaceMode(whitespace)) {
    throw invalid('whitespace must be "default" or "none"');
  }

  return { quotes, escapes, whitespace };
}

// ============================================================
// LOADING
// ============================================================

/**
 * Load and validate a configuration file.
 *
 * @throws ConfigError (LIT-C002) when the file cannot be read or parsed
 * @throws ConfigError (LIT-C001) when its contents are invalid
 */
export function loadLiteralConfig(path: string): LiteralConfig {
  let document: unknown;
  try {
    document = yaml.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw createError(CONFIG_ERRORS.UNREADABLE_CONFIG, {
      path,
      reason: err instanceof Error ? err.message : String(err),
    });
  }
  return validateConfig(document);
}

/** Build the matcher, escape table and whitespace hook for a configuration */
export function resolveConfig(config: LiteralConfig): ResolvedConfig {
  return {
    quotes: quoteSetMatcher(config.quotes),
    escapes: extendEscapeTable(DEFAULT_ESCAPES, config.escapes),
    skipWhitespace:
      config.whitespace === 'none' ? skipNothing : skipAsciiWhitespace,
  };
}
