#!/usr/bin/env node
/**
 * litscan CLI - Scan a single literal
 *
 * Usage:
 *   litscan '"hello\tworld"'
 *   litscan --kind number -- -3.14
 *   litscan --kind replace '/foo/bar/'
 *   litscan --config literals.yaml --kind string "'quoted'"
 */

import type { LiteralNode } from './types.js';
import {
  createDefaultConfig,
  loadLiteralConfig,
  resolveConfig,
  type LiteralConfig,
} from './config.js';
import { formatError, formatNode, readVersion } from './cli-shared.js';
import {
  customStringLiteral,
  numberLiteral,
  parseLiteral,
  regexpMatchLiteral,
  regexpReplaceLiteral,
  type LiteralParser,
} from './parser/index.js';
import { unicodeDelimiters } from './scanner/delimiters.js';

export const LITERAL_KINDS = [
  'string',
  'unicode',
  'number',
  'regexp',
  'replace',
] as const;

export type LiteralKind = (typeof LITERAL_KINDS)[number];

export type ParsedScanArgs =
  | { mode: 'scan'; text: string; kind: LiteralKind; config?: string }
  | { mode: 'help' }
  | { mode: 'version' };

function isLiteralKind(value: string): value is LiteralKind {
  return LITERAL_KINDS.some((kind) => kind === value);
}

/**
 * Parse command-line arguments for litscan
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 */
export function parseScanArgs(argv: string[]): ParsedScanArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  let kind: LiteralKind = 'unicode';
  let config: string | undefined;
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (arg === '--') {
      positional.push(...argv.slice(i + 1));
      break;
    }
    if (arg === '--kind' || arg === '--config') {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('-')) {
        throw new Error(`${arg} requires an argument`);
      }
      if (arg === '--config') {
        config = value;
      } else if (isLiteralKind(value)) {
        kind = value;
      } else {
        throw new Error(
          `Invalid kind: ${value}. Expected one of ${LITERAL_KINDS.join(', ')}`
        );
      }
      i++;
      continue;
    }
    if (arg.startsWith('-')) {
      throw new Error(`Unknown option: ${arg}`);
    }
    positional.push(arg);
  }

  const text = positional[0];
  if (text === undefined) {
    return { mode: 'help' };
  }
  if (positional.length > 1) {
    throw new Error('Expected a single literal argument');
  }

  return config === undefined
    ? { mode: 'scan', text, kind }
    : { mode: 'scan', text, kind, config };
}

/** Pick the parser for a literal kind under a configuration */
export function parserFor(kind: LiteralKind, config: LiteralConfig): LiteralParser {
  const resolved = resolveConfig(config);
  switch (kind) {
    case 'string':
      return customStringLiteral(resolved.quotes, resolved.escapes);
    case 'unicode':
      return customStringLiteral(unicodeDelimiters, resolved.escapes);
    case 'number':
      return numberLiteral();
    case 'regexp':
      return regexpMatchLiteral(unicodeDelimiters, resolved.escapes);
    case 'replace':
      return regexpReplaceLiteral(unicodeDelimiters, resolved.escapes);
  }
}

/**
 * Scan `text` as one literal of `kind`.
 *
 * @throws ScanError at the furthest failure
 */
export function scanText(
  text: string,
  kind: LiteralKind,
  config: LiteralConfig = createDefaultConfig()
): LiteralNode {
  const { skipWhitespace } = resolveConfig(config);
  return parseLiteral(text, parserFor(kind, config), { skipWhitespace });
}

function showHelp(): void {
  console.log(`litscan - scan a single literal

Usage:
  litscan [--kind <kind>] [--config <file>] <text>
  litscan --help              Show this help message
  litscan --version           Show version information

Kinds:
  string     quoted string using the configured quotes
  unicode    string in any quote, bracket or punctuation delimiter (default)
  number     integer or float
  regexp     regexp match literal, e.g. /a+b/
  replace    regexp replace literal, e.g. /foo/bar/ or (foo)[bar]

Examples:
  litscan '"a\\tb"'
  litscan --kind number -- -3.14
  litscan --kind replace '(foo)[bar]'`);
}

/**
 * Entry point for the litscan binary. Returns the exit code.
 */
export function main(argv: string[] = process.argv.slice(2)): number {
  try {
    const command = parseScanArgs(argv);

    if (command.mode === 'help') {
      showHelp();
      return 0;
    }

    if (command.mode === 'version') {
      console.log(`litscan ${readVersion()}`);
      return 0;
    }

    const config =
      command.config === undefined
        ? createDefaultConfig()
        : loadLiteralConfig(command.config);
    console.log(formatNode(scanText(command.text, command.kind, config)));
    return 0;
  } catch (err) {
    console.error(err instanceof Error ? formatError(err) : String(err));
    return 1;
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  process.exitCode = main();
}
