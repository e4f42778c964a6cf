/**
 * CLI Shared Utilities
 * Formatting functions for the litscan CLI
 */

import { readFileSync } from 'node:fs';
import type { LiteralNode, LiteralValue } from './types.js';
import { ConfigError, ScanError } from './types.js';

/** JSON-friendly form of a literal value; integers become decimal strings */
function valueToJson(value: LiteralValue): Record<string, unknown> {
  switch (value.kind) {
    case 'text':
      return { kind: 'text', text: value.text };
    case 'integer':
      return { kind: 'integer', value: value.value.toString() };
    case 'float':
      return { kind: 'float', value: value.value };
    case 'pair':
      return {
        kind: 'pair',
        pattern: nodeToJson(value.pattern),
        replacement: nodeToJson(value.replacement),
      };
  }
}

export function nodeToJson(node: LiteralNode): Record<string, unknown> {
  return {
    type: node.type,
    start: node.start,
    end: node.end,
    value: valueToJson(node.value),
  };
}

/**
 * Convert a parsed literal to pretty-printed JSON
 */
export function formatNode(node: LiteralNode): string {
  return JSON.stringify(nodeToJson(node), null, 2);
}

/**
 * Format error for stderr output
 */
export function formatError(err: Error): string {
  if (err instanceof ScanError) {
    const { line, column } = err.location;
    const message = err.message.replace(/ at \d+:\d+$/, '');
    return `Scan error [${err.errorId}] at ${line}:${column}: ${message}`;
  }

  if (err instanceof ConfigError) {
    return `Config error [${err.errorId}]: ${err.message}`;
  }

  return err.message;
}

/** Version from package.json */
export function readVersion(): string {
  const packageJsonPath = new URL('../package.json', import.meta.url);
  const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  return 'unknown';
}
