/**
 * Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './source-location.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface LiteralErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

function lookupDefinition(
  errorId: string,
  category?: ErrorCategory
): ErrorDefinition {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (category !== undefined && definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return definition;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all literal scanner errors.
 * Provides structured data for host applications to format as needed.
 */
export class LiteralError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: LiteralErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    lookupDefinition(data.errorId);

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'LiteralError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): LiteralErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: LiteralErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Literal scanning failures surfaced to the end user */
export class ScanError extends LiteralError {
  // Scan errors always point into the source
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    lookupDefinition(errorId, 'scan');
    super({ errorId, message, location, context });
    this.name = 'ScanError';
    this.location = location;
  }
}

/** Configuration loading failures */
export class ConfigError extends LiteralError {
  constructor(errorId: string, message: string, context?: Record<string, unknown>) {
    lookupDefinition(errorId, 'config');
    super({ errorId, message, context });
    this.name = 'ConfigError';
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create an error from the registry, rendering its message template with
 * `context`. Scan IDs produce a ScanError (a location is then required),
 * config IDs a ConfigError.
 *
 * @throws TypeError if errorId is not in the registry
 *
 * @example
 * createError('LIT-S002', { expected: '"' }, location)
 * // ScanError: 'Expected closing " at 1:5'
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation
): LiteralError {
  const definition = lookupDefinition(errorId);
  const message = renderMessage(definition.messageTemplate, context);

  if (definition.category === 'scan') {
    if (!location) {
      throw new TypeError(`Scan error ${errorId} requires a location`);
    }
    return new ScanError(errorId, message, location, context);
  }
  return new ConfigError(errorId, message, context);
}
