/**
 * Shared Types
 * Source locations, literal nodes and the error taxonomy
 */

export type { SourceLocation, SourceSpan } from './source-location.js';

export type {
  FloatValue,
  IntegerValue,
  LiteralNode,
  LiteralNodeType,
  LiteralValue,
  PairValue,
  TextValue,
} from './ast-nodes.js';

export {
  CONFIG_ERRORS,
  ERROR_REGISTRY,
  renderMessage,
  SCAN_ERRORS,
  type ConfigErrorId,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
  type ScanErrorId,
} from './error-registry.js';

export {
  ConfigError,
  createError,
  LiteralError,
  ScanError,
  type LiteralErrorData,
} from './error-classes.js';
