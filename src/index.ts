/**
 * execution-command - Typed read-only access to orchestration command documents.
 */

// Core
export { ExecutionCommand } from './execution-command.js';
export { ModuleConfigs } from './module-configs.js';
export { CommandLoader } from './loader.js';
export type { CommandFormat } from './loader.js';

// Document model
export { lookupPath, getValue, splitPath, PATH_SEPARATOR } from './document/path-lookup.js';
export type { LookupResult } from './document/path-lookup.js';
export { toInteger, toBoolean, toStringValue, toStringList } from './document/coerce.js';
export type { CoercionResult } from './document/coerce.js';
export {
  isMapping,
  isSequence,
  isScalar,
  isCommandDocument,
  CommandValueSchema,
  CommandDocumentSchema,
} from './document/types.js';
export type { CommandValue, CommandMapping, CommandSequence, CommandScalar } from './document/types.js';

// Config
export { Config } from './config.js';

// Errors
export {
  CommandError,
  ValueCoercionError,
  CommandParseError,
  CommandNotFoundError,
  ConfigNotFoundError,
  ConfigError,
  ErrorCodes,
} from './errors.js';
export type { ErrorCode, ErrorOptions } from './errors.js';

// Observability
export { ContextLogger } from './observability/index.js';
export type { ContextLoggerOptions, WritableOutput } from './observability/index.js';

export const VERSION = '0.1.0';
