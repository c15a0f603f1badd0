/**
 * Error hierarchy for execution-command.
 */

import type { CommandValue } from './document/types.js';

export interface ErrorOptions {
  cause?: Error;
}

export class CommandError extends Error {
  readonly code: string;
  readonly details: Record<string, unknown>;
  override readonly cause?: Error;
  readonly timestamp: string;

  constructor(code: string, message: string, details?: Record<string, unknown>, cause?: Error) {
    super(message, cause ? { cause } : undefined);
    this.name = 'CommandError';
    this.code = code;
    this.details = details ?? {};
    this.cause = cause;
    this.timestamp = new Date().toISOString();
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }

  toJSON(): Record<string, unknown> {
    const obj: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    };
    if (Object.keys(this.details).length > 0) {
      obj.details = this.details;
    }
    if (this.cause !== undefined) {
      obj.cause = String(this.cause);
    }
    obj.timestamp = this.timestamp;
    return obj;
  }
}

/**
 * A value exists at `path` but cannot be read as `expectedType`.
 */
export class ValueCoercionError extends CommandError {
  readonly path: string;
  readonly expectedType: string;
  readonly actual: CommandValue;

  constructor(path: string, expectedType: string, actual: CommandValue, options?: ErrorOptions) {
    super(
      'VALUE_COERCION_ERROR',
      `Value at '${path}' was expected to be of type ${expectedType} but is ${JSON.stringify(actual)}`,
      { path, expectedType, actual },
      options?.cause,
    );
    this.name = 'ValueCoercionError';
    this.path = path;
    this.expectedType = expectedType;
    this.actual = actual;
  }
}

export class CommandParseError extends CommandError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super('COMMAND_PARSE_ERROR', message, details, options?.cause);
    this.name = 'CommandParseError';
  }
}

export class CommandNotFoundError extends CommandError {
  readonly commandPath: string;

  constructor(commandPath: string, options?: ErrorOptions) {
    super('COMMAND_NOT_FOUND', `Command file not found: ${commandPath}`, { commandPath }, options?.cause);
    this.name = 'CommandNotFoundError';
    this.commandPath = commandPath;
  }
}

export class ConfigNotFoundError extends CommandError {
  readonly configPath: string;

  constructor(configPath: string, options?: ErrorOptions) {
    super('CONFIG_NOT_FOUND', `Configuration file not found: ${configPath}`, { configPath }, options?.cause);
    this.name = 'ConfigNotFoundError';
    this.configPath = configPath;
  }
}

export class ConfigError extends CommandError {
  constructor(message: string, options?: ErrorOptions) {
    super('CONFIG_INVALID', message, {}, options?.cause);
    this.name = 'ConfigError';
  }
}

export const ErrorCodes = Object.freeze({
  VALUE_COERCION_ERROR: 'VALUE_COERCION_ERROR',
  COMMAND_PARSE_ERROR: 'COMMAND_PARSE_ERROR',
  COMMAND_NOT_FOUND: 'COMMAND_NOT_FOUND',
  CONFIG_NOT_FOUND: 'CONFIG_NOT_FOUND',
  CONFIG_INVALID: 'CONFIG_INVALID',
} as const);

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
