/**
 * CommandLoader — builds ExecutionCommand instances from command text or files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { Value } from '@sinclair/typebox/value';
import yaml from 'js-yaml';
import { Config } from './config.js';
import { CommandDocumentSchema, isCommandDocument } from './document/types.js';
import { CommandNotFoundError, CommandParseError } from './errors.js';
import { ExecutionCommand } from './execution-command.js';
import { ContextLogger } from './observability/context-logger.js';
import type { ContextLoggerOptions } from './observability/context-logger.js';

export type CommandFormat = 'json' | 'yaml';

const YAML_EXTENSIONS = new Set(['.yaml', '.yml']);

function parseFormat(value: string): CommandFormat | 'auto' {
  if (value === 'json' || value === 'yaml' || value === 'auto') return value;
  return 'auto';
}

export class CommandLoader {
  private _format: CommandFormat | 'auto';
  private _loggerOptions: ContextLoggerOptions;
  private _logger: ContextLogger;

  constructor(config?: Config, options?: { output?: ContextLoggerOptions['output'] }) {
    const cfg = config ?? new Config();
    this._format = parseFormat(cfg.getString('loader.format', 'auto'));
    this._loggerOptions = {
      level: cfg.getString('logging.level', 'info'),
      format: cfg.getString('logging.format', 'json'),
      output: options?.output,
    };
    this._logger = new ContextLogger({ name: 'execution-command.loader', ...this._loggerOptions });
  }

  /**
   * Parse command text. `format` overrides the configured one; `auto`
   * falls back to JSON.
   */
  parse(text: string, format?: CommandFormat): ExecutionCommand {
    const resolved = format ?? (this._format === 'auto' ? 'json' : this._format);
    return this._build(text, resolved, '<text>');
  }

  loadFile(filePath: string): ExecutionCommand {
    if (!existsSync(filePath)) {
      this._logger.error('Command file not found', { source: filePath });
      throw new CommandNotFoundError(filePath);
    }
    let text: string;
    try {
      text = readFileSync(filePath, 'utf-8');
    } catch (e) {
      this._logger.error('Command file could not be read', { source: filePath, error_message: String(e) });
      throw new CommandParseError(
        `Command file '${filePath}' could not be read: ${e}`,
        { source: filePath },
        { cause: e instanceof Error ? e : undefined },
      );
    }
    return this._build(text, this._formatFor(filePath), filePath);
  }

  private _formatFor(filePath: string): CommandFormat {
    if (this._format !== 'auto') return this._format;
    return YAML_EXTENSIONS.has(extname(filePath).toLowerCase()) ? 'yaml' : 'json';
  }

  private _build(text: string, format: CommandFormat, source: string): ExecutionCommand {
    let data: unknown;
    try {
      data = format === 'yaml' ? yaml.load(text, { schema: yaml.CORE_SCHEMA }) : JSON.parse(text);
    } catch (e) {
      this._logger.error('Command could not be parsed', { source, format, error_message: String(e) });
      throw new CommandParseError(
        `Invalid ${format.toUpperCase()} in command '${source}': ${e}`,
        { source, format },
        { cause: e instanceof Error ? e : undefined },
      );
    }

    if (!isCommandDocument(data)) {
      const details: Record<string, unknown> = { source, format };
      for (const error of Value.Errors(CommandDocumentSchema, data)) {
        details['path'] = error.path || '/';
        details['reason'] = error.message;
        break;
      }
      this._logger.error('Command is not a mapping of JSON values', details);
      throw new CommandParseError(`Command '${source}' is not a mapping of JSON values`, details);
    }

    const command = new ExecutionCommand(data);
    ContextLogger.fromCommand(command, 'execution-command.loader', this._loggerOptions).debug('Command loaded', {
      source,
      format,
      service_name: command.getModuleName(),
    });
    return command;
  }
}
