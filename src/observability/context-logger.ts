/**
 * Structured logging bound to the command being handled.
 */

import type { ExecutionCommand } from '../execution-command.js';

const LEVELS: Record<string, number> = {
  trace: 0,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

const REDACTED = '***REDACTED***';

export interface WritableOutput {
  write(s: string): void;
}

export interface ContextLoggerOptions {
  format?: string;
  level?: string;
  redactSensitive?: boolean;
  output?: WritableOutput;
}

export class ContextLogger {
  private _name: string;
  private _format: string;
  private _levelValue: number;
  private _redactSensitive: boolean;
  private _output: WritableOutput;
  private _clusterName: string | null = null;
  private _role: string | null = null;
  private _hostName: string | null = null;

  constructor(options?: ContextLoggerOptions & { name?: string }) {
    this._name = options?.name ?? 'execution-command';
    this._format = options?.format ?? 'json';
    this._levelValue = LEVELS[options?.level ?? 'info'] ?? LEVELS.info;
    this._redactSensitive = options?.redactSensitive ?? true;
    this._output = options?.output ?? { write: (s: string) => console.error(s) };
  }

  static fromCommand(command: ExecutionCommand, name: string, options?: ContextLoggerOptions): ContextLogger {
    const logger = new ContextLogger({ name, ...options });
    logger._clusterName = command.getClusterName();
    logger._role = command.getComponentType();
    logger._hostName = command.getHostName();
    return logger;
  }

  private _emit(levelName: string, message: string, extra?: Record<string, unknown> | null): void {
    const levelValue = LEVELS[levelName] ?? LEVELS.info;
    if (levelValue < this._levelValue) return;

    let redactedExtra: Record<string, unknown> | null = extra ?? null;
    if (extra != null && this._redactSensitive) {
      redactedExtra = {};
      for (const [k, v] of Object.entries(extra)) {
        redactedExtra[k] = k.startsWith('_secret_') ? REDACTED : v;
      }
    }

    const now = new Date();
    if (this._format === 'json') {
      const entry: Record<string, unknown> = {
        timestamp: now.toISOString(),
        level: levelName,
        message,
        cluster_name: this._clusterName,
        role: this._role,
        host_name: this._hostName,
        logger: this._name,
        extra: redactedExtra,
      };
      this._output.write(JSON.stringify(entry) + '\n');
      return;
    }

    const ts = now.toISOString().replace('T', ' ').replace(/\.\d+Z$/, '');
    const lvl = levelName.toUpperCase();
    const cluster = this._clusterName ?? 'none';
    const role = this._role ?? 'none';
    const host = this._hostName ?? 'none';
    let extrasStr = '';
    if (redactedExtra) {
      extrasStr = ' ' + Object.entries(redactedExtra).map(([k, v]) => `${k}=${v}`).join(' ');
    }
    this._output.write(`${ts} [${lvl}] [cluster=${cluster}] [role=${role}] [host=${host}] ${message}${extrasStr}\n`);
  }

  trace(message: string, extra?: Record<string, unknown>): void {
    this._emit('trace', message, extra);
  }

  debug(message: string, extra?: Record<string, unknown>): void {
    this._emit('debug', message, extra);
  }

  info(message: string, extra?: Record<string, unknown>): void {
    this._emit('info', message, extra);
  }

  warn(message: string, extra?: Record<string, unknown>): void {
    this._emit('warn', message, extra);
  }

  error(message: string, extra?: Record<string, unknown>): void {
    this._emit('error', message, extra);
  }

  fatal(message: string, extra?: Record<string, unknown>): void {
    this._emit('fatal', message, extra);
  }
}
