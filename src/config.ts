/**
 * Configuration accessor with dot-path key support.
 */

import { existsSync, readFileSync } from 'node:fs';
import yaml from 'js-yaml';
import { lookupPath } from './document/path-lookup.js';
import type { CommandMapping, CommandValue } from './document/types.js';
import { isCommandDocument } from './document/types.js';
import { ConfigError, ConfigNotFoundError } from './errors.js';

export class Config {
  private _data: CommandMapping;

  constructor(data?: CommandMapping) {
    this._data = data ?? {};
  }

  static fromFile(configPath: string): Config {
    if (!existsSync(configPath)) {
      throw new ConfigNotFoundError(configPath);
    }
    let data: unknown;
    try {
      data = yaml.load(readFileSync(configPath, 'utf-8'), { schema: yaml.CORE_SCHEMA });
    } catch (e) {
      throw new ConfigError(`Invalid YAML in configuration file '${configPath}': ${e}`, {
        cause: e instanceof Error ? e : undefined,
      });
    }
    if (data === undefined || data === null) {
      return new Config();
    }
    if (!isCommandDocument(data)) {
      throw new ConfigError(`Configuration file '${configPath}' is not a mapping`);
    }
    return new Config(data);
  }

  get(key: string): CommandValue | undefined;
  get<T>(key: string, defaultValue: T): CommandValue | T;
  get<T>(key: string, defaultValue?: T): CommandValue | T | undefined {
    const result = lookupPath(this._data, key, '.');
    return result.status === 'found' ? result.value : defaultValue;
  }

  getString(key: string, defaultValue: string): string {
    const value = this.get(key);
    return typeof value === 'string' ? value : defaultValue;
  }
}
