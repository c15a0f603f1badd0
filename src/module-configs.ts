/**
 * Query view over the `configurations` and `configurationAttributes`
 * blocks of a command document.
 *
 * configurations:          { "<config type>": { "<property>": value } }
 * configurationAttributes: { "<config type>": { "<attribute>": { "<property>": value } } }
 *
 * Property names routinely contain `.` and `/` (`dfs.namenode.name.dir`),
 * so they are read as single keys rather than as paths.
 */

import type { CommandMapping, CommandValue } from './document/types.js';
import { isMapping } from './document/types.js';

const EMPTY: CommandMapping = Object.freeze({});

function childMapping(parent: CommandMapping, key: string): CommandMapping {
  if (!Object.hasOwn(parent, key)) return EMPTY;
  const child = parent[key];
  return isMapping(child) ? child : EMPTY;
}

function ownValue<T>(mapping: CommandMapping, key: string, defaultValue: T): CommandValue | T {
  if (!Object.hasOwn(mapping, key)) return defaultValue;
  const value = mapping[key];
  return value === null ? defaultValue : value;
}

export class ModuleConfigs {
  private readonly _configurations: CommandMapping;
  private readonly _attributes: CommandMapping;

  constructor(configurations?: CommandValue, configurationAttributes?: CommandValue) {
    this._configurations = isMapping(configurations) ? configurations : EMPTY;
    this._attributes = isMapping(configurationAttributes) ? configurationAttributes : EMPTY;
  }

  getRawConfigDict(): CommandMapping {
    return this._configurations;
  }

  getRawConfigAttributes(): CommandMapping {
    return this._attributes;
  }

  getAllProperties(configType: string): CommandMapping {
    return childMapping(this._configurations, configType);
  }

  getAllAttributes(configType: string): CommandMapping {
    return childMapping(this._attributes, configType);
  }

  getPropertyValue(configType: string, propertyName: string): CommandValue;
  getPropertyValue<T>(configType: string, propertyName: string, defaultValue: T): CommandValue | T;
  getPropertyValue<T>(configType: string, propertyName: string, defaultValue?: T): CommandValue | T {
    return ownValue(this.getAllProperties(configType), propertyName, defaultValue ?? null);
  }

  getProperties(
    configType: string,
    propertyNames: readonly string[],
    defaultValue: CommandValue = null,
  ): Record<string, CommandValue> {
    const properties = this.getAllProperties(configType);
    const result: Record<string, CommandValue> = {};
    for (const name of propertyNames) {
      result[name] = ownValue(properties, name, defaultValue);
    }
    return result;
  }

  getAttributeValue(configType: string, attributeName: string, propertyName: string): CommandValue;
  getAttributeValue<T>(
    configType: string,
    attributeName: string,
    propertyName: string,
    defaultValue: T,
  ): CommandValue | T;
  getAttributeValue<T>(
    configType: string,
    attributeName: string,
    propertyName: string,
    defaultValue?: T,
  ): CommandValue | T {
    const attribute = childMapping(this.getAllAttributes(configType), attributeName);
    return ownValue(attribute, propertyName, defaultValue ?? null);
  }
}
