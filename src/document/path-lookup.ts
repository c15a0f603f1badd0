/**
 * Path-based lookup into command documents.
 */

import type { CommandValue } from './types.js';
import { isMapping } from './types.js';

export const PATH_SEPARATOR = '/';

export type LookupResult =
  | { readonly status: 'found'; readonly value: Exclude<CommandValue, null> }
  | { readonly status: 'absent' };

const ABSENT: LookupResult = Object.freeze({ status: 'absent' });

export function splitPath(path: string, separator: string = PATH_SEPARATOR): string[] {
  return path.split(separator).filter((segment) => segment.length > 0);
}

/**
 * Walk `document` one segment at a time.
 *
 * Only own keys of mappings are followed. A sequence, scalar or null met
 * before the last segment ends the walk as absent, and so does a null
 * at the end of the path.
 */
export function lookupPath(
  document: CommandValue | undefined,
  path: string,
  separator: string = PATH_SEPARATOR,
): LookupResult {
  let current: CommandValue | undefined = document;
  for (const segment of splitPath(path, separator)) {
    if (!isMapping(current) || !Object.hasOwn(current, segment)) {
      return ABSENT;
    }
    current = current[segment];
    if (current === null || current === undefined) {
      return ABSENT;
    }
  }
  if (current === null || current === undefined) {
    return ABSENT;
  }
  return { status: 'found', value: current };
}

export function getValue(document: CommandValue | undefined, path: string): CommandValue | undefined;
export function getValue<T>(document: CommandValue | undefined, path: string, defaultValue: T): CommandValue | T;
export function getValue<T>(
  document: CommandValue | undefined,
  path: string,
  defaultValue?: T,
): CommandValue | T | undefined {
  const result = lookupPath(document, path);
  return result.status === 'found' ? result.value : defaultValue;
}
