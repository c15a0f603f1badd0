/**
 * Explicit conversions from command values to typed results.
 */

import type { CommandValue } from './types.js';
import { isScalar, isSequence } from './types.js';

export type CoercionResult<T> =
  | { readonly status: 'found'; readonly value: T }
  | { readonly status: 'invalid'; readonly actual: CommandValue };

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

function found<T>(value: T): CoercionResult<T> {
  return { status: 'found', value };
}

function invalid<T>(actual: CommandValue): CoercionResult<T> {
  return { status: 'invalid', actual };
}

function safeInteger(parsed: number, actual: CommandValue): CoercionResult<number> {
  // `+ 0` folds -0 into 0
  return Number.isSafeInteger(parsed) ? found(parsed + 0) : invalid(actual);
}

/**
 * Integers pass through, other finite numbers truncate toward zero,
 * booleans become 1 or 0 and decimal digit strings are parsed. Results
 * outside the safe integer range are invalid.
 */
export function toInteger(value: CommandValue): CoercionResult<number> {
  if (typeof value === 'number') {
    return safeInteger(Math.trunc(value), value);
  }
  if (typeof value === 'boolean') {
    return found(value ? 1 : 0);
  }
  if (typeof value === 'string' && INTEGER_PATTERN.test(value)) {
    return safeInteger(Number.parseInt(value.trim(), 10), value);
  }
  return invalid(value);
}

export function toBoolean(value: CommandValue): CoercionResult<boolean> {
  if (typeof value === 'boolean') {
    return found(value);
  }
  if (typeof value === 'string') {
    const lowered = value.toLowerCase();
    if (lowered === 'true') return found(true);
    if (lowered === 'false') return found(false);
  }
  return invalid(value);
}

export function toStringValue(value: CommandValue): CoercionResult<string> {
  return isScalar(value) ? found(String(value)) : invalid(value);
}

/**
 * Scalar items are stringified and null items dropped; a nested
 * mapping or sequence makes the whole list invalid.
 */
export function toStringList(value: CommandValue): CoercionResult<string[]> {
  if (!isSequence(value)) {
    return invalid(value);
  }
  const items: string[] = [];
  for (const item of value) {
    if (item === null) continue;
    if (!isScalar(item)) {
      return invalid(value);
    }
    items.push(String(item));
  }
  return found(items);
}
