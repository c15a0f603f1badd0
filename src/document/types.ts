/**
 * Value model for command documents.
 *
 * A command document is plain JSON: every node is a mapping, a sequence,
 * a scalar, or null. Nodes are read-only from this library's point of view.
 */

import { Type, type TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

export type CommandScalar = string | number | boolean;

export interface CommandMapping {
  readonly [key: string]: CommandValue;
}

export type CommandSequence = readonly CommandValue[];

export type CommandValue = CommandScalar | null | CommandSequence | CommandMapping;

export function isMapping(value: CommandValue | undefined): value is CommandMapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isSequence(value: CommandValue | undefined): value is CommandSequence {
  return Array.isArray(value);
}

export function isScalar(value: CommandValue | undefined): value is CommandScalar {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

export const CommandValueSchema: TSchema = Type.Recursive(
  (This) =>
    Type.Union([
      Type.String(),
      Type.Number(),
      Type.Boolean(),
      Type.Null(),
      Type.Array(This),
      Type.Record(Type.String(), This),
    ]),
  { $id: 'CommandValue' },
);

export const CommandDocumentSchema: TSchema = Type.Record(Type.String(), CommandValueSchema);

/**
 * Runtime check that parsed input is a mapping of JSON-shaped values.
 */
export function isCommandDocument(value: unknown): value is CommandMapping {
  return Value.Check(CommandDocumentSchema, value);
}
