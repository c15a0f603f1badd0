/**
 * Shared test fixtures and helpers.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { CommandMapping } from '../src/document/types.js';
import { isCommandDocument } from '../src/document/types.js';
import { ExecutionCommand } from '../src/execution-command.js';

export const FIXTURE_COMMAND_PATH = fileURLToPath(new URL('./fixtures/command.json', import.meta.url));

export function loadFixtureDocument(): CommandMapping {
  const data: unknown = JSON.parse(readFileSync(FIXTURE_COMMAND_PATH, 'utf-8'));
  if (!isCommandDocument(data)) {
    throw new Error(`Fixture is not a command document: ${FIXTURE_COMMAND_PATH}`);
  }
  return data;
}

export function createFixtureCommand(): ExecutionCommand {
  return new ExecutionCommand(loadFixtureDocument());
}

export function createBufferOutput(): { output: { write: (s: string) => void }; lines: string[] } {
  const lines: string[] = [];
  return {
    output: { write: (s: string) => lines.push(s) },
    lines,
  };
}
