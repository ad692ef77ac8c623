/**
 * Shared helpers for localization tests: a tiny three-identifier space, temp
 * directories, and a console.error capture for the JSON logger.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { mock } from 'node:test';
import { IdentifierSpace } from '../../src/localization/identifier-space.js';
import type { DiagnosticDefinition } from '../../src/types.js';

const helpersDir = path.dirname(fileURLToPath(import.meta.url));

export const FIXTURES_DIR = path.join(helpersDir, '..', 'fixtures', 'localization');
export const FIXTURE_DEFINITIONS = path.join(FIXTURES_DIR, 'diagnostics.json');

export const ABC_DEFINITIONS: DiagnosticDefinition[] = [
  { kind: 'error', id: 'A', text: 'default A' },
  { kind: 'warning', id: 'B', text: 'default B' },
  { kind: 'note', id: 'C', text: 'default C' },
];

export function abcSpace(): IdentifierSpace {
  return IdentifierSpace.fromDefinitions(ABC_DEFINITIONS);
}

export interface TempDir {
  readonly dir: string;
  file(name: string): string;
  write(name: string, content: string | Uint8Array): string;
  cleanup(): void;
}

export function createTempDir(prefix = 'diag-locale-test-'): TempDir {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  return {
    dir,
    file: (name: string) => path.join(dir, name),
    write: (name: string, content: string | Uint8Array) => {
      const filePath = path.join(dir, name);
      fs.writeFileSync(filePath, content);
      return filePath;
    },
    cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
  };
}

export interface LogEntry {
  readonly level?: string;
  readonly component?: string;
  readonly message?: string;
  readonly [key: string]: unknown;
}

export interface CapturedConsole {
  /** Every line written, as strings. */
  lines(): string[];
  /** Lines that are JSON log entries. */
  entries(): LogEntry[];
  restore(): void;
}

function isLogEntry(value: unknown): value is LogEntry {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Replaces console.error (or console.log) with a recorder.
 */
export function captureConsole(method: 'error' | 'log' = 'error'): CapturedConsole {
  const spy = mock.method(console, method, () => {});
  const lines = (): string[] => spy.mock.calls.map(call => call.arguments.map(String).join(' '));
  return {
    lines,
    entries: () =>
      lines().flatMap(line => {
        try {
          const parsed: unknown = JSON.parse(line);
          return isLogEntry(parsed) ? [parsed] : [];
        } catch {
          return [];
        }
      }),
    restore: () => spy.mock.restore(),
  };
}

/**
 * Runs `fn` with console output captured, restoring the console afterwards.
 */
export function withCapturedConsole<T>(
  fn: () => T,
  method: 'error' | 'log' = 'error'
): { result: T; output: CapturedConsole } {
  const output = captureConsole(method);
  try {
    return { result: fn(), output };
  } finally {
    output.restore();
  }
}

export function decode(bytes: Uint8Array | undefined): string | undefined {
  return bytes === undefined ? undefined : new TextDecoder().decode(bytes);
}
