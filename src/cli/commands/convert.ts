import { writeFileSync } from 'node:fs';
import { loadDefinitions } from '../../localization/definitions.js';
import { convertDefinitionsToStrings, convertDefinitionsToYaml } from '../../localization/converters.js';
import type { DiagnosticDefinition } from '../../types.js';
import { success } from '../utils/logger.js';

export interface ConvertOptions {
  /** Output file; stdout when omitted. */
  out?: string;
}

function emitTemplate(content: string, count: number, options: ConvertOptions): void {
  if (options.out) {
    writeFileSync(options.out, content, 'utf-8');
    success(`Wrote ${count} messages to ${options.out}`);
    return;
  }
  process.stdout.write(content);
}

function convertWith(
  defsPath: string,
  options: ConvertOptions,
  convert: (definitions: readonly DiagnosticDefinition[]) => string
): void {
  const definitions = loadDefinitions(defsPath);
  emitTemplate(convert(definitions), definitions.length, options);
}

export function defToYamlCommand(defsPath: string, options: ConvertOptions): void {
  convertWith(defsPath, options, convertDefinitionsToYaml);
}

export function defToStringsCommand(defsPath: string, options: ConvertOptions): void {
  convertWith(defsPath, options, convertDefinitionsToStrings);
}
