/**
 * Master definitions loader.
 *
 * Reads the JSON list of `{ kind, id, text }` entries that fixes the identifier
 * space and the default (English) message of every diagnostic.
 */

import { readFileSync } from 'node:fs';
import { Ajv, type JSONSchemaType, type ErrorObject } from 'ajv';
import { DiagnosticBuilder, DiagnosticCode, DiagnosticError, dummyPosition } from '../diagnostics/diagnostics.js';
import type { DiagnosticDefinition, DiagnosticKind } from '../types.js';

interface RawDefinition {
  kind: DiagnosticKind;
  id: string;
  text: string;
}

const definitionsSchema: JSONSchemaType<RawDefinition[]> = {
  type: 'array',
  items: {
    type: 'object',
    properties: {
      kind: { type: 'string', enum: ['error', 'warning', 'note', 'remark'] },
      id: { type: 'string', pattern: '^[A-Za-z_][A-Za-z0-9_]*$' },
      text: { type: 'string' },
    },
    required: ['kind', 'id', 'text'],
    additionalProperties: false,
  },
};

const ajv = new Ajv({ strict: true, allErrors: true });
const validateDefinitions = ajv.compile(definitionsSchema);

function definitionsError(code: DiagnosticCode, message: string, file?: string): DiagnosticError {
  return new DiagnosticError(
    DiagnosticBuilder.error(code).withMessage(message).withPosition(dummyPosition()).withFile(file).build()
  );
}

function describeAjvError(error: ErrorObject): string {
  const where = error.instancePath || '/';
  if (error.keyword === 'additionalProperties') {
    return `${where}: unknown field '${String(error.params.additionalProperty)}'`;
  }
  return `${where}: ${error.message ?? error.keyword}`;
}

/**
 * Parses and validates definitions JSON.
 *
 * @param content - raw file content
 * @param file - file name used in diagnostics
 * @throws DiagnosticError LOC301 for malformed JSON or schema violations, LOC302 for duplicate ids
 */
export function parseDefinitions(content: string, file?: string): DiagnosticDefinition[] {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (err: unknown) {
    const error = err instanceof Error ? err : new Error(String(err));
    throw definitionsError(
      DiagnosticCode.LOC301_InvalidDefinitions,
      `Definitions are not valid JSON: ${error.message}`,
      file
    );
  }

  if (!validateDefinitions(data)) {
    const details = (validateDefinitions.errors ?? []).map(describeAjvError).join('; ');
    throw definitionsError(DiagnosticCode.LOC301_InvalidDefinitions, `Invalid diagnostic definitions: ${details}`, file);
  }

  const seen = new Set<string>();
  for (const def of data) {
    if (seen.has(def.id)) {
      throw definitionsError(
        DiagnosticCode.LOC302_DuplicateDefinition,
        `Diagnostic '${def.id}' is defined more than once`,
        file
      );
    }
    seen.add(def.id);
  }

  return data.map(({ kind, id, text }) => ({ kind, id, text }));
}

export function loadDefinitions(filePath: string): DiagnosticDefinition[] {
  return parseDefinitions(readFileSync(filePath, 'utf-8'), filePath);
}
