/**
 * Structured-list (`.yaml`) catalogs.
 *
 * A catalog is a YAML sequence of two-field mappings:
 *
 * ```yaml
 * - id: cannot_find_in_scope
 *   msg: "ne trouve pas %0 dans la portée"
 * ```
 *
 * Records are placed by identifier, not by position. Records whose id is not in
 * the identifier space are kept aside as unknown records.
 */

import { parse as parseYaml, YAMLParseError } from 'yaml';
import { Ajv, type JSONSchemaType } from 'ajv';
import { DiagnosticBuilder, DiagnosticCode, DiagnosticError, dummyPosition } from '../diagnostics/diagnostics.js';
import type { DiagnosticDefinition, Position, UnknownIdentifierRecord } from '../types.js';
import type { IdentifierSpace } from './identifier-space.js';

interface RawRecord {
  id: string;
  msg: string;
}

const recordsSchema: JSONSchemaType<RawRecord[]> = {
  type: 'array',
  items: {
    type: 'object',
    properties: {
      id: { type: 'string' },
      msg: { type: 'string' },
    },
    required: ['id', 'msg'],
    additionalProperties: false,
  },
};

const ajv = new Ajv({ strict: true, allErrors: true });
const validateRecords = ajv.compile(recordsSchema);

export interface StructuredListResult {
  /** Length equals the identifier space size; `undefined` means not localized. */
  readonly messages: (string | undefined)[];
  readonly unknownIds: UnknownIdentifierRecord[];
}

function yamlError(code: DiagnosticCode, message: string, pos: Position, file?: string): DiagnosticError {
  return new DiagnosticError(
    DiagnosticBuilder.error(code).withMessage(message).withPosition(pos).withFile(file).build()
  );
}

/**
 * Parses a structured-list catalog against `space`.
 *
 * Duplicate records for one identifier: the last one wins.
 *
 * @throws DiagnosticError LOC201 when the text is not YAML, LOC202 when it is not a list of `{id, msg}`
 */
export function parseStructuredList(
  content: string,
  space: IdentifierSpace,
  file?: string
): StructuredListResult {
  let document: unknown;
  try {
    // failsafe: plain `yes` or `12` stays a string
    document = parseYaml(content, { schema: 'failsafe' });
  } catch (err: unknown) {
    if (err instanceof YAMLParseError) {
      const linePos = err.linePos?.[0];
      const pos = linePos ? { line: linePos.line, col: linePos.col } : dummyPosition();
      throw yamlError(DiagnosticCode.LOC201_InvalidYaml, `Invalid YAML: ${err.message}`, pos, file);
    }
    throw err;
  }

  const messages: (string | undefined)[] = new Array<string | undefined>(space.size).fill(undefined);
  const unknownIds: UnknownIdentifierRecord[] = [];

  if (document === null || document === undefined) {
    return { messages, unknownIds };
  }

  if (!validateRecords(document)) {
    const first = validateRecords.errors?.[0];
    const detail = first ? `${first.instancePath || '/'} ${first.message ?? first.keyword}` : 'unexpected shape';
    throw yamlError(
      DiagnosticCode.LOC202_InvalidRecordShape,
      `Expected a list of {id, msg} records: ${detail}`,
      dummyPosition(),
      file
    );
  }

  for (const record of document) {
    const id = space.indexOf(record.id);
    if (id === undefined) {
      unknownIds.push({ id: record.id, message: record.msg });
      continue;
    }
    messages[id] = record.msg;
  }

  return { messages, unknownIds };
}

function escapeStructuredMessage(message: string): string {
  let out = '';
  for (const ch of message) {
    if (ch === '"') {
      out += '\\"';
    } else if (ch === '\\') {
      out += '\\\\';
    } else {
      out += ch;
    }
  }
  return out;
}

/**
 * Renders the master definitions as an editable structured-list template, one
 * record per identifier in declaration order, CR-LF terminated.
 */
export function serializeStructuredList(definitions: readonly DiagnosticDefinition[]): string {
  let out = '';
  for (const def of definitions) {
    out += `- id: ${def.id}\r\n`;
    out += `  msg: "${escapeStructuredMessage(def.text)}"\r\n`;
  }
  return out;
}
