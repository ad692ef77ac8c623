/**
 * Converters between the master definitions and the catalog formats.
 *
 * - definitions → `.yaml` / `.strings` templates for translators
 * - `.yaml` / `.strings` catalog → `.db` binary table
 */

import { extname } from 'node:path';
import { DiagnosticBuilder, DiagnosticCode, DiagnosticError, dummyPosition } from '../diagnostics/diagnostics.js';
import type { DiagnosticDefinition, UnknownIdentifierRecord } from '../types.js';
import { BinaryTableWriter } from './binary-table.js';
import { serializeFlatText } from './flat-text.js';
import type { IdentifierSpace } from './identifier-space.js';
import { ProducerState, type LocalizationProducer } from './producer.js';
import { StringsLocalizationProducer } from './strings-producer.js';
import { serializeStructuredList } from './structured-list.js';
import { YAMLLocalizationProducer } from './yaml-producer.js';

export function convertDefinitionsToYaml(definitions: readonly DiagnosticDefinition[]): string {
  return serializeStructuredList(definitions);
}

export function convertDefinitionsToStrings(definitions: readonly DiagnosticDefinition[]): string {
  return serializeFlatText(definitions);
}

export interface SerializeResult {
  /** Number of translations written to the table. */
  readonly written: number;
  /** Records dropped because their id is not in the identifier space (`.yaml` input only). */
  readonly unknownIds: readonly UnknownIdentifierRecord[];
}

/**
 * Copies every available translation of a producer into a binary table writer.
 */
export function collectTranslations(producer: LocalizationProducer, writer: BinaryTableWriter): number {
  let written = 0;
  producer.forEachAvailable((id, message) => {
    writer.insert(id, message);
    written++;
  });
  return written;
}

function conversionError(code: DiagnosticCode, message: string, file: string): DiagnosticError {
  return new DiagnosticError(
    DiagnosticBuilder.error(code).withMessage(message).withPosition(dummyPosition()).withFile(file).build()
  );
}

/**
 * Serializes a text catalog into a binary table at `outputPath`.
 *
 * Malformed input is always fatal here, for both text formats.
 *
 * @throws DiagnosticError LOC403 for an unsupported extension, LOC402 when the input
 * cannot be read, LOC002 when the output cannot be written, or the parser's error
 */
export function serializeCatalog(inputPath: string, outputPath: string, space: IdentifierSpace): SerializeResult {
  const extension = extname(inputPath);
  let producer: LocalizationProducer;
  let unknownIds: () => readonly UnknownIdentifierRecord[] = () => [];

  if (extension === '.yaml' || extension === '.yml') {
    const yaml = new YAMLLocalizationProducer(inputPath, space, { onMalformed: 'throw' });
    producer = yaml;
    unknownIds = () => yaml.unknownIdentifiers();
  } else if (extension === '.strings') {
    producer = new StringsLocalizationProducer(inputPath, space, { onMalformed: 'throw' });
  } else {
    throw conversionError(
      DiagnosticCode.LOC403_UnsupportedInputFormat,
      `Unsupported catalog format '${extension || inputPath}' (expected .yaml or .strings)`,
      inputPath
    );
  }

  const writer = new BinaryTableWriter();
  const written = collectTranslations(producer, writer);
  if (producer.getState() !== ProducerState.Initialized) {
    throw conversionError(DiagnosticCode.LOC402_LocalizationNotFound, `Cannot read catalog ${inputPath}`, inputPath);
  }

  if (!writer.emit(outputPath)) {
    throw conversionError(
      DiagnosticCode.LOC002_BinaryTableWriteFailed,
      `Cannot write binary table ${outputPath}`,
      outputPath
    );
  }

  return { written, unknownIds: unknownIds() };
}
