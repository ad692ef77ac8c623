/**
 * @module localization
 *
 * Localized diagnostic messages: the identifier space, the three catalog
 * formats, the producers that serve them, and the converters between them.
 */

export { IdentifierSpace } from './identifier-space.js';
export { parseDefinitions, loadDefinitions } from './definitions.js';
export { BinaryTableWriter, BinaryTableReader, hashIdentifier } from './binary-table.js';
export { parseStructuredList, serializeStructuredList, type StructuredListResult } from './structured-list.js';
export { parseFlatText, serializeFlatText } from './flat-text.js';
export {
  LocalizationProducer,
  ProducerState,
  type AvailableMessageCallback,
  type MalformedInputPolicy,
  type ProducerOptions,
} from './producer.js';
export { SerializedLocalizationProducer } from './serialized-producer.js';
export { YAMLLocalizationProducer } from './yaml-producer.js';
export { StringsLocalizationProducer } from './strings-producer.js';
export { producerFor, catalogPath, CATALOG_EXTENSIONS, type CatalogExtension } from './resolver.js';
export {
  convertDefinitionsToYaml,
  convertDefinitionsToStrings,
  collectTranslations,
  serializeCatalog,
  type SerializeResult,
} from './converters.js';
