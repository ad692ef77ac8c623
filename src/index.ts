/**
 * @module diag-locale
 *
 * Localized diagnostic messages for a compiler front end.
 *
 * A fixed, numbered set of diagnostics (the identifier space) gets its text from
 * one of three catalog formats, falling back to the default message whenever a
 * translation is missing:
 *
 * ```
 * <locale>.db       binary hash table, fastest to open
 * <locale>.yaml     list of {id, msg} records
 * <locale>.strings  "id" = "msg"; records
 * ```
 *
 * @example
 * ```typescript
 * import { IdentifierSpace, loadDefinitions, producerFor } from 'diag-locale';
 *
 * const definitions = loadDefinitions('diagnostics.json');
 * const space = IdentifierSpace.fromDefinitions(definitions);
 * const producer = producerFor('fr', 'localization', space);
 *
 * const fallback = definitions[0]?.text ?? '';
 * const text = producer ? producer.messageOrDefault(0, fallback) : fallback;
 * ```
 */

export * from './localization/index.js';

export {
  DiagnosticSeverity,
  DiagnosticCode,
  DiagnosticError,
  DiagnosticBuilder,
  formatDiagnostic,
  type Diagnostic,
} from './diagnostics/index.js';

export type {
  DiagnosticDefinition,
  DiagnosticID,
  DiagnosticKind,
  Position,
  Span,
  UnknownIdentifierRecord,
} from './types.js';

export { ConfigService } from './config/config-service.js';
export { Logger, LogLevel, createLogger, type LogMetadata } from './utils/logger.js';
