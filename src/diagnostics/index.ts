/**
 * @module diagnostics
 *
 * Structured diagnostics raised while reading and writing localization catalogs.
 *
 * Contains:
 * - structured diagnostics (Diagnostic, DiagnosticBuilder, DiagnosticError)
 * - severities (DiagnosticSeverity)
 * - codes (DiagnosticCode)
 */

export {
  DiagnosticSeverity,
  DiagnosticCode,
  DiagnosticError,
  DiagnosticBuilder,
  formatDiagnostic,
  positionAt,
  dummyPosition,
  type Diagnostic,
} from './diagnostics.js';
