import type { Diagnostic } from '../../diagnostics/diagnostics.js';
import { DiagnosticCode, DiagnosticError, formatDiagnostic } from '../../diagnostics/diagnostics.js';
import { error as logError, warn as logWarn } from './logger.js';

type CliErrorCategory = 'binary' | 'catalog' | 'definitions' | 'lookup' | 'unknown';

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

export function classify(code: DiagnosticCode): CliErrorCategory {
  if (code.startsWith('LOC0')) return 'binary';
  if (code.startsWith('LOC1') || code.startsWith('LOC2')) return 'catalog';
  if (code.startsWith('LOC3')) return 'definitions';
  if (code.startsWith('LOC4')) return 'lookup';
  return 'unknown';
}

export function hintFor(code: DiagnosticCode): string | null {
  switch (classify(code)) {
    case 'binary':
      return 'Regenerate the .db file with `diag-locale serialize` from its .yaml or .strings source';
    case 'catalog':
      return 'Fix the catalog at the reported position; `diag-locale def-to-yaml` prints a valid template';
    case 'definitions':
      return 'The definitions file must be a JSON array of { kind, id, text } with unique ids';
    case 'lookup':
      return 'Check --defs, --locale and --path (or DIAG_LOCALE / DIAG_LOCALIZATION_PATH)';
    default:
      return null;
  }
}

function printDiagnostic(diag: Diagnostic): void {
  logError(formatDiagnostic(diag));
  const hint = hintFor(diag.code);
  if (hint) {
    logWarn(hint);
  }
}

function handleNodeError(error: NodeJS.ErrnoException): void {
  const code = error.code ?? 'UNKNOWN';
  switch (code) {
    case 'EACCES':
    case 'EPERM':
      logError(`Permission denied: ${error.message}`);
      break;
    case 'ENOENT':
      logError(`File not found: ${error.message}`);
      break;
    default:
      logError(`File system error (${code}): ${error.message}`);
      break;
  }
}

/**
 * Reports a CLI failure on stderr.
 *
 * @returns the process exit code
 */
export function reportError(error: unknown): number {
  if (error instanceof DiagnosticError) {
    printDiagnostic(error.diagnostic);
  } else if (isNodeError(error)) {
    handleNodeError(error);
  } else if (error instanceof Error) {
    logError(error.message);
  } else {
    logError('Unknown error, please retry');
  }
  return 1;
}

export function handleError(error: unknown): void {
  process.exit(reportError(error));
}
