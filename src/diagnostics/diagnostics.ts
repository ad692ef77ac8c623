// Structured diagnostics with error codes and spans

import type { Position, Span } from '../types.js';

export enum DiagnosticSeverity {
  Error = 'error',
  Warning = 'warning',
  Info = 'info',
  Hint = 'hint',
}

export enum DiagnosticCode {
  // Binary table errors (LOC001-LOC099)
  LOC001_MalformedBinaryTable = 'LOC001',
  LOC002_BinaryTableWriteFailed = 'LOC002',

  // Flat-text (.strings) errors (LOC101-LOC199)
  LOC101_UnterminatedComment = 'LOC101',
  LOC102_ExpectedIdentifier = 'LOC102',
  LOC103_ExpectedEquals = 'LOC103',
  LOC104_ExpectedMessage = 'LOC104',
  LOC105_UnterminatedMessage = 'LOC105',
  LOC106_UnexpectedQuote = 'LOC106',

  // Structured-list (.yaml) errors (LOC201-LOC299)
  LOC201_InvalidYaml = 'LOC201',
  LOC202_InvalidRecordShape = 'LOC202',

  // Definitions file errors (LOC301-LOC399)
  LOC301_InvalidDefinitions = 'LOC301',
  LOC302_DuplicateDefinition = 'LOC302',

  // Localization lookup (LOC401-LOC499)
  LOC401_UnknownIdentifier = 'LOC401',
  LOC402_LocalizationNotFound = 'LOC402',
  LOC403_UnsupportedInputFormat = 'LOC403',
}

export interface Diagnostic {
  readonly severity: DiagnosticSeverity;
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly span: Span;
  readonly file?: string;
}

export class DiagnosticError extends Error {
  public readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.diagnostic = diagnostic;
    this.name = 'DiagnosticError';
  }

  get pos(): Position {
    return this.diagnostic.span.start;
  }
}

export class DiagnosticBuilder {
  private severity: DiagnosticSeverity = DiagnosticSeverity.Error;
  private code?: DiagnosticCode;
  private message?: string;
  private span?: Span;
  private file?: string;

  static error(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(DiagnosticSeverity.Error).withCode(code);
  }

  static warning(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(DiagnosticSeverity.Warning).withCode(code);
  }

  withSeverity(severity: DiagnosticSeverity): DiagnosticBuilder {
    this.severity = severity;
    return this;
  }

  withCode(code: DiagnosticCode): DiagnosticBuilder {
    this.code = code;
    return this;
  }

  withMessage(message: string): DiagnosticBuilder {
    this.message = message;
    return this;
  }

  withSpan(span: Span): DiagnosticBuilder {
    this.span = span;
    return this;
  }

  withPosition(pos: Position): DiagnosticBuilder {
    this.span = { start: pos, end: pos };
    return this;
  }

  withFile(file: string | undefined): DiagnosticBuilder {
    this.file = file;
    return this;
  }

  build(): Diagnostic {
    if (!this.code) throw new Error('Diagnostic code is required');
    if (!this.message) throw new Error('Diagnostic message is required');
    if (!this.span) throw new Error('Diagnostic span is required');

    return {
      severity: this.severity,
      code: this.code,
      message: this.message,
      span: this.span,
      ...(this.file !== undefined ? { file: this.file } : {}),
    };
  }

  throw(): never {
    throw new DiagnosticError(this.build());
  }
}

// Utility to format diagnostics for display
export function formatDiagnostic(diagnostic: Diagnostic, source?: string): string {
  const { severity, code, message, span } = diagnostic;
  const where = diagnostic.file ? `${diagnostic.file}:` : '';
  const pos = `${where}${span.start.line}:${span.start.col}`;

  let result = `${severity} ${code}: ${message} at ${pos}`;

  if (source) {
    const lines = source.split(/\r?\n/);
    const line = lines[span.start.line - 1];
    if (line) {
      result += `\n> ${span.start.line}| ${line}`;
      result += `\n> ${' '.repeat(String(span.start.line).length)}  ${' '.repeat(span.start.col - 1)}^`;
    }
  }

  return result;
}

/**
 * Converts a character offset into a 1-based line/column position.
 * `\r\n` counts as a single line break.
 */
export function positionAt(text: string, offset: number): Position {
  let line = 1;
  let col = 1;
  const end = Math.min(offset, text.length);
  for (let i = 0; i < end; i++) {
    const ch = text[i];
    if (ch === '\n') {
      line++;
      col = 1;
    } else if (ch === '\r') {
      if (text[i + 1] !== '\n') {
        line++;
        col = 1;
      }
    } else {
      col++;
    }
  }
  return { line, col };
}

// Utility to create a dummy position for diagnostics without source location
export function dummyPosition(): Position {
  return { line: 1, col: 1 };
}
