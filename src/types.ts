// Core type definitions shared by the localization formats

export interface Position {
  readonly line: number;
  readonly col: number;
}

export interface Span {
  readonly start: Position;
  readonly end: Position;
}

/** Integer in `[0, N)` naming one localizable diagnostic message slot. */
export type DiagnosticID = number;

export type DiagnosticKind = 'error' | 'warning' | 'note' | 'remark';

/**
 * One entry of the master catalog: a diagnostic's stable name and its default
 * (unlocalized) text.
 */
export interface DiagnosticDefinition {
  readonly kind: DiagnosticKind;
  readonly id: string;
  readonly text: string;
}

/**
 * A record read from a structured-list catalog whose `id` is not part of the
 * current identifier space.
 */
export interface UnknownIdentifierRecord {
  readonly id: string;
  readonly message: string;
}
