/**
 * @module localization/producer
 *
 * Message store facade shared by the three catalog backends.
 *
 * A producer is bound to one catalog (a file path, or a buffer for the binary
 * table) and does no I/O until the first query. That query runs the backend's
 * load exactly once and moves the producer to `Initialized` or
 * `FailedInitialization`; the state never moves back. A failed producer answers
 * every query with the caller's default text.
 */

import { readFileSync } from 'node:fs';
import { DiagnosticError } from '../diagnostics/diagnostics.js';
import type { DiagnosticID } from '../types.js';
import type { Logger } from '../utils/logger.js';
import type { IdentifierSpace } from './identifier-space.js';

export enum ProducerState {
  NotInitialized = 'not-initialized',
  Initialized = 'initialized',
  FailedInitialization = 'failed-initialization',
}

/**
 * What a producer does when its catalog exists but cannot be parsed.
 *
 * - `throw`: the DiagnosticError escapes the first query (the producer still ends
 *   up `FailedInitialization`, so later queries return defaults)
 * - `fallback`: the error is logged and the producer serves defaults
 */
export type MalformedInputPolicy = 'throw' | 'fallback';

export interface ProducerOptions {
  /** Append ` [<identifier name>]` to every localized message. */
  readonly printDiagnosticNames?: boolean;
  readonly onMalformed?: MalformedInputPolicy;
}

export type AvailableMessageCallback = (id: DiagnosticID, message: string) => void;

export abstract class LocalizationProducer {
  private state: ProducerState = ProducerState.NotInitialized;
  protected readonly printDiagnosticNames: boolean;
  protected readonly onMalformed: MalformedInputPolicy;

  protected constructor(
    protected readonly space: IdentifierSpace,
    protected readonly logger: Logger,
    options: ProducerOptions,
    defaultPolicy: MalformedInputPolicy
  ) {
    this.printDiagnosticNames = options.printDiagnosticNames ?? false;
    this.onMalformed = options.onMalformed ?? defaultPolicy;
  }

  /**
   * Loads the catalog. Returns false when the catalog is missing or unreadable.
   * Malformed content is reported by throwing a DiagnosticError.
   */
  protected abstract initializeImpl(): boolean;

  /** Localized text for `id`, or the empty string when there is none. */
  protected abstract getMessage(id: DiagnosticID): string;

  getState(): ProducerState {
    return this.state;
  }

  /**
   * Runs the one-shot load if it has not been attempted yet.
   */
  protected initializeIfNeeded(): void {
    if (this.state !== ProducerState.NotInitialized) return;

    let loaded = false;
    try {
      loaded = this.initializeImpl();
    } catch (err: unknown) {
      this.state = ProducerState.FailedInitialization;
      if (err instanceof DiagnosticError && this.onMalformed === 'fallback') {
        this.logger.warn('Localization catalog is malformed; using default messages', {
          code: err.diagnostic.code,
          detail: err.message,
        });
        return;
      }
      throw err;
    }

    this.state = loaded ? ProducerState.Initialized : ProducerState.FailedInitialization;
  }

  /**
   * Localized text for `id`, or `defaultMessage` when the catalog failed to load,
   * `id` is outside the identifier space, or the entry is missing or empty.
   */
  messageOrDefault(id: DiagnosticID, defaultMessage: string): string {
    this.initializeIfNeeded();
    if (this.state === ProducerState.FailedInitialization) {
      return defaultMessage;
    }
    if (!this.space.has(id)) {
      return defaultMessage;
    }

    const localized = this.getMessage(id);
    if (localized.length === 0) return defaultMessage;
    if (this.printDiagnosticNames) {
      return localized + this.space.debugSuffix(id);
    }
    return localized;
  }

  /**
   * Calls `callback` for every identifier with a non-empty translation, in
   * ascending identifier order. No calls after a failed load.
   */
  forEachAvailable(callback: AvailableMessageCallback): void {
    this.initializeIfNeeded();
    if (this.state === ProducerState.FailedInitialization) {
      return;
    }

    for (let id = 0, n = this.space.size; id !== n; ++id) {
      const translation = this.getMessage(id);
      if (translation.length > 0) callback(id, translation);
    }
  }
}

/**
 * Reads a catalog file as UTF-8. A missing or unreadable file is logged and
 * reported as `undefined` so the caller can fail initialization quietly.
 */
export function readCatalogFile(filePath: string, logger: Logger): string | undefined {
  try {
    return readFileSync(filePath, 'utf-8');
  } catch (err: unknown) {
    const code = err instanceof Error && 'code' in err ? String(err.code) : 'UNKNOWN';
    logger.warn('Localization catalog is not readable; using default messages', { file: filePath, code });
    return undefined;
  }
}
