/**
 * @module config-service
 *
 * Central configuration service: every environment variable the library and the
 * `diag-locale` CLI read goes through here.
 *
 * **Usage**:
 * ```typescript
 * import { ConfigService } from './config/config-service.js';
 *
 * const config = ConfigService.getInstance();
 * const producer = producerFor(config.locale, config.localizationPath, space);
 * ```
 */

import { LogLevel } from '../utils/logger.js';

const DEFAULT_LOCALE = 'en';
const DEFAULT_LOCALIZATION_PATH = 'localization';

/**
 * Configuration singleton.
 *
 * Created on the first getInstance() call from the environment; values stay fixed
 * for the lifetime of the instance.
 */
export class ConfigService {
  private static instance: ConfigService | null = null;

  /** Log level (default INFO, from LOG_LEVEL) */
  readonly logLevel: LogLevel;

  /** Locale tag used when a command does not name one (DIAG_LOCALE, default `en`) */
  readonly locale: string;

  /** Directory holding `<locale>.db|.yaml|.strings` (DIAG_LOCALIZATION_PATH) */
  readonly localizationPath: string;

  /** Append ` [<id>]` to localized messages (DIAG_PRINT_NAMES=1) */
  readonly printDiagnosticNames: boolean;

  private constructor() {
    this.logLevel = this.parseLogLevel(process.env.LOG_LEVEL);
    this.locale = process.env.DIAG_LOCALE || DEFAULT_LOCALE;
    this.localizationPath = process.env.DIAG_LOCALIZATION_PATH || DEFAULT_LOCALIZATION_PATH;
    this.printDiagnosticNames = process.env.DIAG_PRINT_NAMES === '1';
  }

  /**
   * Parses LOG_LEVEL into a LogLevel, defaulting to INFO.
   */
  private parseLogLevel(raw: string | undefined): LogLevel {
    if (!raw) return LogLevel.INFO;
    switch (raw.toUpperCase()) {
      case 'DEBUG':
        return LogLevel.DEBUG;
      case 'WARN':
        return LogLevel.WARN;
      case 'ERROR':
        return LogLevel.ERROR;
      default:
        return LogLevel.INFO;
    }
  }

  static getInstance(): ConfigService {
    if (ConfigService.instance === null) {
      ConfigService.instance = new ConfigService();
    }
    return ConfigService.instance;
  }

  /**
   * Drops the cached instance so the next getInstance() re-reads the environment.
   *
   * **Warning**: test-only.
   */
  static resetForTesting(): void {
    ConfigService.instance = null;
  }
}
