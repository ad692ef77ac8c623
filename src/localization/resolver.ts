/**
 * Picks the catalog backend for a locale.
 *
 * `<basePath>/<locale>.db` wins over `.yaml`, which wins over `.strings`. When
 * none exists the caller is expected to use the default messages directly.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { createLogger } from '../utils/logger.js';
import type { IdentifierSpace } from './identifier-space.js';
import type { LocalizationProducer, ProducerOptions } from './producer.js';
import { SerializedLocalizationProducer } from './serialized-producer.js';
import { StringsLocalizationProducer } from './strings-producer.js';
import { YAMLLocalizationProducer } from './yaml-producer.js';

export const CATALOG_EXTENSIONS = ['.db', '.yaml', '.strings'] as const;

export type CatalogExtension = (typeof CATALOG_EXTENSIONS)[number];

export function catalogPath(basePath: string, locale: string, extension: CatalogExtension): string {
  return join(basePath, `${locale}${extension}`);
}

/**
 * Returns a producer for the first catalog found for `locale` under `basePath`,
 * or undefined when there is none.
 *
 * A `.db` file that exists but cannot be read also yields undefined; the text
 * catalogs are only consulted when no `.db` file is present.
 */
export function producerFor(
  locale: string,
  basePath: string,
  space: IdentifierSpace,
  options: ProducerOptions = {}
): LocalizationProducer | undefined {
  const logger = createLogger('localization');

  const dbPath = catalogPath(basePath, locale, '.db');
  if (existsSync(dbPath)) {
    let buffer: Uint8Array;
    try {
      buffer = readFileSync(dbPath);
    } catch (err: unknown) {
      const error = err instanceof Error ? err : new Error(String(err));
      logger.error('Failed to read serialized localization', error, { file: dbPath });
      return undefined;
    }
    logger.debug('Using serialized localization', { file: dbPath });
    return new SerializedLocalizationProducer(buffer, space, options);
  }

  const yamlPath = catalogPath(basePath, locale, '.yaml');
  if (existsSync(yamlPath)) {
    logger.debug('Using structured-list localization', { file: yamlPath });
    return new YAMLLocalizationProducer(yamlPath, space, options);
  }

  const stringsPath = catalogPath(basePath, locale, '.strings');
  if (existsSync(stringsPath)) {
    logger.debug('Using flat-text localization', { file: stringsPath });
    return new StringsLocalizationProducer(stringsPath, space, options);
  }

  logger.debug('No localization found', { locale, basePath });
  return undefined;
}
