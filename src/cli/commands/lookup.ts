import { ConfigService } from '../../config/config-service.js';
import { DiagnosticBuilder, DiagnosticCode, DiagnosticError, dummyPosition } from '../../diagnostics/diagnostics.js';
import { loadDefinitions } from '../../localization/definitions.js';
import { IdentifierSpace } from '../../localization/identifier-space.js';
import type { LocalizationProducer } from '../../localization/producer.js';
import { producerFor } from '../../localization/resolver.js';
import { YAMLLocalizationProducer } from '../../localization/yaml-producer.js';
import type { DiagnosticDefinition, DiagnosticID } from '../../types.js';
import { info, warn } from '../utils/logger.js';

export interface CatalogOptions {
  defs: string;
  locale?: string;
  path?: string;
}

export interface LookupOptions extends CatalogOptions {
  printNames?: boolean;
}

export interface DumpOptions extends CatalogOptions {
  json?: boolean;
}

interface CatalogContext {
  readonly definitions: DiagnosticDefinition[];
  readonly space: IdentifierSpace;
  readonly locale: string;
  readonly producer: LocalizationProducer | undefined;
}

function openCatalog(options: CatalogOptions, printDiagnosticNames: boolean): CatalogContext {
  const config = ConfigService.getInstance();
  const definitions = loadDefinitions(options.defs);
  const space = IdentifierSpace.fromDefinitions(definitions);
  const locale = options.locale ?? config.locale;
  const producer = producerFor(locale, options.path ?? config.localizationPath, space, { printDiagnosticNames });
  return { definitions, space, locale, producer };
}

/**
 * Accepts either a diagnostic name or its numeric identifier.
 */
function resolveIdentifier(space: IdentifierSpace, raw: string): DiagnosticID {
  const byName = space.indexOf(raw);
  if (byName !== undefined) return byName;
  if (/^\d+$/.test(raw) && space.has(Number(raw))) return Number(raw);
  throw new DiagnosticError(
    DiagnosticBuilder.error(DiagnosticCode.LOC401_UnknownIdentifier)
      .withMessage(`Unknown diagnostic '${raw}'`)
      .withPosition(dummyPosition())
      .build()
  );
}

export function lookupCommand(rawId: string, options: LookupOptions): void {
  const printNames = options.printNames ?? ConfigService.getInstance().printDiagnosticNames;
  const { definitions, space, producer } = openCatalog(options, printNames);
  const id = resolveIdentifier(space, rawId);
  const defaultText = definitions[id]?.text ?? '';
  console.log(producer ? producer.messageOrDefault(id, defaultText) : defaultText);
}

export function dumpCommand(options: DumpOptions): void {
  const { space, locale, producer } = openCatalog(options, false);
  if (!producer) {
    info(`No localization for '${locale}'; default messages apply`);
    if (options.json) console.log('[]');
    return;
  }

  const available: { id: string; message: string }[] = [];
  producer.forEachAvailable((id, message) => {
    available.push({ id: space.nameOf(id) ?? String(id), message });
  });

  if (producer instanceof YAMLLocalizationProducer) {
    for (const unknown of producer.unknownIdentifiers()) {
      warn(`Unknown diagnostic '${unknown.id}' in catalog`);
    }
  }

  if (options.json) {
    console.log(JSON.stringify(available, null, 2));
    return;
  }
  for (const entry of available) {
    console.log(`${entry.id}\t${entry.message}`);
  }
  info(`${available.length} of ${space.size} diagnostics localized for '${locale}'`);
}
