import { serializeCatalog } from '../../localization/converters.js';
import { loadDefinitions } from '../../localization/definitions.js';
import { IdentifierSpace } from '../../localization/identifier-space.js';
import { success, warn } from '../utils/logger.js';

export interface SerializeOptions {
  defs: string;
  out: string;
}

export function serializeCommand(input: string, options: SerializeOptions): void {
  const space = IdentifierSpace.fromDefinitions(loadDefinitions(options.defs));
  const result = serializeCatalog(input, options.out, space);

  for (const unknown of result.unknownIds) {
    warn(`Unknown diagnostic '${unknown.id}' skipped: "${unknown.message}"`);
  }
  success(`Serialized ${result.written} translations to ${options.out}`);
}
