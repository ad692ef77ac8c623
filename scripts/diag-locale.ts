#!/usr/bin/env node
import { cac } from 'cac';
import { defToStringsCommand, defToYamlCommand, type ConvertOptions } from '../src/cli/commands/convert.js';
import { dumpCommand, lookupCommand, type DumpOptions, type LookupOptions } from '../src/cli/commands/lookup.js';
import { serializeCommand } from '../src/cli/commands/serialize.js';
import { handleError } from '../src/cli/utils/error-handler.js';

function wrapAction<Args extends unknown[]>(fn: (...args: Args) => Promise<void> | void) {
  return async (...args: Args): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}

function stringOption(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function requireOption(options: Record<string, unknown>, name: string): string {
  const value = stringOption(options[name]);
  if (value === undefined) {
    throw new Error(`Missing required option --${name}`);
  }
  return value;
}

function convertOptions(options: Record<string, unknown>): ConvertOptions {
  const out = stringOption(options.out);
  return out === undefined ? {} : { out };
}

function catalogOptions(options: Record<string, unknown>): LookupOptions & DumpOptions {
  const result: LookupOptions & DumpOptions = { defs: requireOption(options, 'defs') };
  const locale = stringOption(options.locale);
  if (locale !== undefined) result.locale = locale;
  const path = stringOption(options.path);
  if (path !== undefined) result.path = path;
  return result;
}

async function main(): Promise<void> {
  const cli = cac('diag-locale');

  cli
    .command('def-to-yaml <defs>', 'Write a .yaml catalog template from a definitions file')
    .option('--out <file>', 'Output file (default: stdout)')
    .action(
      wrapAction((defs: string, options: Record<string, unknown>) => {
        defToYamlCommand(defs, convertOptions(options));
      })
    );

  cli
    .command('def-to-strings <defs>', 'Write a .strings catalog template from a definitions file')
    .option('--out <file>', 'Output file (default: stdout)')
    .action(
      wrapAction((defs: string, options: Record<string, unknown>) => {
        defToStringsCommand(defs, convertOptions(options));
      })
    );

  cli
    .command('serialize <input>', 'Serialize a .yaml or .strings catalog into a .db table')
    .option('--defs <file>', 'Diagnostic definitions (JSON)')
    .option('--out <file>', 'Output .db file')
    .action(
      wrapAction((input: string, options: Record<string, unknown>) => {
        serializeCommand(input, {
          defs: requireOption(options, 'defs'),
          out: requireOption(options, 'out'),
        });
      })
    );

  cli
    .command('lookup <id>', 'Print the localized message of one diagnostic (name or number)')
    .option('--defs <file>', 'Diagnostic definitions (JSON)')
    .option('--locale <tag>', 'Locale tag (default: DIAG_LOCALE or en)')
    .option('--path <dir>', 'Localization directory (default: DIAG_LOCALIZATION_PATH or ./localization)')
    .option('--print-names', 'Append the diagnostic name to localized messages')
    .action(
      wrapAction((id: string, options: Record<string, unknown>) => {
        const lookupOptions: LookupOptions = catalogOptions(options);
        if (options.printNames === true) lookupOptions.printNames = true;
        lookupCommand(id, lookupOptions);
      })
    );

  cli
    .command('dump', 'List every localized diagnostic of a locale')
    .option('--defs <file>', 'Diagnostic definitions (JSON)')
    .option('--locale <tag>', 'Locale tag (default: DIAG_LOCALE or en)')
    .option('--path <dir>', 'Localization directory (default: DIAG_LOCALIZATION_PATH or ./localization)')
    .option('--json', 'Print JSON', { default: false })
    .action(
      wrapAction((options: Record<string, unknown>) => {
        dumpCommand({ ...catalogOptions(options), json: Boolean(options.json) });
      })
    );

  cli.help();
  cli.parse();
}

main().catch(handleError);
