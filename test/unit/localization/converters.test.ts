import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';
import { DiagnosticCode, DiagnosticError } from '../../../src/diagnostics/diagnostics.js';
import { BinaryTableReader, BinaryTableWriter } from '../../../src/localization/binary-table.js';
import {
  collectTranslations,
  convertDefinitionsToStrings,
  convertDefinitionsToYaml,
  serializeCatalog,
} from '../../../src/localization/converters.js';
import { loadDefinitions } from '../../../src/localization/definitions.js';
import { IdentifierSpace } from '../../../src/localization/identifier-space.js';
import { StringsLocalizationProducer } from '../../../src/localization/strings-producer.js';
import {
  ABC_DEFINITIONS,
  abcSpace,
  createTempDir,
  decode,
  FIXTURE_DEFINITIONS,
  FIXTURES_DIR,
  type TempDir,
  withCapturedConsole,
} from '../../helpers/catalog-fixtures.js';

function expectDiagnostic(code: DiagnosticCode, message?: string) {
  return (error: unknown): boolean => {
    assert.ok(error instanceof DiagnosticError, `expected DiagnosticError, got ${String(error)}`);
    assert.equal(error.diagnostic.code, code);
    if (message !== undefined) assert.equal(error.message, message);
    return true;
  };
}

describe('definition templates', () => {
  it('renders a structured-list template', () => {
    assert.equal(
      convertDefinitionsToYaml(ABC_DEFINITIONS),
      '- id: A\r\n  msg: "default A"\r\n- id: B\r\n  msg: "default B"\r\n- id: C\r\n  msg: "default C"\r\n'
    );
  });

  it('renders a flat-text template', () => {
    assert.equal(
      convertDefinitionsToStrings(ABC_DEFINITIONS),
      '"A" = "default A";\r\n"B" = "default B";\r\n"C" = "default C";\r\n'
    );
  });
});

describe('collectTranslations', () => {
  let temp: TempDir;

  beforeEach(() => {
    temp = createTempDir();
  });

  afterEach(() => {
    temp.cleanup();
  });

  it('copies every available translation into the writer', () => {
    const producer = new StringsLocalizationProducer(temp.write('fr.strings', '"A" = "a";\r\n"C" = "c";'), abcSpace());
    const writer = new BinaryTableWriter();

    assert.equal(collectTranslations(producer, writer), 2);

    const reader = new BinaryTableReader(writer.toBuffer());
    assert.equal(decode(reader.find(0)), 'a');
    assert.equal(reader.find(1), undefined);
    assert.equal(decode(reader.find(2)), 'c');
  });
});

describe('serializeCatalog', () => {
  let temp: TempDir;
  let space: IdentifierSpace;

  beforeEach(() => {
    temp = createTempDir();
    space = IdentifierSpace.fromDefinitions(loadDefinitions(FIXTURE_DEFINITIONS));
  });

  afterEach(() => {
    temp.cleanup();
  });

  it('serializes a structured-list catalog and reports unknown records', () => {
    const out = temp.file('fr.db');

    const result = serializeCatalog(path.join(FIXTURES_DIR, 'fr.yaml'), out, space);

    assert.equal(result.written, 3);
    assert.deepEqual(result.unknownIds, [{ id: 'removed_upstream', message: "ce diagnostic n'existe plus" }]);

    const reader = new BinaryTableReader(new Uint8Array(fs.readFileSync(out)));
    assert.equal(reader.size, 3);
    assert.equal(decode(reader.find(0)), 'impossible de trouver %0 dans la portée');
    assert.equal(decode(reader.find(1)), 'expression attendue');
    assert.equal(decode(reader.find(4)), '%0 déclaré ici');
  });

  it('serializes a flat-text catalog', () => {
    const out = temp.file('fr.db');

    const { result } = withCapturedConsole(() => serializeCatalog(path.join(FIXTURES_DIR, 'fr.strings'), out, space));

    assert.equal(result.written, 2);
    assert.deepEqual(result.unknownIds, []);
    const reader = new BinaryTableReader(new Uint8Array(fs.readFileSync(out)));
    assert.equal(decode(reader.find(2)), 'la variable %0 n\'est jamais utilisée; remplacez-la par "_"');
  });

  it('rejects other input formats', () => {
    const input = temp.write('fr.txt', 'hello');

    assert.throws(
      () => serializeCatalog(input, temp.file('fr.db'), space),
      expectDiagnostic(
        DiagnosticCode.LOC403_UnsupportedInputFormat,
        "Unsupported catalog format '.txt' (expected .yaml or .strings)"
      )
    );
    assert.equal(fs.existsSync(temp.file('fr.db')), false);
  });

  it('fails when the input cannot be read', () => {
    const input = temp.file('missing.yaml');

    assert.throws(
      () => withCapturedConsole(() => serializeCatalog(input, temp.file('fr.db'), space)),
      expectDiagnostic(DiagnosticCode.LOC402_LocalizationNotFound, `Cannot read catalog ${input}`)
    );
  });

  it('fails on malformed flat text', () => {
    const input = temp.write('fr.strings', '"cannot_find_in_scope" "x";');

    assert.throws(
      () => serializeCatalog(input, temp.file('fr.db'), space),
      expectDiagnostic(DiagnosticCode.LOC103_ExpectedEquals)
    );
  });

  it('fails on a malformed structured list', () => {
    const input = temp.write('fr.yaml', 'id: cannot_find_in_scope\n');

    assert.throws(
      () => serializeCatalog(input, temp.file('fr.db'), space),
      expectDiagnostic(DiagnosticCode.LOC202_InvalidRecordShape)
    );
  });

  it('fails when the output cannot be written', () => {
    const out = temp.file('no/such/dir/fr.db');

    assert.throws(
      () => withCapturedConsole(() => serializeCatalog(path.join(FIXTURES_DIR, 'fr.yaml'), out, space)),
      expectDiagnostic(DiagnosticCode.LOC002_BinaryTableWriteFailed, `Cannot write binary table ${out}`)
    );
  });
});
