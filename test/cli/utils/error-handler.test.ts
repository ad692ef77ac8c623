import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert/strict';
import { classify, handleError, hintFor, reportError } from '../../../src/cli/utils/error-handler.js';
import { DiagnosticBuilder, DiagnosticCode, DiagnosticError } from '../../../src/diagnostics/diagnostics.js';

class ExitSignal extends Error {
  constructor(readonly code: number) {
    super('exit');
  }
}

function diagnosticError(code: DiagnosticCode, message: string): DiagnosticError {
  return new DiagnosticError(
    DiagnosticBuilder.error(code).withMessage(message).withPosition({ line: 2, col: 7 }).withFile('fr.strings').build()
  );
}

describe('error-handler', { concurrency: false }, () => {
  let errors: string[];
  let restoreConsole: () => void;

  beforeEach(() => {
    errors = [];
    const spy = mock.method(console, 'error', (message?: unknown) => {
      errors.push(String(message ?? ''));
    });
    restoreConsole = () => spy.mock.restore();
  });

  afterEach(() => {
    restoreConsole();
  });

  it('prints the diagnostic followed by a hint', () => {
    const code = reportError(diagnosticError(DiagnosticCode.LOC104_ExpectedMessage, 'Expected a message'));

    assert.equal(code, 1);
    assert.equal(errors.length, 2);
    assert.ok(errors[0]?.endsWith('error LOC104: Expected a message at fr.strings:2:7'));
    assert.ok(errors[1]?.includes('diag-locale def-to-yaml'));
  });

  it('maps missing files to a readable message', () => {
    reportError(Object.assign(new Error("ENOENT: no such file, open 'fr.json'"), { code: 'ENOENT' }));

    assert.equal(errors.length, 1);
    assert.ok(errors[0]?.endsWith("File not found: ENOENT: no such file, open 'fr.json'"));
  });

  it('maps permission errors to a readable message', () => {
    reportError(Object.assign(new Error('denied'), { code: 'EACCES' }));

    assert.ok(errors[0]?.endsWith('Permission denied: denied'));
  });

  it('reports other file system errors with their code', () => {
    reportError(Object.assign(new Error('is a directory'), { code: 'EISDIR' }));

    assert.ok(errors[0]?.endsWith('File system error (EISDIR): is a directory'));
  });

  it('prints plain errors and unknown values', () => {
    reportError(new Error('Missing required option --defs'));
    reportError('boom');

    assert.ok(errors[0]?.endsWith('Missing required option --defs'));
    assert.ok(errors[1]?.endsWith('Unknown error, please retry'));
  });

  it('exits with the reported code', () => {
    const exit = mock.method(process, 'exit', (code?: number | string | null) => {
      throw new ExitSignal(Number(code ?? 0));
    });
    try {
      handleError(new Error('fatal'));
      assert.fail('handleError should call process.exit');
    } catch (error) {
      assert.ok(error instanceof ExitSignal);
      assert.equal(error.code, 1);
    } finally {
      exit.mock.restore();
    }
  });
});

describe('classify / hintFor', () => {
  it('groups codes by range', () => {
    assert.equal(classify(DiagnosticCode.LOC001_MalformedBinaryTable), 'binary');
    assert.equal(classify(DiagnosticCode.LOC106_UnexpectedQuote), 'catalog');
    assert.equal(classify(DiagnosticCode.LOC201_InvalidYaml), 'catalog');
    assert.equal(classify(DiagnosticCode.LOC302_DuplicateDefinition), 'definitions');
    assert.equal(classify(DiagnosticCode.LOC401_UnknownIdentifier), 'lookup');
  });

  it('suggests regenerating a corrupt binary table', () => {
    assert.equal(
      hintFor(DiagnosticCode.LOC001_MalformedBinaryTable),
      'Regenerate the .db file with `diag-locale serialize` from its .yaml or .strings source'
    );
  });
});
