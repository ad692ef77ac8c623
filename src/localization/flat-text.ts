/**
 * Flat-text (`.strings`) catalogs.
 *
 * ```
 * /* comment *\/
 * "<id>" = "<message>";
 * ```
 *
 * Records are CR-LF separated. Inside a message `\"` stands for a literal quote;
 * no other escape is recognized, so the serializer escapes only `"`.
 */

import { DiagnosticBuilder, DiagnosticCode, DiagnosticError, positionAt } from '../diagnostics/diagnostics.js';
import type { DiagnosticDefinition } from '../types.js';
import { createLogger } from '../utils/logger.js';
import type { IdentifierSpace } from './identifier-space.js';

const COMMENT_OPEN = '/*';
const COMMENT_CLOSE = '*/';

function isWhitespace(ch: string | undefined): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n' || ch === '\f' || ch === '\v';
}

/**
 * Single forward scan over a `.strings` buffer.
 */
class FlatTextScanner {
  private pos = 0;
  private readonly logger = createLogger('flat-text');

  constructor(
    private readonly text: string,
    private readonly space: IdentifierSpace,
    private readonly file?: string
  ) {}

  parse(): (string | undefined)[] {
    const messages = new Array<string | undefined>(this.space.size).fill(undefined);

    this.skipWhitespace();
    while (this.pos < this.text.length) {
      if (this.text.startsWith(COMMENT_OPEN, this.pos)) {
        this.skipComment();
        continue;
      }

      const id = this.readIdentifier();
      this.skipSpaces();
      this.expect('=', DiagnosticCode.LOC103_ExpectedEquals, `Expected '=' after "${id}"`);
      this.skipSpaces();
      this.expect('"', DiagnosticCode.LOC104_ExpectedMessage, `Expected '"' to open the message of "${id}"`);
      const message = this.readMessage(id);

      const index = this.space.indexOf(id);
      if (index === undefined) {
        this.logger.warn(`Unknown diagnostic: ${id}`, { file: this.file });
      } else {
        messages[index] = message;
      }

      this.skipWhitespace();
    }

    return messages;
  }

  private skipComment(): void {
    const end = this.text.indexOf(COMMENT_CLOSE, this.pos + COMMENT_OPEN.length);
    if (end === -1) {
      throw this.error(DiagnosticCode.LOC101_UnterminatedComment, 'Unterminated comment', this.pos);
    }
    this.pos = end + COMMENT_CLOSE.length;
    this.skipWhitespace();
  }

  private readIdentifier(): string {
    if (this.text[this.pos] !== '"') {
      throw this.error(DiagnosticCode.LOC102_ExpectedIdentifier, 'Expected \'"\' to open a diagnostic identifier', this.pos);
    }
    const start = this.pos + 1;
    const end = this.text.indexOf('"', start);
    if (end === -1) {
      throw this.error(DiagnosticCode.LOC102_ExpectedIdentifier, 'Unterminated diagnostic identifier', this.pos);
    }
    this.pos = end + 1;
    return this.text.slice(start, end);
  }

  /**
   * Reads up to the closing `";`. The opening quote has been consumed.
   */
  private readMessage(id: string): string {
    const start = this.pos;
    let message = '';
    for (let i = start; i < this.text.length; i++) {
      const ch = this.text.charAt(i);
      if (ch !== '"') {
        message += ch;
        continue;
      }

      // An escaped quote is part of the message; drop the escaping backslash.
      if (i > start && this.text[i - 1] === '\\') {
        message = message.slice(0, -1) + '"';
        continue;
      }

      if (this.text[i + 1] === ';') {
        this.pos = i + 2;
        return message;
      }
      throw this.error(
        DiagnosticCode.LOC106_UnexpectedQuote,
        `Unescaped '"' inside the message of "${id}" is not followed by ';'`,
        i
      );
    }
    throw this.error(DiagnosticCode.LOC105_UnterminatedMessage, `Unterminated message for "${id}"`, start - 1);
  }

  private expect(ch: string, code: DiagnosticCode, message: string): void {
    if (this.text[this.pos] !== ch) {
      throw this.error(code, message, this.pos);
    }
    this.pos++;
  }

  private skipSpaces(): void {
    while (this.text[this.pos] === ' ') this.pos++;
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length && isWhitespace(this.text[this.pos])) this.pos++;
  }

  private error(code: DiagnosticCode, message: string, offset: number): DiagnosticError {
    return new DiagnosticError(
      DiagnosticBuilder.error(code)
        .withMessage(message)
        .withPosition(positionAt(this.text, offset))
        .withFile(this.file)
        .build()
    );
  }
}

/**
 * Parses a `.strings` catalog against `space`.
 *
 * Unknown identifiers are reported through the logger and dropped. Later records
 * overwrite earlier ones for the same identifier.
 *
 * @returns one slot per identifier; `undefined` means not localized
 * @throws DiagnosticError (LOC101-LOC106) on malformed input; parsing stops at the first error
 */
export function parseFlatText(content: string, space: IdentifierSpace, file?: string): (string | undefined)[] {
  return new FlatTextScanner(content, space, file).parse();
}

/**
 * Renders the master definitions as a `.strings` template. Only `"` is escaped.
 */
export function serializeFlatText(definitions: readonly DiagnosticDefinition[]): string {
  let out = '';
  for (const def of definitions) {
    out += `"${def.id}" = "${def.text.replace(/"/g, '\\"')}";\r\n`;
  }
  return out;
}
