/**
 * Lexer for Quill source text.
 */

import type { SourcePosition } from './ast';
import { QuillSyntaxError } from './errors';

export type TokenType =
  | 'identifier'
  | 'keyword'
  | 'int'
  | 'string'
  | 'operator'
  | 'punctuation'
  | 'eof';

export interface Token {
  type: TokenType;
  text: string;
  /** Decoded value for string literals */
  value?: string;
  position: SourcePosition;
}

export const KEYWORDS = new Set([
  'func', 'struct', 'var', 'if', 'else', 'for', 'return', 'new', 'true', 'false', 'nil',
]);

// Longest operators first so `<=` wins over `<`
const OPERATORS = ['==', '!=', '<=', '>=', '&&', '||', '+', '-', '*', '/', '<', '>', '!', '='];
const PUNCTUATION = new Set(['(', ')', '{', '}', ';', ',', ':', '.']);

const ESCAPES: Record<string, string> = { n: '\n', t: '\t', '"': '"', '\\': '\\' };

export class Lexer {
  private i = 0;
  private line = 1;
  private col = 1;

  constructor(private readonly source: string) {}

  tokenize(): Token[] {
    const tokens: Token[] = [];
    for (;;) {
      this.skipTrivia();
      if (this.eof()) {
        tokens.push({ type: 'eof', text: '', position: this.position() });
        return tokens;
      }
      tokens.push(this.nextToken());
    }
  }

  private nextToken(): Token {
    const start = this.position();
    const ch = this.peek();

    if (/[A-Za-z_]/.test(ch)) {
      let text = '';
      while (/[A-Za-z0-9_]/.test(this.peek())) text += this.advance();
      return { type: KEYWORDS.has(text) ? 'keyword' : 'identifier', text, position: start };
    }

    if (/[0-9]/.test(ch)) {
      let text = '';
      while (/[0-9]/.test(this.peek())) text += this.advance();
      if (/[A-Za-z_]/.test(this.peek())) {
        throw new QuillSyntaxError(`Malformed number '${text}${this.peek()}'`, start);
      }
      return { type: 'int', text, position: start };
    }

    if (ch === '"') {
      return this.readString(start);
    }

    for (const op of OPERATORS) {
      if (this.source.startsWith(op, this.i)) {
        for (let k = 0; k < op.length; k++) this.advance();
        return { type: 'operator', text: op, position: start };
      }
    }

    if (PUNCTUATION.has(ch)) {
      this.advance();
      return { type: 'punctuation', text: ch, position: start };
    }

    throw new QuillSyntaxError(`Unexpected character '${ch}'`, start);
  }

  private readString(start: SourcePosition): Token {
    let text = this.advance();
    let value = '';
    for (;;) {
      if (this.eof() || this.peek() === '\n') {
        throw new QuillSyntaxError('Unterminated string literal', start);
      }
      const ch = this.advance();
      text += ch;
      if (ch === '"') break;
      if (ch === '\\') {
        const escaped = this.advance();
        text += escaped;
        const decoded = ESCAPES[escaped];
        if (decoded === undefined) {
          throw new QuillSyntaxError(`Unknown escape sequence '\\${escaped}'`, start);
        }
        value += decoded;
      } else {
        value += ch;
      }
    }
    return { type: 'string', text, value, position: start };
  }

  private skipTrivia(): void {
    for (;;) {
      const ch = this.peek();
      if (ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n') {
        this.advance();
      } else if (this.source.startsWith('//', this.i)) {
        while (!this.eof() && this.peek() !== '\n') this.advance();
      } else if (this.source.startsWith('/*', this.i)) {
        const start = this.position();
        this.advance();
        this.advance();
        while (!this.source.startsWith('*/', this.i)) {
          if (this.eof()) throw new QuillSyntaxError('Unterminated block comment', start);
          this.advance();
        }
        this.advance();
        this.advance();
      } else {
        return;
      }
    }
  }

  private peek(): string {
    return this.source[this.i] ?? '';
  }

  private advance(): string {
    const ch = this.source[this.i++] ?? '';
    if (ch === '\n') {
      this.line++;
      this.col = 1;
    } else {
      this.col++;
    }
    return ch;
  }

  private eof(): boolean {
    return this.i >= this.source.length;
  }

  private position(): SourcePosition {
    return { line: this.line, column: this.col };
  }
}

export function tokenize(source: string): Token[] {
  return new Lexer(source).tokenize();
}
