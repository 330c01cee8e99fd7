/**
 * Lexer - turns source text into the token stream the parser consumes
 *
 * Whitespace and `;` comments are kept as a single WhiteSpace token per run so
 * that token positions line up with the source. Identifiers whose text is a
 * special-form name come out as keyword tokens; the parser decides by
 * position whether they act as keywords or as plain symbols.
 */

import { LispSyntaxError, type Location } from './errors.js';
import { type Token, TokenType, keywords } from './token.js';

const I64_MIN = -(2n ** 63n);
const I64_MAX = 2n ** 63n - 1n;

/**
 * Scheme lexer
 */
export class Lexer {
  private input: string;
  private pos: number = 0;
  private line: number = 1;
  private column: number = 1;
  private file: string;

  constructor(input: string, file: string = '<unknown>') {
    this.input = input;
    this.file = file;
  }

  /**
   * Tokenize the whole input. The result always ends with an EOF token.
   */
  tokenize(): Token[] {
    const tokens: Token[] = [];

    while (!this.isAtEnd()) {
      tokens.push(this.nextToken());
    }

    tokens.push({ type: TokenType.EOF, location: this.currentLocation() });
    return tokens;
  }

  private nextToken(): Token {
    const location = this.currentLocation();
    const c = this.peek();

    if (this.isWhitespace(c) || c === ';') {
      this.skipWhitespaceAndComments();
      return { type: TokenType.WhiteSpace, location };
    }

    if (c === '(') {
      this.advance();
      return { type: TokenType.OpenParen, location };
    }

    if (c === ')') {
      this.advance();
      return { type: TokenType.ClosingParen, location };
    }

    if (c === "'") {
      this.advance();
      return { type: TokenType.QuoteTick, location };
    }

    if (c === '.' && this.isDelimiter(this.peekAhead(1))) {
      this.advance();
      return { type: TokenType.Dot, location };
    }

    if (c === '"') {
      return { type: TokenType.String, value: this.scanString(), location };
    }

    if (c === '#') {
      this.advance();
      if (this.peek() !== '\\') {
        throw this.error(`Invalid hash expression: #${this.peek()}`, location);
      }
      this.advance();
      return { type: TokenType.Char, value: this.scanChar(location), location };
    }

    if (this.isDigit(c) || ((c === '-' || c === '+') && this.isDigit(this.peekAhead(1)))) {
      return { type: TokenType.Integer, value: this.scanInteger(location), location };
    }

    if (this.isIdentifierStart(c) || c === '.') {
      const id = this.scanIdentifier();
      const keyword = keywords.get(id);
      if (keyword) {
        return { type: keyword, location };
      }
      return { type: TokenType.Symbol, value: id, location };
    }

    throw this.error(`Unexpected character: ${this.advanceCodePoint()}`, location);
  }

  /**
   * Scan a string literal, returning the raw text between the quotes
   */
  private scanString(): string {
    const start = this.currentLocation();
    this.advance();
    const from = this.pos;

    while (!this.isAtEnd() && this.peek() !== '"') {
      if (this.peek() === '\\') {
        this.advance();
        if (this.isAtEnd()) break;
      }
      this.advance();
    }

    if (this.isAtEnd()) {
      throw this.error('Unterminated string literal', start);
    }

    const raw = this.input.substring(from, this.pos);
    this.advance();
    return raw;
  }

  /**
   * Scan the part of a character literal after `#\`
   */
  private scanChar(location: Location): string {
    if (this.isAtEnd()) {
      throw this.error('Expected character after #\\', location);
    }

    const first = this.advanceCodePoint();

    // A single non-alphabetic character, or a letter not followed by more letters
    if (!this.isAlpha(first) || !this.isAlpha(this.peek())) {
      return this.endChar(first, location);
    }

    let name = first;
    while (this.isAlpha(this.peek())) {
      name += this.advance();
    }
    return this.endChar(this.convertCharName(name, location), location);
  }

  private endChar(value: string, location: Location): string {
    if (!this.isDelimiter(this.peek())) {
      throw this.error('Invalid character literal', location);
    }
    return value;
  }

  private convertCharName(name: string, location: Location): string {
    switch (name.toLowerCase()) {
      case 'space': return ' ';
      case 'newline': return '\n';
      case 'tab': return '\t';
      case 'return': return '\r';
      case 'linefeed': return '\n';
      case 'page': return '\f';
      case 'null': return '\0';
      default:
        throw this.error(`Unknown character name: ${name}`, location);
    }
  }

  private scanInteger(location: Location): bigint {
    let numStr = '';

    if (this.peek() === '-' || this.peek() === '+') {
      numStr += this.advance();
    }

    while (this.isDigit(this.peek())) {
      numStr += this.advance();
    }

    if (!this.isAtEnd() && !this.isDelimiter(this.peek())) {
      while (!this.isAtEnd() && !this.isDelimiter(this.peek())) {
        numStr += this.advance();
      }
      throw this.error(`Invalid number: ${numStr}`, location);
    }

    const value = BigInt(numStr);
    if (value < I64_MIN || value > I64_MAX) {
      throw this.error(`Integer out of range: ${numStr}`, location);
    }
    return value;
  }

  private scanIdentifier(): string {
    let id = '';

    while (!this.isAtEnd() && this.isIdentifierChar(this.peek())) {
      id += this.advance();
    }

    return id;
  }

  // ============ Character helpers ============

  private skipWhitespaceAndComments(): void {
    while (!this.isAtEnd()) {
      const c = this.peek();

      if (this.isWhitespace(c)) {
        this.advance();
      } else if (c === ';') {
        while (!this.isAtEnd() && this.peek() !== '\n') {
          this.advance();
        }
      } else {
        break;
      }
    }
  }

  private isWhitespace(c: string): boolean {
    return c === ' ' || c === '\t' || c === '\r' || c === '\n' || c === '\f';
  }

  private isDelimiter(c: string): boolean {
    return c === '\0' || this.isWhitespace(c) || c === '(' || c === ')' || c === '"' || c === ';' || c === "'";
  }

  private isDigit(c: string): boolean {
    return c >= '0' && c <= '9';
  }

  private isAlpha(c: string): boolean {
    return (c >= 'a' && c <= 'z') || (c >= 'A' && c <= 'Z');
  }

  private isIdentifierStart(c: string): boolean {
    return this.isAlpha(c) || '!$%&*/:<=>?^_~+-'.includes(c);
  }

  private isIdentifierChar(c: string): boolean {
    return this.isIdentifierStart(c) || this.isDigit(c) || c === '.' || c === '@';
  }

  private isAtEnd(): boolean {
    return this.pos >= this.input.length;
  }

  private peek(): string {
    if (this.isAtEnd()) return '\0';
    return this.input[this.pos];
  }

  private peekAhead(n: number): string {
    if (this.pos + n >= this.input.length) return '\0';
    return this.input[this.pos + n];
  }

  private advance(): string {
    const c = this.input[this.pos++];
    if (c === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return c;
  }

  /**
   * Consume one code point, which may span two UTF-16 units; it counts as one column
   */
  private advanceCodePoint(): string {
    const c = String.fromCodePoint(this.input.codePointAt(this.pos) ?? 0);
    if (c.length === 1) {
      return this.advance();
    }
    this.pos += c.length;
    this.column++;
    return c;
  }

  private currentLocation(): Location {
    return { file: this.file, offset: this.pos, line: this.line, column: this.column };
  }

  private error(message: string, location: Location = this.currentLocation()): LispSyntaxError {
    return new LispSyntaxError(message, location);
  }
}

/**
 * Tokenize Scheme source code
 */
export function tokenize(source: string, file: string = '<unknown>'): Token[] {
  return new Lexer(source, file).tokenize();
}
