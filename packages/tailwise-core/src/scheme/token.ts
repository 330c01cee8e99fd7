/**
 * Token vocabulary shared by the lexer and the parser
 */

import type { Location } from './errors.js';

/**
 * Token types
 */
export enum TokenType {
  EOF = 'EOF',
  OpenParen = '(',
  ClosingParen = ')',
  Dot = '.',
  QuoteTick = "'",
  WhiteSpace = 'whitespace',

  // Keywords
  True = 'true',
  False = 'false',
  Begin = 'begin',
  Define = 'define',
  If = 'if',
  Let = 'let',
  Loop = 'loop',
  Lambda = 'lambda',
  Recur = 'recur',
  Quote = 'quote',

  // Payload-carrying tokens
  Char = 'char',
  Integer = 'integer',
  String = 'string',
  Symbol = 'symbol',
}

export type KeywordType =
  | TokenType.True
  | TokenType.False
  | TokenType.Begin
  | TokenType.Define
  | TokenType.If
  | TokenType.Let
  | TokenType.Loop
  | TokenType.Lambda
  | TokenType.Recur
  | TokenType.Quote;

export type SimpleType =
  | TokenType.EOF
  | TokenType.OpenParen
  | TokenType.ClosingParen
  | TokenType.Dot
  | TokenType.QuoteTick
  | TokenType.WhiteSpace;

export type Token =
  | { type: SimpleType; location: Location }
  | { type: KeywordType; location: Location }
  | { type: TokenType.Char; value: string; location: Location }
  | { type: TokenType.Integer; value: bigint; location: Location }
  /** Raw text between the quotes, escapes not yet decoded */
  | { type: TokenType.String; value: string; location: Location }
  | { type: TokenType.Symbol; value: string; location: Location };

export type KeywordToken = Extract<Token, { type: KeywordType }>;

/**
 * Identifier text that the lexer turns into a keyword token.
 * The token type's value is the keyword's source text.
 */
export const keywords: ReadonlyMap<string, KeywordType> = new Map<string, KeywordType>([
  ['true', TokenType.True],
  ['false', TokenType.False],
  ['begin', TokenType.Begin],
  ['define', TokenType.Define],
  ['if', TokenType.If],
  ['let', TokenType.Let],
  ['loop', TokenType.Loop],
  ['lambda', TokenType.Lambda],
  ['recur', TokenType.Recur],
  ['quote', TokenType.Quote],
]);

export function isKeyword(token: Token): token is KeywordToken {
  return keywords.has(token.type);
}

/**
 * Source text of a keyword token, used when a keyword is read as a symbol
 */
export function keywordText(token: KeywordToken): string {
  return token.type;
}

/**
 * Human readable description for error messages
 */
export function describeToken(token: Token): string {
  switch (token.type) {
    case TokenType.EOF:
      return 'end of input';
    case TokenType.WhiteSpace:
      return 'whitespace';
    case TokenType.Char:
      return `character '${token.value}'`;
    case TokenType.Integer:
      return `integer ${token.value}`;
    case TokenType.String:
      return 'string';
    case TokenType.Symbol:
      return `symbol '${token.value}'`;
    default:
      return `'${token.type}'`;
  }
}
