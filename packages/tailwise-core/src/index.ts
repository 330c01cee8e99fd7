/**
 * Tailwise Core - parser for a small Scheme-family language
 *
 * This is the core library containing:
 * - Lexer and token vocabulary
 * - Symbol interner
 * - AST node classes and factory functions
 * - Parser (data mode, code mode with tail-position tracking)
 * - Printer (AST back to source text)
 */

export { Lexer, tokenize } from './scheme/lexer.js';
export { TokenType, describeToken } from './scheme/token.js';
export type { Token } from './scheme/token.js';
export { Interner } from './scheme/interner.js';
export type { SymbolId } from './scheme/interner.js';
export * from './scheme/ast.js';
export { MAX_NESTING_DEPTH, Parser, parse, parseTokens, parseDatum, parseOne } from './scheme/parser.js';
export { Printer, print } from './scheme/printer.js';
export { unescape, escape } from './scheme/unescape.js';
export { LispSyntaxError, ContractViolation } from './scheme/errors.js';
export type { Location } from './scheme/errors.js';
