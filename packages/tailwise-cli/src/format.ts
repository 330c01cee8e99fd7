/**
 * Output formats for the CLI
 */

import { type AstNode, type Interner, type Token, TokenType, print } from 'tailwise-core';

export type OutputFormat = 'sexp' | 'json';

export const outputFormats: readonly OutputFormat[] = ['sexp', 'json'];

export function isOutputFormat(value: string): value is OutputFormat {
  return (outputFormats as readonly string[]).includes(value);
}

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * JSON-friendly view of a node. Symbols are shown by name, integers as
 * decimal strings so that 64-bit values survive.
 */
export function toJson(node: AstNode, interner: Interner): JsonValue {
  const name = (id: number): string => interner.resolve(id) ?? `#<symbol ${id}>`;
  const all = (nodes: readonly AstNode[]): JsonValue[] => nodes.map((n) => toJson(n, interner));

  const integer = node.asInteger();
  if (integer) return { kind: 'integer', value: integer.value.toString() };

  const ch = node.asChar();
  if (ch) return { kind: 'char', value: ch.value };

  const str = node.asString();
  if (str) return { kind: 'string', value: str.value };

  const bool = node.asBool();
  if (bool) return { kind: 'bool', value: bool.value };

  const sym = node.asSymbol();
  if (sym) return { kind: 'symbol', name: name(sym.id) };

  if (node.asEmptyList()) return { kind: 'empty-list' };

  const pair = node.asPair();
  if (pair) return { kind: 'pair', car: toJson(pair.car, interner), cdr: toJson(pair.cdr, interner) };

  const list = node.asList();
  if (list) return { kind: 'list', tail: list.tail, items: all(list.items) };

  const quote = node.asQuote();
  if (quote) return { kind: 'quote', inner: toJson(quote.inner, interner) };

  const begin = node.asBegin();
  if (begin) return { kind: 'begin', body: all(begin.body) };

  const define = node.asDefine();
  if (define) return { kind: 'define', name: name(define.name), expr: toJson(define.expr, interner) };

  const ifNode = node.asIf();
  if (ifNode) {
    return {
      kind: 'if',
      tail: ifNode.tail,
      test: toJson(ifNode.test, interner),
      consequent: toJson(ifNode.consequent, interner),
      alternative: toJson(ifNode.alternative, interner),
    };
  }

  const binder = node.asLet() ?? node.asLoop();
  if (binder) {
    return {
      kind: binder.kind,
      tail: binder.tail,
      bindings: binder.bindings.map((b) => ({ name: name(b.name), expr: toJson(b.expr, interner) })),
      body: all(binder.body),
    };
  }

  const lambda = node.asLambda();
  if (lambda) {
    return { kind: 'lambda', name: lambda.name, params: lambda.params.map(name), body: all(lambda.body) };
  }

  const recur = node.asRecur();
  if (recur) return { kind: 'recur', args: all(recur.args) };

  throw new Error(`Cannot format node of kind ${node.kind}`);
}

/**
 * Render parsed forms, one per line for sexp output
 */
export function formatForms(forms: readonly AstNode[], interner: Interner, format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify(forms.map((f) => toJson(f, interner)), null, 2);
  }
  return forms.map((f) => print(f, interner)).join('\n');
}

/**
 * One token per line: `line:column type [value]`
 */
export function formatTokens(tokens: readonly Token[]): string {
  return tokens
    .filter((t) => t.type !== TokenType.WhiteSpace)
    .map((t) => {
      const where = `${t.location.line}:${t.location.column}`;
      switch (t.type) {
        case TokenType.Char:
        case TokenType.String:
        case TokenType.Symbol:
          return `${where} ${t.type} ${JSON.stringify(t.value)}`;
        case TokenType.Integer:
          return `${where} ${t.type} ${t.value}`;
        default:
          return `${where} ${t.type}`;
      }
    })
    .join('\n');
}
