/**
 * AST printer - renders nodes back to source text
 *
 * Data trees print in a form the data-mode parser reads back to an equal
 * tree. Code nodes print as the special form they came from.
 */

import type { AstNode, Binding } from './ast.js';
import type { Interner, SymbolId } from './interner.js';
import { escape } from './unescape.js';

const charNames: ReadonlyMap<string, string> = new Map([
  [' ', 'space'],
  ['\n', 'newline'],
  ['\t', 'tab'],
  ['\r', 'return'],
  ['\f', 'page'],
  ['\0', 'null'],
]);

export class Printer {
  constructor(private interner: Interner) {}

  print(node: AstNode): string {
    const integer = node.asInteger();
    if (integer) return integer.value.toString();

    const ch = node.asChar();
    if (ch) return `#\\${charNames.get(ch.value) ?? ch.value}`;

    const str = node.asString();
    if (str) return escape(str.value);

    const bool = node.asBool();
    if (bool) return bool.value ? 'true' : 'false';

    const sym = node.asSymbol();
    if (sym) return this.name(sym.id);

    if (node.asEmptyList()) return '()';

    const pair = node.asPair();
    if (pair) return `(${this.print(pair.car)} . ${this.print(pair.cdr)})`;

    const list = node.asList();
    if (list) return this.form(list.items);

    const quote = node.asQuote();
    if (quote) return `(quote ${this.print(quote.inner)})`;

    const begin = node.asBegin();
    if (begin) return this.form(['begin', ...begin.body]);

    const define = node.asDefine();
    if (define) return this.form(['define', this.name(define.name), define.expr]);

    const ifNode = node.asIf();
    if (ifNode) return this.form(['if', ifNode.test, ifNode.consequent, ifNode.alternative]);

    const letNode = node.asLet();
    if (letNode) return this.form(['let', this.bindings(letNode.bindings), ...letNode.body]);

    const loop = node.asLoop();
    if (loop) return this.form(['loop', this.bindings(loop.bindings), ...loop.body]);

    const lambda = node.asLambda();
    if (lambda) {
      const params = `(${lambda.params.map((p) => this.name(p)).join(' ')})`;
      const head = lambda.name === null ? ['lambda', params] : ['lambda', lambda.name, params];
      return this.form([...head, ...lambda.body]);
    }

    const recur = node.asRecur();
    if (recur) return this.form(['recur', ...recur.args]);

    throw new Error(`Cannot print node of kind ${node.kind}`);
  }

  /**
   * Parenthesize a mix of pre-rendered text and nodes
   */
  private form(parts: ReadonlyArray<string | AstNode>): string {
    return `(${parts.map((p) => (typeof p === 'string' ? p : this.print(p))).join(' ')})`;
  }

  private bindings(bindings: readonly Binding[]): string {
    return `(${bindings.map((b) => `(${this.name(b.name)} ${this.print(b.expr)})`).join(' ')})`;
  }

  private name(id: SymbolId): string {
    const text = this.interner.resolve(id);
    if (text === undefined) {
      throw new Error(`Symbol id ${id} is not known to this interner`);
    }
    return text;
  }
}

/**
 * Render `node` as source text
 */
export function print(node: AstNode, interner: Interner): string {
  return new Printer(interner).print(node);
}
