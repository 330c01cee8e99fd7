/**
 * Scheme Parser - token stream to AST
 *
 * Two grammars share one token cursor:
 *
 * - data mode (`parseDatum`) reads inert structure: literals, symbols, pairs
 *   and lists. Keyword tokens are just symbols here, and `'x` becomes the
 *   two-element list `(quote x)`.
 * - code mode (`parseItem`) additionally recognizes the special forms when
 *   their keyword heads a parenthesized form, and threads a `tail` flag
 *   through the recursion so that `recur` is only accepted in tail slots.
 *
 * Entering `quote` switches to data mode for everything inside it.
 */

import {
  type AstNode,
  type Binding,
  makeBegin,
  makeChar,
  makeDefine,
  makeIf,
  makeInteger,
  makeLambda,
  makeLet,
  makeList,
  makeListOrEmpty,
  makeLoop,
  makePair,
  makeQuote,
  makeRecur,
  makeString,
  makeSymbol,
  theEmptyList,
  theFalseNode,
  theTrueNode,
} from './ast.js';
import { ContractViolation, LispSyntaxError } from './errors.js';
import type { Interner, SymbolId } from './interner.js';
import { tokenize } from './lexer.js';
import { type Token, TokenType, describeToken, isKeyword, keywordText } from './token.js';
import { unescape } from './unescape.js';

/**
 * Deepest nesting of lists and quotes accepted before reporting a syntax error
 */
export const MAX_NESTING_DEPTH = 512;

type FormType = TokenType.Begin | TokenType.Define | TokenType.If | TokenType.Let
  | TokenType.Loop | TokenType.Lambda | TokenType.Recur | TokenType.Quote;

/**
 * Scheme Parser
 */
export class Parser {
  private tokens: Token[];
  private pos: number = 0;
  private depth: number = 0;

  constructor(tokens: Token[], private interner: Interner) {
    if (!interner.isValid()) {
      throw new ContractViolation('Parser used with an interner that has not been initialized');
    }
    if (tokens.length === 0 || tokens[tokens.length - 1].type !== TokenType.EOF) {
      throw new ContractViolation('Token stream must end with an EOF token');
    }
    this.tokens = tokens;
  }

  /**
   * Parse one or more top-level items
   */
  parseProgram(): AstNode[] {
    const forms = [this.parseItem(false)];

    while (this.peek().type !== TokenType.EOF) {
      forms.push(this.parseItem(false));
    }

    return forms;
  }

  /**
   * Parse exactly one code-mode item
   */
  parseSingleItem(): AstNode {
    return this.expectEnd(this.parseItem(false));
  }

  /**
   * Parse exactly one datum in data mode
   */
  parseSingleDatum(): AstNode {
    return this.expectEnd(this.parseDatum());
  }

  private expectEnd(node: AstNode): AstNode {
    const rest = this.peek();
    if (rest.type !== TokenType.EOF) {
      throw this.error(`Expected end of input, got ${describeToken(rest)}`, rest);
    }
    return node;
  }

  // ============ Data mode ============

  private parseDatum(): AstNode {
    const token = this.next();

    return this.nested(token, () => {
      switch (token.type) {
        case TokenType.OpenParen:
          return this.parseListRest(token, () => this.parseDatum(), false);
        case TokenType.QuoteTick:
          return makeList([makeSymbol(this.interner.intern('quote')), this.parseDatum()]);
        default:
          return this.parseAtom(token);
      }
    });
  }

  /**
   * Literal or symbol. Keyword tokens are read back as the symbol of their text.
   */
  private parseAtom(token: Token): AstNode {
    switch (token.type) {
      case TokenType.True:
        return theTrueNode;
      case TokenType.False:
        return theFalseNode;
      case TokenType.Integer:
        return makeInteger(token.value);
      case TokenType.Char:
        return makeChar(token.value);
      case TokenType.String: {
        const value = unescape(token.value);
        if (value === null) {
          throw this.error('Invalid escape sequence in string', token);
        }
        return makeString(value);
      }
      case TokenType.Symbol:
        return makeSymbol(this.interner.intern(token.value));
    }

    if (isKeyword(token)) {
      return makeSymbol(this.interner.intern(keywordText(token)));
    }

    throw this.error(`Unexpected ${describeToken(token)}`, token);
  }

  /**
   * Elements of a list after its opening paren, up to and including the
   * closing paren. `(a b . c)` builds nested pairs ending in `c`.
   */
  private parseListRest(open: Token, element: () => AstNode, tail: boolean): AstNode {
    const items: AstNode[] = [];

    while (true) {
      const token = this.peek();

      if (token.type === TokenType.ClosingParen) {
        this.next();
        return makeListOrEmpty(items, tail);
      }

      if (token.type === TokenType.EOF) {
        throw this.error(`Unterminated list opened at ${open.location.line}:${open.location.column}`, token);
      }

      if (token.type === TokenType.Dot) {
        if (items.length === 0) {
          throw this.error('Expected datum before dot', token);
        }
        this.next();
        let result = element();
        this.expect(TokenType.ClosingParen);
        for (let i = items.length - 1; i >= 0; i--) {
          result = makePair(items[i], result);
        }
        return result;
      }

      items.push(element());
    }
  }

  // ============ Code mode ============

  private parseItem(tail: boolean): AstNode {
    const token = this.next();

    return this.nested(token, () => {
      switch (token.type) {
        case TokenType.OpenParen:
          return this.parseForm(token, tail);
        case TokenType.QuoteTick:
          return makeQuote(this.parseDatum());
        default:
          return this.parseAtom(token);
      }
    });
  }

  /**
   * A parenthesized form, after its opening paren
   */
  private parseForm(open: Token, tail: boolean): AstNode {
    const head = this.peek();

    switch (head.type) {
      case TokenType.ClosingParen:
        this.next();
        return theEmptyList;
      case TokenType.Begin:
      case TokenType.Define:
      case TokenType.If:
      case TokenType.Let:
      case TokenType.Loop:
      case TokenType.Lambda:
      case TokenType.Recur:
      case TokenType.Quote:
        this.next();
        if (process.env.DEBUG_PARSE) {
          console.error(`[parseForm] ${head.type} at ${head.location.line}:${head.location.column}${tail ? ' (tail)' : ''}`);
        }
        return this.parseSpecialForm(head.type, head, tail);
      default:
        return this.parseListRest(open, () => this.parseItem(false), tail);
    }
  }

  private parseSpecialForm(type: FormType, keyword: Token, tail: boolean): AstNode {
    switch (type) {
      case TokenType.Begin:
        return this.parseBegin(tail);
      case TokenType.Define:
        return this.parseDefine(keyword);
      case TokenType.If:
        return this.parseIf(keyword, tail);
      case TokenType.Let:
        return this.parseLet(keyword, false, tail);
      case TokenType.Loop:
        return this.parseLet(keyword, true, tail);
      case TokenType.Lambda:
        return this.parseLambda(keyword);
      case TokenType.Recur:
        return this.parseRecur(keyword, tail);
      case TokenType.Quote:
        return this.parseQuote();
    }
  }

  /**
   * (begin e1 ... en)
   *
   * In tail position the sequence is re-listed under the `begin` symbol with
   * its last element parsed as a tail item.
   */
  private parseBegin(tail: boolean): AstNode {
    if (!tail) {
      return makeBegin(this.parseSequence(false));
    }
    const body = this.parseSequence(true);
    return makeList([makeSymbol(this.interner.intern('begin')), ...body], true);
  }

  /**
   * (define name expr)
   */
  private parseDefine(keyword: Token): AstNode {
    const nameToken = this.next();
    let name: SymbolId;

    if (nameToken.type === TokenType.Symbol) {
      name = this.interner.intern(nameToken.value);
    } else if (isKeyword(nameToken)) {
      name = this.interner.intern(keywordText(nameToken));
    } else {
      throw this.error(`define name must be a symbol, got ${describeToken(nameToken)}`, nameToken);
    }

    this.expectItem(keyword, 'define requires a name and an expression');
    const expr = this.parseItem(false);
    this.expectClose(keyword, 'define requires exactly a name and an expression');
    return makeDefine(name, expr);
  }

  /**
   * (if test consequent alternative); both branches inherit the tail flag
   */
  private parseIf(keyword: Token, tail: boolean): AstNode {
    const arity = 'if requires exactly three expressions';

    this.expectItem(keyword, arity);
    const test = this.parseItem(false);
    this.expectItem(keyword, arity);
    const consequent = this.parseItem(tail);
    this.expectItem(keyword, arity);
    const alternative = this.parseItem(tail);
    this.expectClose(keyword, arity);

    return makeIf(test, consequent, alternative, tail);
  }

  /**
   * (let ((name expr) ...) body...) and (loop ...)
   *
   * A loop is only kept as a loop when its body's tail reaches a `recur`;
   * without one there is nothing to re-enter and it is a plain let.
   */
  private parseLet(keyword: Token, isLoop: boolean, tail: boolean): AstNode {
    const bindings = this.parseBindings(keyword);
    const body = this.parseBody(keyword);

    if (!isLoop) {
      return makeLet(bindings, body, tail);
    }

    if (reachesRecur(body[body.length - 1], this.interner.intern('begin'))) {
      return makeLoop(bindings, body, tail);
    }

    if (process.env.DEBUG_PARSE) {
      console.error(`[parseLet] loop at ${keyword.location.line}:${keyword.location.column} has no tail recur, building let`);
    }
    return makeLet(bindings, body, tail);
  }

  private parseBindings(keyword: Token): Binding[] {
    const form = keywordName(keyword);
    const open = this.next();
    if (open.type !== TokenType.OpenParen) {
      throw this.error(`${form} requires a binding list, got ${describeToken(open)}`, open);
    }

    const bindings: Binding[] = [];

    while (this.peek().type !== TokenType.ClosingParen) {
      const bindingOpen = this.next();
      if (bindingOpen.type !== TokenType.OpenParen) {
        throw this.error(`${form} binding must be a (name expr) list, got ${describeToken(bindingOpen)}`, bindingOpen);
      }
      const name = this.parseName(`${form} binding name`);
      this.expectItem(bindingOpen, `${form} binding must have exactly 2 elements`);
      const expr = this.parseItem(false);
      this.expectClose(bindingOpen, `${form} binding must have exactly 2 elements`);
      bindings.push({ name, expr });
    }

    this.next();
    return bindings;
  }

  /**
   * (lambda [name] (params...) body...)
   */
  private parseLambda(keyword: Token): AstNode {
    let name: string | null = null;
    const first = this.peek();
    if (first.type === TokenType.Symbol) {
      this.next();
      name = first.value;
    }

    const open = this.next();
    if (open.type !== TokenType.OpenParen) {
      throw this.error(`lambda requires a parameter list, got ${describeToken(open)}`, open);
    }

    const params: SymbolId[] = [];
    while (this.peek().type !== TokenType.ClosingParen) {
      const param = this.parseName('lambda parameter');
      if (params.includes(param)) {
        throw this.error(`duplicate lambda parameter: ${this.interner.resolve(param)}`, this.tokens[this.pos - 1]);
      }
      params.push(param);
    }
    this.next();

    return makeLambda(name, params, this.parseBody(keyword));
  }

  /**
   * (recur arg...)
   */
  private parseRecur(keyword: Token, tail: boolean): AstNode {
    if (!tail) {
      throw this.error('recur is only allowed in tail position', keyword);
    }
    return makeRecur(this.parseSequence(false));
  }

  /**
   * (quote datum)
   */
  private parseQuote(): AstNode {
    const inner = this.parseDatum();
    this.expect(TokenType.ClosingParen);
    return makeQuote(inner);
  }

  // ============ Shared pieces ============

  /**
   * Run `parse` one nesting level below the current one
   */
  private nested(token: Token, parse: () => AstNode): AstNode {
    if (this.depth >= MAX_NESTING_DEPTH) {
      throw this.error(`Nesting deeper than ${MAX_NESTING_DEPTH} levels`, token);
    }
    this.depth++;
    try {
      return parse();
    } finally {
      this.depth--;
    }
  }

  /**
   * Items up to and including the closing paren. With `tailLast`, the final
   * item is parsed in tail position.
   */
  private parseSequence(tailLast: boolean): AstNode[] {
    const items: AstNode[] = [];

    while (true) {
      const token = this.peek();
      if (token.type === TokenType.ClosingParen) {
        this.next();
        return items;
      }
      items.push(this.parseItem(tailLast && this.isLastItem()));
    }
  }

  /**
   * Body of a let, loop or lambda: at least one item, the last one in tail position
   */
  private parseBody(keyword: Token): AstNode[] {
    const at = this.peek();
    const body = this.parseSequence(true);
    if (body.length === 0) {
      throw this.error(`${keywordName(keyword)} body requires at least one expression`, at);
    }
    return body;
  }

  /**
   * A plain symbol used as a binder
   */
  private parseName(what: string): SymbolId {
    const token = this.next();
    if (token.type !== TokenType.Symbol) {
      throw this.error(`${what} must be a symbol, got ${describeToken(token)}`, token);
    }
    return this.interner.intern(token.value);
  }

  /**
   * Whether the item starting at the cursor is the last one before a closing paren
   */
  private isLastItem(): boolean {
    const end = this.skipItem(this.skipWhitespace(this.pos));
    return this.tokens[this.skipWhitespace(end)].type === TokenType.ClosingParen;
  }

  /**
   * Index just past the item starting at `from`
   */
  private skipItem(from: number): number {
    const token = this.tokens[from];

    if (token.type === TokenType.QuoteTick) {
      let i = from;
      while (this.tokens[i].type === TokenType.QuoteTick) {
        i = this.skipWhitespace(i + 1);
      }
      return this.skipItem(i);
    }

    if (token.type !== TokenType.OpenParen) {
      return token.type === TokenType.EOF ? from : from + 1;
    }

    let depth = 0;
    let i = from;
    do {
      const t = this.tokens[i];
      if (t.type === TokenType.EOF) return i;
      if (t.type === TokenType.OpenParen) depth++;
      if (t.type === TokenType.ClosingParen) depth--;
      i++;
    } while (depth > 0);
    return i;
  }

  // ============ Token cursor ============

  private skipWhitespace(from: number): number {
    let i = from;
    while (this.tokens[i].type === TokenType.WhiteSpace) {
      i++;
    }
    return i;
  }

  private peek(): Token {
    this.pos = this.skipWhitespace(this.pos);
    return this.tokens[this.pos];
  }

  private next(): Token {
    const token = this.peek();
    if (token.type !== TokenType.EOF) {
      this.pos++;
    }
    return token;
  }

  private expect(type: TokenType): Token {
    const token = this.next();
    if (token.type !== type) {
      throw this.error(`Expected '${type}', got ${describeToken(token)}`, token);
    }
    return token;
  }

  /**
   * Fail with `message` when the form ends before another item
   */
  private expectItem(form: Token, message: string): void {
    const token = this.peek();
    if (token.type === TokenType.ClosingParen) {
      throw this.error(message, form);
    }
  }

  /**
   * Fail with `message` unless the form ends here
   */
  private expectClose(form: Token, message: string): void {
    const token = this.peek();
    if (token.type !== TokenType.ClosingParen) {
      throw this.error(message, token.type === TokenType.EOF ? token : form);
    }
    this.next();
  }

  private error(message: string, token: Token): LispSyntaxError {
    return new LispSyntaxError(message, token.location);
  }
}

function keywordName(token: Token): string {
  return isKeyword(token) ? keywordText(token) : describeToken(token);
}

/**
 * Whether `node`, sitting in a loop body's tail slot, reaches a `recur` that
 * re-enters that loop. Nested loops and lambdas own their recurs.
 */
function reachesRecur(node: AstNode, beginId: SymbolId): boolean {
  if (node.asRecur()) {
    return true;
  }

  const ifNode = node.asIf();
  if (ifNode) {
    return ifNode.tail && (reachesRecur(ifNode.consequent, beginId) || reachesRecur(ifNode.alternative, beginId));
  }

  const letNode = node.asLet();
  if (letNode) {
    return letNode.tail && reachesRecur(letNode.body[letNode.body.length - 1], beginId);
  }

  // Tail `begin`, re-listed under the begin symbol
  const list = node.asList();
  if (list && list.tail && list.items.length > 1 && list.items[0].asSymbol()?.id === beginId) {
    return reachesRecur(list.items[list.items.length - 1], beginId);
  }

  return false;
}

/**
 * Parse a program: one or more top-level items
 */
export function parse(source: string, interner: Interner, file: string = '<unknown>'): AstNode[] {
  if (!interner.isValid()) {
    throw new ContractViolation('parse called with an interner that has not been initialized');
  }
  return new Parser(tokenize(source, file), interner).parseProgram();
}

/**
 * Parse a program from an already lexed token stream ending in EOF
 */
export function parseTokens(tokens: Token[], interner: Interner): AstNode[] {
  return new Parser(tokens, interner).parseProgram();
}

/**
 * Parse a single datum in data mode
 */
export function parseDatum(source: string, interner: Interner, file: string = '<unknown>'): AstNode {
  if (!interner.isValid()) {
    throw new ContractViolation('parseDatum called with an interner that has not been initialized');
  }
  return new Parser(tokenize(source, file), interner).parseSingleDatum();
}

/**
 * Parse a single code-mode expression
 */
export function parseOne(source: string, interner: Interner, file: string = '<unknown>'): AstNode {
  if (!interner.isValid()) {
    throw new ContractViolation('parseOne called with an interner that has not been initialized');
  }
  return new Parser(tokenize(source, file), interner).parseSingleItem();
}
