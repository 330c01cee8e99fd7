/**
 * AST node classes
 *
 * Data nodes (literals, symbols, pairs, lists) double as the values a quoted
 * datum denotes; code nodes (quote, begin, define, if, let, loop, lambda,
 * recur) only come out of code-mode parsing. Nodes are immutable once built.
 */

import type { SymbolId } from './interner.js';

export type NodeKind =
  | 'integer'
  | 'char'
  | 'string'
  | 'bool'
  | 'symbol'
  | 'empty-list'
  | 'pair'
  | 'list'
  | 'quote'
  | 'begin'
  | 'define'
  | 'if'
  | 'let'
  | 'loop'
  | 'lambda'
  | 'recur';

/**
 * Base class for all AST nodes
 */
export abstract class AstNode {
  abstract readonly kind: NodeKind;

  /** Type predicates - return specific subclass or null */
  asInteger(): IntegerNode | null { return null; }
  asChar(): CharNode | null { return null; }
  asString(): StringNode | null { return null; }
  asBool(): BoolNode | null { return null; }
  asSymbol(): SymbolNode | null { return null; }
  asEmptyList(): EmptyListNode | null { return null; }
  asPair(): PairNode | null { return null; }
  asList(): ListNode | null { return null; }
  asQuote(): QuoteNode | null { return null; }
  asBegin(): BeginNode | null { return null; }
  asDefine(): DefineNode | null { return null; }
  asIf(): IfNode | null { return null; }
  asLet(): LetNode | null { return null; }
  asLoop(): LoopNode | null { return null; }
  asLambda(): LambdaNode | null { return null; }
  asRecur(): RecurNode | null { return null; }
}

// ============ Data ============

/**
 * Signed 64-bit integer literal
 */
export class IntegerNode extends AstNode {
  readonly kind = 'integer';
  constructor(readonly value: bigint) {
    super();
  }
  asInteger(): IntegerNode { return this; }
}

export class CharNode extends AstNode {
  readonly kind = 'char';
  constructor(readonly value: string) {
    super();
  }
  asChar(): CharNode { return this; }
}

/**
 * String literal, escapes already decoded
 */
export class StringNode extends AstNode {
  readonly kind = 'string';
  constructor(readonly value: string) {
    super();
  }
  asString(): StringNode { return this; }
}

export class BoolNode extends AstNode {
  readonly kind = 'bool';
  constructor(readonly value: boolean) {
    super();
  }
  asBool(): BoolNode { return this; }
}

/**
 * Symbol, identified by its interned id
 */
export class SymbolNode extends AstNode {
  readonly kind = 'symbol';
  constructor(readonly id: SymbolId) {
    super();
  }
  asSymbol(): SymbolNode { return this; }
}

/**
 * Empty list (one shared instance)
 */
export class EmptyListNode extends AstNode {
  readonly kind = 'empty-list';
  asEmptyList(): EmptyListNode { return this; }
}

/**
 * Explicit dotted pair
 */
export class PairNode extends AstNode {
  readonly kind = 'pair';
  constructor(readonly car: AstNode, readonly cdr: AstNode) {
    super();
  }
  asPair(): PairNode { return this; }
}

/**
 * Proper list with at least one element.
 *
 * `tail` is set on a code-mode call that sits in tail position; lists read
 * as data never carry it.
 */
export class ListNode extends AstNode {
  readonly kind = 'list';
  constructor(readonly items: readonly [AstNode, ...AstNode[]], readonly tail: boolean = false) {
    super();
  }
  asList(): ListNode { return this; }

  /**
   * The same list as a right-nested pair chain ending in the empty list
   */
  toPairs(): PairNode {
    let result: AstNode = theEmptyList;
    for (let i = this.items.length - 1; i > 0; i--) {
      result = new PairNode(this.items[i], result);
    }
    return new PairNode(this.items[0], result);
  }
}

// ============ Code ============

export class QuoteNode extends AstNode {
  readonly kind = 'quote';
  constructor(readonly inner: AstNode) {
    super();
  }
  asQuote(): QuoteNode { return this; }
}

/**
 * Sequence outside tail position; may be empty
 */
export class BeginNode extends AstNode {
  readonly kind = 'begin';
  constructor(readonly body: readonly AstNode[]) {
    super();
  }
  asBegin(): BeginNode { return this; }
}

export class DefineNode extends AstNode {
  readonly kind = 'define';
  constructor(readonly name: SymbolId, readonly expr: AstNode) {
    super();
  }
  asDefine(): DefineNode { return this; }
}

export class IfNode extends AstNode {
  readonly kind = 'if';
  constructor(
    readonly test: AstNode,
    readonly consequent: AstNode,
    readonly alternative: AstNode,
    readonly tail: boolean = false
  ) {
    super();
  }
  asIf(): IfNode { return this; }
}

export interface Binding {
  readonly name: SymbolId;
  readonly expr: AstNode;
}

/**
 * Flat-scope let: every binding expression sees the outer scope only
 */
export class LetNode extends AstNode {
  readonly kind = 'let';
  constructor(
    readonly bindings: readonly Binding[],
    readonly body: readonly AstNode[],
    readonly tail: boolean = false
  ) {
    super();
  }
  asLet(): LetNode { return this; }
}

/**
 * A let whose body can be re-entered with new binding values by `recur`
 */
export class LoopNode extends AstNode {
  readonly kind = 'loop';
  constructor(
    readonly bindings: readonly Binding[],
    readonly body: readonly AstNode[],
    readonly tail: boolean = false
  ) {
    super();
  }
  asLoop(): LoopNode { return this; }
}

export class LambdaNode extends AstNode {
  readonly kind = 'lambda';
  constructor(
    /** Advisory only (diagnostics); does not bind anything */
    readonly name: string | null,
    readonly params: readonly SymbolId[],
    readonly body: readonly AstNode[]
  ) {
    super();
  }
  asLambda(): LambdaNode { return this; }
}

export class RecurNode extends AstNode {
  readonly kind = 'recur';
  constructor(readonly args: readonly AstNode[]) {
    super();
  }
  asRecur(): RecurNode { return this; }
}

// ============ Factory ============

export const theEmptyList = new EmptyListNode();
export const theTrueNode = new BoolNode(true);
export const theFalseNode = new BoolNode(false);

export function makeInteger(value: bigint): IntegerNode {
  return new IntegerNode(value);
}

export function makeChar(value: string): CharNode {
  return new CharNode(value);
}

export function makeString(value: string): StringNode {
  return new StringNode(value);
}

export function makeBool(value: boolean): BoolNode {
  return value ? theTrueNode : theFalseNode;
}

export function makeSymbol(id: SymbolId): SymbolNode {
  return new SymbolNode(id);
}

export function makePair(car: AstNode, cdr: AstNode): PairNode {
  return new PairNode(car, cdr);
}

export function makeList(items: readonly [AstNode, ...AstNode[]], tail: boolean = false): ListNode {
  return new ListNode(items, tail);
}

/**
 * List of `items`, or the empty list when there are none
 */
export function makeListOrEmpty(items: readonly AstNode[], tail: boolean = false): ListNode | EmptyListNode {
  if (items.length === 0) {
    return theEmptyList;
  }
  return new ListNode([items[0], ...items.slice(1)], tail);
}

export function makeQuote(inner: AstNode): QuoteNode {
  return new QuoteNode(inner);
}

export function makeBegin(body: readonly AstNode[]): BeginNode {
  return new BeginNode(body);
}

export function makeDefine(name: SymbolId, expr: AstNode): DefineNode {
  return new DefineNode(name, expr);
}

export function makeIf(test: AstNode, consequent: AstNode, alternative: AstNode, tail: boolean = false): IfNode {
  return new IfNode(test, consequent, alternative, tail);
}

export function makeLet(bindings: readonly Binding[], body: readonly AstNode[], tail: boolean = false): LetNode {
  return new LetNode(bindings, body, tail);
}

export function makeLoop(bindings: readonly Binding[], body: readonly AstNode[], tail: boolean = false): LoopNode {
  return new LoopNode(bindings, body, tail);
}

export function makeLambda(name: string | null, params: readonly SymbolId[], body: readonly AstNode[]): LambdaNode {
  return new LambdaNode(name, params, body);
}

export function makeRecur(args: readonly AstNode[]): RecurNode {
  return new RecurNode(args);
}
