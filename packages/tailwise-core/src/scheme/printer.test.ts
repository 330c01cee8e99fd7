/**
 * Printer tests - rendering and data round trips
 */

import { describe, it, expect } from 'vitest';
import { print } from './printer.js';
import { parseDatum, parseOne } from './parser.js';
import { Interner } from './interner.js';
import {
  type AstNode,
  makeBool,
  makeChar,
  makeInteger,
  makeListOrEmpty,
  makePair,
  makeString,
  makeSymbol,
  theEmptyList,
} from './ast.js';

describe('Printer', () => {
  it('should print literals', () => {
    const interner = Interner.create();
    expect(print(makeInteger(-5n), interner)).toBe('-5');
    expect(print(makeBool(true), interner)).toBe('true');
    expect(print(makeChar('a'), interner)).toBe('#\\a');
    expect(print(makeChar(' '), interner)).toBe('#\\space');
    expect(print(makeString('a\nb'), interner)).toBe('"a\\nb"');
    expect(print(theEmptyList, interner)).toBe('()');
  });

  it('should print pairs and lists', () => {
    const interner = Interner.create();
    expect(print(parseDatum('(1 2 . 3)', interner), interner)).toBe('(1 . (2 . 3))');
    expect(print(parseDatum("(a 'b)", interner), interner)).toBe('(a (quote b))');
  });

  it('should print special forms as written', () => {
    const interner = Interner.create();
    const source = '(lambda fact (n acc) (if (= n 0) acc (recur (- n 1) (* n acc))))';
    expect(print(parseOne(source, interner), interner)).toBe(source);
  });

  it('should print let, loop, define, begin and quote', () => {
    const interner = Interner.create();
    for (const source of [
      '(let ((x 1) (y 2)) (f x y))',
      '(loop ((i 0)) (if (< i 3) (recur (+ i 1)) i))',
      '(define x (quote (1 2)))',
      '(begin (f) (g))',
    ]) {
      expect(print(parseOne(source, interner), interner)).toBe(source);
    }
  });

  it('should round trip characters outside the basic plane', () => {
    const interner = Interner.create();
    const text = print(makeChar('😀'), interner);
    expect(text).toBe('#\\😀');
    expect(parseDatum(text, interner)).toEqual(makeChar('😀'));
    expect(print(parseDatum('(#\\😀 #\\a)', interner), interner)).toBe('(#\\😀 #\\a)');
  });

  it('should refuse ids from another interner', () => {
    const interner = Interner.create();
    expect(() => print(makeSymbol(500), interner)).toThrow('Symbol id 500 is not known to this interner');
  });
});

/**
 * Small deterministic generator of data-mode trees
 */
function* lcg(seed: number): Generator<number, never> {
  let state = seed;
  while (true) {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    yield state >>> 16;
  }
}

function generate(rand: Generator<number, never>, interner: Interner, depth: number): AstNode {
  const pick = (n: number) => rand.next().value % n;
  const words = ['a', 'b', 'foo', 'x->y', 'if', 'loop', 'quote', '+', '...'];
  const chars = ['a', 'Z', ' ', '\n', '(', '"', '\\'];
  const strings = ['', 'hi', 'two words', 'tab\tnew\nline', 'q"uote', 'back\\slash'];

  switch (depth > 0 ? pick(8) : pick(5)) {
    case 0:
      return makeInteger(BigInt(pick(2001) - 1000));
    case 1:
      return makeChar(chars[pick(chars.length)]);
    case 2:
      return makeString(strings[pick(strings.length)]);
    case 3:
      return makeBool(pick(2) === 0);
    case 4:
      return makeSymbol(interner.intern(words[pick(words.length)]));
    case 5:
      return makePair(generate(rand, interner, depth - 1), generate(rand, interner, depth - 1));
    default: {
      const items: AstNode[] = [];
      const length = pick(4);
      for (let i = 0; i < length; i++) {
        items.push(generate(rand, interner, depth - 1));
      }
      return makeListOrEmpty(items);
    }
  }
}

describe('Printer - data round trip', () => {
  it('should re-parse printed data to an equal tree', () => {
    const interner = Interner.create();
    const rand = lcg(20261019);

    for (let i = 0; i < 200; i++) {
      const tree = generate(rand, interner, 4);
      const text = print(tree, interner);
      expect(parseDatum(text, interner)).toEqual(tree);
    }
  });
});
