/**
 * Symbol interner - maps symbol text to small stable integer ids
 *
 * One interner is shared by every parse whose symbols must compare equal.
 * It is mutated by parsing, so concurrent parses need one interner each.
 */

import { keywords } from './token.js';

export type SymbolId = number;

export class Interner {
  private ids: Map<string, SymbolId> = new Map();
  private names: string[] = [];
  private valid: boolean = false;

  /**
   * Create an interner that is ready for parsing
   */
  static create(): Interner {
    const interner = new Interner();
    interner.initialize();
    return interner;
  }

  /**
   * Pre-intern the special-form names, so they get the lowest ids, and mark
   * the interner usable by the parser. Calling it again has no effect.
   */
  initialize(): void {
    if (this.valid) return;
    for (const name of keywords.keys()) {
      this.intern(name);
    }
    this.valid = true;
  }

  isValid(): boolean {
    return this.valid;
  }

  /**
   * Id for `text`, allocating the next one on first sight
   */
  intern(text: string): SymbolId {
    let id = this.ids.get(text);
    if (id === undefined) {
      id = this.names.length;
      this.names.push(text);
      this.ids.set(text, id);
    }
    return id;
  }

  /**
   * Text of an interned id
   */
  resolve(id: SymbolId): string | undefined {
    return this.names[id];
  }

  get size(): number {
    return this.names.length;
  }
}
