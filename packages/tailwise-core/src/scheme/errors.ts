/**
 * Parser errors
 *
 * Two kinds of failure leave the parser: a syntax error in the input, and a
 * contract violation by the caller (parsing with an uninitialized interner).
 */

/**
 * Location in source
 */
export interface Location {
  file: string;
  offset: number;
  line: number;
  column: number;
}

/**
 * No grammar production matched at `location`.
 */
export class LispSyntaxError extends Error {
  readonly offset: number;

  constructor(public readonly detail: string, public readonly location: Location) {
    super(`Parse error in ${location.file} at ${location.line}:${location.column}: ${detail}`);
    this.name = 'LispSyntaxError';
    this.offset = location.offset;
  }
}

/**
 * The caller broke a precondition of the parser API.
 * This is a programming error and is never raised for bad input.
 */
export class ContractViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContractViolation';
  }
}
