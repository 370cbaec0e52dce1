/**
 * Error kinds raised by the trie engines
 */

export class OutOfRangeError extends RangeError {
  readonly index: number;
  readonly count: number;

  constructor(index: number, count: number) {
    super(`Index ${index} out of range [0, ${count})`);
    this.name = 'OutOfRangeError';
    this.index = index;
    this.count = count;
  }
}

/**
 * Raised when a node breaks a representation invariant. Always a bug in the
 * engine, never a caller error.
 */
export class InvariantError extends Error {
  constructor(message: string) {
    super(`Invariant violated: ${message}`);
    this.name = 'InvariantError';
  }
}

export function invariant(condition: boolean, message: string): asserts condition {
  if (!condition) throw new InvariantError(message);
}

export type IndexResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: OutOfRangeError };
