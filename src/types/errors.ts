/**
 * Error types shared by every structure in the library.
 */

import { isIndexWithin } from './branded.ts';

export type ErrorCode = 'OUT_OF_RANGE';

/**
 * Raised when an index or vertex argument falls outside the valid domain
 * of a structure, or when a query range is inverted (`l > r`).
 * Always thrown before any state is touched.
 */
export class OutOfRangeError extends RangeError {
  readonly code: ErrorCode = 'OUT_OF_RANGE';

  constructor(
    public readonly operation: string,
    public readonly size: number,
    message: string,
  ) {
    super(`${operation}: ${message}`);
    this.name = 'OutOfRangeError';
  }
}

/**
 * Throw unless `value` is an integer in `[0, size - 1]`.
 */
export function assertIndex(operation: string, name: string, value: number, size: number): void {
  if (isIndexWithin(value, size)) return;
  const domain = size === 0 ? 'the domain is empty' : `expected an integer in [0, ${size - 1}]`;
  throw new OutOfRangeError(operation, size, `${name} ${value} is out of range, ${domain}`);
}

/**
 * Throw unless `[l, r]` is a non-empty range inside `[0, size - 1]`.
 */
export function assertRange(operation: string, l: number, r: number, size: number): void {
  assertIndex(operation, 'l', l, size);
  assertIndex(operation, 'r', r, size);
  if (l > r) {
    throw new OutOfRangeError(operation, size, `inverted range [${l}, ${r}]`);
  }
}
