/**
 * Ready-made monoids for range-query trees.
 */

import type { Monoid } from '../types/state.ts';

/**
 * Type a merge operation together with its identity element.
 * Both are fixed here so the aggregate type cannot drift between them.
 */
export function defineMonoid<T>(merge: (left: T, right: T) => T, identity: T): Monoid<T> {
  return Object.freeze({ merge, identity });
}

export const sumMonoid: Monoid<number> = defineMonoid((a, b) => a + b, 0);

export const bigintSumMonoid: Monoid<bigint> = defineMonoid((a, b) => a + b, 0n);

export const minMonoid: Monoid<number> = defineMonoid((a, b) => Math.min(a, b), Infinity);

export const maxMonoid: Monoid<number> = defineMonoid((a, b) => Math.max(a, b), -Infinity);

/** Bitwise xor over 32-bit integers. */
export const xorMonoid: Monoid<number> = defineMonoid((a, b) => a ^ b, 0);

/** Greatest common divisor; results are non-negative and `gcd(0, x) = |x|`. */
export const gcdMonoid: Monoid<number> = defineMonoid(gcd, 0);

/** String concatenation. Not commutative. */
export const concatMonoid: Monoid<string> = defineMonoid((a, b) => a + b, '');

function gcd(a: number, b: number): number {
  let x = Math.abs(a);
  let y = Math.abs(b);
  while (y !== 0) {
    const t = x % y;
    x = y;
    y = t;
  }
  return x;
}
