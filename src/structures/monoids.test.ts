import { describe, it, expect } from 'vitest';
import {
  defineMonoid,
  sumMonoid,
  bigintSumMonoid,
  minMonoid,
  maxMonoid,
  xorMonoid,
  gcdMonoid,
  concatMonoid,
} from './monoids.ts';
import type { Monoid } from '../types/state.ts';

function expectIdentityLaw<T>(monoid: Monoid<T>, samples: readonly T[]): void {
  for (const x of samples) {
    expect(monoid.merge(monoid.identity, x)).toEqual(x);
    expect(monoid.merge(x, monoid.identity)).toEqual(x);
  }
}

describe('Monoids', () => {
  describe('identity law', () => {
    it('should hold for sum', () => {
      expectIdentityLaw(sumMonoid, [0, 1, -7, 2.5, 1e9]);
    });

    it('should hold for bigint sum', () => {
      expectIdentityLaw(bigintSumMonoid, [0n, 12n, -3n, 2n ** 70n]);
    });

    it('should hold for min and max', () => {
      expectIdentityLaw(minMonoid, [0, -5, 42, Number.MAX_SAFE_INTEGER]);
      expectIdentityLaw(maxMonoid, [0, -5, 42, Number.MIN_SAFE_INTEGER]);
    });

    it('should hold for xor', () => {
      expectIdentityLaw(xorMonoid, [0, 1, 255, 0x7fffffff]);
    });

    it('should hold for gcd on non-negative values', () => {
      expectIdentityLaw(gcdMonoid, [0, 1, 12, 97]);
    });

    it('should hold for concatenation', () => {
      expectIdentityLaw(concatMonoid, ['', 'a', 'hello']);
    });
  });

  describe('operations', () => {
    it('should compute sums, minima and maxima', () => {
      expect(sumMonoid.merge(2, 3)).toBe(5);
      expect(minMonoid.merge(2, 3)).toBe(2);
      expect(maxMonoid.merge(2, 3)).toBe(3);
      expect(bigintSumMonoid.merge(2n ** 64n, 1n)).toBe(18446744073709551617n);
    });

    it('should compute xor', () => {
      expect(xorMonoid.merge(0b1100, 0b1010)).toBe(0b0110);
      expect(xorMonoid.merge(7, 7)).toBe(0);
    });

    it('should compute non-negative gcd', () => {
      expect(gcdMonoid.merge(12, 18)).toBe(6);
      expect(gcdMonoid.merge(17, 5)).toBe(1);
      expect(gcdMonoid.merge(0, -7)).toBe(7);
      expect(gcdMonoid.merge(-12, -8)).toBe(4);
    });

    it('should concatenate in argument order', () => {
      expect(concatMonoid.merge('ab', 'cd')).toBe('abcd');
      expect(concatMonoid.merge('cd', 'ab')).toBe('cdab');
    });
  });

  describe('defineMonoid', () => {
    it('should freeze the resulting pair', () => {
      const product = defineMonoid((a: number, b: number) => a * b, 1);
      expect(Object.isFrozen(product)).toBe(true);
      expect(product.merge(3, 4)).toBe(12);
      expect(product.identity).toBe(1);
    });
  });
});
