import { describe, it, expect } from 'vitest';
import { OutOfRangeError, assertIndex, assertRange } from './errors.ts';

describe('OutOfRangeError', () => {
  it('should carry the operation, domain size and code', () => {
    const error = new OutOfRangeError('query', 5, 'inverted range [2, 1]');
    expect(error).toBeInstanceOf(RangeError);
    expect(error.name).toBe('OutOfRangeError');
    expect(error.code).toBe('OUT_OF_RANGE');
    expect(error.operation).toBe('query');
    expect(error.size).toBe(5);
    expect(error.message).toBe('query: inverted range [2, 1]');
  });
});

describe('assertIndex', () => {
  it('should accept integers inside the domain', () => {
    expect(() => assertIndex('get', 'position', 0, 3)).not.toThrow();
    expect(() => assertIndex('get', 'position', 2, 3)).not.toThrow();
  });

  it('should describe the valid domain', () => {
    expect(() => assertIndex('get', 'position', 3, 3)).toThrow(
      'get: position 3 is out of range, expected an integer in [0, 2]'
    );
  });

  it('should describe an empty domain', () => {
    expect(() => assertIndex('update', 'position', 0, 0)).toThrow(
      'update: position 0 is out of range, the domain is empty'
    );
  });
});

describe('assertRange', () => {
  it('should accept single-element and full ranges', () => {
    expect(() => assertRange('query', 1, 1, 3)).not.toThrow();
    expect(() => assertRange('query', 0, 2, 3)).not.toThrow();
  });

  it('should check each bound before the ordering', () => {
    expect(() => assertRange('query', 4, 1, 3)).toThrow(
      'query: l 4 is out of range, expected an integer in [0, 2]'
    );
    expect(() => assertRange('query', 2, 1, 3)).toThrow('query: inverted range [2, 1]');
  });
});
