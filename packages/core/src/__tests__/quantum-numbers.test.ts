/**
 * Tests for quantum number parsing
 */

import { describe, it, expect } from 'vitest';
import { parseQuantumNumbers, validateQuantumNumbers, orbitalLabel } from '../quantum-numbers';
import { InvalidQuantumNumberError } from '../errors';

describe('parseQuantumNumbers', () => {
  it('defaults omitted l and m to 0', () => {
    expect(parseQuantumNumbers([3])).toEqual({ n: 3, l: 0, m: 0 });
    expect(parseQuantumNumbers([3, 2])).toEqual({ n: 3, l: 2, m: 0 });
  });

  it('accepts a full triple', () => {
    expect(parseQuantumNumbers([4, 3, -2])).toEqual({ n: 4, l: 3, m: -2 });
  });

  it('returns a frozen triple', () => {
    expect(Object.isFrozen(parseQuantumNumbers([2, 1, 1]))).toBe(true);
  });

  it('rejects zero or more than three values', () => {
    expect(() => parseQuantumNumbers([])).toThrow(
      'Please provide 1 to 3 quantum numbers: n [l] [m].'
    );
    expect(() => parseQuantumNumbers([3, 1, 0, 0])).toThrow(InvalidQuantumNumberError);
  });

  it('rejects non-integers', () => {
    expect(() => parseQuantumNumbers([2.5])).toThrow('Quantum numbers must be integers, got 2.5.');
  });

  it('enforces the hydrogenic constraints', () => {
    expect(() => parseQuantumNumbers([0])).toThrow('Principal quantum number n must be >= 1.');
    expect(() => parseQuantumNumbers([2, -1])).toThrow(
      'Angular momentum quantum number l must be >= 0.'
    );
    expect(() => parseQuantumNumbers([2, 2])).toThrow(
      'Angular momentum quantum number l must satisfy l <= n - 1.'
    );
    expect(() => parseQuantumNumbers([3, 1, 2])).toThrow(
      'Magnetic quantum number m must satisfy |m| <= l.'
    );
  });
});

describe('validateQuantumNumbers', () => {
  it('rejects a non-integer triple', () => {
    expect(() => validateQuantumNumbers({ n: 2, l: 0.5, m: 0 })).toThrow(InvalidQuantumNumberError);
  });
});

describe('orbitalLabel', () => {
  it('uses spectroscopic letters', () => {
    expect(orbitalLabel({ n: 1, l: 0, m: 0 })).toBe('1s');
    expect(orbitalLabel({ n: 2, l: 1, m: 0 })).toBe('2p');
    expect(orbitalLabel({ n: 4, l: 3, m: 1 })).toBe('4f');
  });
});
