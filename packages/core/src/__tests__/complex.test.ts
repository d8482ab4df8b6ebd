/**
 * Tests for complex number utilities
 */

import { describe, it, expect } from 'vitest';
import {
  complex,
  ZERO,
  magnitudeSquared,
  conjugate,
  scale,
  fromPolar,
} from '../complex';

describe('Complex Number Creation', () => {
  it('creates complex number with real and imaginary parts', () => {
    const c = complex(3, 4);
    expect(c.real).toBe(3);
    expect(c.imag).toBe(4);
  });

  it('creates real number when imaginary part omitted', () => {
    expect(complex(5)).toEqual({ real: 5, imag: 0 });
  });

  it('keeps ZERO frozen', () => {
    expect(ZERO).toEqual({ real: 0, imag: 0 });
    expect(Object.isFrozen(ZERO)).toBe(true);
  });
});

describe('Complex Operations', () => {
  it('computes magnitude squared', () => {
    expect(magnitudeSquared(complex(3, 4))).toBe(25);
  });

  it('conjugates', () => {
    expect(conjugate(complex(1, 2))).toEqual({ real: 1, imag: -2 });
  });

  it('scales both parts', () => {
    expect(scale(complex(1, -2), 3)).toEqual({ real: 3, imag: -6 });
  });

  it('builds from polar form', () => {
    const c = fromPolar(2, Math.PI / 2);
    expect(c.real).toBeCloseTo(0, 12);
    expect(c.imag).toBeCloseTo(2, 12);
  });
});
