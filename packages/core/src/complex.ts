/**
 * Complex number utilities for wavefunction values.
 *
 * psi and Y_l^m are complex numbers of the form a + bi.
 */

/**
 * Complex number interface
 */
export interface Complex {
  real: number;
  imag: number;
}

/**
 * Create a complex number
 */
export function complex(real: number, imag: number = 0): Complex {
  return { real, imag };
}

/**
 * Complex zero
 */
export const ZERO: Complex = Object.freeze({ real: 0, imag: 0 });

/**
 * Calculate magnitude squared |z|² = a² + b²
 * This is the probability density for psi
 */
export function magnitudeSquared(c: Complex): number {
  return c.real * c.real + c.imag * c.imag;
}

/**
 * Complex conjugate z* = a - bi
 */
export function conjugate(c: Complex): Complex {
  return { real: c.real, imag: -c.imag };
}

/**
 * Scalar multiplication s * z
 */
export function scale(c: Complex, s: number): Complex {
  return {
    real: c.real * s,
    imag: c.imag * s,
  };
}

/**
 * Create complex from polar form r*e^(iθ)
 */
export function fromPolar(r: number, theta: number): Complex {
  return {
    real: r * Math.cos(theta),
    imag: r * Math.sin(theta),
  };
}
