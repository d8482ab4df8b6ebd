/**
 * Orbital Evaluator
 *
 * psi_{n,l,m}(r, θ, φ) = R_{n,l}(r) · Y_l^m(θ, φ), evaluated from Cartesian
 * coordinates in units of a0.
 */

import { magnitudeSquared, scale, ZERO, type Complex } from './complex';
import { sphericalHarmonic } from './angular';
import { createRadialFunction } from './radial';
import type { QuantumNumbers } from './quantum-numbers';

/**
 * Spherical coordinates (r in a0, θ in [0, π], φ in [-π, π])
 */
export interface SphericalPoint {
  r: number;
  theta: number;
  phi: number;
}

/**
 * Convert Cartesian coordinates to spherical.
 * At the origin θ and φ are set to 0.
 */
export function cartesianToSpherical(x: number, y: number, z: number): SphericalPoint {
  const r = Math.sqrt(x * x + y * y + z * z);
  if (r === 0) {
    return { r: 0, theta: 0, phi: 0 };
  }
  const theta = Math.acos(Math.min(1, Math.max(-1, z / r)));
  const phi = Math.atan2(y, x);
  return { r, theta, phi };
}

/**
 * Hydrogen orbital for a validated quantum number triple
 *
 * @example
 * ```typescript
 * const orbital = new OrbitalEvaluator(parseQuantumNumbers([2, 1, 0]));
 * orbital.density(0, 0, 2);        // |psi|² on the z axis
 * orbital.radialDistribution(4);   // r²|R|² at r = 4 a0
 * ```
 */
export class OrbitalEvaluator {
  readonly quantumNumbers: QuantumNumbers;
  private readonly radial: (r: number) => number;

  constructor(quantumNumbers: QuantumNumbers) {
    this.quantumNumbers = quantumNumbers;
    this.radial = createRadialFunction(quantumNumbers.n, quantumNumbers.l);
  }

  /**
   * Y_l^m(θ, φ), independent of r
   */
  sphericalHarmonic(theta: number, phi: number): Complex {
    return sphericalHarmonic(this.quantumNumbers.l, this.quantumNumbers.m, theta, phi);
  }

  /**
   * psi at spherical coordinates
   */
  psiSpherical(point: SphericalPoint): Complex {
    const radial = this.radial(point.r);
    if (radial === 0) {
      return ZERO;
    }
    return scale(this.sphericalHarmonic(point.theta, point.phi), radial);
  }

  /**
   * psi at Cartesian coordinates
   */
  psi(x: number, y: number, z: number): Complex {
    return this.psiSpherical(cartesianToSpherical(x, y, z));
  }

  realPart(x: number, y: number, z: number): number {
    return this.psi(x, y, z).real;
  }

  imagPart(x: number, y: number, z: number): number {
    return this.psi(x, y, z).imag;
  }

  /**
   * Probability density |psi|²
   */
  density(x: number, y: number, z: number): number {
    return magnitudeSquared(this.psi(x, y, z));
  }

  /**
   * r²|R_{n,l}(r)|², a function of r only
   */
  radialDistribution(r: number): number {
    const radial = this.radial(r);
    return r * r * radial * radial;
  }
}
