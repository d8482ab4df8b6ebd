/**
 * Tests for spherical harmonics
 */

import { describe, it, expect } from 'vitest';
import { sphericalHarmonic, normalizedLegendre } from '../angular';
import { magnitudeSquared } from '../complex';

describe('sphericalHarmonic', () => {
  it('gives a constant Y_0^0', () => {
    const expected = 1 / Math.sqrt(4 * Math.PI);
    for (const [theta, phi] of [[0, 0], [1, 2], [Math.PI, -1]]) {
      const y = sphericalHarmonic(0, 0, theta, phi);
      expect(y.real).toBeCloseTo(expected, 12);
      expect(y.imag).toBe(0);
    }
  });

  it('matches Y_1^0 = sqrt(3/4π) cos θ', () => {
    const y = sphericalHarmonic(1, 0, 0.8, 0.3);
    expect(y.real).toBeCloseTo(Math.sqrt(3 / (4 * Math.PI)) * Math.cos(0.8), 12);
    expect(y.imag).toBeCloseTo(0, 12);
  });

  it('applies the Condon-Shortley phase to Y_1^1', () => {
    const y = sphericalHarmonic(1, 1, Math.PI / 2, 0);
    expect(y.real).toBeCloseTo(-Math.sqrt(3 / (8 * Math.PI)), 12);
    expect(y.imag).toBeCloseTo(0, 12);
  });

  it('matches Y_2^1 = -sqrt(15/8π) sin θ cos θ e^{iφ}', () => {
    const theta = 0.6;
    const phi = 1.1;
    const amplitude = -Math.sqrt(15 / (8 * Math.PI)) * Math.sin(theta) * Math.cos(theta);
    const y = sphericalHarmonic(2, 1, theta, phi);
    expect(y.real).toBeCloseTo(amplitude * Math.cos(phi), 12);
    expect(y.imag).toBeCloseTo(amplitude * Math.sin(phi), 12);
  });

  it('relates negative m to the conjugate', () => {
    const theta = 1.3;
    const phi = -0.4;
    for (const m of [1, 2, 3]) {
      const positive = sphericalHarmonic(3, m, theta, phi);
      const negative = sphericalHarmonic(3, -m, theta, phi);
      const sign = m % 2 === 0 ? 1 : -1;
      expect(negative.real).toBeCloseTo(sign * positive.real, 12);
      expect(negative.imag).toBeCloseTo(-sign * positive.imag, 12);
    }
  });

  it('uses the pole limits', () => {
    expect(sphericalHarmonic(2, 0, 0, 1.7).real).toBeCloseTo(Math.sqrt(5 / (4 * Math.PI)), 12);
    expect(sphericalHarmonic(1, 0, Math.PI, 0).real).toBeCloseTo(-Math.sqrt(3 / (4 * Math.PI)), 12);
    expect(sphericalHarmonic(2, 0, Math.PI, 0).real).toBeCloseTo(Math.sqrt(5 / (4 * Math.PI)), 12);
    expect(sphericalHarmonic(2, 1, 0, 0.5)).toEqual({ real: 0, imag: 0 });
  });

  it('is normalized over the sphere', () => {
    const steps = 200;
    const dTheta = Math.PI / steps;
    const dPhi = (2 * Math.PI) / steps;
    for (const [l, m] of [[1, 1], [2, -1], [3, 2]]) {
      let total = 0;
      for (let i = 0; i < steps; i++) {
        const theta = (i + 0.5) * dTheta;
        for (let j = 0; j < steps; j++) {
          const phi = -Math.PI + (j + 0.5) * dPhi;
          total += magnitudeSquared(sphericalHarmonic(l, m, theta, phi)) * Math.sin(theta) * dTheta * dPhi;
        }
      }
      expect(total).toBeCloseTo(1, 3);
    }
  });
});

describe('normalizedLegendre', () => {
  it('returns the m = l seed directly', () => {
    expect(normalizedLegendre(0, 0, 0.3, Math.sqrt(1 - 0.09))).toBeCloseTo(1 / Math.sqrt(4 * Math.PI), 12);
  });

  it('stays finite for high degree', () => {
    const value = normalizedLegendre(40, 20, 0.2, Math.sqrt(1 - 0.04));
    expect(Number.isFinite(value)).toBe(true);
  });
});
