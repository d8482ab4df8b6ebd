/**
 * Tests for default output names
 */

import { describe, it, expect } from 'vitest';
import { defaultOutputName, encodeValueToken } from '../naming';
import { parseQuantumNumbers } from '../quantum-numbers';

describe('encodeValueToken', () => {
  it('writes integers with one decimal', () => {
    expect(encodeValueToken(0)).toBe('0p0');
    expect(encodeValueToken(3)).toBe('3p0');
  });

  it('replaces sign and decimal point', () => {
    expect(encodeValueToken(-1.5)).toBe('m1p5');
    expect(encodeValueToken(0.25)).toBe('0p25');
  });
});

describe('defaultOutputName', () => {
  const qn = parseQuantumNumbers([2, 1, 0]);

  it('names a planar slice', () => {
    expect(defaultOutputName({ quantumNumbers: qn, mode: 'real', plane: 'z', value: 0 })).toBe(
      'orbital_n2_l1_m0_real_z0p0.png'
    );
  });

  it('encodes negative m and plane values', () => {
    const name = defaultOutputName({
      quantumNumbers: parseQuantumNumbers([3, 2, -1]),
      mode: 'density',
      plane: 'x',
      value: -1.5,
      extension: 'svg',
    });
    expect(name).toBe('orbital_n3_l2_m-1_density_xm1p5.svg');
  });

  it('uses fixed tokens for plane-independent modes', () => {
    expect(
      defaultOutputName({ quantumNumbers: qn, mode: 'radial_distribution', plane: 'none', value: 4 })
    ).toBe('orbital_n2_l1_m0_radial_distribution_r0p0.png');
    expect(
      defaultOutputName({ quantumNumbers: qn, mode: 'spherical_harmonic', plane: 'none', value: 0 })
    ).toBe('orbital_n2_l1_m0_spherical_harmonic_angles0p0.png');
  });
});
