/**
 * Tests for the color policy
 */

import { describe, it, expect } from 'vitest';
import { UnsupportedScaleError } from '@orbital-slice/core';
import { intensityToPosition, resolveColorPolicy } from '../color-policy';

describe('resolveColorPolicy', () => {
  it('gives non-negative fields the upper half of the map', () => {
    const policy = resolveColorPolicy('density', 'linear');
    expect(policy.signed).toBe(false);
    expect(policy.span).toEqual([0.5, 1]);
    expect(policy.positiveLineAt).toBe(1);
  });

  it('gives signed fields the whole map', () => {
    const policy = resolveColorPolicy('real', 'symlog');
    expect(policy).toEqual({
      signed: true,
      scale: 'symlog',
      span: [0, 1],
      positiveLineAt: 1,
      negativeLineAt: 0,
    });
  });

  it('treats the radial distribution as non-negative', () => {
    expect(resolveColorPolicy('radial_distribution', 'log').signed).toBe(false);
  });

  it('rejects scales the mode cannot use', () => {
    expect(() => resolveColorPolicy('real', 'log')).toThrow(UnsupportedScaleError);
    expect(() => resolveColorPolicy('density', 'symlog')).toThrow(UnsupportedScaleError);
  });
});

describe('intensityToPosition', () => {
  it('centres zero for signed fields', () => {
    const policy = resolveColorPolicy('imag', 'linear');
    expect(intensityToPosition(policy, -1)).toBe(0);
    expect(intensityToPosition(policy, 0)).toBe(0.5);
    expect(intensityToPosition(policy, 1)).toBe(1);
  });

  it('starts non-negative fields at the centre', () => {
    const policy = resolveColorPolicy('density', 'log');
    expect(intensityToPosition(policy, 0)).toBe(0.5);
    expect(intensityToPosition(policy, 0.5)).toBe(0.75);
    expect(intensityToPosition(policy, 1)).toBe(1);
  });
});
