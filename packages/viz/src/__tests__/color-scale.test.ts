/**
 * Tests for the color scale mapper
 */

import { describe, it, expect } from 'vitest';
import { UnknownColormapError, UnsupportedScaleError } from '@orbital-slice/core';
import {
  computeBounds,
  denormalizeValue,
  intensityColor,
  mapColors,
  normalizeValue,
} from '../color-scale';
import { makeField } from './helpers';

describe('mapColors', () => {
  describe('linear', () => {
    it('divides signed values by the peak magnitude', () => {
      const mapping = mapColors(makeField('real', 'linear', [[-2, 1, 0, 2]]));
      expect(Array.from(mapping.intensities[0])).toEqual([-1, 0.5, 0, 1]);
      expect(mapping.bounds).toEqual({ peak: 2, floor: null, threshold: null });
    });

    it('divides non-negative values by the maximum', () => {
      const mapping = mapColors(makeField('density', 'linear', [[0, 1, 4]]));
      expect(Array.from(mapping.intensities[0])).toEqual([0, 0.25, 1]);
    });

    it('shares one bound across panels', () => {
      const mapping = mapColors(makeField('real_imag', 'linear', [[1, -1], [4, 2]]));
      expect(mapping.bounds.peak).toBe(4);
      expect(Array.from(mapping.intensities[0])).toEqual([0.25, -0.25]);
      expect(Array.from(mapping.intensities[1])).toEqual([1, 0.5]);
    });

    it('maps an all-zero field to zero', () => {
      const mapping = mapColors(makeField('density', 'linear', [[0, 0, 0]]));
      expect(mapping.bounds.peak).toBe(1);
      expect(Array.from(mapping.intensities[0])).toEqual([0, 0, 0]);
    });
  });

  describe('log', () => {
    it('spans the smallest positive value to the peak', () => {
      const mapping = mapColors(makeField('density', 'log', [[0, 1e-3, 1e-1, 1]]));
      const [zero, floor, mid, top] = mapping.intensities[0];
      expect(mapping.bounds.floor).toBe(1e-3);
      expect(zero).toBe(0);
      expect(floor).toBe(0);
      expect(mid).toBeCloseTo(2 / 3, 12);
      expect(top).toBe(1);
    });

    it('limits the dynamic range to seven decades', () => {
      const mapping = mapColors(makeField('density', 'log', [[1e-12, 1]]));
      expect(mapping.bounds.floor).toBe(1e-7);
      expect(mapping.intensities[0][0]).toBe(0);
    });
  });

  describe('symlog', () => {
    it('is linear inside the threshold and logarithmic beyond', () => {
      const mapping = mapColors(makeField('real', 'symlog', [[-1, -1e-4, 0, 5e-4, 1e-2, 1]]));
      const [neg, smallNeg, zero, smallPos, mid, top] = mapping.intensities[0];
      expect(mapping.bounds.threshold).toBe(1e-3);
      expect(neg).toBe(-1);
      expect(smallNeg).toBeCloseTo(-0.025, 12);
      expect(zero).toBe(0);
      expect(smallPos).toBeCloseTo(0.125, 12);
      expect(mid).toBeCloseTo(0.5, 12);
      expect(top).toBe(1);
    });

    it('takes the threshold as a fraction of the peak', () => {
      const mapping = mapColors(makeField('imag', 'symlog', [[0.05, 2]]), { symlogThreshold: 0.1 });
      expect(mapping.bounds.threshold).toBeCloseTo(0.2, 15);
      // t(0.05) = 0.25, t(2) = 1 + log10(10) = 2
      expect(mapping.intensities[0][0]).toBeCloseTo(0.125, 12);
    });
  });

  it('rejects scales the mode cannot use', () => {
    expect(() => mapColors(makeField('real', 'log', [[1, -1]]))).toThrow(UnsupportedScaleError);
    expect(() => mapColors(makeField('density', 'symlog', [[1, 0]]))).toThrow(UnsupportedScaleError);
  });

  it('rejects unknown colormap names', () => {
    expect(() => mapColors(makeField('density', 'linear', [[1]]), { colormap: 'nope' })).toThrow(
      UnknownColormapError
    );
  });

  it('leaves the field untouched', () => {
    const field = makeField('real', 'symlog', [[-3, 0.5, 3]]);
    mapColors(field);
    expect(Array.from(field.panels[0].values)).toEqual([-3, 0.5, 3]);
  });
});

describe('computeBounds', () => {
  it('keeps a tiny symlog threshold above zero', () => {
    const bounds = computeBounds(makeField('real', 'symlog', [[1e-20, 0]]), 'symlog');
    expect(bounds.threshold).toBe(1e-16);
  });
});

describe('denormalizeValue', () => {
  it('inverts normalizeValue', () => {
    const bounds = { peak: 1, floor: null, threshold: 1e-3 };
    for (const value of [-0.5, -2e-4, 0, 7e-4, 0.03]) {
      const intensity = normalizeValue(value, 'symlog', bounds, true);
      expect(denormalizeValue(intensity, 'symlog', bounds)).toBeCloseTo(value, 12);
    }

    const logBounds = { peak: 10, floor: 1e-2, threshold: null };
    const intensity = normalizeValue(0.5, 'log', logBounds, false);
    expect(denormalizeValue(intensity, 'log', logBounds)).toBeCloseTo(0.5, 12);
  });
});

describe('intensityColor', () => {
  it('places signed zero at the centre of the map', () => {
    const mapping = mapColors(makeField('real', 'linear', [[-1, 1]]), { colormap: 'gray' });
    expect(intensityColor(mapping, -1)).toEqual([0, 0, 0]);
    expect(intensityColor(mapping, 0)).toEqual([127.5, 127.5, 127.5]);
  });

  it('starts non-negative fields at the centre', () => {
    const mapping = mapColors(makeField('density', 'linear', [[0, 1]]), { colormap: 'gray' });
    expect(intensityColor(mapping, 0)).toEqual([127.5, 127.5, 127.5]);
    expect(intensityColor(mapping, 1)).toEqual([255, 255, 255]);
  });
});
