/**
 * Tests for colormaps
 */

import { describe, it, expect } from 'vitest';
import { UnknownColormapError } from '@orbital-slice/core';
import { colormapNames } from '@orbital-slice/core';
import { Colormap, resolveColormap } from '../colormap';

describe('Colormap', () => {
  it('interpolates between stops', () => {
    const gray = resolveColormap('gray');
    expect(gray.at(0)).toEqual([0, 0, 0]);
    expect(gray.at(1)).toEqual([255, 255, 255]);
    expect(gray.at(0.5)).toEqual([127.5, 127.5, 127.5]);
    expect(gray.hex(0.5)).toBe('#808080');
  });

  it('clamps positions outside [0, 1]', () => {
    const gray = resolveColormap('gray');
    expect(gray.at(-2)).toEqual([0, 0, 0]);
    expect(gray.at(3)).toEqual([255, 255, 255]);
    expect(gray.at(NaN)).toEqual([0, 0, 0]);
  });

  it('hits the exact middle stop of an odd-length map', () => {
    expect(resolveColormap('RdYlBu').hex(0.5)).toBe('#ffffbf');
  });

  it('needs two stops', () => {
    expect(() => new Colormap('flat', [[0, 0, 0]])).toThrow('Colormap flat needs at least two stops');
  });
});

describe('resolveColormap', () => {
  it('reverses maps with the _r suffix', () => {
    const reversed = resolveColormap('gray_r');
    expect(reversed.name).toBe('gray_r');
    expect(reversed.at(0)).toEqual([255, 255, 255]);
    expect(resolveColormap('RdYlBu_r').hex(0)).toBe('#313695');
  });

  it('resolves presets', () => {
    const sample = resolveColormap('sample');
    expect(sample.name).toBe('RdYlBu_r');
    expect(sample.hex(1)).toBe('#a50026');
    expect(resolveColormap('sample_density').name).toBe('YlOrRd');
  });

  it('rejects unknown names', () => {
    expect(() => resolveColormap('nope')).toThrow(UnknownColormapError);
    expect(() => resolveColormap('nope')).toThrow('Unknown colormap: nope');
    expect(() => resolveColormap('toString')).toThrow(UnknownColormapError);
    expect(() => resolveColormap('sample_r')).toThrow(UnknownColormapError);
  });

  it('lists base maps and presets', () => {
    const names = colormapNames();
    expect(names).toContain('viridis');
    expect(names).toContain('sample_density');
    for (const name of names) {
      expect(() => resolveColormap(name)).not.toThrow();
    }
  });
});
