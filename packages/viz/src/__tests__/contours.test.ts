/**
 * Tests for contour levels and tracing
 */

import { describe, it, expect } from 'vitest';
import { mapColors } from '../color-scale';
import {
  deriveContours,
  nodalContour,
  traceContour,
  NODAL_LINE_COLOR,
} from '../contours';
import { makeField, makeGrid } from './helpers';

describe('deriveContours', () => {
  it('mirrors dashed negative levels for signed fields', () => {
    const field = makeField('real', 'linear', [[-2, 2]]);
    const contours = deriveContours(field, mapColors(field, { colormap: 'gray' }), { levels: 3 });

    expect(contours.map((c) => c.style)).toEqual([
      'dashed',
      'dashed',
      'dashed',
      'solid',
      'solid',
      'solid',
    ]);
    const levels = contours.map((c) => c.level);
    [-2, -1.12, -0.24, 0.24, 1.12, 2].forEach((expected, i) => {
      expect(levels[i]).toBeCloseTo(expected, 12);
    });
    expect(contours[0].color).toBe('#000000');
    expect(contours[5].color).toBe('#ffffff');
  });

  it('uses solid positive levels only for non-negative fields', () => {
    const field = makeField('density', 'linear', [[0, 4]]);
    const contours = deriveContours(field, mapColors(field, { colormap: 'gray' }));

    expect(contours).toHaveLength(8);
    expect(contours.every((c) => c.style === 'solid' && c.color === '#ffffff')).toBe(true);
    expect(contours[0].level).toBeCloseTo(0.48, 12);
    expect(contours[7].level).toBeCloseTo(4, 12);
  });

  it('spaces log levels geometrically from the floor', () => {
    const field = makeField('density', 'log', [[1e-6, 1]]);
    const contours = deriveContours(field, mapColors(field), { levels: 4 });
    const levels = contours.map((c) => c.level);

    [1e-3, 1e-2, 1e-1, 1].forEach((expected, i) => {
      expect(levels[i]).toBeCloseTo(expected, 12);
    });
  });

  it('starts symlog levels at the threshold', () => {
    const field = makeField('real', 'symlog', [[-1, 1]]);
    const levels = deriveContours(field, mapColors(field), { levels: 4 }).map((c) => c.level);

    expect(levels).toHaveLength(8);
    expect(levels[0]).toBe(-1);
    expect(levels[4]).toBeCloseTo(1e-3, 15);
    expect(levels[5]).toBeCloseTo(1e-2, 14);
    expect(levels[7]).toBe(1);
  });

  it('returns the peak alone for a single level', () => {
    const field = makeField('density', 'linear', [[0, 3]]);
    const contours = deriveContours(field, mapColors(field), { levels: 1 });
    expect(contours.map((c) => c.level)).toEqual([3]);
  });

  it('rejects a non-positive level count', () => {
    const field = makeField('density', 'linear', [[0, 3]]);
    const mapping = mapColors(field);
    expect(() => deriveContours(field, mapping, { levels: 0 })).toThrow(
      'Contour level count must be a positive integer, got 0'
    );
    expect(() => deriveContours(field, mapping, { levels: 2.5 })).toThrow();
  });
});

describe('nodalContour', () => {
  it('is a solid gray zero level', () => {
    expect(nodalContour()).toEqual({ level: 0, style: 'solid', color: NODAL_LINE_COLOR });
    expect(NODAL_LINE_COLOR).toBe('#a8a8a8');
  });
});

describe('traceContour', () => {
  it('crosses a horizontal gradient vertically', () => {
    const panel = makeGrid([
      [0, 1, 2],
      [0, 1, 2],
      [0, 1, 2],
    ]);

    expect(traceContour(panel, 0.5)).toEqual([
      [
        { x: 0.5, y: 0 },
        { x: 0.5, y: 1 },
      ],
      [
        { x: 0.5, y: 1 },
        { x: 0.5, y: 2 },
      ],
    ]);
  });

  it('interpolates along edges', () => {
    const panel = makeGrid([
      [0, 4],
      [0, 4],
    ]);
    const [[a, b]] = traceContour(panel, 1);
    expect(a).toEqual({ x: 0.25, y: 0 });
    expect(b).toEqual({ x: 0.25, y: 1 });
  });

  it('resolves saddles by the cell centre', () => {
    const panel = makeGrid([
      [1, 0],
      [0, 1],
    ]);

    expect(traceContour(panel, 0.5)).toEqual([
      [
        { x: 0.5, y: 0 },
        { x: 1, y: 0.5 },
      ],
      [
        { x: 0.5, y: 1 },
        { x: 0, y: 0.5 },
      ],
    ]);
  });

  it('yields nothing for a level outside the values', () => {
    const panel = makeGrid([
      [0, 1],
      [1, 2],
    ]);
    expect(traceContour(panel, 5)).toEqual([]);
    expect(traceContour(panel, -1)).toEqual([]);
  });

  it('yields nothing for a single row', () => {
    expect(traceContour(makeGrid([[0, 1, 2]]), 0.5)).toEqual([]);
  });
});
