/**
 * Contour Lines
 *
 * Level selection for line mode and the nodal overlay, plus marching-squares
 * tracing of a level through a panel.
 */

import { assertNever, type Field, type FieldPanel } from '@orbital-slice/core';
import type { ColorMapping } from './color-scale';
import type { HexColor, Segment } from './types';

// ============================================================================
// Types
// ============================================================================

export type ContourStyle = 'solid' | 'dashed';

export interface ContourLevel {
  readonly level: number;
  readonly style: ContourStyle;
  readonly color: HexColor;
}

export interface ContourOptions {
  /**
   * Number of positive levels (default: 8)
   */
  levels?: number;
}

/**
 * Gray used for the zero-level overlay
 */
export const NODAL_LINE_COLOR: HexColor = '#a8a8a8';

const LINEAR_START_FRACTION = 0.12;
const GEOMETRIC_START_FRACTION = 1e-3;

// ============================================================================
// Level selection
// ============================================================================

function linearLevels(start: number, end: number, count: number): number[] {
  if (count === 1) return [end];
  return Array.from({ length: count }, (_, i) => start + ((end - start) * i) / (count - 1));
}

function geometricLevels(start: number, end: number, count: number): number[] {
  if (count === 1) return [end];
  const ratio = Math.log(end / start);
  return Array.from({ length: count }, (_, i) =>
    i === count - 1 ? end : start * Math.exp((ratio * i) / (count - 1))
  );
}

/**
 * Positive contour magnitudes for a mapping, ascending
 */
export function contourMagnitudes(mapping: ColorMapping, count: number): number[] {
  const { peak, floor, threshold } = mapping.bounds;

  switch (mapping.scale) {
    case 'linear':
      return linearLevels(LINEAR_START_FRACTION * peak, peak, count);
    case 'log':
      return geometricLevels(
        Math.min(peak, Math.max(floor ?? 0, GEOMETRIC_START_FRACTION * peak)),
        peak,
        count
      );
    case 'symlog':
      return geometricLevels(
        Math.min(peak, Math.max(threshold ?? 0, GEOMETRIC_START_FRACTION * peak)),
        peak,
        count
      );
    default:
      return assertNever(mapping.scale);
  }
}

/**
 * Ordered contour levels for line mode.
 *
 * Signed fields get mirrored dashed negatives in the colormap's negative end
 * color; non-negative fields get solid positives only.
 */
export function deriveContours(
  field: Field,
  mapping: ColorMapping,
  options: ContourOptions = {}
): readonly ContourLevel[] {
  const count = options.levels ?? 8;
  if (!Number.isInteger(count) || count < 1) {
    throw new Error(`Contour level count must be a positive integer, got ${count}`);
  }

  const magnitudes = contourMagnitudes(mapping, count);
  const positiveColor = mapping.colormap.hex(mapping.policy.positiveLineAt);
  const positives = magnitudes.map(
    (level): ContourLevel => ({ level, style: 'solid', color: positiveColor })
  );

  if (!field.signed) {
    return Object.freeze(positives);
  }

  const negativeColor = mapping.colormap.hex(mapping.policy.negativeLineAt);
  const negatives = [...magnitudes]
    .reverse()
    .map((level): ContourLevel => ({ level: -level, style: 'dashed', color: negativeColor }));

  return Object.freeze([...negatives, ...positives]);
}

/**
 * The zero level drawn by the nodal-line overlay
 */
export function nodalContour(): ContourLevel {
  return { level: 0, style: 'solid', color: NODAL_LINE_COLOR };
}

// ============================================================================
// Marching squares
// ============================================================================

/**
 * Edge pairs crossed by the level for each corner case.
 * Edges: 0 bottom (a-b), 1 right (b-c), 2 top (c-d), 3 left (d-a);
 * corners a (col, row), b (col+1, row), c (col+1, row+1), d (col, row+1).
 * Cases 5 and 10 are saddles and are resolved by the cell centre.
 */
const EDGE_TABLE: readonly (readonly [number, number][])[] = [
  [],
  [[3, 0]],
  [[0, 1]],
  [[3, 1]],
  [[1, 2]],
  [],
  [[0, 2]],
  [[3, 2]],
  [[2, 3]],
  [[0, 2]],
  [],
  [[1, 2]],
  [[1, 3]],
  [[0, 1]],
  [[3, 0]],
  [],
];

function crossing(level: number, v1: number, v2: number): number {
  return (level - v1) / (v2 - v1);
}

/**
 * Trace one level through a panel.
 *
 * Segments are in grid coordinates: x is the column, y the row, both
 * fractional. A single-row panel has no area and yields no segments.
 */
export function traceContour(panel: FieldPanel, level: number): Segment[] {
  const { rows, cols, values } = panel;
  const segments: Segment[] = [];
  if (rows < 2 || cols < 2) return segments;

  for (let row = 0; row < rows - 1; row++) {
    for (let col = 0; col < cols - 1; col++) {
      const a = values[row * cols + col];
      const b = values[row * cols + col + 1];
      const c = values[(row + 1) * cols + col + 1];
      const d = values[(row + 1) * cols + col];

      const index =
        (a >= level ? 1 : 0) | (b >= level ? 2 : 0) | (c >= level ? 4 : 0) | (d >= level ? 8 : 0);
      if (index === 0 || index === 15) continue;

      const edgePoint = (edge: number) => {
        switch (edge) {
          case 0:
            return { x: col + crossing(level, a, b), y: row };
          case 1:
            return { x: col + 1, y: row + crossing(level, b, c) };
          case 2:
            return { x: col + 1 - crossing(level, c, d), y: row + 1 };
          default:
            return { x: col, y: row + 1 - crossing(level, d, a) };
        }
      };

      let pairs = EDGE_TABLE[index];
      if (index === 5 || index === 10) {
        const centreAbove = (a + b + c + d) / 4 >= level;
        // Separate the two corners that lie on the other side of the centre
        const isolateBD = (index === 5) === centreAbove;
        pairs = isolateBD
          ? [
              [0, 1],
              [2, 3],
            ]
          : [
              [3, 0],
              [1, 2],
            ];
      }

      for (const [from, to] of pairs) {
        segments.push([edgePoint(from), edgePoint(to)]);
      }
    }
  }

  return segments;
}
