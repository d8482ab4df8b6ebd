/**
 * Hand-built fields for mapping and contour tests
 */

import {
  isDensityFamily,
  type ColorScale,
  type Field,
  type FieldMode,
  type FieldPanel,
} from '@orbital-slice/core';

/**
 * A field whose panels are single rows of the given values
 */
export function makeField(mode: FieldMode, scale: ColorScale, panels: number[][]): Field {
  const cols = panels[0].length;
  return {
    mode,
    plane: 'z',
    value: 0,
    range: [-1, 1],
    scale,
    resolution: cols,
    signed: !isDensityFamily(mode),
    u: { label: 'X', min: -1, max: 1, values: new Float64Array(cols) },
    v: { label: 'Y', min: -1, max: 1, values: new Float64Array(1) },
    panels: panels.map((values, i) => ({
      label: `panel ${i}`,
      rows: 1,
      cols,
      values: Float64Array.from(values),
    })),
  };
}

/**
 * A single panel with explicit rows
 */
export function makeGrid(rows: number[][]): FieldPanel {
  return {
    label: 'grid',
    rows: rows.length,
    cols: rows[0].length,
    values: Float64Array.from(rows.flat()),
  };
}
