/**
 * Colormaps
 *
 * Piecewise-linear maps from a position in [0, 1] to a color, built from
 * the catalogue entries in core.
 */

import { lookupColormap } from '@orbital-slice/core';
import { clamp, hexToRgb, lerp, rgbToHex, type HexColor, type RGB } from './types';

export class Colormap {
  readonly name: string;
  private readonly stops: readonly RGB[];

  constructor(name: string, stops: readonly RGB[]) {
    if (stops.length < 2) {
      throw new Error(`Colormap ${name} needs at least two stops`);
    }
    this.name = name;
    this.stops = stops;
  }

  /**
   * Color at a position in [0, 1]; positions outside are clamped
   */
  at(position: number): RGB {
    const segments = this.stops.length - 1;
    const t = clamp(Number.isFinite(position) ? position : 0, 0, 1) * segments;
    const index = Math.min(Math.floor(t), segments - 1);
    const local = t - index;
    const a = this.stops[index];
    const b = this.stops[index + 1];
    return [lerp(a[0], b[0], local), lerp(a[1], b[1], local), lerp(a[2], b[2], local)];
  }

  hex(position: number): HexColor {
    return rgbToHex(this.at(position));
  }

  reversed(name: string = `${this.name}_r`): Colormap {
    return new Colormap(name, [...this.stops].reverse());
  }
}

/**
 * Look up a colormap by name.
 *
 * @throws UnknownColormapError for names that are neither base maps,
 * presets, nor `_r` reversals of a base map
 */
export function resolveColormap(name: string): Colormap {
  const entry = lookupColormap(name);
  const colormap = new Colormap(entry.base, entry.stops.map(hexToRgb));
  return entry.reversed ? colormap.reversed(entry.name) : colormap;
}
