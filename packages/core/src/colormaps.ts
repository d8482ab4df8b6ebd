/**
 * Colormap Catalogue
 *
 * Names and color stops of the colormaps a plot may request. Base maps are
 * read from colormaps.json; any base name may take an `_r` suffix to reverse
 * it, and the presets `sample` / `sample_density` alias common choices.
 * Names are resolved here so a request can be rejected before evaluation.
 */

import table from './colormaps.json';
import { UnknownColormapError } from './errors';

const BASE_MAPS: Record<string, string[]> = table.maps;
const PRESETS: Record<string, string> = table.presets;

function lookup<T>(record: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

export interface ColormapEntry {
  /** Name after preset expansion, e.g. 'RdYlBu_r' for 'sample' */
  readonly name: string;
  readonly base: string;
  readonly reversed: boolean;
  /** Hex stops of the base map, low to high */
  readonly stops: readonly string[];
}

/**
 * Names accepted by lookupColormap, without the `_r` variants
 */
export function colormapNames(): string[] {
  return [...Object.keys(BASE_MAPS), ...Object.keys(PRESETS)];
}

/**
 * Resolve a colormap name to its base map.
 *
 * @throws UnknownColormapError for names that are neither base maps,
 * presets, nor `_r` reversals of a base map
 */
export function lookupColormap(name: string): ColormapEntry {
  const target = lookup(PRESETS, name) ?? name;
  const reversed = target.endsWith('_r');
  const base = reversed ? target.slice(0, -2) : target;
  const stops = lookup(BASE_MAPS, base);

  if (!stops) {
    throw new UnknownColormapError(name);
  }
  return { name: target, base, reversed, stops };
}
