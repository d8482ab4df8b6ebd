/**
 * Color Scale Mapper
 *
 * Normalizes raw field values into intensities:
 *
 * - linear: v / vlim for signed fields, v / vmax otherwise
 * - log: log10 between a positive floor and vmax (non-negative fields)
 * - symlog: linear inside ±threshold, log10 beyond, scaled to [-1, 1]
 *
 * All panels of a field share one bound. The field is never modified.
 */

import {
  assertNever,
  DEFAULT_COLORMAP,
  DEFAULT_SYMLOG_THRESHOLD,
  type ColorScale,
  type Field,
} from '@orbital-slice/core';
import { resolveColorPolicy, intensityToPosition, type ColorPolicy } from './color-policy';
import { Colormap, resolveColormap } from './colormap';
import type { RGB } from './types';

// ============================================================================
// Types
// ============================================================================

export interface ColorMappingOptions {
  /**
   * Colormap or colormap name (default: RdYlBu_r)
   */
  colormap?: Colormap | string;

  /**
   * Symlog linear region as a fraction of the peak magnitude (default: 1e-3)
   */
  symlogThreshold?: number;
}

/**
 * Normalization bounds shared by every panel
 */
export interface ScaleBounds {
  /** max |v| for signed fields, max v otherwise; 1 for an all-zero field */
  readonly peak: number;
  /** Lowest value resolved by the log scale */
  readonly floor: number | null;
  /** Half-width of the symlog linear region */
  readonly threshold: number | null;
}

export interface ColorMapping {
  readonly colormap: Colormap;
  readonly scale: ColorScale;
  readonly policy: ColorPolicy;
  readonly bounds: ScaleBounds;
  /** One array per panel, in [-1, 1] when signed, [0, 1] otherwise */
  readonly intensities: readonly Float64Array[];
}

const LOG_FLOOR_RATIO = 1e-7;
const SYMLOG_MIN_THRESHOLD = 1e-16;

function defaultThreshold(peak: number): number {
  return Math.max(peak * DEFAULT_SYMLOG_THRESHOLD, SYMLOG_MIN_THRESHOLD);
}

// ============================================================================
// Bounds
// ============================================================================

function peakOf(field: Field): number {
  let peak = 0;
  for (const panel of field.panels) {
    for (const value of panel.values) {
      const magnitude = field.signed ? Math.abs(value) : value;
      if (magnitude > peak) peak = magnitude;
    }
  }
  return peak > 0 ? peak : 1;
}

function minPositiveOf(field: Field): number {
  let min = Infinity;
  for (const panel of field.panels) {
    for (const value of panel.values) {
      if (value > 0 && value < min) min = value;
    }
  }
  return min;
}

/**
 * Compute the shared normalization bounds of a field under a scale
 */
export function computeBounds(
  field: Field,
  scale: ColorScale,
  symlogThreshold: number = DEFAULT_SYMLOG_THRESHOLD
): ScaleBounds {
  const peak = peakOf(field);

  switch (scale) {
    case 'linear':
      return { peak, floor: null, threshold: null };
    case 'log': {
      const minPositive = minPositiveOf(field);
      const floor = Math.min(peak, Math.max(minPositive, peak * LOG_FLOOR_RATIO));
      return { peak, floor, threshold: null };
    }
    case 'symlog':
      return {
        peak,
        floor: null,
        threshold: Math.max(peak * symlogThreshold, SYMLOG_MIN_THRESHOLD),
      };
    default:
      return assertNever(scale);
  }
}

// ============================================================================
// Transfer functions
// ============================================================================

function symlogTransform(value: number, threshold: number): number {
  const magnitude = Math.abs(value);
  if (magnitude <= threshold) return value / threshold;
  return Math.sign(value) * (1 + Math.log10(magnitude / threshold));
}

/**
 * Map one raw value to an intensity
 */
export function normalizeValue(
  value: number,
  scale: ColorScale,
  bounds: ScaleBounds,
  signed: boolean
): number {
  const { peak } = bounds;

  switch (scale) {
    case 'linear': {
      const t = value / peak;
      return signed ? Math.max(-1, Math.min(1, t)) : Math.max(0, Math.min(1, t));
    }
    case 'log': {
      const floor = bounds.floor ?? peak * LOG_FLOOR_RATIO;
      if (floor >= peak) return value >= peak ? 1 : 0;
      const logFloor = Math.log10(floor);
      const t = (Math.log10(Math.max(value, floor)) - logFloor) / (Math.log10(peak) - logFloor);
      return Math.max(0, Math.min(1, t));
    }
    case 'symlog': {
      const threshold = bounds.threshold ?? defaultThreshold(peak);
      const t = symlogTransform(value, threshold) / symlogTransform(peak, threshold);
      return Math.max(-1, Math.min(1, t));
    }
    default:
      return assertNever(scale);
  }
}

/**
 * Raw value at an intensity; inverse of normalizeValue within the bounds
 */
export function denormalizeValue(
  intensity: number,
  scale: ColorScale,
  bounds: ScaleBounds
): number {
  const { peak } = bounds;

  switch (scale) {
    case 'linear':
      return intensity * peak;
    case 'log': {
      const floor = bounds.floor ?? peak * LOG_FLOOR_RATIO;
      const logFloor = Math.log10(floor);
      return Math.pow(10, logFloor + intensity * (Math.log10(peak) - logFloor));
    }
    case 'symlog': {
      const threshold = bounds.threshold ?? defaultThreshold(peak);
      const t = intensity * symlogTransform(peak, threshold);
      const magnitude = Math.abs(t);
      if (magnitude <= 1) return t * threshold;
      return Math.sign(t) * threshold * Math.pow(10, magnitude - 1);
    }
    default:
      return assertNever(scale);
  }
}

// ============================================================================
// Mapping
// ============================================================================

/**
 * Map every sample of a field to an intensity.
 *
 * @throws UnknownColormapError for an unknown colormap name
 * @throws UnsupportedScaleError when the field's scale does not suit its mode
 */
export function mapColors(field: Field, options: ColorMappingOptions = {}): ColorMapping {
  const colormap =
    options.colormap instanceof Colormap
      ? options.colormap
      : resolveColormap(options.colormap ?? DEFAULT_COLORMAP);
  const policy = resolveColorPolicy(field.mode, field.scale);
  const bounds = computeBounds(
    field,
    policy.scale,
    options.symlogThreshold ?? DEFAULT_SYMLOG_THRESHOLD
  );

  const intensities = field.panels.map((panel) => {
    const out = new Float64Array(panel.values.length);
    for (let i = 0; i < panel.values.length; i++) {
      out[i] = normalizeValue(panel.values[i], policy.scale, bounds, policy.signed);
    }
    return out;
  });

  return Object.freeze({
    colormap,
    scale: policy.scale,
    policy,
    bounds: Object.freeze(bounds),
    intensities: Object.freeze(intensities),
  });
}

/**
 * Color of an intensity under a mapping
 */
export function intensityColor(mapping: ColorMapping, intensity: number): RGB {
  return mapping.colormap.at(intensityToPosition(mapping.policy, intensity));
}
