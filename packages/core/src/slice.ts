/**
 * Slice Sampler
 *
 * Turns the 3D orbital into a concrete 2D (or 1D) grid of samples:
 *
 * - planar modes: a uniform grid over the two free axes of an x, y or z
 *   plane, the constant axis fixed at `value`
 * - radial_distribution: r over `range`
 * - spherical_harmonic: φ ∈ [-π, π] by θ ∈ [0, π], independent of r
 *
 * Output is deterministic for identical inputs.
 */

import { InvalidSliceSpecError } from './errors';
import { assertNever, isDensityFamily, isPlanarMode, panelLabels, projectPsi, type FieldMode } from './modes';
import { cartesianToSpherical, OrbitalEvaluator } from './orbital';
import type { QuantumNumbers } from './quantum-numbers';

// ============================================================================
// Types
// ============================================================================

export type SlicePlane = 'x' | 'y' | 'z' | 'none';

export type ColorScale = 'linear' | 'log' | 'symlog';

export interface SliceSpec {
  plane: SlicePlane;
  /** Constant coordinate of the plane, in a0 */
  value: number;
  /** Extent of each visible axis, in a0 */
  range: readonly [number, number];
  /** Grid points per axis */
  resolution: number;
}

/**
 * One grid axis
 */
export interface Axis {
  label: string;
  min: number;
  max: number;
  values: Float64Array;
}

/**
 * Row-major samples: row follows the v axis, column the u axis
 */
export interface FieldPanel {
  label: string;
  rows: number;
  cols: number;
  values: Float64Array;
}

export interface Field {
  readonly mode: FieldMode;
  readonly plane: SlicePlane;
  readonly value: number;
  /** Spatial range in a0; null for spherical harmonics */
  readonly range: readonly [number, number] | null;
  readonly scale: ColorScale;
  readonly resolution: number;
  /** Whether samples can be negative */
  readonly signed: boolean;
  readonly u: Axis;
  readonly v: Axis | null;
  readonly panels: readonly FieldPanel[];
}

// ============================================================================
// Grid helpers
// ============================================================================

/**
 * `count` evenly spaced values from min to max inclusive
 */
export function linspace(min: number, max: number, count: number): Float64Array {
  const values = new Float64Array(count);
  const step = (max - min) / (count - 1);
  for (let i = 0; i < count; i++) {
    values[i] = min + i * step;
  }
  values[count - 1] = max;
  return values;
}

/**
 * Free-axis labels for a plane
 */
export function planeAxes(plane: 'x' | 'y' | 'z'): [string, string] {
  switch (plane) {
    case 'x':
      return ['Y', 'Z'];
    case 'y':
      return ['X', 'Z'];
    case 'z':
      return ['X', 'Y'];
    default:
      return assertNever(plane);
  }
}

/**
 * Map grid coordinates (u, v) on a plane to a 3D point
 */
export function planePoint(
  plane: 'x' | 'y' | 'z',
  value: number,
  u: number,
  v: number
): [number, number, number] {
  switch (plane) {
    case 'x':
      return [value, u, v];
    case 'y':
      return [u, value, v];
    case 'z':
      return [u, v, value];
    default:
      return assertNever(plane);
  }
}

/**
 * @throws InvalidSliceSpecError unless min < max, both finite, and r >= 0
 * for the radial distribution
 */
export function validateRange(range: readonly [number, number], mode: FieldMode): void {
  const [min, max] = range;
  if (!Number.isFinite(min) || !Number.isFinite(max)) {
    throw new InvalidSliceSpecError('Range bounds must be finite numbers.');
  }
  if (min >= max) {
    throw new InvalidSliceSpecError(`Range minimum (${min}) must be less than maximum (${max}).`);
  }
  if (mode === 'radial_distribution' && min < 0) {
    throw new InvalidSliceSpecError(`Radial range must start at r >= 0, got ${min}.`);
  }
}

/**
 * @throws InvalidSliceSpecError unless resolution is an integer >= 2
 */
export function validateResolution(resolution: number): void {
  if (!Number.isInteger(resolution) || resolution < 2) {
    throw new InvalidSliceSpecError(`Resolution must be an integer >= 2, got ${resolution}.`);
  }
}

/**
 * @throws InvalidSliceSpecError unless the plane value is finite
 */
export function validatePlaneValue(value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidSliceSpecError('Plane value must be a finite number.');
  }
}

/**
 * Check a slice spec against a mode.
 *
 * @throws InvalidSliceSpecError
 */
export function validateSliceSpec(spec: SliceSpec, mode: FieldMode): void {
  validateRange(spec.range, mode);
  validateResolution(spec.resolution);
  validatePlaneValue(spec.value);
  if (isPlanarMode(mode) && spec.plane === 'none') {
    throw new InvalidSliceSpecError(`Mode ${mode} needs an x, y or z plane.`);
  }
}

// ============================================================================
// Sampling
// ============================================================================

function freezeField(field: Field): Field {
  return Object.freeze({ ...field, panels: Object.freeze([...field.panels]) });
}

function samplePlane(
  orbital: OrbitalEvaluator,
  mode: FieldMode,
  spec: SliceSpec,
  scale: ColorScale
): Field {
  if (spec.plane === 'none') {
    throw new InvalidSliceSpecError(`Mode ${mode} needs an x, y or z plane.`);
  }
  const plane = spec.plane;
  const [uLabel, vLabel] = planeAxes(plane);
  const [min, max] = spec.range;
  const size = spec.resolution;
  const axis = linspace(min, max, size);
  const labels = panelLabels(mode);
  const buffers = labels.map(() => new Float64Array(size * size));

  for (let row = 0; row < size; row++) {
    for (let col = 0; col < size; col++) {
      const [x, y, z] = planePoint(plane, spec.value, axis[col], axis[row]);
      const samples = projectPsi(orbital.psiSpherical(cartesianToSpherical(x, y, z)), mode);
      for (let p = 0; p < buffers.length; p++) {
        buffers[p][row * size + col] = samples[p];
      }
    }
  }

  return freezeField({
    mode,
    plane,
    value: spec.value,
    range: [min, max],
    scale,
    resolution: size,
    signed: !isDensityFamily(mode),
    u: { label: uLabel, min, max, values: axis },
    v: { label: vLabel, min, max, values: axis.slice() },
    panels: labels.map((label, p) => ({ label, rows: size, cols: size, values: buffers[p] })),
  });
}

function sampleRadial(orbital: OrbitalEvaluator, spec: SliceSpec, scale: ColorScale): Field {
  const [min, max] = spec.range;
  const r = linspace(min, max, spec.resolution);
  const values = new Float64Array(spec.resolution);
  for (let i = 0; i < r.length; i++) {
    values[i] = orbital.radialDistribution(r[i]);
  }

  return freezeField({
    mode: 'radial_distribution',
    plane: 'none',
    value: 0,
    range: [min, max],
    scale,
    resolution: spec.resolution,
    signed: false,
    u: { label: 'r / a0', min, max, values: r },
    v: null,
    panels: [{ label: panelLabels('radial_distribution')[0], rows: 1, cols: r.length, values }],
  });
}

function sampleHarmonic(orbital: OrbitalEvaluator, spec: SliceSpec, scale: ColorScale): Field {
  const size = spec.resolution;
  const phi = linspace(-Math.PI, Math.PI, size);
  const theta = linspace(0, Math.PI, size);
  const [realLabel, imagLabel] = panelLabels('spherical_harmonic');
  const real = new Float64Array(size * size);
  const imag = new Float64Array(size * size);

  for (let row = 0; row < size; row++) {
    for (let col = 0; col < size; col++) {
      const y = orbital.sphericalHarmonic(theta[row], phi[col]);
      real[row * size + col] = y.real;
      imag[row * size + col] = y.imag;
    }
  }

  return freezeField({
    mode: 'spherical_harmonic',
    plane: 'none',
    value: 0,
    range: null,
    scale,
    resolution: size,
    signed: true,
    u: { label: 'phi', min: -Math.PI, max: Math.PI, values: phi },
    v: { label: 'theta', min: 0, max: Math.PI, values: theta },
    panels: [
      { label: realLabel, rows: size, cols: size, values: real },
      { label: imagLabel, rows: size, cols: size, values: imag },
    ],
  });
}

/**
 * Sample the field selected by `mode` over `spec`.
 *
 * @throws InvalidSliceSpecError for a malformed spec
 */
export function sampleField(
  quantumNumbers: QuantumNumbers,
  mode: FieldMode,
  spec: SliceSpec,
  scale: ColorScale = 'linear'
): Field {
  validateSliceSpec(spec, mode);
  const orbital = new OrbitalEvaluator(quantumNumbers);

  switch (mode) {
    case 'density':
    case 'real':
    case 'imag':
    case 'real_imag':
      return samplePlane(orbital, mode, spec, scale);
    case 'radial_distribution':
      return sampleRadial(orbital, spec, scale);
    case 'spherical_harmonic':
      return sampleHarmonic(orbital, spec, scale);
    default:
      return assertNever(mode);
  }
}
