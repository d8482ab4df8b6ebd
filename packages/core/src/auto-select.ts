/**
 * Auto Selection
 *
 * Defaults for plane, plane value and range when the caller leaves them
 * open. All functions are pure in (n, l, m, mode).
 *
 * Plane: every central plane passes through the origin, so the radial
 * factor contributes the same ∫ r |R|² dr to each of them. The in-plane
 * integral of the plotted quantity is therefore ranked exactly by the mean
 * of its angular part around the plane's great circle. Ties go to z, then
 * x, then y.
 *
 * Range: the radius enclosing a fixed fraction of radial probability,
 * times a margin, clamped between AUTO_EXTENT_MIN and a cap that grows
 * linearly in n.
 */

import {
  AUTO_COVERAGE_DENSITY,
  AUTO_COVERAGE_SIGNED,
  AUTO_EXTENT_CAP_DENSITY,
  AUTO_EXTENT_CAP_FLOOR,
  AUTO_EXTENT_CAP_SIGNED_BASE,
  AUTO_EXTENT_CAP_SIGNED_PER_L,
  AUTO_EXTENT_MARGIN,
  AUTO_EXTENT_MIN,
  AUTO_PLANE_SAMPLES,
  AUTO_SCAN_POINTS,
} from './constants';
import { magnitudeSquared } from './complex';
import { sphericalHarmonic } from './angular';
import { assertNever, isDensityFamily, isPlanarMode, type FieldMode } from './modes';
import { cartesianToSpherical } from './orbital';
import { createRadialFunction } from './radial';
import { planePoint, type SlicePlane } from './slice';
import type { QuantumNumbers } from './quantum-numbers';

const PLANE_ORDER = ['z', 'x', 'y'] as const;

/**
 * Angular part of the plotted quantity, squared
 */
function angularWeight(qn: QuantumNumbers, mode: FieldMode, theta: number, phi: number): number {
  const y = sphericalHarmonic(qn.l, qn.m, theta, phi);
  switch (mode) {
    case 'density':
    case 'real_imag':
      return magnitudeSquared(y);
    case 'real':
      return y.real * y.real;
    case 'imag':
      return y.imag * y.imag;
    case 'radial_distribution':
    case 'spherical_harmonic':
      return 0;
    default:
      return assertNever(mode);
  }
}

/**
 * Mean angular weight around the great circle of a central plane
 */
export function planeScore(qn: QuantumNumbers, mode: FieldMode, plane: 'x' | 'y' | 'z'): number {
  let sum = 0;
  for (let k = 0; k < AUTO_PLANE_SAMPLES; k++) {
    const t = (2 * Math.PI * k) / AUTO_PLANE_SAMPLES;
    const [x, y, z] = planePoint(plane, 0, Math.cos(t), Math.sin(t));
    const { theta, phi } = cartesianToSpherical(x, y, z);
    sum += angularWeight(qn, mode, theta, phi);
  }
  return sum / AUTO_PLANE_SAMPLES;
}

/**
 * Choose the central plane that shows the most structure.
 * Plane-independent modes get 'none'.
 */
export function autoPlane(qn: QuantumNumbers, mode: FieldMode): SlicePlane {
  if (!isPlanarMode(mode)) return 'none';

  let best: SlicePlane = 'z';
  let bestScore = -1;
  for (const plane of PLANE_ORDER) {
    const score = planeScore(qn, mode, plane);
    if (score > bestScore * (1 + 1e-9) + 1e-12) {
      best = plane;
      bestScore = score;
    }
  }
  return best;
}

/**
 * Default constant coordinate of the chosen plane
 */
export function autoValue(): number {
  return 0;
}

/**
 * Radius (a0) enclosing `coverage` of the radial probability r²|R|²
 */
export function enclosingRadius(n: number, l: number, coverage: number): number {
  const radial = createRadialFunction(n, l);
  const rMax = 12 * n * n;
  const dr = rMax / (AUTO_SCAN_POINTS - 1);
  const cumulative = new Float64Array(AUTO_SCAN_POINTS);

  let previous = 0;
  for (let i = 1; i < AUTO_SCAN_POINTS; i++) {
    const r = i * dr;
    const R = radial(r);
    const current = r * r * R * R;
    cumulative[i] = cumulative[i - 1] + 0.5 * (previous + current) * dr;
    previous = current;
  }

  const total = cumulative[AUTO_SCAN_POINTS - 1];
  const target = coverage * total;
  for (let i = 1; i < AUTO_SCAN_POINTS; i++) {
    if (cumulative[i] >= target) {
      const span = cumulative[i] - cumulative[i - 1];
      const fraction = span > 0 ? (target - cumulative[i - 1]) / span : 0;
      return (i - 1 + fraction) * dr;
    }
  }
  return rMax;
}

/**
 * Largest automatic half-range (a0)
 */
export function maxAutoExtent(qn: QuantumNumbers, mode: FieldMode): number {
  const perN = isDensityFamily(mode)
    ? AUTO_EXTENT_CAP_DENSITY
    : AUTO_EXTENT_CAP_SIGNED_BASE + AUTO_EXTENT_CAP_SIGNED_PER_L * qn.l;
  return Math.max(AUTO_EXTENT_CAP_FLOOR, perN * qn.n);
}

/**
 * Half-range (a0) for the plotted axes
 */
export function autoExtent(qn: QuantumNumbers, mode: FieldMode): number {
  const coverage = isDensityFamily(mode) ? AUTO_COVERAGE_DENSITY : AUTO_COVERAGE_SIGNED;
  const raw = AUTO_EXTENT_MARGIN * enclosingRadius(qn.n, qn.l, coverage);
  return Math.min(maxAutoExtent(qn, mode), Math.max(AUTO_EXTENT_MIN, raw));
}

/**
 * Default range: symmetric for planes, from 0 for the radial distribution
 */
export function autoRange(qn: QuantumNumbers, mode: FieldMode): [number, number] {
  switch (mode) {
    case 'density':
    case 'real':
    case 'imag':
    case 'real_imag': {
      const extent = autoExtent(qn, mode);
      return [-extent, extent];
    }
    case 'radial_distribution':
      return [0, autoExtent(qn, mode)];
    case 'spherical_harmonic':
      return [0, Math.PI];
    default:
      return assertNever(mode);
  }
}
