/**
 * Field Modes
 *
 * Which scalar quantity is extracted from the orbital, and how many panels
 * it produces. Consumers switch over the union exhaustively; `assertNever`
 * turns a missing case into a compile error.
 */

import { magnitudeSquared, type Complex } from './complex';

export type FieldMode =
  | 'density'
  | 'real'
  | 'imag'
  | 'real_imag'
  | 'radial_distribution'
  | 'spherical_harmonic';

export const FIELD_MODES: readonly FieldMode[] = [
  'density',
  'real',
  'imag',
  'real_imag',
  'radial_distribution',
  'spherical_harmonic',
];

/**
 * Unreachable branch of an exhaustive switch
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${String(value)}`);
}

/**
 * Non-negative modes: |psi|² and r²|R|²
 */
export function isDensityFamily(mode: FieldMode): boolean {
  switch (mode) {
    case 'density':
    case 'radial_distribution':
      return true;
    case 'real':
    case 'imag':
    case 'real_imag':
    case 'spherical_harmonic':
      return false;
    default:
      return assertNever(mode);
  }
}

/**
 * Modes sampled on an x/y/z plane
 */
export function isPlanarMode(mode: FieldMode): boolean {
  switch (mode) {
    case 'density':
    case 'real':
    case 'imag':
    case 'real_imag':
      return true;
    case 'radial_distribution':
    case 'spherical_harmonic':
      return false;
    default:
      return assertNever(mode);
  }
}

/**
 * Panel labels, one per produced panel
 */
export function panelLabels(mode: FieldMode): string[] {
  switch (mode) {
    case 'density':
      return ['|psi|^2'];
    case 'real':
      return ['Re(psi)'];
    case 'imag':
      return ['Im(psi)'];
    case 'real_imag':
      return ['Real Part', 'Imaginary Part'];
    case 'radial_distribution':
      return ['r^2|R(r)|^2'];
    case 'spherical_harmonic':
      return ['Re(Y_l^m)', 'Im(Y_l^m)'];
    default:
      return assertNever(mode);
  }
}

/**
 * Values of one planar sample for each panel of the mode.
 * Plane-independent modes are sampled elsewhere and never reach here.
 */
export function projectPsi(psi: Complex, mode: FieldMode): number[] {
  switch (mode) {
    case 'density':
      return [magnitudeSquared(psi)];
    case 'real':
      return [psi.real];
    case 'imag':
      return [psi.imag];
    case 'real_imag':
      return [psi.real, psi.imag];
    case 'radial_distribution':
    case 'spherical_harmonic':
      throw new Error(`Mode ${mode} is not sampled from psi on a plane`);
    default:
      return assertNever(mode);
  }
}
