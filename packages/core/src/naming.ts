/**
 * Default output file names.
 *
 *   orbital_n{n}_l{l}_m{m}_{mode}_{plane}{value}.{ext}
 */

import { DEFAULT_EXTENSION } from './constants';
import { assertNever, isPlanarMode, type FieldMode } from './modes';
import type { QuantumNumbers } from './quantum-numbers';
import type { SlicePlane } from './slice';

export interface OutputNameOptions {
  quantumNumbers: QuantumNumbers;
  mode: FieldMode;
  plane: SlicePlane;
  value: number;
  /** File extension without the dot (default: png) */
  extension?: string;
}

/**
 * File-name-safe token for a plane value: at least one decimal,
 * '-' written as 'm' and '.' as 'p' (0 -> "0p0", -1.5 -> "m1p5")
 */
export function encodeValueToken(value: number): string {
  const text = Number.isInteger(value) ? value.toFixed(1) : String(value);
  return text.replace(/-/g, 'm').replace(/\./g, 'p');
}

function planeToken(mode: FieldMode, plane: SlicePlane): string {
  switch (mode) {
    case 'radial_distribution':
      return 'r';
    case 'spherical_harmonic':
      return 'angles';
    case 'density':
    case 'real':
    case 'imag':
    case 'real_imag':
      return plane;
    default:
      return assertNever(mode);
  }
}

/**
 * Deterministic file name for a plot
 */
export function defaultOutputName(options: OutputNameOptions): string {
  const { quantumNumbers: qn, mode } = options;
  const extension = options.extension ?? DEFAULT_EXTENSION;
  const value = isPlanarMode(mode) ? options.value : 0;
  const token = `${planeToken(mode, options.plane)}${encodeValueToken(value)}`;
  return `orbital_n${qn.n}_l${qn.l}_m${qn.m}_${mode}_${token}.${extension}`;
}
