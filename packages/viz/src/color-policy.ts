/**
 * Color Policy
 *
 * Which part of the colormap a field may use, and where contour line colors
 * are taken from. Signed fields use the whole map with zero at its centre;
 * non-negative fields use only the upper half.
 */

import { isDensityFamily, resolveScale, type ColorScale, type FieldMode } from '@orbital-slice/core';

export interface ColorPolicy {
  readonly signed: boolean;
  readonly scale: ColorScale;
  /** Colormap positions used by intensities, [start, end] */
  readonly span: readonly [number, number];
  /** Colormap position for positive contour lines */
  readonly positiveLineAt: number;
  /** Colormap position for negative contour lines */
  readonly negativeLineAt: number;
}

/**
 * Derive the color policy for a mode and scale.
 *
 * @throws UnsupportedScaleError when the scale cannot represent the mode
 */
export function resolveColorPolicy(mode: FieldMode, scale: ColorScale): ColorPolicy {
  const resolved = resolveScale(mode, scale);

  if (isDensityFamily(mode)) {
    return Object.freeze({
      signed: false,
      scale: resolved,
      span: Object.freeze([0.5, 1] as const),
      positiveLineAt: 1,
      negativeLineAt: 0.5,
    });
  }

  return Object.freeze({
    signed: true,
    scale: resolved,
    span: Object.freeze([0, 1] as const),
    positiveLineAt: 1,
    negativeLineAt: 0,
  });
}

/**
 * Colormap position of an intensity under a policy
 * (intensity in [-1, 1] when signed, [0, 1] otherwise)
 */
export function intensityToPosition(policy: ColorPolicy, intensity: number): number {
  const [start, end] = policy.span;
  const t = policy.signed ? (intensity + 1) / 2 : intensity;
  return start + (end - start) * t;
}
