/**
 * @orbital-slice/core
 *
 * Analytic hydrogen orbitals psi_{n,l,m} = R_{n,l} · Y_l^m, sampled on
 * planar slices, radial profiles and angular maps.
 *
 * @example
 * ```typescript
 * import { resolvePlotRequest, sampleField } from '@orbital-slice/core';
 *
 * const request = resolvePlotRequest({ quantumNumbers: [2, 1, 0], mode: 'real' });
 * const field = sampleField(request.quantumNumbers, request.mode, request.slice, request.scale);
 * console.log(field.plane, field.range);  // 'x', [-14.48.., 14.48..]
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Quantum Numbers
// ============================================================================

export { parseQuantumNumbers, validateQuantumNumbers, orbitalLabel } from './quantum-numbers';
export type { QuantumNumbers } from './quantum-numbers';

// ============================================================================
// Wavefunction
// ============================================================================

export {
  createRadialFunction,
  radialWavefunction,
  radialDistribution,
  generalizedLaguerre,
  logFactorial,
  logFactorials,
} from './radial';

export { sphericalHarmonic, normalizedLegendre } from './angular';

export { OrbitalEvaluator, cartesianToSpherical } from './orbital';
export type { SphericalPoint } from './orbital';

export {
  FIELD_MODES,
  assertNever,
  isDensityFamily,
  isPlanarMode,
  panelLabels,
  projectPsi,
} from './modes';
export type { FieldMode } from './modes';

// ============================================================================
// Slicing and Auto Selection
// ============================================================================

export {
  sampleField,
  linspace,
  planeAxes,
  planePoint,
  validateSliceSpec,
  validateRange,
  validateResolution,
  validatePlaneValue,
} from './slice';
export type { SlicePlane, ColorScale, SliceSpec, Axis, FieldPanel, Field } from './slice';

export {
  autoPlane,
  autoValue,
  autoExtent,
  maxAutoExtent,
  autoRange,
  enclosingRadius,
  planeScore,
} from './auto-select';

// ============================================================================
// Requests and Naming
// ============================================================================

export { colormapNames, lookupColormap } from './colormaps';
export type { ColormapEntry } from './colormaps';

export {
  resolvePlotRequest,
  resolveScale,
  checkOptionConflicts,
  PlotRequestSchema,
  FieldModeSchema,
  PlaneChoiceSchema,
  ScaleChoiceSchema,
} from './request';
export type {
  PlotRequestInput,
  ResolvedPlotRequest,
  PlaneChoice,
  ScaleChoice,
} from './request';

export { defaultOutputName, encodeValueToken } from './naming';
export type { OutputNameOptions } from './naming';

// ============================================================================
// Errors
// ============================================================================

export {
  OrbitalError,
  InvalidQuantumNumberError,
  InvalidSliceSpecError,
  UnsupportedScaleError,
  ConflictingOptionError,
  InvalidOptionError,
  UnknownColormapError,
  isOrbitalError,
} from './errors';
export type { OrbitalErrorCode } from './errors';

// ============================================================================
// Complex Number Utilities
// ============================================================================

export {
  complex,
  magnitudeSquared,
  conjugate,
  scale,
  fromPolar,
  ZERO,
} from './complex';
export type { Complex } from './complex';

// ============================================================================
// Constants
// ============================================================================

export {
  DEFAULT_RESOLUTION,
  DEFAULT_COLORMAP,
  DEFAULT_EXTENSION,
  DEFAULT_SYMLOG_THRESHOLD,
} from './constants';

// ============================================================================
// Version Info
// ============================================================================

export const VERSION = '0.1.0';
