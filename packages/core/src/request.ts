/**
 * Plot Requests
 *
 * A request is validated in full (schema, quantum numbers, colormap name,
 * scale and option combinations, slice spec) before anything is evaluated.
 * Open plane, value and range are then filled in by the auto selector.
 */

import { z } from 'zod';
import { lookupColormap } from './colormaps';
import { DEFAULT_COLORMAP, DEFAULT_RESOLUTION, DEFAULT_SYMLOG_THRESHOLD } from './constants';
import {
  ConflictingOptionError,
  InvalidOptionError,
  InvalidQuantumNumberError,
  InvalidSliceSpecError,
  OrbitalError,
  UnknownColormapError,
  UnsupportedScaleError,
} from './errors';
import { autoPlane, autoRange, autoValue } from './auto-select';
import { isDensityFamily, isPlanarMode, type FieldMode } from './modes';
import { parseQuantumNumbers, type QuantumNumbers } from './quantum-numbers';
import {
  validatePlaneValue,
  validateRange,
  validateResolution,
  validateSliceSpec,
  type ColorScale,
  type SliceSpec,
} from './slice';

// ============================================================================
// Schema
// ============================================================================

export const FieldModeSchema = z.enum([
  'density',
  'real',
  'imag',
  'real_imag',
  'radial_distribution',
  'spherical_harmonic',
]) satisfies z.ZodType<FieldMode>;

export const PlaneChoiceSchema = z.enum(['x', 'y', 'z', 'none', 'auto']);

export const ScaleChoiceSchema = z.enum(['linear', 'log', 'symlog', 'auto']);

export const PlotRequestSchema = z.object({
  /** n [l] [m] */
  quantumNumbers: z.array(z.number()),
  mode: FieldModeSchema.default('density'),
  plane: PlaneChoiceSchema.default('auto'),
  /** Plane coordinate in a0 (auto: 0) */
  value: z.number().optional(),
  /** Axis range in a0 (auto: estimated from the radial extent) */
  range: z.tuple([z.number(), z.number()]).optional(),
  resolution: z.number().int().default(DEFAULT_RESOLUTION),
  scale: ScaleChoiceSchema.default('linear'),
  colormap: z.string().trim().min(1).default(DEFAULT_COLORMAP),
  lineMode: z.boolean().default(false),
  /** Zero-level overlay (default: on for signed fields outside line mode) */
  nodalLines: z.boolean().optional(),
  colorbar: z.boolean().default(false),
  /** Linear region of symlog as a fraction of the peak magnitude */
  symlogThreshold: z.number().positive().max(1).default(DEFAULT_SYMLOG_THRESHOLD),
  contourLevels: z.number().int().min(1).max(64).default(8),
});

export type PlotRequestInput = z.input<typeof PlotRequestSchema>;
export type PlaneChoice = z.infer<typeof PlaneChoiceSchema>;
export type ScaleChoice = z.infer<typeof ScaleChoiceSchema>;

export interface ResolvedPlotRequest {
  readonly quantumNumbers: QuantumNumbers;
  readonly mode: FieldMode;
  readonly slice: Readonly<SliceSpec>;
  readonly scale: ColorScale;
  readonly colormap: string;
  readonly lineMode: boolean;
  readonly nodalLines: boolean;
  readonly colorbar: boolean;
  readonly symlogThreshold: number;
  readonly contourLevels: number;
  /** Which slice parameters came from the auto selector */
  readonly auto: Readonly<{ plane: boolean; value: boolean; range: boolean }>;
}

// ============================================================================
// Validation helpers
// ============================================================================

/**
 * Convert the first schema issue into one of the orbital error kinds
 */
function toOrbitalError(error: z.ZodError, input: unknown): OrbitalError {
  const issue = error.issues[0];
  const field = String(issue?.path[0] ?? 'request');
  const message = `${field}: ${issue?.message ?? 'invalid value'}`;

  switch (field) {
    case 'quantumNumbers':
      return new InvalidQuantumNumberError(message);
    case 'plane':
    case 'value':
    case 'range':
    case 'resolution':
      return new InvalidSliceSpecError(message);
    case 'scale':
    case 'symlogThreshold':
      return new UnsupportedScaleError(message);
    case 'colormap': {
      const name =
        typeof input === 'object' && input !== null && 'colormap' in input ? input.colormap : '';
      return new UnknownColormapError(String(name));
    }
    default:
      return new InvalidOptionError(message);
  }
}

/**
 * Resolve 'auto' and check the scale against the mode
 */
export function resolveScale(
  mode: FieldMode,
  scale: ScaleChoice,
  lineMode: boolean = false
): ColorScale {
  const densityFamily = isDensityFamily(mode);
  const resolved: ColorScale = scale === 'auto' ? (densityFamily ? 'log' : 'symlog') : scale;

  if (resolved === 'log' && !densityFamily) {
    throw new UnsupportedScaleError(
      `Log scale cannot represent the signed ${mode} field; use linear or symlog.`
    );
  }
  if (resolved === 'symlog' && densityFamily) {
    throw new UnsupportedScaleError(
      lineMode
        ? `Line mode with symlog scale is disabled for ${mode}; use linear or log.`
        : `Symlog scale is for signed fields; use linear or log for ${mode}.`
    );
  }
  return resolved;
}

/**
 * Reject option pairs that cannot be drawn together
 */
export function checkOptionConflicts(
  mode: FieldMode,
  options: { lineMode: boolean; nodalLines: boolean }
): void {
  if (options.lineMode && options.nodalLines) {
    throw new ConflictingOptionError(
      'Line mode and the nodal-line overlay cannot be combined; choose one.'
    );
  }
  if (options.nodalLines && isDensityFamily(mode)) {
    throw new ConflictingOptionError(
      `Nodal lines need a signed field; ${mode} is non-negative.`
    );
  }
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Validate a plot request and fill in auto-selected slice parameters.
 *
 * @throws OrbitalError subclasses for every rejected input
 */
export function resolvePlotRequest(input: PlotRequestInput): ResolvedPlotRequest {
  const parsed = PlotRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw toOrbitalError(parsed.error, input);
  }
  const request = parsed.data;

  const quantumNumbers = parseQuantumNumbers(request.quantumNumbers);
  const mode = request.mode;
  lookupColormap(request.colormap);
  const scale = resolveScale(mode, request.scale, request.lineMode);
  const nodalLines = request.nodalLines ?? (!request.lineMode && !isDensityFamily(mode));
  checkOptionConflicts(mode, { lineMode: request.lineMode, nodalLines });

  const planar = isPlanarMode(mode);
  if (planar && request.plane === 'none') {
    throw new InvalidSliceSpecError(`Mode ${mode} needs an x, y or z plane (or auto).`);
  }

  // Explicit values are checked before the auto selector evaluates anything.
  validateResolution(request.resolution);
  if (planar && request.value !== undefined) {
    validatePlaneValue(request.value);
  }
  if (request.range) {
    validateRange(request.range, mode);
  }

  const autoPlaneUsed = planar && request.plane === 'auto';
  const autoValueUsed = planar && request.value === undefined;
  const autoRangeUsed = request.range === undefined && mode !== 'spherical_harmonic';

  const plane = !planar
    ? 'none'
    : request.plane === 'auto'
      ? autoPlane(quantumNumbers, mode)
      : request.plane;
  const value = !planar ? 0 : request.value ?? autoValue();
  const range: [number, number] =
    mode === 'spherical_harmonic'
      ? [0, Math.PI]
      : request.range
        ? [request.range[0], request.range[1]]
        : autoRange(quantumNumbers, mode);

  const slice: SliceSpec = { plane, value, range, resolution: request.resolution };
  validateSliceSpec(slice, mode);

  return Object.freeze({
    quantumNumbers,
    mode,
    slice: Object.freeze(slice),
    scale,
    colormap: request.colormap,
    lineMode: request.lineMode,
    nodalLines,
    colorbar: request.colorbar,
    symlogThreshold: request.symlogThreshold,
    contourLevels: request.contourLevels,
    auto: Object.freeze({ plane: autoPlaneUsed, value: autoValueUsed, range: autoRangeUsed }),
  });
}
