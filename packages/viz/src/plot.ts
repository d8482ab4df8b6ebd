/**
 * Plot Pipeline
 *
 * resolved request -> sampled field -> color mapping -> contour levels.
 * Pure and deterministic; renderers consume the resulting Plot.
 */

import {
  assertNever,
  isPlanarMode,
  resolvePlotRequest,
  sampleField,
  type Field,
  type PlotRequestInput,
  type ResolvedPlotRequest,
} from '@orbital-slice/core';
import { mapColors, type ColorMapping } from './color-scale';
import { resolveColormap } from './colormap';
import { deriveContours, nodalContour, type ContourLevel } from './contours';

export interface Plot {
  readonly request: ResolvedPlotRequest;
  readonly field: Field;
  readonly mapping: ColorMapping;
  /** Line-mode levels; null when the surface is filled */
  readonly contours: readonly ContourLevel[] | null;
  /** Zero-level overlay; null unless requested */
  readonly nodalLine: ContourLevel | null;
  readonly title: string;
}

/**
 * Figure title for a request
 */
export function plotTitle(request: ResolvedPlotRequest): string {
  const { quantumNumbers: qn, mode, scale } = request;
  const scaleSuffix = scale === 'linear' ? '' : ` | scale=${scale}`;

  switch (mode) {
    case 'radial_distribution':
      return `Hydrogen Radial Distribution n=${qn.n}, l=${qn.l}`;
    case 'spherical_harmonic':
      return `Spherical Harmonic l=${qn.l}, m=${qn.m} | mode=${mode}${scaleSuffix}`;
    case 'density':
    case 'real':
    case 'imag':
    case 'real_imag':
      return (
        `Hydrogen Orbital n=${qn.n}, l=${qn.l}, m=${qn.m} | mode=${mode}` +
        ` | slice=${request.slice.plane}-plane${scaleSuffix}`
      );
    default:
      return assertNever(mode);
  }
}

/**
 * Build a plot from a resolved request
 *
 * @throws UnknownColormapError for an unknown colormap name
 */
export function buildPlot(request: ResolvedPlotRequest): Plot {
  const colormap = resolveColormap(request.colormap);
  const field = sampleField(request.quantumNumbers, request.mode, request.slice, request.scale);
  const mapping = mapColors(field, {
    colormap,
    symlogThreshold: request.symlogThreshold,
  });

  const contours = request.lineMode
    ? deriveContours(field, mapping, { levels: request.contourLevels })
    : null;
  const nodalLine = request.nodalLines && field.signed ? nodalContour() : null;

  return Object.freeze({
    request,
    field,
    mapping,
    contours,
    nodalLine,
    title: plotTitle(request),
  });
}

/**
 * Validate raw input and build its plot
 *
 * @throws OrbitalError subclasses for rejected input
 */
export function plotOrbital(input: PlotRequestInput): Plot {
  return buildPlot(resolvePlotRequest(input));
}

/**
 * Axis captions for the plot's horizontal and vertical axes
 */
export function axisLabels(plot: Plot): [string, string] {
  const { field } = plot;
  if (field.mode === 'spherical_harmonic') {
    return ['phi / pi', 'theta / pi'];
  }
  if (!isPlanarMode(field.mode) || !field.v) {
    return [field.u.label, field.panels[0].label];
  }
  return [`${field.u.label} / a0`, `${field.v.label} / a0`];
}
