/**
 * @orbital-slice/viz
 *
 * Color scales, contour lines and renderers for sampled orbital fields:
 * standalone SVG, PNG bytes, and a Canvas 2D view for the browser.
 *
 * @example
 * ```typescript
 * import { plotOrbital, renderSvg, encodePng, OrbitalSliceView } from '@orbital-slice/viz';
 *
 * const plot = plotOrbital({ quantumNumbers: [3, 2, 1], mode: 'real_imag', scale: 'symlog' });
 * const svg = renderSvg(plot);
 * const png = encodePng(plot);
 *
 * // In the browser
 * const view = new OrbitalSliceView('orbital-canvas');
 * view.setPlot(plot);
 * view.on('hover', (e) => console.log(e.u, e.v, e.value));
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Plot Pipeline
// ============================================================================

export { buildPlot, plotOrbital, plotTitle, axisLabels } from './plot';
export type { Plot } from './plot';

// ============================================================================
// Colors
// ============================================================================

export { Colormap, resolveColormap } from './colormap';

export { resolveColorPolicy, intensityToPosition } from './color-policy';
export type { ColorPolicy } from './color-policy';

export {
  mapColors,
  computeBounds,
  normalizeValue,
  denormalizeValue,
  intensityColor,
} from './color-scale';
export type { ColorMapping, ColorMappingOptions, ScaleBounds } from './color-scale';

// ============================================================================
// Contours
// ============================================================================

export {
  deriveContours,
  contourMagnitudes,
  nodalContour,
  traceContour,
  NODAL_LINE_COLOR,
} from './contours';
export type { ContourLevel, ContourStyle, ContourOptions } from './contours';

// ============================================================================
// Renderers
// ============================================================================

export { rasterize, rasterizePanel, pixelAt, panelGap, RADIAL_LINE_COLOR } from './raster';
export type { RasterImage, RasterOptions } from './raster';

export { renderSvg, escapeXml } from './svg';
export type { SvgOptions } from './svg';

export { encodePng, encodeRaster } from './png';

export { OrbitalSliceView } from './canvas';
export type { OrbitalSliceViewOptions } from './canvas';

// ============================================================================
// Types and Utilities
// ============================================================================

export type {
  RGB,
  RGBA,
  HexColor,
  Point2D,
  Segment,
  Size,
  BaseVisualizationOptions,
  EventListener,
  HoverEvent,
} from './types';

export { rgbToHex, hexToRgb, lerp, clamp } from './types';

// ============================================================================
// Version Info
// ============================================================================

export const VERSION = '0.1.0';
