/**
 * SVG Export
 *
 * Standalone SVG document for a plot: title, one framed panel per field
 * component, axis captions and ticks, the filled surface as an embedded
 * PNG or the traced contour paths, the optional nodal line and colorbar.
 */

import { denormalizeValue, intensityColor } from './color-scale';
import { traceContour, type ContourLevel } from './contours';
import { encodeRaster } from './png';
import { axisLabels, type Plot } from './plot';
import { rasterizePanel, RADIAL_LINE_COLOR } from './raster';
import { rgbToHex, type Size } from './types';

export interface SvgOptions {
  /**
   * Edge length of each panel in pixels (default: 360)
   */
  panelSize?: number;

  /**
   * Draw a colorbar (default: the request's colorbar flag)
   */
  colorbar?: boolean;

  /**
   * Text color (default: #1f2937)
   */
  textColor?: string;
}

interface Layout {
  panelSize: number;
  left: number;
  top: number;
  gap: number;
  colorbarWidth: number;
  size: Size;
}

const FONT = 'font-family="sans-serif"';
const FRAME_COLOR = '#9ca3af';
const COLORBAR_STOPS = 11;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Escape text for use in SVG content and attributes
 */
export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function num(value: number): string {
  return String(Math.round(value * 100) / 100);
}

function tick(value: number): string {
  return value.toFixed(1);
}

interface TextStyle {
  size: number;
  color: string;
  anchor?: 'start' | 'middle' | 'end';
  rotate?: boolean;
}

function text(x: number, y: number, content: string, style: TextStyle): string {
  const anchor = style.anchor ? ` text-anchor="${style.anchor}"` : '';
  const transform = style.rotate ? ` transform="rotate(-90 ${num(x)} ${num(y)})"` : '';
  return (
    `<text x="${num(x)}" y="${num(y)}"${transform} ${FONT} font-size="${style.size}"` +
    ` fill="${style.color}"${anchor}>${escapeXml(content)}</text>`
  );
}

function computeLayout(plot: Plot, options: SvgOptions, colorbar: boolean): Layout {
  const panelSize = options.panelSize ?? 360;
  const count = plot.field.panels.length;
  const left = 72;
  const top = count > 1 ? 76 : 56;
  const gap = 72;
  const colorbarWidth = colorbar ? 96 : 0;
  const width = left + count * panelSize + (count - 1) * gap + colorbarWidth + 24;
  const height = top + panelSize + 56;
  return { panelSize, left, top, gap, colorbarWidth, size: { width, height } };
}

function panelOrigin(layout: Layout, index: number): { x: number; y: number } {
  return { x: layout.left + index * (layout.panelSize + layout.gap), y: layout.top };
}

// ============================================================================
// Parts
// ============================================================================

function contourPath(
  plot: Plot,
  index: number,
  contour: ContourLevel,
  layout: Layout,
  strokeWidth: number
): string {
  const panel = plot.field.panels[index];
  const origin = panelOrigin(layout, index);
  const sx = layout.panelSize / (panel.cols - 1);
  const sy = layout.panelSize / (panel.rows - 1);

  const d = traceContour(panel, contour.level)
    .map(
      ([a, b]) =>
        `M${num(origin.x + a.x * sx)} ${num(origin.y + layout.panelSize - a.y * sy)}` +
        `L${num(origin.x + b.x * sx)} ${num(origin.y + layout.panelSize - b.y * sy)}`
    )
    .join('');
  if (!d) return '';

  const dash = contour.style === 'dashed' ? ' stroke-dasharray="4 3"' : '';
  return `<path d="${d}" fill="none" stroke="${contour.color}" stroke-width="${strokeWidth}"${dash}/>`;
}

function surface(plot: Plot, index: number, layout: Layout): string {
  const origin = panelOrigin(layout, index);
  const png = encodeRaster(rasterizePanel(plot, index)).toString('base64');
  return (
    `<image x="${origin.x}" y="${origin.y}" width="${layout.panelSize}" height="${layout.panelSize}"` +
    ` preserveAspectRatio="none" style="image-rendering:pixelated"` +
    ` href="data:image/png;base64,${png}"/>`
  );
}

function radialCurve(plot: Plot, layout: Layout): string {
  const panel = plot.field.panels[0];
  const intensities = plot.mapping.intensities[0];
  const origin = panelOrigin(layout, 0);
  const sx = layout.panelSize / (panel.cols - 1);
  const points: string[] = [];

  for (let i = 0; i < panel.cols; i++) {
    const y = origin.y + layout.panelSize * (1 - intensities[i]);
    points.push(`${num(origin.x + i * sx)},${num(y)}`);
  }
  return (
    `<polyline points="${points.join(' ')}" fill="none"` +
    ` stroke="${RADIAL_LINE_COLOR}" stroke-width="2"/>`
  );
}

function axes(plot: Plot, index: number, layout: Layout, textColor: string): string {
  const { field } = plot;
  const origin = panelOrigin(layout, index);
  const size = layout.panelSize;
  const [uCaption, vCaption] = axisLabels(plot);
  const harmonic = field.mode === 'spherical_harmonic';
  const uMin = harmonic ? field.u.min / Math.PI : field.u.min;
  const uMax = harmonic ? field.u.max / Math.PI : field.u.max;
  const small: TextStyle = { size: 11, color: textColor };
  const caption: TextStyle = { size: 13, color: textColor, anchor: 'middle' };
  const bottom = origin.y + size;
  const parts = [
    `<rect x="${origin.x}" y="${origin.y}" width="${size}" height="${size}" fill="none" stroke="${FRAME_COLOR}"/>`,
    text(origin.x, bottom + 16, tick(uMin), { ...small, anchor: 'start' }),
    text(origin.x + size, bottom + 16, tick(uMax), { ...small, anchor: 'end' }),
    text(origin.x + size / 2, bottom + 36, uCaption, caption),
  ];

  if (field.v) {
    const vMin = harmonic ? field.v.min / Math.PI : field.v.min;
    const vMax = harmonic ? field.v.max / Math.PI : field.v.max;
    parts.push(
      text(origin.x - 6, bottom, tick(vMin), { ...small, anchor: 'end' }),
      text(origin.x - 6, origin.y + 10, tick(vMax), { ...small, anchor: 'end' })
    );
  }

  parts.push(text(origin.x - 44, origin.y + size / 2, vCaption, { ...caption, rotate: true }));

  if (field.panels.length > 1) {
    parts.push(text(origin.x + size / 2, origin.y - 10, field.panels[index].label, caption));
  }
  return parts.join('\n');
}

function colorbar(plot: Plot, layout: Layout, textColor: string): string {
  const { mapping } = plot;
  const signed = mapping.policy.signed;
  const last = panelOrigin(layout, plot.field.panels.length - 1);
  const x = last.x + layout.panelSize + 24;
  const y = layout.top;
  const height = layout.panelSize;
  const low = signed ? -1 : 0;

  const stops: string[] = [];
  for (let k = 0; k < COLORBAR_STOPS; k++) {
    const t = k / (COLORBAR_STOPS - 1);
    const color = rgbToHex(intensityColor(mapping, low + (1 - low) * t));
    stops.push(`<stop offset="${num(t)}" stop-color="${color}"/>`);
  }

  const lowValue = signed
    ? denormalizeValue(-1, mapping.scale, mapping.bounds)
    : mapping.scale === 'log'
      ? (mapping.bounds.floor ?? 0)
      : 0;
  const highValue = mapping.bounds.peak;

  return [
    '<defs>',
    `<linearGradient id="colorbar" x1="0" y1="1" x2="0" y2="0">${stops.join('')}</linearGradient>`,
    '</defs>',
    `<rect x="${x}" y="${y}" width="16" height="${height}" fill="url(#colorbar)" stroke="${FRAME_COLOR}"/>`,
    text(x + 22, y + 10, highValue.toExponential(2), { size: 11, color: textColor }),
    text(x + 22, y + height, lowValue.toExponential(2), { size: 11, color: textColor }),
  ].join('\n');
}

// ============================================================================
// Document
// ============================================================================

/**
 * Render a plot as a standalone SVG document
 */
export function renderSvg(plot: Plot, options: SvgOptions = {}): string {
  const { field } = plot;
  const textColor = options.textColor ?? '#1f2937';
  const showColorbar = (options.colorbar ?? plot.request.colorbar) && field.v !== null;
  const layout = computeLayout(plot, options, showColorbar);
  const { width, height } = layout.size;

  const body: string[] = [
    `<rect width="${width}" height="${height}" fill="#ffffff"/>`,
    text(width / 2, 28, plot.title, { size: 15, color: textColor, anchor: 'middle' }),
  ];

  if (field.v === null) {
    body.push(radialCurve(plot, layout), axes(plot, 0, layout, textColor));
  } else {
    field.panels.forEach((_, index) => {
      if (plot.contours === null) {
        body.push(surface(plot, index, layout));
      } else {
        for (const contour of plot.contours) {
          body.push(contourPath(plot, index, contour, layout, 1.2));
        }
      }
      if (plot.nodalLine) {
        body.push(contourPath(plot, index, plot.nodalLine, layout, 0.9));
      }
      body.push(axes(plot, index, layout, textColor));
    });
    if (showColorbar) {
      body.push(colorbar(plot, layout, textColor));
    }
  }

  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    ...body.filter((part) => part.length > 0),
    '</svg>',
    '',
  ].join('\n');
}
