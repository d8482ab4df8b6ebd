/**
 * Rasterizer
 *
 * One pixel per grid sample, panels side by side with a transparent gap,
 * v increasing upward. Line mode leaves the background transparent and
 * draws only the traced contours. The radial distribution becomes an area
 * chart, one column per r sample.
 */

import { intensityColor } from './color-scale';
import { traceContour, type ContourLevel } from './contours';
import { hexToRgb, type RGB, type RGBA } from './types';
import type { Plot } from './plot';

export interface RasterImage {
  readonly width: number;
  readonly height: number;
  /** RGBA, row-major from the top-left pixel */
  readonly data: Uint8ClampedArray;
}

export interface RasterOptions {
  /**
   * Transparent columns between panels (default: max(2, cols / 25))
   */
  gap?: number;

  /**
   * Height of the radial distribution chart (default: 0.6 × samples)
   */
  chartHeight?: number;
}

/**
 * Stroke color of the radial distribution curve
 */
export const RADIAL_LINE_COLOR = '#1f4e79';

/** Dashed lines draw 3 of every 6 pixels along each diagonal */
const DASH_PERIOD = 6;
const DASH_ON = 3;

/**
 * Default transparent columns between side-by-side panels
 */
export function panelGap(cols: number, count: number): number {
  return count > 1 ? Math.max(2, Math.round(cols / 25)) : 0;
}

// ============================================================================
// Drawing primitives
// ============================================================================

function createImage(width: number, height: number): RasterImage {
  return { width, height, data: new Uint8ClampedArray(width * height * 4) };
}

function setPixel(image: RasterImage, x: number, y: number, color: RGB): void {
  if (x < 0 || y < 0 || x >= image.width || y >= image.height) return;
  const offset = (y * image.width + x) * 4;
  image.data[offset] = color[0];
  image.data[offset + 1] = color[1];
  image.data[offset + 2] = color[2];
  image.data[offset + 3] = 255;
}

function drawLine(
  image: RasterImage,
  x0: number,
  y0: number,
  x1: number,
  y1: number,
  color: RGB,
  dashed: boolean
): void {
  const steps = Math.max(1, Math.ceil(Math.max(Math.abs(x1 - x0), Math.abs(y1 - y0))));
  for (let k = 0; k <= steps; k++) {
    const x = Math.round(x0 + ((x1 - x0) * k) / steps);
    const y = Math.round(y0 + ((y1 - y0) * k) / steps);
    if (dashed && (x + y) % DASH_PERIOD >= DASH_ON) continue;
    setPixel(image, x, y, color);
  }
}

function drawLevel(image: RasterImage, plot: Plot, contour: ContourLevel, gap: number): void {
  const color = hexToRgb(contour.color);
  const dashed = contour.style === 'dashed';

  plot.field.panels.forEach((panel, p) => {
    const offset = p * (panel.cols + gap);
    const top = panel.rows - 1;
    for (const [a, b] of traceContour(panel, contour.level)) {
      drawLine(image, offset + a.x, top - a.y, offset + b.x, top - b.y, color, dashed);
    }
  });
}

// ============================================================================
// Rasterization
// ============================================================================

function fillPanel(image: RasterImage, plot: Plot, index: number, offset: number): void {
  const { rows, cols } = plot.field.panels[index];
  const intensities = plot.mapping.intensities[index];
  for (let row = 0; row < rows; row++) {
    for (let col = 0; col < cols; col++) {
      const color = intensityColor(plot.mapping, intensities[row * cols + col]);
      setPixel(image, offset + col, rows - 1 - row, color);
    }
  }
}

/**
 * Filled surface of a single panel of a 2D plot
 */
export function rasterizePanel(plot: Plot, index: number): RasterImage {
  const panel = plot.field.panels[index];
  if (!panel || plot.field.v === null) {
    throw new Error(`Plot has no 2D panel ${index}`);
  }
  const image = createImage(panel.cols, panel.rows);
  fillPanel(image, plot, index, 0);
  return image;
}

function rasterizeRadial(plot: Plot, options: RasterOptions): RasterImage {
  const panel = plot.field.panels[0];
  const intensities = plot.mapping.intensities[0];
  const width = panel.cols;
  const height = Math.max(2, options.chartHeight ?? Math.round(width * 0.6));
  const image = createImage(width, height);
  const lineColor = hexToRgb(RADIAL_LINE_COLOR);

  let previous: { x: number; y: number } | null = null;
  for (let col = 0; col < width; col++) {
    const intensity = intensities[col];
    const top = height - 1 - Math.round(intensity * (height - 1));

    if (plot.contours === null) {
      const fill = intensityColor(plot.mapping, intensity);
      for (let y = height - 1; y > top; y--) {
        setPixel(image, col, y, fill);
      }
    }
    if (previous) {
      drawLine(image, previous.x, previous.y, col, top, lineColor, false);
    }
    previous = { x: col, y: top };
  }

  return image;
}

/**
 * Render a plot to RGBA pixels
 */
export function rasterize(plot: Plot, options: RasterOptions = {}): RasterImage {
  const { field } = plot;
  if (field.v === null) {
    return rasterizeRadial(plot, options);
  }

  const { rows, cols } = field.panels[0];
  const count = field.panels.length;
  const gap = count > 1 ? (options.gap ?? panelGap(cols, count)) : 0;
  const image = createImage(cols * count + gap * (count - 1), rows);

  if (plot.contours === null) {
    for (let p = 0; p < count; p++) {
      fillPanel(image, plot, p, p * (cols + gap));
    }
  } else {
    for (const contour of plot.contours) {
      drawLevel(image, plot, contour, gap);
    }
  }

  if (plot.nodalLine) {
    drawLevel(image, plot, plot.nodalLine, gap);
  }

  return image;
}

/**
 * RGBA of one pixel, for inspection
 */
export function pixelAt(image: RasterImage, x: number, y: number): RGBA {
  const offset = (y * image.width + x) * 4;
  const { data } = image;
  return [data[offset], data[offset + 1], data[offset + 2], data[offset + 3]];
}
