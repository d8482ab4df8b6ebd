/**
 * Orbital Slice View (Canvas 2D)
 *
 * Draws a plot's raster into a canvas, scaled to fit with square samples,
 * and reports the sample under the pointer.
 */

import type { BaseVisualizationOptions, EventListener, HoverEvent } from '../types';
import { panelGap, rasterize, type RasterImage } from '../raster';
import type { Plot } from '../plot';

// ============================================================================
// Types
// ============================================================================

export interface OrbitalSliceViewOptions extends BaseVisualizationOptions {
  /**
   * Draw the plot title above the image (default: true)
   */
  showTitle?: boolean;

  /**
   * Text color (default: #1f2937)
   */
  textColor?: string;

  /**
   * Panel frame color (default: #9ca3af)
   */
  frameColor?: string;

  /**
   * Padding around the image (default: { top: 36, right: 12, bottom: 12, left: 12 })
   */
  padding?: { top: number; right: number; bottom: number; left: number };
}

type ViewEvent = 'hover';

interface DrawnImage {
  raster: RasterImage;
  x: number;
  y: number;
  scaleX: number;
  scaleY: number;
  gap: number;
}

/**
 * Fill options left undefined from a base set
 */
function withDefaults(
  options: OrbitalSliceViewOptions,
  base: Required<OrbitalSliceViewOptions>
): Required<OrbitalSliceViewOptions> {
  return {
    width: options.width ?? base.width,
    height: options.height ?? base.height,
    backgroundColor: options.backgroundColor ?? base.backgroundColor,
    pixelRatio: options.pixelRatio ?? base.pixelRatio,
    showTitle: options.showTitle ?? base.showTitle,
    textColor: options.textColor ?? base.textColor,
    frameColor: options.frameColor ?? base.frameColor,
    padding: options.padding ?? base.padding,
  };
}

// ============================================================================
// OrbitalSliceView Class
// ============================================================================

export class OrbitalSliceView {
  private canvas: HTMLCanvasElement;
  private ctx: CanvasRenderingContext2D;
  private options: Required<OrbitalSliceViewOptions>;
  private plot: Plot | null = null;
  private drawn: DrawnImage | null = null;
  private listeners: Map<ViewEvent, Set<EventListener<HoverEvent>>> = new Map();

  constructor(canvas: HTMLCanvasElement | string, options: OrbitalSliceViewOptions = {}) {
    // Get canvas element
    if (typeof canvas === 'string') {
      const el = document.getElementById(canvas);
      if (!el || !(el instanceof HTMLCanvasElement)) {
        throw new Error(`Canvas element not found: ${canvas}`);
      }
      this.canvas = el;
    } else {
      this.canvas = canvas;
    }

    // Get 2D context
    const ctx = this.canvas.getContext('2d');
    if (!ctx) {
      throw new Error('Failed to get 2D canvas context');
    }
    this.ctx = ctx;

    this.options = withDefaults(options, {
      width: 640,
      height: 400,
      backgroundColor: '#ffffff',
      pixelRatio: typeof window !== 'undefined' ? window.devicePixelRatio : 1,
      showTitle: true,
      textColor: '#1f2937',
      frameColor: '#9ca3af',
      padding: { top: 36, right: 12, bottom: 12, left: 12 },
    });

    this.onMouseMove = this.onMouseMove.bind(this);

    this.setupCanvas();
    this.canvas.addEventListener('mousemove', this.onMouseMove);
    this.render();
  }

  // =========================================================================
  // Public Methods
  // =========================================================================

  /**
   * Show a plot, or clear the view with null
   */
  setPlot(plot: Plot | null): void {
    this.plot = plot;
    this.render();
  }

  getPlot(): Plot | null {
    return this.plot;
  }

  /**
   * Update options
   */
  setOptions(options: Partial<OrbitalSliceViewOptions>): void {
    const previous = this.options;
    this.options = withDefaults(options, previous);
    const { width, height, pixelRatio } = this.options;
    const resized =
      width !== previous.width || height !== previous.height || pixelRatio !== previous.pixelRatio;
    if (resized) {
      this.setupCanvas();
    }
    this.render();
  }

  /**
   * Add event listener
   */
  on(event: ViewEvent, callback: EventListener<HoverEvent>): void {
    const callbacks = this.listeners.get(event) ?? new Set();
    callbacks.add(callback);
    this.listeners.set(event, callbacks);
  }

  /**
   * Remove event listener
   */
  off(event: ViewEvent, callback: EventListener<HoverEvent>): void {
    this.listeners.get(event)?.delete(callback);
  }

  /**
   * Dispose and cleanup
   */
  dispose(): void {
    this.canvas.removeEventListener('mousemove', this.onMouseMove);
    this.listeners.clear();
    this.plot = null;
    this.drawn = null;
  }

  // =========================================================================
  // Private Methods
  // =========================================================================

  private setupCanvas(): void {
    const { width, height, pixelRatio } = this.options;

    this.canvas.width = width * pixelRatio;
    this.canvas.height = height * pixelRatio;
    this.canvas.style.width = `${width}px`;
    this.canvas.style.height = `${height}px`;

    this.ctx.setTransform(pixelRatio, 0, 0, pixelRatio, 0, 0);
  }

  private onMouseMove(e: MouseEvent): void {
    const rect = this.canvas.getBoundingClientRect();
    const point = { x: e.clientX - rect.left, y: e.clientY - rect.top };
    const event = this.sampleAt(point.x, point.y);
    if (event) {
      this.listeners.get('hover')?.forEach((cb) => cb(event));
    }
  }

  /**
   * Nearest sample under a view coordinate, if any
   */
  private sampleAt(x: number, y: number): HoverEvent | null {
    const { plot, drawn } = this;
    if (!plot || !drawn) return null;

    const px = Math.floor((x - drawn.x) / drawn.scaleX);
    const py = Math.floor((y - drawn.y) / drawn.scaleY);
    if (px < 0 || py < 0 || px >= drawn.raster.width || py >= drawn.raster.height) {
      return null;
    }

    const { field } = plot;
    if (field.v === null) {
      const panel = field.panels[0];
      return {
        type: 'hover',
        point: { x, y },
        panel: 0,
        u: field.u.values[px],
        v: null,
        value: panel.values[px],
      };
    }

    const { cols, rows } = field.panels[0];
    const index = Math.floor(px / (cols + drawn.gap));
    const col = px - index * (cols + drawn.gap);
    if (col >= cols || index >= field.panels.length) return null;
    const row = rows - 1 - py;

    return {
      type: 'hover',
      point: { x, y },
      panel: index,
      u: field.u.values[col],
      v: field.v.values[row],
      value: field.panels[index].values[row * cols + col],
    };
  }

  private render(): void {
    const { ctx, options } = this;
    const { width, height, padding } = options;

    ctx.clearRect(0, 0, width, height);
    ctx.fillStyle = options.backgroundColor;
    ctx.fillRect(0, 0, width, height);

    const plot = this.plot;
    if (!plot) {
      this.drawn = null;
      this.drawEmptyState();
      return;
    }

    if (options.showTitle) {
      ctx.save();
      ctx.font = '13px sans-serif';
      ctx.fillStyle = options.textColor;
      ctx.textAlign = 'center';
      ctx.textBaseline = 'middle';
      ctx.fillText(plot.title, width / 2, padding.top / 2);
      ctx.restore();
    }

    const raster = rasterize(plot);
    const areaWidth = width - padding.left - padding.right;
    const areaHeight = height - padding.top - padding.bottom;
    const radial = plot.field.v === null;

    // 2D panels keep square samples; the radial chart fills the area
    const fit = Math.min(areaWidth / raster.width, areaHeight / raster.height);
    const scaleX = radial ? areaWidth / raster.width : fit;
    const scaleY = radial ? areaHeight / raster.height : fit;
    const drawWidth = raster.width * scaleX;
    const drawHeight = raster.height * scaleY;
    const x = padding.left + (areaWidth - drawWidth) / 2;
    const y = padding.top + (areaHeight - drawHeight) / 2;

    const offscreen = document.createElement('canvas');
    offscreen.width = raster.width;
    offscreen.height = raster.height;
    const offscreenCtx = offscreen.getContext('2d');
    if (!offscreenCtx) {
      throw new Error('Failed to get 2D canvas context');
    }
    const imageData = offscreenCtx.createImageData(raster.width, raster.height);
    imageData.data.set(raster.data);
    offscreenCtx.putImageData(imageData, 0, 0);

    ctx.save();
    ctx.imageSmoothingEnabled = false;
    ctx.drawImage(offscreen, x, y, drawWidth, drawHeight);
    ctx.strokeStyle = options.frameColor;
    ctx.lineWidth = 1;
    ctx.strokeRect(x, y, drawWidth, drawHeight);
    ctx.restore();

    this.drawn = {
      raster,
      x,
      y,
      scaleX,
      scaleY,
      gap: panelGap(plot.field.panels[0].cols, plot.field.panels.length),
    };
  }

  private drawEmptyState(): void {
    const { ctx, options } = this;

    ctx.save();
    ctx.font = '14px sans-serif';
    ctx.fillStyle = options.textColor;
    ctx.textAlign = 'center';
    ctx.textBaseline = 'middle';
    ctx.fillText('No plot', options.width / 2, options.height / 2);
    ctx.restore();
  }
}
