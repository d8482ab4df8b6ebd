/**
 * Common Types for Orbital Visualizations
 */

// ============================================================================
// Color Types
// ============================================================================

/**
 * RGB color as [r, g, b] with values 0-255
 */
export type RGB = [number, number, number];

/**
 * RGBA color as [r, g, b, a] with all channels 0-255
 */
export type RGBA = [number, number, number, number];

/**
 * Color as hex string (#RRGGBB)
 */
export type HexColor = string;

// ============================================================================
// Geometry Types
// ============================================================================

/**
 * 2D point
 */
export interface Point2D {
  x: number;
  y: number;
}

/**
 * Line segment between two points
 */
export type Segment = [Point2D, Point2D];

/**
 * Size in pixels
 */
export interface Size {
  width: number;
  height: number;
}

// ============================================================================
// Visualization Options
// ============================================================================

/**
 * Base options for canvas views
 */
export interface BaseVisualizationOptions {
  /**
   * Canvas width in pixels (default: 640)
   */
  width?: number;

  /**
   * Canvas height in pixels (default: 400)
   */
  height?: number;

  /**
   * Background color (default: #ffffff)
   */
  backgroundColor?: HexColor;

  /**
   * Device pixel ratio for high-DPI displays (default: auto)
   */
  pixelRatio?: number;
}

// ============================================================================
// Event Types
// ============================================================================

/**
 * Event listener callback
 */
export type EventListener<T = unknown> = (event: T) => void;

/**
 * Hover event over a sampled panel
 */
export interface HoverEvent {
  type: 'hover';
  point: Point2D;
  /** Panel index under the pointer */
  panel: number;
  /** Axis coordinates of the nearest sample */
  u: number;
  v: number | null;
  /** Raw field value of the nearest sample */
  value: number;
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Convert RGB to hex string
 */
export function rgbToHex(rgb: RGB): HexColor {
  const hex = rgb
    .map((c) => Math.round(clamp(c, 0, 255)).toString(16).padStart(2, '0'))
    .join('');
  return `#${hex}`;
}

/**
 * Convert hex to RGB
 */
export function hexToRgb(hex: HexColor): RGB {
  const match = hex.match(/^#?([a-f\d]{2})([a-f\d]{2})([a-f\d]{2})$/i);
  if (!match) {
    throw new Error(`Invalid hex color: ${hex}`);
  }
  return [parseInt(match[1], 16), parseInt(match[2], 16), parseInt(match[3], 16)];
}

/**
 * Linear interpolation
 */
export function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}

/**
 * Clamp value to range
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
