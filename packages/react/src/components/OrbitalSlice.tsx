/**
 * OrbitalSlice React Component
 *
 * Displays a plot in a canvas and reports the sample under the pointer.
 */

import React, { useRef, useEffect } from 'react';
import {
  OrbitalSliceView,
  type HoverEvent,
  type OrbitalSliceViewOptions,
  type Plot,
} from '@orbital-slice/viz';

export interface OrbitalSliceProps extends Omit<OrbitalSliceViewOptions, 'width' | 'height'> {
  /**
   * Plot to display; null shows the empty state
   */
  plot: Plot | null;

  /**
   * Width in pixels (default: 640)
   */
  width?: number;

  /**
   * Height in pixels (default: 400)
   */
  height?: number;

  /**
   * Additional CSS class name
   */
  className?: string;

  /**
   * Inline styles
   */
  style?: React.CSSProperties;

  /**
   * Marks the canvas busy while a newer plot is computing
   */
  'aria-busy'?: boolean;

  /**
   * Callback with the sample under the pointer
   */
  onHover?: (event: HoverEvent) => void;
}

/**
 * OrbitalSlice React Component
 *
 * @example
 * ```tsx
 * import { OrbitalSlice, useOrbitalPlot } from '@orbital-slice/react';
 *
 * function App() {
 *   const { plot } = useOrbitalPlot({ quantumNumbers: [3, 2, 1], mode: 'density' });
 *   return <OrbitalSlice plot={plot} width={480} height={480} onHover={console.log} />;
 * }
 * ```
 */
export function OrbitalSlice({
  plot,
  width = 640,
  height = 400,
  className,
  style,
  'aria-busy': busy,
  onHover,
  backgroundColor,
  pixelRatio,
  showTitle,
  textColor,
  frameColor,
  padding,
}: OrbitalSliceProps): React.ReactElement {
  const canvasRef = useRef<HTMLCanvasElement>(null);
  const vizRef = useRef<OrbitalSliceView | null>(null);
  const hoverRef = useRef(onHover);
  hoverRef.current = onHover;

  // Initialize visualization
  useEffect(() => {
    if (!canvasRef.current) return;

    const view = new OrbitalSliceView(canvasRef.current, { width, height });
    view.on('hover', (event) => hoverRef.current?.(event));
    vizRef.current = view;

    return () => {
      view.dispose();
      vizRef.current = null;
    };
  }, []);

  // Update options when they change
  useEffect(() => {
    vizRef.current?.setOptions({
      width,
      height,
      backgroundColor,
      pixelRatio,
      showTitle,
      textColor,
      frameColor,
      padding,
    });
  }, [width, height, backgroundColor, pixelRatio, showTitle, textColor, frameColor, padding]);

  useEffect(() => {
    vizRef.current?.setPlot(plot);
  }, [plot]);

  return (
    <canvas
      ref={canvasRef}
      className={className}
      aria-busy={busy}
      aria-label={plot?.title ?? 'No plot'}
      role="img"
      style={{
        display: 'block',
        ...style,
      }}
    />
  );
}
