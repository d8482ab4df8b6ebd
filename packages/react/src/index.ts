/**
 * @orbital-slice/react
 *
 * React hook and component for interactive orbital slices.
 *
 * @example
 * ```tsx
 * import { useOrbitalPlot, OrbitalSlice } from '@orbital-slice/react';
 *
 * function Explorer() {
 *   const [m, setM] = useState(0);
 *   const { plot, error, computing } = useOrbitalPlot({
 *     quantumNumbers: [3, 2, m],
 *     mode: 'real',
 *     nodalLines: true,
 *   });
 *
 *   return (
 *     <div>
 *       <input type="range" min={-2} max={2} value={m} onChange={(e) => setM(Number(e.target.value))} />
 *       {error && <p role="alert">{error}</p>}
 *       <OrbitalSlice plot={plot} aria-busy={computing} />
 *     </div>
 *   );
 * }
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Hooks
// ============================================================================

export { useOrbitalPlot } from './hooks';

export type { UseOrbitalPlotOptions, UseOrbitalPlotReturn } from './hooks';

// ============================================================================
// Components
// ============================================================================

export { OrbitalSlice } from './components';

export type { OrbitalSliceProps } from './components';

// ============================================================================
// Re-exports from Core and Viz
// ============================================================================

export { OrbitalError, type PlotRequestInput } from '@orbital-slice/core';
export { plotOrbital, type Plot, type HoverEvent } from '@orbital-slice/viz';

// ============================================================================
// Version Info
// ============================================================================

export const VERSION = '0.1.0';
