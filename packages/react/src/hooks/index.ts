/**
 * React Hooks for Orbital Plots
 */

export { useOrbitalPlot } from './useOrbitalPlot';
export type {
  UseOrbitalPlotOptions,
  UseOrbitalPlotReturn,
} from './useOrbitalPlot';
