/**
 * React Components for Orbital Plots
 */

export { OrbitalSlice } from './OrbitalSlice';
export type { OrbitalSliceProps } from './OrbitalSlice';
