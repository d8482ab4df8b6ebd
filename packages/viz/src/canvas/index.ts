/**
 * Canvas 2D Orbital Views
 */

export { OrbitalSliceView } from './orbital-slice';
export type { OrbitalSliceViewOptions } from './orbital-slice';
