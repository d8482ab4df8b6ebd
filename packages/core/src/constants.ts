/**
 * Physical constants and numerical defaults.
 *
 * The evaluator works in atomic units: every length is a multiple of the
 * Bohr radius a0, so a0 itself is 1 inside the formulas.
 */

/**
 * Default number of grid samples per axis
 */
export const DEFAULT_RESOLUTION = 401;

/**
 * Default colormap name
 */
export const DEFAULT_COLORMAP = 'RdYlBu_r';

/**
 * Default output file extension
 */
export const DEFAULT_EXTENSION = 'png';

/**
 * Fraction of radial probability enclosed by the automatic range
 */
export const AUTO_COVERAGE_DENSITY = 0.99;
export const AUTO_COVERAGE_SIGNED = 0.995;

/**
 * Margin applied on top of the enclosing radius
 */
export const AUTO_EXTENT_MARGIN = 1.15;

/**
 * Smallest automatic half-range in a0
 */
export const AUTO_EXTENT_MIN = 4;

/**
 * Cap on the automatic half-range: max(AUTO_EXTENT_CAP_FLOOR, per-n factor * n).
 * Signed fields get (6 + 2l) per n to keep alternating lobes in view.
 */
export const AUTO_EXTENT_CAP_FLOOR = 10;
export const AUTO_EXTENT_CAP_DENSITY = 8;
export const AUTO_EXTENT_CAP_SIGNED_BASE = 6;
export const AUTO_EXTENT_CAP_SIGNED_PER_L = 2;

/**
 * Samples used when scanning the radial probability
 */
export const AUTO_SCAN_POINTS = 6000;

/**
 * Samples along each central great circle when scoring planes
 */
export const AUTO_PLANE_SAMPLES = 360;

/**
 * Default symlog linear region, as a fraction of the peak magnitude
 */
export const DEFAULT_SYMLOG_THRESHOLD = 1e-3;
