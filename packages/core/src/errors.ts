/**
 * Error kinds raised while validating a plot request.
 *
 * Every kind is a deterministic input error: callers report it and stop,
 * nothing is retried or replaced by a default.
 */

export type OrbitalErrorCode =
  | 'INVALID_QUANTUM_NUMBER'
  | 'INVALID_SLICE_SPEC'
  | 'UNSUPPORTED_SCALE'
  | 'CONFLICTING_OPTION'
  | 'INVALID_OPTION'
  | 'UNKNOWN_COLORMAP';

/**
 * Base class for all validation failures
 */
export class OrbitalError extends Error {
  readonly code: OrbitalErrorCode;

  constructor(code: OrbitalErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = 'OrbitalError';
  }
}

/**
 * n, l or m outside the hydrogenic domain
 */
export class InvalidQuantumNumberError extends OrbitalError {
  constructor(message: string) {
    super('INVALID_QUANTUM_NUMBER', message);
    this.name = 'InvalidQuantumNumberError';
  }
}

/**
 * Malformed plane, value, range or resolution
 */
export class InvalidSliceSpecError extends OrbitalError {
  constructor(message: string) {
    super('INVALID_SLICE_SPEC', message);
    this.name = 'InvalidSliceSpecError';
  }
}

/**
 * Colour scale that cannot represent the requested field
 */
export class UnsupportedScaleError extends OrbitalError {
  constructor(message: string) {
    super('UNSUPPORTED_SCALE', message);
    this.name = 'UnsupportedScaleError';
  }
}

/**
 * Two options that cannot be combined
 */
export class ConflictingOptionError extends OrbitalError {
  constructor(message: string) {
    super('CONFLICTING_OPTION', message);
    this.name = 'ConflictingOptionError';
  }
}

/**
 * Option value of the wrong type or outside its allowed set
 */
export class InvalidOptionError extends OrbitalError {
  constructor(message: string) {
    super('INVALID_OPTION', message);
    this.name = 'InvalidOptionError';
  }
}

export class UnknownColormapError extends OrbitalError {
  constructor(name: string) {
    super('UNKNOWN_COLORMAP', `Unknown colormap: ${name}`);
    this.name = 'UnknownColormapError';
  }
}

/**
 * Check whether a value is one of the validation errors above
 */
export function isOrbitalError(value: unknown): value is OrbitalError {
  return value instanceof OrbitalError;
}
