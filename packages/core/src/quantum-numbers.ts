/**
 * Quantum Number Validation
 *
 * Accepts one to three positional values `n [l] [m]`; omitted trailing
 * values default to 0. Hydrogenic constraints:
 *
 *   n >= 1,  0 <= l <= n - 1,  -l <= m <= l
 */

import { InvalidQuantumNumberError } from './errors';

/**
 * Validated (n, l, m) triple
 */
export interface QuantumNumbers {
  readonly n: number;
  readonly l: number;
  readonly m: number;
}

/**
 * Spectroscopic letters for l = 0, 1, 2, ...
 */
const L_LABELS = ['s', 'p', 'd', 'f', 'g', 'h', 'i', 'k', 'l', 'm', 'n', 'o'];

/**
 * Parse and validate one to three quantum numbers.
 *
 * @throws InvalidQuantumNumberError when the count or any constraint fails
 */
export function parseQuantumNumbers(values: readonly number[]): QuantumNumbers {
  if (values.length < 1 || values.length > 3) {
    throw new InvalidQuantumNumberError(
      'Please provide 1 to 3 quantum numbers: n [l] [m].'
    );
  }

  for (const value of values) {
    if (!Number.isInteger(value)) {
      throw new InvalidQuantumNumberError(`Quantum numbers must be integers, got ${value}.`);
    }
  }

  const [n, l = 0, m = 0] = values;
  return validateQuantumNumbers({ n, l, m });
}

/**
 * Validate an already-assembled triple and freeze it.
 */
export function validateQuantumNumbers(qn: QuantumNumbers): QuantumNumbers {
  const { n, l, m } = qn;

  if (!Number.isInteger(n) || !Number.isInteger(l) || !Number.isInteger(m)) {
    throw new InvalidQuantumNumberError('Quantum numbers must be integers.');
  }
  if (n < 1) {
    throw new InvalidQuantumNumberError('Principal quantum number n must be >= 1.');
  }
  if (l < 0) {
    throw new InvalidQuantumNumberError('Angular momentum quantum number l must be >= 0.');
  }
  if (l > n - 1) {
    throw new InvalidQuantumNumberError(
      'Angular momentum quantum number l must satisfy l <= n - 1.'
    );
  }
  if (Math.abs(m) > l) {
    throw new InvalidQuantumNumberError('Magnetic quantum number m must satisfy |m| <= l.');
  }

  return Object.freeze({ n, l, m });
}

/**
 * Orbital label such as "1s", "2p" or "4f"
 */
export function orbitalLabel(qn: QuantumNumbers): string {
  return `${qn.n}${L_LABELS[qn.l] ?? `[l=${qn.l}]`}`;
}
