/**
 * Angular Wavefunction
 *
 * Complex spherical harmonic Y_l^m(θ, φ) with the Condon-Shortley phase.
 * The associated Legendre factor is built with the fully-normalized
 * recurrence, so the (l-m)!/(l+m)! ratio never appears explicitly:
 *
 *   P̄_m^m     = (-1)^m sqrt((2m+1)/(4π) · Π_{k=1..m} (2k-1)/(2k)) · sin^m θ
 *   P̄_{m+1}^m = sqrt(2m+3) · cos θ · P̄_m^m
 *   P̄_l^m     = a_lm (cos θ · P̄_{l-1}^m - b_lm P̄_{l-2}^m)
 *
 *   a_lm = sqrt((4l² - 1) / (l² - m²))
 *   b_lm = sqrt(((l-1)² - m²) / (4(l-1)² - 1))
 */

import { complex, conjugate, fromPolar, scale, ZERO, type Complex } from './complex';

/**
 * Normalized associated Legendre value N_lm · P_l^m(cos θ) for m >= 0,
 * taking cos θ and sin θ directly.
 */
export function normalizedLegendre(
  l: number,
  m: number,
  cosTheta: number,
  sinTheta: number
): number {
  let pmm = Math.sqrt(1 / (4 * Math.PI));
  for (let k = 1; k <= m; k++) {
    pmm *= -Math.sqrt((2 * k + 1) / (2 * k)) * sinTheta;
  }
  if (l === m) return pmm;

  let pmmp1 = Math.sqrt(2 * m + 3) * cosTheta * pmm;
  if (l === m + 1) return pmmp1;

  let pll = 0;
  for (let ll = m + 2; ll <= l; ll++) {
    const a = Math.sqrt((4 * ll * ll - 1) / (ll * ll - m * m));
    const b = Math.sqrt(((ll - 1) * (ll - 1) - m * m) / (4 * (ll - 1) * (ll - 1) - 1));
    pll = a * (cosTheta * pmmp1 - b * pmm);
    pmm = pmmp1;
    pmmp1 = pll;
  }
  return pll;
}

/**
 * Evaluate Y_l^m(θ, φ).
 *
 * At the poles the azimuth is undefined; the limit is used instead:
 * 0 for m ≠ 0 and sqrt((2l+1)/(4π)) · (cos θ)^l for m = 0.
 */
export function sphericalHarmonic(l: number, m: number, theta: number, phi: number): Complex {
  const absM = Math.abs(m);
  const cosTheta = Math.min(1, Math.max(-1, Math.cos(theta)));
  const sinTheta = Math.sqrt(Math.max(0, (1 - cosTheta) * (1 + cosTheta)));

  if (sinTheta === 0) {
    if (absM !== 0) return ZERO;
    const sign = cosTheta < 0 && l % 2 === 1 ? -1 : 1;
    return complex(sign * Math.sqrt((2 * l + 1) / (4 * Math.PI)));
  }

  const plm = normalizedLegendre(l, absM, cosTheta, sinTheta);
  const positive = fromPolar(plm, absM * phi);
  if (m >= 0) return positive;

  // Y_l^{-m} = (-1)^m conj(Y_l^m)
  return scale(conjugate(positive), absM % 2 === 0 ? 1 : -1);
}
