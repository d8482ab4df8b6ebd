/**
 * Radial Wavefunction
 *
 *   R_{n,l}(r) = N · e^(-ρ/2) · ρ^l · L_{n-l-1}^{2l+1}(ρ),   ρ = 2r / n
 *   N = (2/n)^(3/2) · sqrt((n-l-1)! / (2n (n+l)!))
 *
 * r is in units of a0. N, ρ^l and e^(-ρ/2) are combined as one exponent so
 * that no factorial or power is formed on its own.
 */

/**
 * ln(0!) .. ln(max!) by cumulative sum of logarithms
 */
export function logFactorials(max: number): Float64Array {
  if (max < 0 || !Number.isInteger(max)) {
    throw new Error(`logFactorial expects a non-negative integer, got ${max}`);
  }
  const table = new Float64Array(max + 1);
  for (let i = 2; i <= max; i++) {
    table[i] = table[i - 1] + Math.log(i);
  }
  return table;
}

/**
 * ln(k!)
 */
export function logFactorial(k: number): number {
  return logFactorials(k)[k];
}

/**
 * Generalized Laguerre polynomial L_p^α(x) by the three-term recurrence
 *
 *   (k+1) L_{k+1} = (2k + 1 + α - x) L_k - (k + α) L_{k-1}
 */
export function generalizedLaguerre(p: number, alpha: number, x: number): number {
  if (p === 0) return 1;

  let previous = 1;
  let current = 1 + alpha - x;
  for (let k = 1; k < p; k++) {
    const next = ((2 * k + 1 + alpha - x) * current - (k + alpha) * previous) / (k + 1);
    previous = current;
    current = next;
  }
  return current;
}

/**
 * ln N for the radial normalization constant
 */
function logNormalization(n: number, l: number): number {
  const lnFact = logFactorials(n + l);
  return (
    1.5 * Math.log(2 / n) +
    0.5 * (lnFact[n - l - 1] - Math.log(2 * n) - lnFact[n + l])
  );
}

/**
 * Build R_{n,l} as a function of r (a0). Constants are computed once.
 */
export function createRadialFunction(n: number, l: number): (r: number) => number {
  const logN = logNormalization(n, l);
  const degree = n - l - 1;
  const alpha = 2 * l + 1;

  return (r: number): number => {
    const rho = (2 * Math.max(r, 0)) / n;
    const laguerre = generalizedLaguerre(degree, alpha, rho);

    if (rho === 0) {
      return l === 0 ? Math.exp(logN) * laguerre : 0;
    }
    return Math.exp(logN - rho / 2 + l * Math.log(rho)) * laguerre;
  };
}

/**
 * Evaluate R_{n,l}(r)
 */
export function radialWavefunction(n: number, l: number, r: number): number {
  return createRadialFunction(n, l)(r);
}

/**
 * Radial probability per unit radius r²|R_{n,l}(r)|²
 */
export function radialDistribution(n: number, l: number, r: number): number {
  const radial = radialWavefunction(n, l, r);
  return r * r * radial * radial;
}
