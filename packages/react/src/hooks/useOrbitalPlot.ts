/**
 * useOrbitalPlot Hook
 *
 * Recomputes a plot once its input has stopped changing for `debounceMs`.
 */

import { useState, useEffect, useCallback, useRef } from 'react';
import {
  OrbitalError,
  type OrbitalErrorCode,
  type PlotRequestInput,
} from '@orbital-slice/core';
import { plotOrbital, type Plot } from '@orbital-slice/viz';

export interface UseOrbitalPlotOptions {
  /**
   * Quiet period before recomputing, in milliseconds (default: 160)
   */
  debounceMs?: number;

  /**
   * Skip computation while false (default: true)
   */
  enabled?: boolean;
}

export interface UseOrbitalPlotReturn {
  /**
   * Last successfully built plot (kept while a newer input is rejected)
   */
  plot: Plot | null;

  /**
   * Reason the latest input was rejected
   */
  error: string | null;

  /**
   * Stable kind of the rejection, when it is a validation error
   */
  errorCode: OrbitalErrorCode | null;

  /**
   * Whether a recomputation is pending
   */
  computing: boolean;

  /**
   * Recompute immediately with the current input
   */
  refresh: () => void;
}

/**
 * React hook for debounced plot computation
 *
 * @example
 * ```tsx
 * function Viewer({ n, l, m }: { n: number; l: number; m: number }) {
 *   const { plot, error, computing } = useOrbitalPlot({
 *     quantumNumbers: [n, l, m],
 *     mode: 'real',
 *     resolution: 201,
 *   });
 *
 *   if (error) return <p role="alert">{error}</p>;
 *   return <OrbitalSlice plot={plot} aria-busy={computing} />;
 * }
 * ```
 */
export function useOrbitalPlot(
  input: PlotRequestInput,
  options: UseOrbitalPlotOptions = {}
): UseOrbitalPlotReturn {
  const { debounceMs = 160, enabled = true } = options;

  const [plot, setPlot] = useState<Plot | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [errorCode, setErrorCode] = useState<OrbitalErrorCode | null>(null);
  const [computing, setComputing] = useState(enabled);

  // Inputs are usually fresh object literals; compare them by content
  const key = JSON.stringify(input);
  const inputRef = useRef(input);
  inputRef.current = input;

  const compute = useCallback(() => {
    try {
      setPlot(plotOrbital(inputRef.current));
      setError(null);
      setErrorCode(null);
    } catch (err) {
      setError(err instanceof Error ? err.message : String(err));
      setErrorCode(err instanceof OrbitalError ? err.code : null);
    } finally {
      setComputing(false);
    }
  }, []);

  useEffect(() => {
    if (!enabled) {
      setComputing(false);
      return;
    }

    setComputing(true);
    const timer = setTimeout(compute, debounceMs);
    return () => clearTimeout(timer);
  }, [key, debounceMs, enabled, compute]);

  return { plot, error, errorCode, computing, refresh: compute };
}
