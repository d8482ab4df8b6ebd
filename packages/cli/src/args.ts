/**
 * Argument parsing for the orbital-slice command
 */

import {
  colormapNames,
  FieldModeSchema,
  PlaneChoiceSchema,
  ScaleChoiceSchema,
  type PlotRequestInput,
} from '@orbital-slice/core';

export type OutputFormat = 'png' | 'svg';

export interface CliArgs {
  /** Print usage and exit */
  help: boolean;
  request: PlotRequestInput;
  /** Explicit output path; null picks a name from the resolved request */
  output: string | null;
  format: OutputFormat;
}

/**
 * Malformed command line (exit code 2)
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = `Usage: orbital-slice n [l] [m] [options]

Plot analytic hydrogen orbital fields, radial profiles and harmonics.
Missing l and m default to 0.

Options:
  --mode MODE          density | real | imag | real_imag |
                       radial_distribution | spherical_harmonic (default: density)
  --plane PLANE        auto | x | y | z (default: auto)
  --value V            plane coordinate in a0 (default: auto)
  --range MIN MAX      axis range in a0; a single value H means -H..H
  --points N           samples per axis (default: 401)
  --scale SCALE        linear | log | symlog | auto (default: linear)
  --cmap NAME          colormap name, _r to reverse, or sample / sample_density
  --line-mode          draw contour lines instead of a filled surface
  --nodal-lines        overlay the zero level on signed fields (default
                       outside line mode; --no-nodal-lines to disable)
  --colorbar           draw a colorbar (--no-colorbar to disable)
  --output PATH        .png or .svg (default: generated from the parameters)
  -h, --help           show this message

Colormaps: ${colormapNames().join(', ')}`;

const PLANES = PlaneChoiceSchema.exclude(['none']).options;

// ============================================================================
// Token helpers
// ============================================================================

function isNumberToken(token: string | undefined): token is string {
  return token !== undefined && token.trim() !== '' && Number.isFinite(Number(token));
}

function parseNumber(token: string, flag: string): number {
  if (!isNumberToken(token)) {
    throw new UsageError(`${flag} expects a number, got '${token}'`);
  }
  return Number(token);
}

function parseInteger(token: string, flag: string): number {
  const value = parseNumber(token, flag);
  if (!Number.isInteger(value)) {
    throw new UsageError(`${flag} expects an integer, got '${token}'`);
  }
  return value;
}

function parseChoice<T extends string>(options: readonly T[], token: string, flag: string): T {
  const match = options.find((option) => option === token);
  if (match === undefined) {
    throw new UsageError(`${flag} must be one of: ${options.join(', ')}`);
  }
  return match;
}

/**
 * Output format from a path's extension
 */
export function outputFormat(path: string): OutputFormat {
  const lower = path.toLowerCase();
  if (lower.endsWith('.png')) return 'png';
  if (lower.endsWith('.svg')) return 'svg';
  throw new UsageError(`Unsupported output format for '${path}'; use .png or .svg`);
}

// ============================================================================
// Parser
// ============================================================================

/**
 * Parse command-line arguments (without the node and script entries).
 *
 * Quantum numbers are passed through unchecked; the request validator
 * rejects them with its own error kind.
 *
 * @throws UsageError for unknown flags, missing values and malformed tokens
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const quantumNumbers: number[] = [];
  const request: PlotRequestInput = { quantumNumbers, mode: 'density' };
  let output: string | null = null;
  let help = false;

  for (let i = 0; i < argv.length; i += 1) {
    const flag = argv[i];

    const takeValue = (): string => {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new UsageError(`${flag} requires a value`);
      }
      i += 1;
      return value;
    };

    switch (flag) {
      case '-h':
      case '--help':
        help = true;
        break;
      case '--mode':
        request.mode = parseChoice(FieldModeSchema.options, takeValue(), flag);
        break;
      case '--plane':
        request.plane = parseChoice(PLANES, takeValue(), flag);
        break;
      case '--value':
        request.value = parseNumber(takeValue(), flag);
        break;
      case '--range': {
        const first = parseNumber(takeValue(), flag);
        if (isNumberToken(argv[i + 1])) {
          request.range = [first, parseNumber(takeValue(), flag)];
        } else if (first > 0) {
          request.range = [-first, first];
        } else {
          throw new UsageError(`${flag} half-width must be positive, got ${first}`);
        }
        break;
      }
      case '--points':
        request.resolution = parseInteger(takeValue(), flag);
        break;
      case '--scale':
        request.scale = parseChoice(ScaleChoiceSchema.options, takeValue(), flag);
        break;
      case '--cmap':
        request.colormap = takeValue();
        break;
      case '--line-mode':
        request.lineMode = true;
        break;
      case '--nodal-lines':
        request.nodalLines = true;
        break;
      case '--no-nodal-lines':
        request.nodalLines = false;
        break;
      case '--colorbar':
        request.colorbar = true;
        break;
      case '--no-colorbar':
        request.colorbar = false;
        break;
      case '--output':
        output = takeValue();
        break;
      default:
        if (flag.startsWith('--')) {
          throw new UsageError(`Unknown option: ${flag}`);
        }
        quantumNumbers.push(parseNumber(flag, 'quantum number'));
    }
  }

  return {
    help: help || quantumNumbers.length === 0,
    request,
    output,
    format: output === null ? 'png' : outputFormat(output),
  };
}
