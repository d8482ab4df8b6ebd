/**
 * orbital-slice command
 *
 * Validates the command line, builds the plot and writes it as PNG or SVG.
 * Exit codes: 0 success, 1 rejected request, 2 malformed command line.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { pathToFileURL } from 'node:url';
import { defaultOutputName, OrbitalError, resolvePlotRequest } from '@orbital-slice/core';
import { buildPlot, encodePng, renderSvg } from '@orbital-slice/viz';
import { parseArgs, UsageError, USAGE, type CliArgs } from './args';

export const EXIT_OK = 0;
export const EXIT_INVALID = 1;
export const EXIT_USAGE = 2;

/**
 * Console and file system seams
 */
export interface CliIO {
  log: (message: string) => void;
  error: (message: string) => void;
  writeFile: (path: string, data: string | Uint8Array) => Promise<void>;
}

const nodeIO: CliIO = {
  log: (message) => console.log(message),
  error: (message) => console.error(message),
  writeFile: async (path, data) => {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, data);
  },
};

/**
 * Run the command and return its exit code
 */
export async function run(argv: readonly string[], io: CliIO = nodeIO): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      io.error(`orbital-slice: ${err.message}`);
      io.error("Run 'orbital-slice --help' for usage.");
      return EXIT_USAGE;
    }
    throw err;
  }

  if (args.help) {
    io.log(USAGE);
    return EXIT_OK;
  }

  try {
    const request = resolvePlotRequest(args.request);
    const plot = buildPlot(request);
    const output =
      args.output ??
      defaultOutputName({
        quantumNumbers: request.quantumNumbers,
        mode: request.mode,
        plane: request.slice.plane,
        value: request.slice.value,
      });
    const data = args.format === 'svg' ? renderSvg(plot) : encodePng(plot);

    await io.writeFile(output, data);
    io.log(`Saved plot to: ${output}`);
    return EXIT_OK;
  } catch (err) {
    if (err instanceof OrbitalError) {
      io.error(`orbital-slice: ${err.message}`);
      return EXIT_INVALID;
    }
    throw err;
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('orbital-slice failed:', error);
      process.exit(EXIT_INVALID);
    });
}
