/**
 * @orbital-slice/cli
 *
 * Command-line front end: `orbital-slice n [l] [m] [options]`.
 *
 * @packageDocumentation
 */

export { run, EXIT_OK, EXIT_INVALID, EXIT_USAGE, type CliIO } from './main';
export { parseArgs, outputFormat, UsageError, USAGE, type CliArgs, type OutputFormat } from './args';

export const VERSION = '0.1.0';
