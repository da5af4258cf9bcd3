/**
 * Command-line argument parsing for pid-simulate
 */

import type { LevelWithSilent } from 'pino';
import { ConfigError } from '../api/errors.js';

export interface CLIArgs {
  /** Positional arguments; the first is the settings file */
  _: string[];
  out?: string;
  logLevel?: string;
  plot: boolean;
  quiet: boolean;
  help: boolean;
}

export const DEFAULT_OUTPUT_DIR = 'simulation-out';

export function parseArgs(args: readonly string[]): CLIArgs {
  const result: CLIArgs = { _: [], plot: false, quiet: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--help':
      case '-h':
        result.help = true;
        break;
      case '--plot':
        result.plot = true;
        break;
      case '--quiet':
        result.quiet = true;
        break;
      case '--out':
      case '--log-level': {
        const value = args[i + 1];
        if (value === undefined || value.startsWith('--')) {
          throw new ConfigError(`Missing value for ${arg}`);
        }
        if (arg === '--out') {
          result.out = value;
        } else {
          result.logLevel = value;
        }
        i++;
        break;
      }
      default:
        if (arg.startsWith('--')) {
          throw new ConfigError(`Unknown option: ${arg}`);
        }
        result._.push(arg);
    }
  }

  // A plot is always written to disk
  if (result.plot && result.out === undefined) {
    result.out = DEFAULT_OUTPUT_DIR;
  }

  return result;
}

/**
 * Log level used when neither --log-level nor PID_SIM_LOG_LEVEL is set.
 * Info-level records would interleave with the report on stdout.
 */
export function defaultLogLevel(args: CLIArgs): LevelWithSilent {
  return args.quiet ? 'error' : 'warn';
}

export const USAGE = `
PID Simulation - Drive a PID controller against a noisy simulated process

USAGE:
  pid-simulate [settings-file] [options]

ARGUMENTS:
  settings-file                 JSON or YAML file with a "simulation" section
                                (built-in defaults when omitted)

OPTIONS:
  --out <dir>                   Save settings, timing and data as JSON
  --plot                        Also save an SVG plot (default dir: ${DEFAULT_OUTPUT_DIR})
  --quiet                       Only print errors
  --log-level <level>           trace|debug|info|warn|error|fatal|silent
  -h, --help                    Show this help
`;
