#!/usr/bin/env node

/**
 * PID Simulation CLI
 *
 * Usage:
 *   pid-simulate                              # Run with built-in defaults
 *   pid-simulate settings.json --plot         # Run from a file and save a plot
 */

import { createLogger } from '../utils/logger.js';
import { defaultLogLevel, parseArgs, type CLIArgs } from './args.js';
import { runSimulateCommand } from './simulate-command.js';

async function main(): Promise<void> {
  let args: CLIArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`***ERROR: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }

  const logger = createLogger({ level: args.logLevel, defaultLevel: defaultLogLevel(args) });

  const code = await runSimulateCommand(args, {
    stdout: (text) => console.log(text),
    stderr: (text) => console.error(text),
    logger,
  });

  process.exit(code);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
