import chalk from 'chalk';

import type { Logger } from '../utils/logger.js';

/**
 * Global CLI options available to all commands.
 */
export interface GlobalOptions {
  /** Enable verbose output for debugging */
  verbose: boolean;
  /** Output results as JSON instead of human-readable text */
  json: boolean;
  /** Config file to use instead of ~/.chunkwise/config.toml */
  config?: string;
}

/**
 * Context passed to all command handlers. Satisfies `Logger`, so it can be
 * handed straight to library code.
 */
export interface CommandContext extends Logger {
  options: GlobalOptions;
  /** Log a message (suppressed under --json) */
  log: (message: string) => void;
  /** Only shown with --verbose */
  debug: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

export function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    info: (message) => {
      if (options.verbose && !options.json) {
        console.log(message);
      }
    },
    warn: (message) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}
