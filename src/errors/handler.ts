/**
 * CLI error formatting and display.
 *
 * - Colored output for the terminal
 * - JSON output for `--json`
 * - Stack traces under `--verbose`
 */

import chalk from 'chalk';
import { CLIError } from './types.js';

export interface ErrorHandlerOptions {
  /** Show full stack traces */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  name: string;
  code: number;
  hint?: string;
  stack?: string;
}

/**
 * One-line description of anything that was thrown. Used when recording
 * failures in reports, where a full format would be noise.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const { verbose = false, json = false } = options;

  if (!(error instanceof Error)) {
    if (json) {
      return JSON.stringify({ error: String(error), name: 'Error', code: 1 }, null, 2);
    }
    return chalk.red('Error: ') + String(error);
  }

  const cliError = error instanceof CLIError ? error : undefined;

  if (json) {
    const output: ErrorOutput = {
      error: error.message,
      name: error.name,
      code: cliError?.code ?? 1,
      hint: cliError?.hint,
      stack: verbose ? error.stack : undefined,
    };
    return JSON.stringify(output, null, 2);
  }

  const lines: string[] = [chalk.red('Error: ') + error.message];

  if (cliError?.hint) {
    lines.push(chalk.dim('Hint: ') + cliError.hint);
  }

  if (verbose && error.stack) {
    lines.push('');
    lines.push(chalk.dim('Stack trace:'));
    lines.push(chalk.dim(error.stack));
  } else if (!cliError) {
    lines.push(chalk.dim('Hint: ') + 'Run with --verbose for more details');
  }

  return lines.join('\n');
}

/**
 * CLIError carries its own code, everything else is 1.
 */
export function getExitCode(error: unknown): number {
  if (error instanceof CLIError) {
    return error.code;
  }
  return 1;
}

/**
 * Format the error to stderr and exit with its code.
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Handler suitable for `process.on('uncaughtException' | 'unhandledRejection')`.
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
