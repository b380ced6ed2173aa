#!/usr/bin/env node
/**
 * chunkwise CLI Entry Point
 *
 * Sets up Commander with the global options and registers the subcommands.
 */

import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';

import { createContext, type GlobalOptions } from './types.js';
import { createChunkCommand } from './commands/chunk.js';
import { createChunkersCommand } from './commands/chunkers.js';
import { createConfigCommand } from './commands/config.js';
import { createIngestCommand } from './commands/ingest.js';
import { handleError, createGlobalErrorHandler, CLIError } from '../errors/index.js';

// package.json sits two levels above both src/cli and dist/cli
function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (error) {
    console.warn(chalk.dim(`Could not read package version: ${error instanceof Error ? error.message : error}`));
  }
  return '0.0.0';
}

const program = new Command();

program
  .name('chunkwise')
  .description('Split source repositories into semantic chunks and pack them into token-budgeted batches')
  .version(readVersion(), '-v, --version', 'Display version number')
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)
  .option('-c, --config <path>', 'Config file (default: ~/.chunkwise/config.toml)')
  .addHelpText(
    'after',
    `
${chalk.dim('Examples:')}
  ${chalk.cyan('chunkwise chunk ./my-repo')}                      Summarise how a repository chunks
  ${chalk.cyan('chunkwise ingest ./my-repo --out batches.jsonl')} Write token-budgeted batches
  ${chalk.cyan('chunkwise ingest ./my-repo --dry-run')}           Plan batches only
  ${chalk.cyan('chunkwise chunkers')}                             Show which chunker handles what
  ${chalk.cyan('chunkwise config list')}                          Show the effective configuration
`
  );

function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
    config: opts.config,
  };
}

const getContext = () => createContext(getGlobalOptions());

program.addCommand(createChunkCommand(getContext));
program.addCommand(createIngestCommand(getContext));
program.addCommand(createChunkersCommand(getContext));
program.addCommand(createConfigCommand(getContext));

program.on('command:*', (operands: string[]) => {
  throw new CLIError(`Unknown command: ${operands[0]}`, 'Run: chunkwise --help  to see available commands');
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
