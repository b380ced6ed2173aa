/**
 * Config Command
 *
 *   chunkwise config get <key>      Print one effective value
 *   chunkwise config list           Print every effective value
 *   chunkwise config path           Print the config file location
 *   chunkwise config init [--force] Write the commented template
 *
 * "Effective" means after defaults, config.toml and CHUNKWISE_* variables
 * are merged.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import { getConfigPath, getConfigValue, listConfig, writeConfigTemplate } from '../../config/loader.js';
import { CLIError } from '../../errors/index.js';
import type { CommandContext } from '../types.js';
import { loadCommandConfig } from './shared.js';

export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config').description('Inspect configuration settings');

  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g. chunkwise config get batching.token_model)')
    .action((key: string) => {
      const ctx = getContext();
      const value = getConfigValue(loadCommandConfig(ctx), key);

      if (value === undefined) {
        throw new CLIError(`Unknown config key: ${key}`, 'Run: chunkwise config list  to see all available keys');
      }

      if (ctx.options.json) {
        console.log(JSON.stringify({ key, value }));
      } else {
        ctx.log(formatValue(value));
      }
    });

  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values')
    .action(() => {
      const ctx = getContext();
      const entries = listConfig(loadCommandConfig(ctx));

      if (ctx.options.json) {
        console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
        return;
      }

      ctx.log(chalk.bold('Configuration:'));
      ctx.log('');
      let currentGroup = '';
      for (const [key, value] of entries) {
        const group = key.includes('.') ? (key.split('.')[0] ?? '') : '';
        if (group !== currentGroup) {
          ctx.log('');
          currentGroup = group;
        }
        ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}`);
      }
      ctx.log('');
      ctx.log(chalk.dim(`Config file: ${ctx.options.config ?? getConfigPath()}`));
    });

  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = ctx.options.config ?? getConfigPath();

      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath }));
      } else {
        ctx.log(configPath);
      }
    });

  configCmd
    .command('init')
    .description('Write a commented config.toml with the defaults')
    .option('-f, --force', 'Overwrite an existing file', false)
    .action((options: { force: boolean }) => {
      const ctx = getContext();
      const configPath = ctx.options.config ?? getConfigPath();
      writeConfigTemplate(configPath, options.force);

      if (ctx.options.json) {
        console.log(JSON.stringify({ success: true, path: configPath }));
      } else {
        ctx.log(`${chalk.green('✓')} Wrote ${configPath}`);
      }
    });

  return configCmd;
}

/**
 * Format a value for display.
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean' || typeof value === 'number') return String(value);
  return JSON.stringify(value);
}
