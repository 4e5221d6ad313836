/**
 * Config Command
 *
 * Shows the effective configuration (defaults, then ~/.billrag/config.toml,
 * then environment variables):
 *   billrag config list          - Show all configuration
 *   billrag config get <key>     - Get a value or a whole section
 *   billrag config path          - Show config file location
 *   billrag config init          - Write a commented config file if none exists
 *
 * Secrets (access_key, secret_key, api_key) are always masked.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync } from 'node:fs';

import { listConfig, loadConfig, resolveConfigPath } from '../../config/index.js';
import type { CommandContext, ContextFactory } from '../types.js';

/**
 * Look up a dotted key among the masked entries. A section name returns
 * its entries with the section prefix stripped.
 */
export function lookupConfigKey(
  entries: Array<[string, unknown]>,
  key: string
): { value: unknown } | undefined {
  const exact = entries.find(([entryKey]) => entryKey === key);
  if (exact) {
    return { value: exact[1] };
  }

  const prefix = `${key}.`;
  const section = entries.filter(([entryKey]) => entryKey.startsWith(prefix));
  if (section.length === 0) {
    return undefined;
  }
  return {
    value: Object.fromEntries(section.map(([entryKey, value]) => [entryKey.slice(prefix.length), value])),
  };
}

/**
 * Create the config command with all subcommands
 */
export function createConfigCommand(getContext: ContextFactory): Command {
  const configCmd = new Command('config').description('Show configuration settings');

  // billrag config get <key>
  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., billrag config get retrieval.top_k)')
    .action((key: string) => {
      const ctx = getContext();
      const found = lookupConfigKey(listConfig(loadConfig()), key);

      if (found === undefined) {
        ctx.error(`Unknown config key: ${key}`);
        ctx.log('');
        ctx.log(`Run ${chalk.cyan('billrag config list')} to see all available keys.`);
        process.exitCode = 1;
        return;
      }

      if (ctx.options.json) {
        console.log(JSON.stringify({ key, value: found.value ?? null }));
      } else {
        ctx.log(formatValue(found.value));
      }
    });

  // billrag config list
  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values')
    .action(() => {
      const ctx = getContext();
      const entries = listConfig(loadConfig());

      if (ctx.options.json) {
        console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
        return;
      }

      ctx.log(chalk.bold('Configuration:'));
      ctx.log('');

      // Group by top-level key for readability
      let currentGroup = '';
      for (const [key, value] of entries) {
        const group = key.split('.')[0] ?? '';
        if (group !== currentGroup) {
          if (currentGroup !== '') ctx.log('');
          currentGroup = group;
        }
        ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}`);
      }

      ctx.log('');
      ctx.log(chalk.dim(`Config file: ${resolveConfigPath()}`));
    });

  // billrag config path
  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = resolveConfigPath();

      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath, exists: existsSync(configPath) }));
      } else {
        ctx.log(configPath);
      }
    });

  // billrag config init
  configCmd
    .command('init')
    .description('Write a commented config file if none exists')
    .action(() => {
      const ctx = getContext();
      reportInit(ctx, resolveConfigPath());
    });

  return configCmd;
}

function reportInit(ctx: CommandContext, configPath: string): void {
  const existed = existsSync(configPath);
  if (!existed) {
    loadConfig({ configPath, createIfMissing: true });
  }

  if (ctx.options.json) {
    console.log(JSON.stringify({ path: configPath, created: !existed }));
  } else if (existed) {
    ctx.log(`${chalk.dim('Config file already exists:')} ${configPath}`);
  } else {
    ctx.log(`${chalk.green('✓')} Wrote ${configPath}`);
  }
}

/**
 * Format a value for display
 */
function formatValue(value: unknown): string {
  if (value === undefined) return '(unset)';
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return String(value);
  return JSON.stringify(value);
}
