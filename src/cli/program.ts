/**
 * Builds the `billrag` commander program. Kept apart from the entry point
 * so tests can inspect and drive it without parsing process.argv.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { readFileSync } from 'node:fs';

import type { GlobalOptions } from './types.js';
import { createContext } from './context.js';
import { createAskCommand } from './commands/ask.js';
import { createChatCommand } from './commands/chat.js';
import { createConfigCommand } from './commands/config.js';
import { createIngestCommand } from './commands/ingest.js';
import { createSearchCommand } from './commands/search.js';
import { createStatusCommand } from './commands/status.js';
import { CLIError } from '../errors/index.js';

/**
 * package.json sits two levels up from both src/cli/ and dist/cli/.
 */
function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('billrag')
    .description('Ask questions about your utility bills, answered with citations')
    .version(readVersion(), '-v, --version', 'Display version number')

    // Global options - available to ALL subcommands
    .option('--verbose', 'Enable verbose output for debugging', false)
    .option('--json', 'Output results as JSON', false)

    .addHelpText(
      'after',
      `
${chalk.dim('Examples:')}
  ${chalk.cyan('billrag ingest')}                          Index new and changed bills
  ${chalk.cyan('billrag ask "What was due in March?"')}    Ask one question
  ${chalk.cyan('billrag chat')}                            Multi-turn chat with citations
  ${chalk.cyan('billrag search "meter reading" -k 10')}    See what retrieval returns
  ${chalk.cyan('billrag status')}                          List indexed bills
  ${chalk.cyan('billrag config list')}                     Show the effective configuration
`
    );

  /**
   * Commander stores options on the Command object after parsing
   */
  const getGlobalOptions = (): GlobalOptions => {
    const opts = program.opts<Partial<GlobalOptions>>();
    return {
      verbose: opts.verbose ?? false,
      json: opts.json ?? false,
    };
  };
  const getContext = () => createContext(getGlobalOptions());

  program.addCommand(createIngestCommand(getContext));
  program.addCommand(createChatCommand(getContext));
  program.addCommand(createAskCommand(getContext));
  program.addCommand(createSearchCommand(getContext));
  program.addCommand(createStatusCommand(getContext));
  program.addCommand(createConfigCommand(getContext));

  // Unknown commands
  program.on('command:*', (operands: string[]) => {
    throw new CLIError(`Unknown command: ${operands[0] ?? ''}`, 'Run: billrag --help  to see available commands');
  });

  return program;
}
