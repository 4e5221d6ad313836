/**
 * Error formatting and process-level handling for the CLI.
 *
 * - Coloured output for terminals
 * - JSON output for --json
 * - Stack traces and error causes with --verbose
 */

import chalk from 'chalk';
import { CLIError } from './types.js';

export interface ErrorHandlerOptions {
  /** Show full stack traces and causes */
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
  cause?: string;
  stack?: string;
}

/**
 * One-line description of any thrown value, used in logs and summaries.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Name of the error class, or 'Error' for non-Error throwables.
 */
export function errorName(error: unknown): string {
  return error instanceof Error ? error.name : 'Error';
}

function causeOf(error: Error): Error | undefined {
  return error.cause instanceof Error ? error.cause : undefined;
}

/**
 * Format an error for display.
 *
 * Kept separate from handleError so it can be tested without process.exit.
 */
export function formatError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): string {
  const { verbose = false, json = false } = options;

  if (!(error instanceof Error)) {
    if (json) {
      return JSON.stringify({ error: String(error), name: 'Error', code: 1 }, null, 2);
    }
    return chalk.red('Error: ') + String(error);
  }

  const hint = error instanceof CLIError ? error.hint : undefined;
  const cause = causeOf(error);

  if (json) {
    const output: ErrorOutput = {
      error: error.message,
      name: error.name,
      code: getExitCode(error),
      hint,
      cause: verbose && cause ? cause.message : undefined,
      stack: verbose ? error.stack : undefined,
    };
    return JSON.stringify(output, null, 2);
  }

  const lines: string[] = [chalk.red('Error: ') + error.message];

  if (hint) {
    lines.push(chalk.dim('Hint: ') + hint);
  } else if (!verbose && !(error instanceof CLIError)) {
    lines.push(chalk.dim('Hint: ') + 'Run with --verbose for more details');
  }

  if (verbose) {
    if (cause) {
      lines.push(chalk.dim('Caused by: ') + cause.message);
    }
    if (error.stack) {
      lines.push('');
      lines.push(chalk.dim('Stack trace:'));
      lines.push(chalk.dim(error.stack));
    }
  }

  return lines.join('\n');
}

/**
 * CLIError carries its own code, everything else exits with 1.
 */
export function getExitCode(error: unknown): number {
  if (error instanceof CLIError) {
    return error.code;
  }
  return 1;
}

/**
 * Format the error on stderr and exit with its code.
 */
export function handleError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Build a handler for process-level events.
 *
 * Usage:
 *   const handler = createGlobalErrorHandler({ verbose: true });
 *   process.on('uncaughtException', handler);
 *   process.on('unhandledRejection', handler);
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
