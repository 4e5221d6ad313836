#!/usr/bin/env node
/**
 * billrag CLI Entry Point
 *
 * Parses process.argv with the program from ./program.ts and turns any
 * error into a formatted message and exit code.
 */

import { createProgram } from './program.js';
import { handleError, createGlobalErrorHandler } from '../errors/index.js';

async function main(): Promise<void> {
  const program = createProgram();

  // Read after parsing so --verbose/--json apply to late errors too
  const getErrorOptions = () => {
    const opts = program.opts<{ verbose?: boolean; json?: boolean }>();
    return { verbose: opts.verbose ?? false, json: opts.json ?? false };
  };

  // These catch errors that escape all try/catch blocks
  process.on('uncaughtException', (error) => createGlobalErrorHandler(getErrorOptions())(error));
  process.on('unhandledRejection', (reason) => createGlobalErrorHandler(getErrorOptions())(reason));

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
