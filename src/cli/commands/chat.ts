/**
 * Chat Command
 *
 * Interactive multi-turn REPL over the indexed bills. Each line is one
 * agent turn; earlier turns are sent along as history.
 *
 *   billrag chat
 *
 * REPL commands:
 *   exit, quit, Ctrl+D   leave
 *   /clear               forget the conversation so far
 *   Ctrl+C               cancel the running turn
 */

import { Command } from 'commander';
import { createInterface } from 'node:readline';
import chalk from 'chalk';

import type { CommandContext, ContextFactory } from '../types.js';
import { createAgentFromRuntime, createRuntime, withRuntime, type RuntimeFactory } from '../runtime.js';
import { createAgentEventRenderer, renderTurnResult, type Write } from '../utils/agent-event-renderer.js';
import type { ChatAgent } from '../../agent/index.js';
import { TurnCancelledError } from '../../errors/index.js';

const EXIT_COMMANDS = new Set(['exit', 'quit']);
const CLEAR_COMMAND = '/clear';

export interface ChatReplOptions {
  agent: ChatAgent;
  ctx: CommandContext;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Where tool activity is written (defaults to stdout) */
  write?: Write;
  /** Use terminal features (raw mode, SIGINT on Ctrl+C); defaults to input.isTTY */
  terminal?: boolean;
}

/**
 * Run the REPL until exit, quit or end of input.
 */
export async function runChatRepl(options: ChatReplOptions): Promise<void> {
  const { agent, ctx } = options;
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;

  const rl = createInterface({
    input,
    output,
    prompt: chalk.cyan('billrag> '),
    terminal: options.terminal ?? process.stdin.isTTY ?? false,
  });

  let current: AbortController | null = null;
  const onInterrupt = () => {
    if (current) {
      current.abort();
      return;
    }
    output.write('\n' + chalk.dim('(type exit or press Ctrl+D to leave)') + '\n');
    rl.prompt();
  };
  rl.on('SIGINT', onInterrupt);
  process.on('SIGINT', onInterrupt);

  const onEvent = createAgentEventRenderer(ctx, options.write);

  try {
    rl.prompt();
    for await (const raw of rl) {
      const line = raw.trim();

      if (EXIT_COMMANDS.has(line.toLowerCase())) {
        break;
      }

      if (line === CLEAR_COMMAND) {
        agent.clearHistory();
        ctx.log(chalk.dim('Conversation cleared.'));
      } else if (line) {
        current = new AbortController();
        try {
          const result = await agent.runTurn(line, { signal: current.signal, onEvent });
          renderTurnResult(result, ctx);
        } catch (error) {
          if (!(error instanceof TurnCancelledError)) {
            throw error;
          }
          ctx.log(chalk.dim('Cancelled.'));
        } finally {
          current = null;
        }
        ctx.log('');
      }

      rl.prompt();
    }
  } finally {
    process.off('SIGINT', onInterrupt);
    rl.close();
  }
}

export interface ChatCommandDeps {
  createRuntime?: RuntimeFactory;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  write?: Write;
}

export function createChatCommand(getContext: ContextFactory, deps: ChatCommandDeps = {}): Command {
  const buildRuntime = deps.createRuntime ?? createRuntime;

  return new Command('chat')
    .description('Chat about your bills (multi-turn, with citations)')
    .action(async () => {
      const ctx = getContext();

      await withRuntime(buildRuntime, ctx, async (runtime) => {
        await runtime.store.ensureReady();
        const agent = createAgentFromRuntime(runtime, ctx);

        ctx.log(chalk.bold('billrag chat'));
        ctx.log(chalk.dim(`Model: ${runtime.config.llm.model}. Type exit or press Ctrl+D to leave, /clear to start over.`));
        ctx.log('');

        await runChatRepl({
          agent,
          ctx,
          input: deps.input,
          output: deps.output,
          write: deps.write,
          terminal: deps.input ? false : undefined,
        });
      });
    });
}
