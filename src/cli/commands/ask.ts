/**
 * Ask Command
 *
 * One question, one agent turn, no history.
 *
 *   billrag ask "How much was the March electricity bill?"
 *   billrag ask "Which month had the highest gas usage?" --json
 *
 * Ctrl+C cancels the turn (exit code 130). A turn that fails prints the
 * apology and exits 1.
 */

import { Command } from 'commander';

import type { ContextFactory } from '../types.js';
import { createAgentFromRuntime, createRuntime, withRuntime, type RuntimeFactory } from '../runtime.js';
import { createAgentEventRenderer, renderTurnResult, type Write } from '../utils/agent-event-renderer.js';
import { AskArgsSchema, validateInput } from '../validation.js';

export interface AskCommandDeps {
  createRuntime?: RuntimeFactory;
  write?: Write;
}

export function createAskCommand(getContext: ContextFactory, deps: AskCommandDeps = {}): Command {
  const buildRuntime = deps.createRuntime ?? createRuntime;

  return new Command('ask')
    .argument('<question>', 'Question about your bills')
    .description('Ask one question about the indexed bills')
    .action(async (rawQuestion: string) => {
      const ctx = getContext();
      const { question } = validateInput(AskArgsSchema, { question: rawQuestion });

      await withRuntime(buildRuntime, ctx, async (runtime) => {
        await runtime.store.ensureReady();
        const agent = createAgentFromRuntime(runtime, ctx, createAgentEventRenderer(ctx, deps.write));

        const controller = new AbortController();
        const onSigint = () => controller.abort();
        process.on('SIGINT', onSigint);

        try {
          const result = await agent.runTurn(question, { signal: controller.signal });
          renderTurnResult(result, ctx);
          if (result.status === 'failed') {
            process.exitCode = 1;
          }
        } finally {
          process.off('SIGINT', onSigint);
        }
      });
    });
}
