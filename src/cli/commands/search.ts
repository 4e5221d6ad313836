/**
 * Search Command
 *
 * Runs the search_pdfs tool directly, without the chat model. Useful to
 * check what the agent would see for a query.
 *
 *   billrag search "amount due march"
 *   billrag search "meter reading" -k 10 --json
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { ContextFactory } from '../types.js';
import { createRuntime, createToolFromRuntime, withRuntime, type RuntimeFactory } from '../runtime.js';
import { SearchArgsSchema, searchOptionsSchema, validateInput } from '../validation.js';
import { formatHitJSON, formatHits } from '../../search/index.js';

export interface SearchCommandDeps {
  createRuntime?: RuntimeFactory;
}

export function createSearchCommand(getContext: ContextFactory, deps: SearchCommandDeps = {}): Command {
  const buildRuntime = deps.createRuntime ?? createRuntime;

  return new Command('search')
    .argument('<query>', 'What to look for')
    .description('Search the indexed bills without asking the model')
    .option('-k, --top-k <n>', 'Number of passages (default: retrieval.top_k)')
    .action(async (rawQuery: string, cmdOptions: { topK?: string }) => {
      const ctx = getContext();
      const { query } = validateInput(SearchArgsSchema, { query: rawQuery });

      await withRuntime(buildRuntime, ctx, async (runtime) => {
        const { retrieval } = runtime.config;
        const { k } = validateInput(searchOptionsSchema(retrieval.max_top_k), { k: cmdOptions.topK });

        await runtime.store.ensureReady();
        const tool = createToolFromRuntime(runtime, ctx);
        const input = tool.parse({ query, top_k: k ?? retrieval.top_k });

        const started = performance.now();
        const hits = await tool.execute(input);
        const elapsed = Math.round(performance.now() - started);

        if (ctx.options.json) {
          console.log(JSON.stringify({ query, top_k: input.top_k, hits: hits.map(formatHitJSON) }));
          return;
        }

        if (hits.length === 0) {
          ctx.log(chalk.yellow(`No passages scored at least ${retrieval.min_score} for "${query}".`));
          ctx.log(chalk.dim('Run: billrag ingest  if bills were added recently'));
          return;
        }

        ctx.log(chalk.dim(`${hits.length} passage(s) in ${elapsed}ms`));
        ctx.log('');
        ctx.log(formatHits(hits));
      });
    });
}
