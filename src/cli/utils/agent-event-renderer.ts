/**
 * Agent Event Renderer
 *
 * Turns ChatAgent events and turn results into terminal output for `chat`
 * and `ask`.
 *
 * ```
 * ChatAgent.runTurn(input, { onEvent })
 *     │
 *     ├── createAgentEventRenderer()  → "Searching..." / "Found N passages"
 *     │
 *     └── renderTurnResult()          → answer, sources, grounding warning
 * ```
 *
 * In --json mode events are not shown and the result is one JSON object.
 */

import chalk from 'chalk';
import type { AgentEventListener, AgentTurnResult } from '../../agent/index.js';
import { formatCitations } from '../../agent/index.js';
import type { CommandContext } from '../types.js';

export type Write = (text: string) => void;

const writeStdout: Write = (text) => {
  process.stdout.write(text);
};

/** \x1b[2K clears the current line, \r returns to column 0 */
const CLEAR_LINE = '\x1b[2K\r';

function queryOf(input: unknown): string | undefined {
  if (typeof input === 'object' && input !== null && 'query' in input && typeof input.query === 'string') {
    return input.query;
  }
  return undefined;
}

/**
 * Live tool activity for one turn.
 */
export function createAgentEventRenderer(ctx: CommandContext, write: Write = writeStdout): AgentEventListener {
  if (ctx.options.json) {
    return () => {};
  }

  return (event) => {
    switch (event.type) {
      case 'state':
        ctx.debug(`agent: ${event.state} (round ${event.round})`);
        break;

      case 'tool_start': {
        const query = queryOf(event.input)?.slice(0, 60) ?? 'bills';
        write(chalk.cyan(`Searching: "${query}"...`));
        break;
      }

      case 'tool_result': {
        const plural = event.hits === 1 ? '' : 's';
        write(CLEAR_LINE + chalk.dim(`Found ${event.hits} passage${plural} (${event.durationMs}ms)`) + '\n');
        break;
      }

      case 'tool_error':
        write(CLEAR_LINE + chalk.yellow(`Tool call rejected: ${event.message}`) + '\n');
        break;
    }
  };
}

/**
 * JSON shape of a finished turn (--json).
 */
export interface TurnResultJSON {
  answer: string;
  status: AgentTurnResult['status'];
  grounded: boolean;
  cited_tags: string[];
  ungrounded_tags: string[];
  retrieved_tags: string[];
  tool_rounds: number;
  error?: string;
}

export function toTurnResultJSON(result: AgentTurnResult): TurnResultJSON {
  return {
    answer: result.text,
    status: result.status,
    grounded: result.grounded,
    cited_tags: result.citedTags,
    ungrounded_tags: result.ungroundedTags,
    retrieved_tags: result.retrievedTags,
    tool_rounds: result.toolRounds,
    ...(result.error !== undefined ? { error: result.error } : {}),
  };
}

/**
 * Print the answer, then its sources. Citations of passages that were not
 * retrieved this turn are flagged.
 */
export function renderTurnResult(result: AgentTurnResult, ctx: CommandContext): void {
  if (ctx.options.json) {
    console.log(JSON.stringify(toTurnResultJSON(result)));
    return;
  }

  if (result.status === 'failed') {
    ctx.log(chalk.red(result.text));
    if (result.error !== undefined) {
      ctx.debug(result.error);
    }
    return;
  }

  ctx.log(result.text);

  if (result.citedTags.length > 0) {
    ctx.log('');
    ctx.log(chalk.bold('Sources:'));
    ctx.log(formatCitations(result.citedTags, result.hits));
  }

  if (!result.grounded) {
    ctx.log('');
    ctx.warn(`The answer cites passages that were not retrieved: ${result.ungroundedTags.join(', ')}`);
  }
}
