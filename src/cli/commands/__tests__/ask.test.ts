import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';

import { createAskCommand } from '../ask.js';
import { createIngestCommand } from '../ingest.js';
import { TURN_FAILED_MESSAGE, UNABLE_TO_ANSWER } from '../../../agent/index.js';
import { ValidationError } from '../../../errors/index.js';
import { answer, callTool, MemoryContentSource, ScriptedChatModel } from '../../../test-utils/index.js';
import { recordingContext, testConfig, testRuntime } from '../../__tests__/helpers.js';

const BILLS = {
  '2024/march.pdf': 'Electricity bill March amount due 84.10',
  '2024/gas.pdf': 'Gas meter reading 10452 cubic feet',
};

async function seeded(model: ScriptedChatModel, config = testConfig()) {
  const setup = testRuntime({ source: new MemoryContentSource(BILLS), model, config });
  await createIngestCommand(() => recordingContext({ json: true }), { createRuntime: setup.factory }).parseAsync([], {
    from: 'user',
  });
  return setup;
}

describe('createAskCommand', () => {
  let level: typeof chalk.level;

  beforeEach(() => {
    level = chalk.level;
    chalk.level = 0;
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    chalk.level = level;
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it('answers with sources after one search', async () => {
    const model = new ScriptedChatModel([
      callTool('call_1', { query: 'march amount due' }),
      answer('You owed $84.10 for March [2024/march.pdf#0].'),
    ]);
    const setup = await seeded(model);
    const ctx = recordingContext();
    const written: string[] = [];

    await createAskCommand(() => ctx, { createRuntime: setup.factory, write: (text) => written.push(text) }).parseAsync(
      ['How much was due in March?'],
      { from: 'user' }
    );

    expect(written[0]).toBe('Searching: "march amount due"...');
    expect(written[1]).toMatch(/^\x1b\[2K\rFound 2 passages \(\d+ms\)\n$/);
    expect(ctx.logs[0]).toBe('You owed $84.10 for March [2024/march.pdf#0].');
    expect(ctx.logs[2]).toBe('Sources:');
    expect(ctx.logs[3]).toMatch(/^\[2024\/march\.pdf#0\] \(\d\.\d\d\)$/);
    expect(ctx.warnings).toEqual([]);
    expect(model.requests[0]?.messages.at(-1)).toEqual({ role: 'user', content: 'How much was due in March?' });
    expect(setup.runtime.closed).toBe(true);
  });

  it('gives up after max_tool_rounds', async () => {
    const config = testConfig();
    const model = new ScriptedChatModel([
      callTool('call_1', { query: 'water' }),
      callTool('call_2', { query: 'water usage' }),
    ]);
    const setup = await seeded(model, { ...config, agent: { ...config.agent, max_tool_rounds: 1 } });
    const ctx = recordingContext();

    await createAskCommand(() => ctx, { createRuntime: setup.factory, write: () => {} }).parseAsync(
      ['How much water did I use?'],
      { from: 'user' }
    );

    expect(ctx.logs).toEqual([UNABLE_TO_ANSWER]);
    expect(process.exitCode).toBeUndefined();
  });

  it('prints the apology and exits 1 when the model fails', async () => {
    const setup = await seeded(new ScriptedChatModel([new Error('connect ECONNREFUSED 127.0.0.1:11434')]));
    const ctx = recordingContext();

    await createAskCommand(() => ctx, { createRuntime: setup.factory, write: () => {} }).parseAsync(['Anything?'], {
      from: 'user',
    });

    expect(ctx.logs).toEqual([TURN_FAILED_MESSAGE]);
    expect(process.exitCode).toBe(1);
  });

  it('rejects an empty question', async () => {
    const setup = testRuntime();
    const run = createAskCommand(() => recordingContext(), { createRuntime: setup.factory }).parseAsync(['  '], {
      from: 'user',
    });

    await expect(run).rejects.toBeInstanceOf(ValidationError);
  });
});
