import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';

import { createAgentEventRenderer, renderTurnResult, toTurnResultJSON } from '../agent-event-renderer.js';
import type { AgentTurnResult, SearchHit } from '../../../agent/index.js';
import { recordingContext } from '../../__tests__/helpers.js';

const HIT: SearchHit = {
  chunkId: 'c1',
  documentId: '2024/march.pdf',
  contentVersion: 'v1',
  chunkIndex: 0,
  score: 0.875,
  text: 'Amount due $84.10',
  citationTag: '[2024/march.pdf#0]',
};

function turnResult(partial: Partial<AgentTurnResult> = {}): AgentTurnResult {
  return {
    text: 'You owed $84.10 in March [2024/march.pdf#0].',
    status: 'answered',
    retrievedTags: ['[2024/march.pdf#0]'],
    citedTags: ['[2024/march.pdf#0]'],
    ungroundedTags: [],
    grounded: true,
    hits: [HIT],
    toolRounds: 1,
    ...partial,
  };
}

let level: typeof chalk.level;

beforeEach(() => {
  level = chalk.level;
  chalk.level = 0;
});

afterEach(() => {
  chalk.level = level;
  vi.restoreAllMocks();
});

describe('createAgentEventRenderer', () => {
  it('shows the search query and then the hit count', () => {
    const written: string[] = [];
    const render = createAgentEventRenderer(recordingContext(), (text) => written.push(text));

    render({ type: 'tool_start', tool: 'search_pdfs', callId: 'call_1', input: { query: 'march total', top_k: 5 }, round: 1 });
    render({ type: 'tool_result', tool: 'search_pdfs', callId: 'call_1', hits: 1, durationMs: 12, round: 1 });

    expect(written).toEqual(['Searching: "march total"...', '\x1b[2K\rFound 1 passage (12ms)\n']);
  });

  it('shows rejected tool calls', () => {
    const written: string[] = [];
    const render = createAgentEventRenderer(recordingContext(), (text) => written.push(text));

    render({ type: 'tool_error', tool: 'search_pdfs', callId: 'call_1', message: 'Invalid arguments for search_pdfs', round: 1 });

    expect(written).toEqual(['\x1b[2K\rTool call rejected: Invalid arguments for search_pdfs\n']);
  });

  it('sends state changes to debug output only', () => {
    const written: string[] = [];
    const ctx = recordingContext({ verbose: true });
    const render = createAgentEventRenderer(ctx, (text) => written.push(text));

    render({ type: 'state', state: 'model_thinking', round: 0 });

    expect(written).toEqual([]);
    expect(ctx.debug).toHaveBeenCalledWith('agent: model_thinking (round 0)');
  });

  it('writes nothing in JSON mode', () => {
    const write = vi.fn();
    const render = createAgentEventRenderer(recordingContext({ json: true }), write);

    render({ type: 'tool_start', tool: 'search_pdfs', callId: 'call_1', input: { query: 'x' }, round: 1 });

    expect(write).not.toHaveBeenCalled();
  });
});

describe('renderTurnResult', () => {
  it('prints the answer followed by its sources', () => {
    const ctx = recordingContext();
    renderTurnResult(turnResult(), ctx);

    expect(ctx.logs).toEqual([
      'You owed $84.10 in March [2024/march.pdf#0].',
      '',
      'Sources:',
      '[2024/march.pdf#0] (0.88)',
    ]);
    expect(ctx.warnings).toEqual([]);
  });

  it('warns about citations that were not retrieved', () => {
    const ctx = recordingContext();
    renderTurnResult(
      turnResult({
        text: 'See [2024/june.pdf#2].',
        citedTags: ['[2024/june.pdf#2]'],
        ungroundedTags: ['[2024/june.pdf#2]'],
        grounded: false,
      }),
      ctx
    );

    expect(ctx.logs).toContain('[2024/june.pdf#2] (not retrieved)');
    expect(ctx.warnings).toEqual(['The answer cites passages that were not retrieved: [2024/june.pdf#2]']);
  });

  it('prints only the apology for a failed turn', () => {
    const ctx = recordingContext();
    renderTurnResult(
      turnResult({ text: 'Sorry, something went wrong.', status: 'failed', citedTags: [], error: 'connect ECONNREFUSED' }),
      ctx
    );

    expect(ctx.logs).toEqual(['Sorry, something went wrong.']);
    expect(ctx.debug).toHaveBeenCalledWith('connect ECONNREFUSED');
  });

  it('prints one JSON object in JSON mode', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    renderTurnResult(turnResult(), recordingContext({ json: true }));

    expect(log).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(log.mock.calls[0]?.[0]))).toEqual({
      answer: 'You owed $84.10 in March [2024/march.pdf#0].',
      status: 'answered',
      grounded: true,
      cited_tags: ['[2024/march.pdf#0]'],
      ungrounded_tags: [],
      retrieved_tags: ['[2024/march.pdf#0]'],
      tool_rounds: 1,
    });
  });
});

describe('toTurnResultJSON', () => {
  it('carries the error of a failed turn', () => {
    expect(toTurnResultJSON(turnResult({ status: 'failed', error: 'boom' })).error).toBe('boom');
  });
});
