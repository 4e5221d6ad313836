/**
 * Ingest Command
 *
 * Brings the index up to date with the content source.
 *
 * Usage:
 *   billrag ingest                    Index new and changed bills
 *   billrag ingest --prune            Also remove bills deleted from the source
 *   billrag ingest --concurrency 8    Process 8 documents at once
 *   billrag ingest --json             Output progress as NDJSON
 *
 * Ctrl+C stops starting new documents; documents already being written
 * finish first. Exit code 0 when every document is up to date, 1 when any
 * failed, 130 when cancelled.
 */

import { Command } from 'commander';

import type { ContextFactory } from '../types.js';
import { createRuntime, withRuntime, type RuntimeFactory } from '../runtime.js';
import { createProgressReporter, type ProgressReporter, type ProgressReporterOptions } from '../utils/progress.js';
import { IngestOptionsSchema, validateInput } from '../validation.js';
import { IngestionOrchestrator } from '../../indexer/index.js';
import { IngestionCancelledError, IngestionFailedError } from '../../errors/index.js';

export interface IngestCommandDeps {
  createRuntime?: RuntimeFactory;
  createReporter?: (options: Partial<ProgressReporterOptions>) => ProgressReporter;
}

export function createIngestCommand(getContext: ContextFactory, deps: IngestCommandDeps = {}): Command {
  const buildRuntime = deps.createRuntime ?? createRuntime;
  const buildReporter = deps.createReporter ?? createProgressReporter;

  return new Command('ingest')
    .description('Index new and changed bills from the content source')
    .option('--prune', 'Remove indexed bills that are no longer in the source', false)
    .option('-c, --concurrency <n>', 'Documents processed at once (default: ingestion.concurrency)')
    .action(async (cmdOptions: unknown) => {
      const ctx = getContext();
      const { prune, concurrency } = validateInput(IngestOptionsSchema, cmdOptions);

      await withRuntime(buildRuntime, ctx, async (runtime) => {
        const { config } = runtime;
        const source = runtime.source();
        const reporter = buildReporter({ json: ctx.options.json, verbose: ctx.options.verbose });

        ctx.debug(`Source: ${source.description}`);
        ctx.debug(`Index store: ${runtime.store.description}`);

        const orchestrator = new IngestionOrchestrator({
          source,
          extractor: runtime.extractor,
          embedder: runtime.embedder,
          store: runtime.store,
          chunking: { chunkSize: config.chunking.chunk_size, chunkOverlap: config.chunking.chunk_overlap },
          concurrency: concurrency ?? config.ingestion.concurrency,
          upsertBatchSize: config.ingestion.upsert_batch_size,
          prune,
          logger: { warn: ctx.debug, debug: ctx.debug },
          onListed: reporter.onListed,
          onDocumentStart: reporter.onDocumentStart,
          onDocumentComplete: reporter.onDocumentComplete,
          onPruned: reporter.onPruned,
        });

        const controller = new AbortController();
        const onSigint = () => {
          if (controller.signal.aborted) {
            // Second Ctrl+C: stop waiting for in-flight documents
            process.exit(130);
          }
          reporter.cancelling();
          controller.abort();
        };
        process.on('SIGINT', onSigint);

        try {
          const summary = await orchestrator.run(controller.signal);
          reporter.showSummary(summary);

          if (summary.cancelled) {
            throw new IngestionCancelledError();
          }
          if (summary.failures.length > 0) {
            throw new IngestionFailedError(summary.failures.map((f) => f.documentId));
          }
        } finally {
          reporter.stop();
          process.off('SIGINT', onSigint);
        }
      });
    });
}
