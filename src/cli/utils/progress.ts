/**
 * Progress Reporter
 *
 * Shows ingestion progress. Three output modes:
 * - Interactive: one ora spinner counting documents
 * - JSON: NDJSON event stream for scripts and CI
 * - Text: one line per document for non-TTY environments
 *
 * Spinner updates are throttled to 100ms. Failures are always listed in
 * the summary, whatever the mode.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { DocumentOutcome, DocumentState, IngestionCallbacks, IngestionSummary } from '../../indexer/index.js';

export interface ProgressReporterOptions {
  /** Output as JSON events instead of human-readable text */
  json: boolean;

  /** Show per-document lines on a TTY too */
  verbose: boolean;

  /** Disable colors (respects NO_COLOR env) */
  noColor: boolean;

  /** Whether stdout is a TTY (for spinner support) */
  isInteractive: boolean;
}

export type ProgressEventType = 'listed' | 'document_complete' | 'pruned' | 'cancelling' | 'complete';

/**
 * JSON event emitted in --json mode.
 */
export interface ProgressEvent {
  type: ProgressEventType;
  timestamp: string;
  data: Record<string, unknown>;
}

const STATE_LABELS: Record<DocumentState, string> = {
  indexed: 'indexed',
  skipped: 'unchanged',
  repaired: 'repaired',
  failed: 'failed',
};

export class ProgressReporter implements Required<IngestionCallbacks> {
  private readonly options: ProgressReporterOptions;
  private spinner: Ora | null = null;
  private total = 0;
  private lastUpdateTime = 0;

  /** Minimum time between spinner updates to prevent flickering */
  private static readonly UPDATE_THROTTLE_MS = 100;

  /** Maximum length for document id display */
  private static readonly MAX_ID_LENGTH = 40;

  constructor(options: ProgressReporterOptions) {
    this.options = options;

    if (options.noColor) {
      chalk.level = 0;
    }
  }

  // Arrow properties so they can be spread straight into the orchestrator options

  onListed = (total: number): void => {
    this.total = total;

    if (this.options.json) {
      this.emitJson('listed', { total });
      return;
    }

    if (this.options.isInteractive) {
      this.spinner?.stop();
      this.spinner = ora({ text: this.progressText(0) }).start();
    } else {
      console.log(`Found ${total} document(s)`);
    }
  };

  onDocumentStart = (documentId: string): void => {
    if (!this.spinner || this.options.json) return;

    const now = performance.now();
    if (now - this.lastUpdateTime < ProgressReporter.UPDATE_THROTTLE_MS) {
      return;
    }
    this.lastUpdateTime = now;
    this.spinner.suffixText = chalk.dim(this.truncate(documentId));
  };

  onDocumentComplete = (outcome: DocumentOutcome, completed: number, total: number): void => {
    if (this.options.json) {
      this.emitJson('document_complete', {
        completed,
        total,
        document_id: outcome.documentId,
        content_version: outcome.contentVersion,
        state: outcome.state,
        chunks_written: outcome.chunksWritten,
        removed_versions: outcome.removedVersions,
        duration_ms: outcome.durationMs,
        ...(outcome.error ? { error: outcome.error } : {}),
      });
      return;
    }

    if (this.spinner) {
      this.spinner.text = this.progressText(completed);
      if (this.options.verbose || outcome.state === 'failed') {
        this.printAboveSpinner(this.describeOutcome(outcome, completed, total));
      }
      return;
    }

    console.log(this.describeOutcome(outcome, completed, total));
  };

  onPruned = (documentId: string): void => {
    if (this.options.json) {
      this.emitJson('pruned', { document_id: documentId });
      return;
    }
    const line = `Removed ${documentId} (no longer in the source)`;
    if (this.spinner) {
      this.printAboveSpinner(chalk.dim(line));
    } else {
      console.log(line);
    }
  };

  /**
   * Ctrl+C was pressed; in-flight documents are finishing.
   */
  cancelling(): void {
    if (this.options.json) {
      this.emitJson('cancelling', {});
      return;
    }
    if (this.spinner) {
      this.spinner.text = 'Cancelling, waiting for documents in progress...';
    } else {
      console.log('Cancelling, waiting for documents in progress...');
    }
  }

  /**
   * Stop the spinner without a summary (the run threw).
   */
  stop(): void {
    this.spinner?.stop();
    this.spinner = null;
  }

  showSummary(summary: IngestionSummary): void {
    if (this.options.json) {
      this.emitJson('complete', {
        documents_seen: summary.documentsSeen,
        indexed: summary.indexed,
        skipped: summary.skipped,
        repaired: summary.repaired,
        failed: summary.failed,
        chunks_written: summary.chunksWritten,
        pruned: summary.pruned,
        failures: summary.failures,
        duration_ms: summary.durationMs,
        cancelled: summary.cancelled,
      });
      return;
    }

    if (this.spinner) {
      const text = `${summary.outcomes.length}/${summary.documentsSeen} documents processed`;
      if (summary.cancelled) {
        this.spinner.warn(text);
      } else if (summary.failures.length > 0) {
        this.spinner.fail(text);
      } else {
        this.spinner.succeed(text);
      }
      this.spinner = null;
    }

    const heading = summary.cancelled
      ? chalk.yellow.bold('Ingestion cancelled')
      : summary.failures.length > 0
        ? chalk.red.bold('Ingestion finished with failures')
        : chalk.green.bold('Ingestion complete ✓');

    console.log('');
    console.log(heading);
    console.log('');
    console.log(`  ${chalk.dim('Documents:')}      ${summary.documentsSeen.toLocaleString()}`);
    console.log(`  ${chalk.dim('Indexed:')}        ${summary.indexed.toLocaleString()}`);
    console.log(`  ${chalk.dim('Unchanged:')}      ${summary.skipped.toLocaleString()}`);
    console.log(`  ${chalk.dim('Repaired:')}       ${summary.repaired.toLocaleString()}`);
    console.log(`  ${chalk.dim('Failed:')}         ${summary.failed.toLocaleString()}`);
    if (summary.pruned.length > 0) {
      console.log(`  ${chalk.dim('Removed:')}        ${summary.pruned.length.toLocaleString()}`);
    }
    console.log(`  ${chalk.dim('Chunks written:')} ${summary.chunksWritten.toLocaleString()}`);
    console.log(`  ${chalk.dim('Time elapsed:')}   ${formatDuration(summary.durationMs)}`);

    if (summary.failures.length > 0) {
      console.log('');
      console.log(chalk.red(`  ${summary.failures.length} failure(s):`));
      for (const failure of summary.failures) {
        const phase = failure.phase === 'prune' ? ' (while removing)' : '';
        console.log(`    - ${failure.documentId}${phase}: ${failure.errorName}: ${failure.error}`);
      }
    }

    console.log('');
  }

  private emitJson(type: ProgressEventType, data: Record<string, unknown>): void {
    const event: ProgressEvent = { type, timestamp: new Date().toISOString(), data };
    console.log(JSON.stringify(event));
  }

  private progressText(completed: number): string {
    if (this.total === 0) {
      return 'No documents to ingest';
    }
    const percentage = Math.round((completed / this.total) * 100);
    return `Ingesting ${completed}/${this.total} (${percentage}%)`;
  }

  private describeOutcome(outcome: DocumentOutcome, completed: number, total: number): string {
    const prefix = `[${completed}/${total}]`;
    const label = STATE_LABELS[outcome.state];
    if (outcome.state === 'failed') {
      return chalk.red(`${prefix} ${label} ${outcome.documentId}: ${outcome.error ?? 'unknown error'}`);
    }
    const detail =
      outcome.state === 'indexed'
        ? ` (${outcome.chunksWritten} chunks)`
        : outcome.state === 'repaired'
          ? ` (removed ${outcome.removedVersions.length} stale version(s))`
          : '';
    return `${prefix} ${label} ${outcome.documentId}${detail}`;
  }

  private printAboveSpinner(line: string): void {
    this.spinner?.clear();
    console.log(line);
    this.spinner?.render();
  }

  private truncate(id: string): string {
    if (id.length <= ProgressReporter.MAX_ID_LENGTH) {
      return id;
    }
    return '...' + id.slice(-(ProgressReporter.MAX_ID_LENGTH - 3));
  }
}

/**
 * Format milliseconds as human-readable duration.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

/**
 * Create a ProgressReporter with sensible defaults.
 */
export function createProgressReporter(options: Partial<ProgressReporterOptions> = {}): ProgressReporter {
  return new ProgressReporter({
    json: options.json ?? false,
    verbose: options.verbose ?? false,
    noColor: options.noColor ?? !!process.env.NO_COLOR,
    isInteractive: options.isInteractive ?? (process.stdout.isTTY ?? false),
  });
}
