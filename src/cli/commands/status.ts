/**
 * Status Command
 *
 * Lists what the index holds:
 *   billrag status         - One row per indexed document version
 *   billrag status --json  - Output as JSON
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { ContextFactory } from '../types.js';
import { createRuntime, withRuntime, type RuntimeFactory } from '../runtime.js';
import { resolveConfigPath } from '../../config/index.js';
import type { IndexedDocument } from '../../search/index.js';
import { formatTable } from '../../utils/table.js';

/** Versions are SHA-256 digests or ETags; the head is enough to tell them apart */
const VERSION_WIDTH = 12;

/**
 * Format a path with ~ for home directory
 */
export function formatPath(filePath: string): string {
  const homeDir = process.env['HOME'] ?? process.env['USERPROFILE'] ?? '';
  if (homeDir && filePath.startsWith(homeDir)) {
    return '~' + filePath.slice(homeDir.length);
  }
  return filePath;
}

/**
 * Documents with more than one stored version, e.g. after an interrupted
 * re-index. The next ingest removes the stale ones.
 */
export function findMultiVersionDocuments(documents: readonly IndexedDocument[]): string[] {
  const counts = new Map<string, number>();
  for (const doc of documents) {
    counts.set(doc.documentId, (counts.get(doc.documentId) ?? 0) + 1);
  }
  return [...counts].filter(([, count]) => count > 1).map(([documentId]) => documentId);
}

export interface StatusCommandDeps {
  createRuntime?: RuntimeFactory;
}

export function createStatusCommand(getContext: ContextFactory, deps: StatusCommandDeps = {}): Command {
  const buildRuntime = deps.createRuntime ?? createRuntime;

  return new Command('status')
    .description('Show indexed bills, their versions and chunk counts')
    .action(async () => {
      const ctx = getContext();

      await withRuntime(buildRuntime, ctx, async (runtime) => {
        await runtime.store.ensureReady();
        const documents = await runtime.store.listDocuments();
        const totalChunks = documents.reduce((sum, doc) => sum + doc.chunkCount, 0);
        const multiVersion = findMultiVersionDocuments(documents);

        if (ctx.options.json) {
          console.log(
            JSON.stringify({
              store: runtime.store.description,
              config_path: resolveConfigPath(),
              documents: documents.map((doc) => ({
                document_id: doc.documentId,
                content_version: doc.contentVersion,
                chunk_count: doc.chunkCount,
                last_indexed: doc.lastIndexed,
              })),
              total_documents: new Set(documents.map((doc) => doc.documentId)).size,
              total_chunks: totalChunks,
              multi_version_documents: multiVersion,
            })
          );
          return;
        }

        ctx.log(chalk.bold('billrag status'));
        ctx.log('');
        ctx.log(`  ${chalk.dim('Index store:')}  ${formatPath(runtime.store.description)}`);
        ctx.log(`  ${chalk.dim('Config:')}       ${formatPath(resolveConfigPath())}`);
        ctx.log('');

        if (documents.length === 0) {
          ctx.log(chalk.yellow('No bills indexed yet.'));
          ctx.log(chalk.dim('Run: billrag ingest'));
          return;
        }

        ctx.log(
          formatTable(
            [
              { header: 'Document', key: 'document', maxWidth: 60 },
              { header: 'Version', key: 'version' },
              { header: 'Chunks', key: 'chunks', align: 'right' },
              { header: 'Last indexed', key: 'indexed' },
            ],
            documents.map((doc) => ({
              document: doc.documentId,
              version: doc.contentVersion.slice(0, VERSION_WIDTH),
              chunks: doc.chunkCount.toLocaleString(),
              indexed: doc.lastIndexed,
            }))
          )
        );
        ctx.log('');
        ctx.log(
          `${new Set(documents.map((doc) => doc.documentId)).size.toLocaleString()} document(s), ${totalChunks.toLocaleString()} chunk(s)`
        );

        if (multiVersion.length > 0) {
          ctx.warn(
            `${multiVersion.length} document(s) hold more than one version: ${multiVersion.join(', ')}. Run: billrag ingest`
          );
        }
      });
    });
}
