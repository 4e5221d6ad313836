/**
 * Agent Tools
 *
 * Tools the chat agent can call. Each one exposes a JSON schema for the
 * model, a zod-backed argument parser, and an execute function.
 */

export {
  createSearchPdfsTool,
  toResultItems,
  SEARCH_PDFS_TOOL,
  type SearchPdfsTool,
  type SearchPdfsInput,
  type SearchPdfsToolOptions,
} from './search-pdfs-tool.js';
