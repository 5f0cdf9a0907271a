/**
 * @module @baton/agent-tools
 * Capability tools for baton agents.
 *
 * Provides:
 * - Web search and page scraping (web-search capability)
 * - Local document retrieval (retrieval capability)
 * - An article store that fills the retriever's docs folder from the configured sites
 * - Report drafting and review tools (shared session state)
 * - Control tool definitions (`handoff`, `finish`) for tool-calling backends
 * - An OpenAI-compatible model backend
 */

export { ToolRegistry } from './registry.js';
export type { Tool, ToolExecCtx, ToolExecutor } from './types.js';
export { TOOL_NAMES, SEARCH_TOOL_CONFIG, SCRAPE_TOOL_CONFIG, RETRIEVAL_CONFIG, ARTICLE_STORE_CONFIG } from './config.js';
export { truncateText, readMeteredInput } from './utils.js';

export {
  createToolRegistry,
  createWebSearchTool,
  createScrapeTool,
  createRetrieveTool,
  createRecordReportTool,
  createReviewReportTool,
  createHandoffToolDefinition,
  createFinishToolDefinition,
  isControlTool,
  intentFromToolCalls,
  toolError,
  formatToolResult,
  type ToolProviders,
  type HandoffTarget,
} from './tools/index.js';

export { LocalDocsRetriever, chunkWords, tokenize } from './retrieval/local-docs-retriever.js';
export { ArticleStore, safeFilename, type ArticleRecord, type ArticleStoreOptions } from './articles/article-store.js';
export { OpenAICompatibleLLM, type OpenAICompatibleLLMOptions } from './llm/openai-compatible-llm.js';
