/**
 * Centralized configuration constants for agent tools.
 *
 * Tool implementations import from this module instead of defining
 * inline constants.
 */

// ═══════════════════════════════════════════════════════════════════════════
// Tool names
// ═══════════════════════════════════════════════════════════════════════════

export const TOOL_NAMES = {
  webSearch: 'web_search',
  scrapeUrl: 'scrape_url',
  retrieveDocuments: 'retrieve_documents',
  recordReport: 'record_report',
  reviewReport: 'review_report',
  /** Control tools: never executed, mapped onto the handoff intent */
  handoff: 'handoff',
  finish: 'finish',
} as const;

// ═══════════════════════════════════════════════════════════════════════════
// Search tool config
// ═══════════════════════════════════════════════════════════════════════════

export const SEARCH_TOOL_CONFIG = {
  /** Used when the calling agent has no browser params */
  defaultMaxResults: 10,
  /** Snippet length cap in the rendered output */
  maxSnippetChars: 300,
} as const;

// ═══════════════════════════════════════════════════════════════════════════
// Scrape tool config
// ═══════════════════════════════════════════════════════════════════════════

export const SCRAPE_TOOL_CONFIG = {
  /** Hard cap on scraped text returned to the model */
  maxOutputChars: 8_000,
  defaultWaitTimeMs: 3_000,
} as const;

// ═══════════════════════════════════════════════════════════════════════════
// Retrieval config
// ═══════════════════════════════════════════════════════════════════════════

export const RETRIEVAL_CONFIG = {
  /** Chunks returned per retrieval call */
  topK: 3,
  /** File patterns indexed by LocalDocsRetriever */
  patterns: ['**/*.txt', '**/*.md'] as string[],
  /** Query terms shorter than this are ignored */
  minTermLength: 3,
} as const;

// ═══════════════════════════════════════════════════════════════════════════
// Article store config
// ═══════════════════════════════════════════════════════════════════════════

export const ARTICLE_STORE_CONFIG = {
  /** Catalogue file inside the data folder */
  recordsFile: 'articles.json',
  /** Document folder inside the data folder, indexed by LocalDocsRetriever */
  docsDir: 'docs',
} as const;
