/**
 * External collaborators behind narrow interfaces: the logger, the web-search
 * and scraping provider, and the document-retrieval index.
 */

// ─────────────────────────────────────────────────────────────────────────────
// ILogger
// ─────────────────────────────────────────────────────────────────────────────

export interface ILogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

// ─────────────────────────────────────────────────────────────────────────────
// Web search / scraping
// ─────────────────────────────────────────────────────────────────────────────

export interface SearchResult {
  title: string;
  url: string;
  snippet: string;
}

export interface SearchOptions {
  maxResults: number;
  /** Site list the provider may restrict itself to */
  sites: readonly string[];
  timeoutMs: number;
  /** Browsing service credential of the calling agent */
  apiKey?: string;
  signal: AbortSignal;
}

export interface ISearchProvider {
  /** Ranked results, best first */
  search(query: string, options: SearchOptions): Promise<SearchResult[]>;
}

export interface ScrapeOptions {
  /** Natural-language description of what to extract */
  prompt?: string;
  waitTimeMs: number;
  /** Browsing service credential of the calling agent */
  apiKey?: string;
  signal: AbortSignal;
}

export interface IScrapeProvider {
  scrape(url: string, options: ScrapeOptions): Promise<string>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Document retrieval
// ─────────────────────────────────────────────────────────────────────────────

export interface RetrievedChunk {
  /** Source document path */
  source: string;
  text: string;
  score: number;
}

export interface RetrieveOptions {
  docsFolder: string;
  topK: number;
  /** Chunking parameters of the calling agent, forwarded to the index */
  chunking?: { chunkSize: number; chunkOverlap: number };
  /** Embedding model for vector indexes; keyword indexes ignore it */
  embeddingModel?: string;
  signal: AbortSignal;
}

export interface IRetrievalProvider {
  /** Ranked chunks, best first */
  retrieve(query: string, options: RetrieveOptions): Promise<RetrievedChunk[]>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Article sources
// ─────────────────────────────────────────────────────────────────────────────

export interface Article {
  url: string;
  title: string;
  /** Publishing site or outlet */
  source: string;
  publishDate?: string;
  /** Extracted body text; absent when only the link is known */
  text?: string;
}

export interface FetchArticlesOptions {
  maxArticles: number;
  timeoutMs: number;
  waitTimeMs: number;
  /** URLs already stored; sources may skip fetching them */
  knownUrls: ReadonlySet<string>;
  signal?: AbortSignal;
}

/**
 * Lists recent articles published on one site
 */
export interface IArticleSource {
  fetchArticles(site: string, options: FetchArticlesOptions): Promise<Article[]>;
}
