/**
 * Centralized default values.
 *
 * Config schemas, the spec builder and the orchestrator import from here
 * instead of defining inline constants.
 */

export const AGENT_DEFAULTS = {
  model: 'qwen2.5-7b-instruct-1m',
  apiBase: 'http://localhost:1234/v1',
  /** Per-invocation timeout, seconds (as written in configuration) */
  timeoutSeconds: 120,
  /** Largest timeout a Node timer can hold (2^31 - 1 ms), in whole seconds */
  maxTimeoutSeconds: 2_147_483,
  verbose: false,
  /** Max distinct searches / retrievals per agent per session */
  maxSearches: 2,
  maxRetrievals: 2,
  tokenizerEmbeddingModel: 'BAAI/bge-small-en-v1.5',
  chunkSize: 1024,
  chunkOverlap: 200,
} as const;

export const SEARCH_DEFAULTS = {
  /** Provider page-load timeout (ms) */
  timeoutMs: 60_000,
  /** Provider settle time (ms) */
  waitTimeMs: 3_000,
  maxArticlesPerSite: 20,
} as const;

export const ORCHESTRATOR_DEFAULTS = {
  /** Session-wide ceiling on agent-to-agent transitions */
  maxHops: 20,
  /** Retries of a timed-out / failed invocation on the same agent */
  maxRetries: 1,
  /** Model round trips allowed inside one invocation */
  maxToolRounds: 8,
  maxConcurrentSessions: 4,
  maxQueuedSessions: 100,
  approvalPolicy: 'reviewer',
} as const;
