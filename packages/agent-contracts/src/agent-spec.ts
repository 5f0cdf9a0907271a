/**
 * AgentSpec: immutable definition of one agent in the handoff graph.
 *
 * Role-specific settings live in a tagged `params` block so that
 * capability-specific validation stays local to each kind:
 * - `manager`: entry agent, delegates to workers
 * - `browser`: web search + page scraping
 * - `retriever`: document retrieval from a local folder
 * - `writer`: drafts the report
 * - `reviewer`: reviews the report, approves or requests revisions
 * - `custom`: anything else, capabilities given explicitly
 */

// ═══════════════════════════════════════════════════════════════════════
// Capabilities & roles
// ═══════════════════════════════════════════════════════════════════════

export type Capability = 'web-search' | 'retrieval' | 'drafting' | 'reviewing';

/** Capabilities whose tool calls are counted by the Quota Tracker */
export type MeteredCapability = Extract<Capability, 'web-search' | 'retrieval'>;

export const CAPABILITIES: readonly Capability[] = [
  'web-search',
  'retrieval',
  'drafting',
  'reviewing',
];

export const METERED_CAPABILITIES: readonly MeteredCapability[] = ['web-search', 'retrieval'];

export function isMeteredCapability(capability: Capability): capability is MeteredCapability {
  return capability === 'web-search' || capability === 'retrieval';
}

/**
 * Orchestration role
 *
 * - `manager`: the entry agent (exactly one per registry)
 * - `worker`: intermediate agent
 * - `terminal-reviewer`: only role whose approval ends a session successfully
 */
export type AgentRole = 'manager' | 'worker' | 'terminal-reviewer';

export type AgentKind = AgentParams['kind'];

// ═══════════════════════════════════════════════════════════════════════
// Role-specific parameter blocks
// ═══════════════════════════════════════════════════════════════════════

export interface ManagerParams {
  kind: 'manager';
}

export interface BrowserParams {
  kind: 'browser';
  /** Sites the search collaborator may fan out to */
  sites: readonly string[];
  /** Upper bound on results per site / per search call */
  maxArticlesPerSite: number;
  /** Search provider page-load timeout (ms) */
  searchTimeoutMs: number;
  /** Search provider settle time after page load (ms) */
  waitTimeMs: number;
  /** Browsing service credential, forwarded to search and scrape providers */
  apiKey?: string;
}

export interface RetrieverParams {
  kind: 'retriever';
  docsFolder: string;
  /** Opaque to the orchestrator, forwarded to the retrieval provider */
  tokenizerEmbeddingModel: string;
  chunkSize: number;
  chunkOverlap: number;
}

export interface WriterParams {
  kind: 'writer';
}

export interface ReviewerParams {
  kind: 'reviewer';
}

export interface CustomParams {
  kind: 'custom';
}

export type AgentParams =
  | ManagerParams
  | BrowserParams
  | RetrieverParams
  | WriterParams
  | ReviewerParams
  | CustomParams;

// ═══════════════════════════════════════════════════════════════════════
// AgentSpec
// ═══════════════════════════════════════════════════════════════════════

export interface AgentLimits {
  /** Max allowed calls per metered capability within one session */
  readonly maxCalls: Readonly<Record<MeteredCapability, number>>;
  /** Wall-clock bound of one invocation (ms) */
  readonly timeoutMs: number;
}

/** Model connection parameters. Opaque to the orchestrator. */
export interface AgentConnection {
  readonly model: string;
  readonly apiBase: string;
}

export interface AgentSpec {
  /** Unique name, as written in configuration */
  readonly name: string;
  readonly role: AgentRole;
  readonly description: string;
  readonly systemPrompt: string;
  readonly capabilities: readonly Capability[];
  /** Names of agents this one may hand off to */
  readonly canHandoffTo: readonly string[];
  readonly limits: AgentLimits;
  readonly connection: AgentConnection;
  /** Raise this agent's step logs from debug to info */
  readonly verbose: boolean;
  readonly params: Readonly<AgentParams>;
}

export function hasCapability(spec: AgentSpec, capability: Capability): boolean {
  return spec.capabilities.includes(capability);
}

/**
 * Canonical key for agent names.
 * `browser_agent`, `BrowserAgent` and `browser-agent` share one key.
 */
export function canonicalAgentName(name: string): string {
  return name.replace(/[\s_-]+/g, '').toLowerCase();
}

export function sameAgent(a: string, b: string): boolean {
  return canonicalAgentName(a) === canonicalAgentName(b);
}
