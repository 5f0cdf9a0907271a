/**
 * @baton/agent-core/testing
 *
 * In-process fakes for testing orchestration without a model server or the
 * network: a scripted model backend, fake search/retrieval providers, spec
 * and config builders, and a mock logger. Import from this sub-path, never
 * from the main index.
 *
 * @example
 *   import { ScriptedLLM, makeConfig, createMockLogger } from '@baton/agent-core/testing';
 *
 * Helpers use vitest's `vi.fn()`; vitest must be available in the test env.
 */

import { vi, type Mock } from 'vitest';
import type {
  AgentSpec,
  BatonConfig,
  BatonConfigInput,
  HandoffIntent,
  ILLM,
  ILogger,
  IRetrievalProvider,
  ISearchProvider,
  LLMRequest,
  LLMResponse,
  RetrievedChunk,
  SearchResult,
} from '@baton/agent-contracts';
import { BackendError, parseBatonConfig } from '@baton/agent-contracts';
import type { LLMResolver } from './executor/agent-executor.js';
import { withAbort } from './executor/abortable.js';

// ─── Scripted model backend ──────────────────────────────────────────────────

export type ScriptedTurn =
  | {
      content?: string;
      toolCalls?: Array<{ name: string; input: Record<string, unknown> }>;
      handoff?: HandoffIntent;
      /** Reply only after this delay (aborts with the invocation) */
      delayMs?: number;
    }
  | { throws: string }
  /** Never replies; ends only when the invocation is aborted */
  | { hang: true };

export type ScriptFn = (request: LLMRequest, callIndex: number) => ScriptedTurn;

export interface RecordedRequest {
  agent: string;
  request: LLMRequest;
}

/**
 * Model backend scripted per agent name. Array scripts are consumed in order
 * and fail with a BackendError once exhausted; function scripts are called
 * for every request.
 */
export class ScriptedLLM {
  readonly requests: RecordedRequest[] = [];
  private readonly cursors = new Map<string, number>();
  private toolCallSeq = 0;

  constructor(private readonly scripts: Record<string, ScriptedTurn[] | ScriptFn>) {}

  /** Resolver to pass as `resolveLLM` / `llm` */
  readonly resolver: LLMResolver = (spec: AgentSpec): ILLM => ({
    complete: (request) => this.complete(spec.name, request),
  });

  /** Requests made by one agent */
  requestsFor(agent: string): LLMRequest[] {
    return this.requests.filter((r) => r.agent === agent).map((r) => r.request);
  }

  private async complete(agent: string, request: LLMRequest): Promise<LLMResponse> {
    this.requests.push({ agent, request: { ...request, messages: [...request.messages] } });
    const index = this.cursors.get(agent) ?? 0;
    this.cursors.set(agent, index + 1);

    const script = this.scripts[agent];
    if (!script) {
      throw new BackendError(`No script for agent ${agent}`);
    }
    const step = typeof script === 'function' ? script(request, index) : script[index];
    if (!step) {
      throw new BackendError(`Script exhausted for agent ${agent} at call ${index + 1}`);
    }

    if ('throws' in step) {
      throw new BackendError(step.throws);
    }
    if ('hang' in step) {
      return withAbort(new Promise<LLMResponse>(() => undefined), request.signal);
    }
    const delayMs = step.delayMs ?? 0;
    if (delayMs > 0) {
      let timer: ReturnType<typeof setTimeout> | undefined;
      try {
        await withAbort(new Promise<void>((resolve) => (timer = setTimeout(resolve, delayMs))), request.signal);
      } finally {
        clearTimeout(timer);
      }
    }
    return {
      content: step.content ?? '',
      toolCalls: (step.toolCalls ?? []).map((call) => ({
        id: `call-${++this.toolCallSeq}`,
        name: call.name,
        input: call.input,
      })),
      handoff: step.handoff,
    };
  }
}

/** Shorthand turns */
export const turn = {
  handoff: (target: string, payload?: string): ScriptedTurn => ({ handoff: { type: 'handoff', target, payload } }),
  approve: (content = 'Approved.'): ScriptedTurn => ({ content, handoff: { type: 'finish', approved: true } }),
  reject: (notes: string): ScriptedTurn => ({ content: '', handoff: { type: 'finish', approved: false, notes } }),
  say: (content: string): ScriptedTurn => ({ content }),
  search: (...queries: string[]): ScriptedTurn => ({
    toolCalls: queries.map((query) => ({ name: 'web_search', input: { query } })),
  }),
  tool: (name: string, input: Record<string, unknown>): ScriptedTurn => ({ toolCalls: [{ name, input }] }),
};

// ─── Fake providers ──────────────────────────────────────────────────────────

export function createFakeSearchProvider(
  results: (query: string) => SearchResult[] = (query) => [
    { title: `Result for ${query}`, url: `https://example.com/${encodeURIComponent(query)}`, snippet: `About ${query}` },
  ],
): ISearchProvider & { search: Mock<ISearchProvider['search']> } {
  return {
    search: vi.fn<ISearchProvider['search']>(async (query) => results(query)),
  };
}

export function createFakeRetrievalProvider(
  chunks: RetrievedChunk[] = [],
): IRetrievalProvider & { retrieve: Mock<IRetrievalProvider['retrieve']> } {
  return {
    retrieve: vi.fn<IRetrievalProvider['retrieve']>(async () => chunks),
  };
}

// ─── Logger mock ─────────────────────────────────────────────────────────────

export function createMockLogger(): ILogger & {
  debug: Mock<ILogger['debug']>;
  info: Mock<ILogger['info']>;
  warn: Mock<ILogger['warn']>;
  error: Mock<ILogger['error']>;
} {
  return {
    debug: vi.fn<ILogger['debug']>(),
    info: vi.fn<ILogger['info']>(),
    warn: vi.fn<ILogger['warn']>(),
    error: vi.fn<ILogger['error']>(),
  };
}

// ─── Spec / config builders ──────────────────────────────────────────────────

export function makeAgentSpec(overrides: Partial<AgentSpec> & Pick<AgentSpec, 'name'>): AgentSpec {
  return {
    role: 'worker',
    description: `${overrides.name} agent`,
    systemPrompt: '',
    capabilities: [],
    canHandoffTo: [],
    limits: { maxCalls: { 'web-search': 2, retrieval: 2 }, timeoutMs: 1_000 },
    connection: { model: 'test-model', apiBase: 'http://localhost:1234/v1' },
    verbose: false,
    params: { kind: 'custom' },
    ...overrides,
  };
}

/**
 * The research graph used throughout the tests:
 *
 *   root_agent → browser_agent, retriever_agent, write_agent
 *   browser_agent → root_agent, retriever_agent
 *   retriever_agent → root_agent, browser_agent
 *   write_agent ↔ review_agent
 */
export function makeConfig(overrides: Partial<BatonConfigInput> = {}): BatonConfig {
  return parseBatonConfig({
    search: { web: { sites: ['https://example.com'] } },
    orchestrator: {},
    agents: [
      {
        name: 'root_agent',
        manager: true,
        description: 'Plans the research and delegates',
        timeout: 1,
        can_handoff_to: ['browser_agent', 'retriever_agent', 'write_agent'],
      },
      {
        name: 'browser_agent',
        description: 'Searches the web',
        timeout: 1,
        can_handoff_to: ['root_agent', 'retriever_agent'],
      },
      {
        name: 'retriever_agent',
        description: 'Searches local documents',
        timeout: 1,
        docs_folder: '/docs',
        can_handoff_to: ['root_agent', 'browser_agent'],
      },
      {
        name: 'write_agent',
        description: 'Writes the report',
        timeout: 1,
        can_handoff_to: ['review_agent'],
      },
      {
        name: 'review_agent',
        description: 'Reviews the report',
        timeout: 1,
        can_handoff_to: ['write_agent'],
      },
    ],
    ...overrides,
  });
}
