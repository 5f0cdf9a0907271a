/**
 * Wiring: configuration document → ready Orchestrator.
 */

import type { AgentSpec, BatonConfig, ILLM, ILogger, OrchestratorEventBus } from '@baton/agent-contracts';
import { LocalDocsRetriever, OpenAICompatibleLLM, createToolRegistry, type ToolProviders } from '@baton/agent-tools';
import { AgentSpecRegistry } from './registry/agent-spec-registry.js';
import { Orchestrator } from './orchestrator.js';
import type { LLMResolver } from './executor/agent-executor.js';
import { loadConfig } from './config/config-loader.js';
import { createLogger } from './logging/logger.js';

export interface CreateOrchestratorDeps extends ToolProviders {
  /**
   * Model backend: one instance for every agent, or a resolver per agent.
   * Defaults to an OpenAI-compatible client per `api_base`.
   */
  llm?: ILLM | LLMResolver;
  /** Bearer token for the default backend */
  apiKey?: string;
  logger?: ILogger;
  events?: OrchestratorEventBus;
  now?: () => Date;
}

function createLLMResolver(llm: ILLM | LLMResolver | undefined, apiKey: string | undefined): LLMResolver {
  if (typeof llm === 'function') {
    return llm;
  }
  if (llm) {
    return () => llm;
  }
  const clients = new Map<string, ILLM>();
  return (spec: AgentSpec) => {
    let client = clients.get(spec.connection.apiBase);
    if (!client) {
      client = new OpenAICompatibleLLM({ apiBase: spec.connection.apiBase, apiKey });
      clients.set(spec.connection.apiBase, client);
    }
    return client;
  };
}

/**
 * Build an orchestrator from a parsed configuration
 *
 * @throws ConfigInvalidError when the agent graph is invalid
 */
export function createOrchestrator(config: BatonConfig, deps: CreateOrchestratorDeps = {}): Orchestrator {
  const logger = deps.logger ?? createLogger();
  const registry = AgentSpecRegistry.fromConfig(config, { logger });
  const tools = createToolRegistry({
    search: deps.search,
    scrape: deps.scrape,
    retrieval: deps.retrieval ?? new LocalDocsRetriever(),
  });

  logger.debug('Orchestrator configured', {
    agents: registry.listNames(),
    entryAgent: registry.entryAgent.name,
    tools: tools.getToolNames(),
  });

  return new Orchestrator(
    {
      registry,
      tools,
      resolveLLM: createLLMResolver(deps.llm, deps.apiKey),
      logger,
      events: deps.events,
      now: deps.now,
    },
    {
      maxHops: config.orchestrator.max_hops,
      maxRetries: config.orchestrator.max_retries,
      maxToolRounds: config.orchestrator.max_tool_rounds,
      maxConcurrentSessions: config.orchestrator.max_concurrent_sessions,
      maxQueuedSessions: config.orchestrator.max_queued_sessions,
      approvalPolicy: config.orchestrator.approval_policy,
    },
  );
}

/**
 * Load a YAML/JSON configuration file and build an orchestrator from it
 *
 * @throws ConfigInvalidError
 */
export async function loadOrchestrator(path: string, deps: CreateOrchestratorDeps = {}): Promise<Orchestrator> {
  return createOrchestrator(await loadConfig(path), deps);
}
