/**
 * Maps snake_case configuration entries onto frozen AgentSpecs.
 */

import type {
  AgentConfig,
  AgentKind,
  AgentParams,
  AgentRole,
  AgentSpec,
  Capability,
  ConfigIssue,
  SearchSettings,
} from '@baton/agent-contracts';
import { AGENT_DEFAULTS, canonicalAgentName } from '@baton/agent-contracts';

const DEFAULT_CAPABILITIES: Record<AgentKind, readonly Capability[]> = {
  manager: [],
  browser: ['web-search'],
  retriever: ['retrieval'],
  writer: ['drafting'],
  reviewer: ['reviewing'],
  custom: [],
};

/**
 * Infer the agent kind from its name when `type` is not given.
 * `root_agent` / `manager: true` → manager, `browser_agent` → browser, ...
 */
export function inferAgentKind(config: Pick<AgentConfig, 'name' | 'manager' | 'type'>): AgentKind {
  if (config.type) {
    return config.type;
  }
  if (config.manager) {
    return 'manager';
  }
  const key = canonicalAgentName(config.name);
  // `review` first: `research_reviewer` contains `search`
  if (key.includes('review')) return 'reviewer';
  if (key.includes('retriev')) return 'retriever';
  if (key.includes('browser') || key.includes('search')) return 'browser';
  if (key.includes('writ')) return 'writer';
  if (key.includes('root') || key.includes('manager')) return 'manager';
  return 'custom';
}

function deriveRole(config: AgentConfig, kind: AgentKind): AgentRole {
  if (config.role) {
    return config.role;
  }
  if (config.manager) {
    return 'manager';
  }
  return kind === 'reviewer' ? 'terminal-reviewer' : 'worker';
}

function buildParams(config: AgentConfig, kind: AgentKind, search: SearchSettings): AgentParams {
  switch (kind) {
    case 'browser':
      return {
        kind,
        sites: Object.freeze([...search.web.sites]),
        maxArticlesPerSite: search.max_articles_per_site,
        searchTimeoutMs: search.timeout,
        waitTimeMs: search.wait_time,
        apiKey: config.agentql_api_key,
      };
    case 'retriever':
      return {
        kind,
        docsFolder: config.docs_folder ?? '',
        tokenizerEmbeddingModel: config.tokenizer_embedding_model ?? AGENT_DEFAULTS.tokenizerEmbeddingModel,
        chunkSize: config.chunk_size ?? AGENT_DEFAULTS.chunkSize,
        chunkOverlap: config.chunk_overlap ?? AGENT_DEFAULTS.chunkOverlap,
      };
    default:
      return { kind };
  }
}

export interface SpecBuildResult {
  spec: AgentSpec;
  /** Error-severity problems local to this entry */
  issues: ConfigIssue[];
}

export function buildAgentSpec(config: AgentConfig, search: SearchSettings): SpecBuildResult {
  const issues: ConfigIssue[] = [];
  const kind = inferAgentKind(config);
  const role = deriveRole(config, kind);

  if (config.manager && role !== 'manager') {
    issues.push({ path: config.name, message: `manager: true conflicts with role "${role}"` });
  }
  if (kind === 'retriever' && !config.docs_folder) {
    issues.push({ path: `${config.name}.docs_folder`, message: 'retriever agents require docs_folder' });
  }

  const spec: AgentSpec = Object.freeze({
    name: config.name,
    role,
    description: config.description ?? '',
    systemPrompt: config.system_prompt ?? '',
    capabilities: Object.freeze([...(config.capabilities ?? DEFAULT_CAPABILITIES[kind])]),
    canHandoffTo: Object.freeze([...config.can_handoff_to]),
    limits: Object.freeze({
      maxCalls: Object.freeze({
        'web-search': config.limits?.max_searches ?? AGENT_DEFAULTS.maxSearches,
        retrieval: config.limits?.max_retrievals ?? AGENT_DEFAULTS.maxRetrievals,
      }),
      timeoutMs: Math.round(config.timeout * 1000),
    }),
    connection: Object.freeze({ model: config.model, apiBase: config.api_base }),
    verbose: config.verbose,
    params: Object.freeze(buildParams(config, kind, search)),
  });

  return { spec, issues };
}
