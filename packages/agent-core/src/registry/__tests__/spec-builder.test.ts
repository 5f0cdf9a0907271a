import { describe, it, expect } from 'vitest';
import { parseBatonConfig } from '@baton/agent-contracts';
import { buildAgentSpec, inferAgentKind } from '../spec-builder.js';

function build(agent: Record<string, unknown>, search: Record<string, unknown> = {}) {
  const config = parseBatonConfig({ search, agents: [agent] });
  const [entry] = config.agents;
  if (!entry) {
    throw new Error('no agent parsed');
  }
  return buildAgentSpec(entry, config.search);
}

describe('inferAgentKind', () => {
  it('prefers an explicit type', () => {
    expect(inferAgentKind({ name: 'browser_agent', manager: false, type: 'writer' })).toBe('writer');
  });

  it('treats the manager flag as the manager kind', () => {
    expect(inferAgentKind({ name: 'planner', manager: true })).toBe('manager');
  });

  it.each([
    ['browser_agent', 'browser'],
    ['WebSearchAgent', 'browser'],
    ['retriever_agent', 'retriever'],
    ['review_agent', 'reviewer'],
    ['research_reviewer', 'reviewer'],
    ['write_agent', 'writer'],
    ['root_agent', 'manager'],
    ['translator', 'custom'],
  ] as const)('infers %s as %s', (name, kind) => {
    expect(inferAgentKind({ name, manager: false })).toBe(kind);
  });
});

describe('buildAgentSpec', () => {
  it('keeps the largest accepted timeout within timer range', () => {
    const { spec } = build({ name: 'write_agent', timeout: 2_147_483 });

    expect(spec.limits.timeoutMs).toBe(2_147_483_000);
    expect(spec.limits.timeoutMs).toBeLessThanOrEqual(2 ** 31 - 1);
  });

  it('applies defaults and converts the timeout to milliseconds', () => {
    const { spec, issues } = build({ name: 'write_agent', timeout: 1.5, can_handoff_to: ['review_agent'] });

    expect(issues).toEqual([]);
    expect(spec).toEqual({
      name: 'write_agent',
      role: 'worker',
      description: '',
      systemPrompt: '',
      capabilities: ['drafting'],
      canHandoffTo: ['review_agent'],
      limits: { maxCalls: { 'web-search': 2, retrieval: 2 }, timeoutMs: 1500 },
      connection: { model: 'qwen2.5-7b-instruct-1m', apiBase: 'http://localhost:1234/v1' },
      verbose: false,
      params: { kind: 'writer' },
    });
  });

  it('freezes the spec deeply', () => {
    const { spec } = build({ name: 'write_agent' });

    expect(Object.isFrozen(spec)).toBe(true);
    expect(Object.isFrozen(spec.limits.maxCalls)).toBe(true);
    expect(Object.isFrozen(spec.canHandoffTo)).toBe(true);
  });

  it('takes browser parameters from the search settings', () => {
    const { spec } = build(
      { name: 'browser_agent', agentql_api_key: 'test-secret' },
      { timeout: 5000, wait_time: 100, max_articles_per_site: 3, web: { sites: ['https://example.org'] } },
    );

    expect(spec.capabilities).toEqual(['web-search']);
    expect(spec.params).toEqual({
      kind: 'browser',
      sites: ['https://example.org'],
      maxArticlesPerSite: 3,
      searchTimeoutMs: 5000,
      waitTimeMs: 100,
      apiKey: 'test-secret',
    });
  });

  it('fills retriever chunking defaults', () => {
    const { spec, issues } = build({ name: 'retriever_agent', docs_folder: './docs' });

    expect(issues).toEqual([]);
    expect(spec.params).toEqual({
      kind: 'retriever',
      docsFolder: './docs',
      tokenizerEmbeddingModel: 'BAAI/bge-small-en-v1.5',
      chunkSize: 1024,
      chunkOverlap: 200,
    });
  });

  it('marks reviewers as terminal reviewers and managers as managers', () => {
    expect(build({ name: 'review_agent' }).spec.role).toBe('terminal-reviewer');
    expect(build({ name: 'planner', manager: true }).spec.role).toBe('manager');
    expect(build({ name: 'review_agent', role: 'worker' }).spec.role).toBe('worker');
  });

  it('honors explicit capabilities and limits', () => {
    const { spec } = build({
      name: 'analyst',
      capabilities: ['web-search', 'retrieval'],
      limits: { max_searches: 5 },
    });

    expect(spec.capabilities).toEqual(['web-search', 'retrieval']);
    expect(spec.limits.maxCalls).toEqual({ 'web-search': 5, retrieval: 2 });
  });

  it('reports a manager flag that conflicts with the role', () => {
    expect(build({ name: 'root_agent', manager: true, role: 'worker' }).issues).toEqual([
      { path: 'root_agent', message: 'manager: true conflicts with role "worker"' },
    ]);
  });

  it('reports a retriever without docs_folder', () => {
    expect(build({ name: 'retriever_agent' }).issues).toEqual([
      { path: 'retriever_agent.docs_folder', message: 'retriever agents require docs_folder' },
    ]);
  });
});
