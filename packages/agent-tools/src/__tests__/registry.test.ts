import { describe, it, expect } from 'vitest';
import type { AgentSpec, Capability } from '@baton/agent-contracts';
import { INITIAL_SHARED_STATE } from '@baton/agent-contracts';
import { ToolRegistry } from '../registry.js';
import { createToolRegistry } from '../tools/index.js';
import type { Tool, ToolExecCtx } from '../types.js';

const AGENT: AgentSpec = {
  name: 'write_agent',
  role: 'worker',
  description: 'Writes the report',
  systemPrompt: '',
  capabilities: ['drafting'],
  canHandoffTo: [],
  limits: { maxCalls: { 'web-search': 2, retrieval: 2 }, timeoutMs: 1000 },
  connection: { model: 'test-model', apiBase: 'http://localhost:1234/v1' },
  verbose: false,
  params: { kind: 'writer' },
};

function createMockContext(): ToolExecCtx {
  return {
    sessionId: 'session-1',
    agent: AGENT,
    signal: new AbortController().signal,
    sharedState: { ...INITIAL_SHARED_STATE },
  };
}

function createMockTool(name: string, capability: Capability = 'drafting', executor?: Tool['executor']): Tool {
  return {
    definition: {
      name,
      description: `Mock tool: ${name}`,
      inputSchema: { type: 'object', properties: {} },
    },
    policy: { capability },
    executor: executor ?? (async () => ({ success: true, output: 'ok' })),
  };
}

describe('ToolRegistry', () => {
  it('should register and retrieve a tool', () => {
    const registry = new ToolRegistry();
    const tool = createMockTool('test_tool');

    registry.register(tool);

    expect(registry.get('test_tool')).toBe(tool);
    expect(registry.has('test_tool')).toBe(true);
  });

  it('should return undefined for unknown tool', () => {
    const registry = new ToolRegistry();

    expect(registry.get('nonexistent')).toBeUndefined();
    expect(registry.has('nonexistent')).toBe(false);
  });

  it('should return definitions of all registered tools', () => {
    const registry = new ToolRegistry();
    registry.register(createMockTool('alpha'));
    registry.register(createMockTool('beta'));

    const defs = registry.getDefinitions();

    expect(defs.map((def) => def.name)).toEqual(['alpha', 'beta']);
  });

  it('should filter definitions by capability', () => {
    const registry = new ToolRegistry();
    registry.register(createMockTool('search', 'web-search'));
    registry.register(createMockTool('draft', 'drafting'));
    registry.register(createMockTool('review', 'reviewing'));

    expect(registry.getDefinitions(['drafting', 'reviewing']).map((d) => d.name)).toEqual(['draft', 'review']);
    expect(registry.getDefinitions([])).toEqual([]);
  });

  it('should return sorted tool names', () => {
    const registry = new ToolRegistry();
    registry.register(createMockTool('zebra'));
    registry.register(createMockTool('alpha'));
    registry.register(createMockTool('middle'));

    expect(registry.getToolNames()).toEqual(['alpha', 'middle', 'zebra']);
  });

  it('should execute a registered tool with its context', async () => {
    const registry = new ToolRegistry();
    registry.register(
      createMockTool('my_tool', 'drafting', async (input, ctx) => ({
        success: true,
        output: `received: ${String(input.key)} from ${ctx.agent.name}`,
      })),
    );

    const result = await registry.execute('my_tool', { key: 'value' }, createMockContext());

    expect(result).toEqual({ success: true, output: 'received: value from write_agent' });
  });

  it('should throw when executing unknown tool', async () => {
    const registry = new ToolRegistry();

    await expect(registry.execute('missing', {}, createMockContext())).rejects.toThrow('Unknown tool: missing');
  });

  it('should overwrite tool when registering with same name', () => {
    const registry = new ToolRegistry();
    const tool1 = createMockTool('dup');
    const tool2 = createMockTool('dup');

    registry.register(tool1);
    registry.register(tool2);

    expect(registry.get('dup')).toBe(tool2);
    expect(registry.getToolNames()).toEqual(['dup']);
  });
});

describe('createToolRegistry', () => {
  it('registers only the report tools without providers', () => {
    expect(createToolRegistry().getToolNames()).toEqual(['record_report', 'review_report']);
  });

  it('registers provider-backed tools when providers are present', () => {
    const registry = createToolRegistry({
      search: { search: async () => [] },
      scrape: { scrape: async () => '' },
      retrieval: { retrieve: async () => [] },
    });

    expect(registry.getToolNames()).toEqual([
      'record_report',
      'retrieve_documents',
      'review_report',
      'scrape_url',
      'web_search',
    ]);
    expect(registry.get('web_search')?.policy).toEqual({ capability: 'web-search', meteredInput: 'query' });
    expect(registry.get('scrape_url')?.policy).toEqual({ capability: 'web-search' });
  });
});
