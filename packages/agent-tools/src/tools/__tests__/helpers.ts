import type { AgentParams, AgentSpec, Capability } from '@baton/agent-contracts';
import { INITIAL_SHARED_STATE } from '@baton/agent-contracts';
import type { ToolExecCtx } from '../../types.js';

export function makeAgent(params: AgentParams, capabilities: Capability[]): AgentSpec {
  return {
    name: `${params.kind}_agent`,
    role: 'worker',
    description: `${params.kind} agent`,
    systemPrompt: '',
    capabilities,
    canHandoffTo: [],
    limits: { maxCalls: { 'web-search': 2, retrieval: 2 }, timeoutMs: 1000 },
    connection: { model: 'test-model', apiBase: 'http://localhost:1234/v1' },
    verbose: false,
    params,
  };
}

export function makeCtx(agent: AgentSpec, signal: AbortSignal = new AbortController().signal): ToolExecCtx {
  return { sessionId: 'session-1', agent, signal, sharedState: { ...INITIAL_SHARED_STATE } };
}
