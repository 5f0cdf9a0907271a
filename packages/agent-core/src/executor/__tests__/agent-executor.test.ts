import { describe, it, expect, beforeEach } from 'vitest';
import type { LLMMessage, OrchestratorEvents } from '@baton/agent-contracts';
import { createToolRegistry, type ToolRegistry } from '@baton/agent-tools';
import { AgentSpecRegistry } from '../../registry/agent-spec-registry.js';
import { QuotaTracker } from '../../quota/quota-tracker.js';
import { Session } from '../../session/session.js';
import { createEventBus } from '../../events/event-bus.js';
import { AgentExecutor } from '../agent-executor.js';
import {
  ScriptedLLM,
  createFakeRetrievalProvider,
  createFakeSearchProvider,
  makeAgentSpec,
  makeConfig,
  turn,
  type ScriptedTurn,
  type ScriptFn,
} from '../../testing.js';

const registry = AgentSpecRegistry.fromConfig(makeConfig());

function lastMessage(messages: readonly LLMMessage[]): LLMMessage | undefined {
  return messages[messages.length - 1];
}

describe('AgentExecutor', () => {
  let search: ReturnType<typeof createFakeSearchProvider>;
  let tools: ToolRegistry;
  let session: Session;

  beforeEach(() => {
    search = createFakeSearchProvider();
    tools = createToolRegistry({ search, retrieval: createFakeRetrievalProvider() });
    session = new Session('Compare async runtimes', { id: 's1' });
  });

  function executorFor(scripts: Record<string, ScriptedTurn[] | ScriptFn>, specs = registry) {
    const llm = new ScriptedLLM(scripts);
    const events = createEventBus();
    const executor = new AgentExecutor({
      registry: specs,
      tools,
      quota: new QuotaTracker(specs),
      resolveLLM: llm.resolver,
      events,
    });
    return { executor, llm, events };
  }

  it('takes the handoff decision from a text marker', async () => {
    const { executor } = executorFor({ root_agent: [turn.say('Plan ready.\n[HANDOFF: browser_agent] find sources')] });

    const outcome = await executor.invoke(registry.getOrThrow('root_agent'), 'task', session);

    expect(outcome).toEqual({
      status: 'completed',
      output: 'Plan ready.\n find sources',
      decision: { kind: 'handoff', target: 'browser_agent', payload: 'find sources' },
    });
    expect(session.transcript.map((e) => e.kind)).toEqual(['invocation']);
    expect(session.transcript[0]?.detail).toMatchObject({
      attempt: 1,
      decision: { kind: 'handoff', target: 'browser_agent', payload: 'find sources' },
    });
  });

  it('prefers a structured handoff intent over text markers', async () => {
    const { executor } = executorFor({
      root_agent: [{ content: ' [APPROVED] ', handoff: { type: 'handoff', target: 'write_agent', payload: 'draft' } }],
    });

    const outcome = await executor.invoke(registry.getOrThrow('root_agent'), 'task', session);

    expect(outcome).toEqual({
      status: 'completed',
      output: '[APPROVED]',
      decision: { kind: 'handoff', target: 'write_agent', payload: 'draft' },
    });
  });

  it('offers capability tools plus the control tools', async () => {
    const { executor, llm } = executorFor({
      root_agent: [turn.say('done')],
      review_agent: [turn.approve()],
    });

    await executor.invoke(registry.getOrThrow('root_agent'), 'task', session);
    await executor.invoke(registry.getOrThrow('review_agent'), 'task', session);

    expect(llm.requestsFor('root_agent')[0]?.tools.map((t) => t.name)).toEqual(['handoff', 'finish']);
    expect(llm.requestsFor('review_agent')[0]?.tools.map((t) => t.name)).toEqual(['review_report', 'handoff', 'finish']);
  });

  it('denies a third search and feeds the denial back to the model', async () => {
    const { executor, llm, events } = executorFor({
      browser_agent: [turn.search('q1', 'q2', 'q3'), turn.handoff('root_agent', 'two sources')],
    });
    const denied: Array<OrchestratorEvents['tool:denied']> = [];
    events.on('tool:denied', (e) => denied.push(e));

    const outcome = await executor.invoke(registry.getOrThrow('browser_agent'), 'find sources', session);

    expect(outcome).toEqual({
      status: 'completed',
      output: '',
      decision: { kind: 'handoff', target: 'root_agent', payload: 'two sources' },
    });
    expect(search.search).toHaveBeenCalledTimes(2);
    expect(session.transcript.map((e) => e.kind)).toEqual(['tool_call', 'tool_call', 'tool_denied', 'invocation']);

    const second = llm.requestsFor('browser_agent')[1];
    expect(lastMessage(second?.messages ?? [])).toEqual({
      role: 'tool',
      toolCallId: 'call-3',
      name: 'web_search',
      content:
        'DENIED (SearchLimitExceeded): browser_agent already used 2/2 searches in this session. ' +
        'No further searches are allowed: work with what you have or hand off.',
    });
    expect(second?.systemPrompt).toContain('No further searches are allowed in this session.');
    expect(denied).toEqual([
      {
        sessionId: 's1',
        agent: 'browser_agent',
        tool: 'web_search',
        reason: 'SearchLimitExceeded',
        message:
          'browser_agent already used 2/2 searches in this session. ' +
          'No further searches are allowed: work with what you have or hand off.',
      },
    ]);
  });

  it('returns tool output to the model', async () => {
    const { executor, llm } = executorFor({
      browser_agent: [turn.search('rust async'), turn.say('Found it.')],
    });

    await executor.invoke(registry.getOrThrow('browser_agent'), 'find sources', session);

    expect(lastMessage(llm.requestsFor('browser_agent')[1]?.messages ?? [])).toEqual({
      role: 'tool',
      toolCallId: 'call-1',
      name: 'web_search',
      content: '1. Result for rust async\n   https://example.com/rust%20async\n   About rust async',
    });
  });

  it('denies tools outside the agent capabilities', async () => {
    const { executor } = executorFor({
      write_agent: [turn.search('anything'), turn.handoff('review_agent')],
    });

    await executor.invoke(registry.getOrThrow('write_agent'), 'write', session);

    expect(search.search).not.toHaveBeenCalled();
    expect(session.transcript[0]).toMatchObject({
      kind: 'tool_denied',
      output: 'write_agent has no tool named "web_search". Available: record_report',
      detail: { tool: 'web_search', reason: 'CapabilityMissing' },
    });
  });

  it('lets the writer record the report in shared state', async () => {
    const { executor } = executorFor({
      write_agent: [
        {
          toolCalls: [{ name: 'record_report', input: { report: '# Runtimes' } }],
          handoff: { type: 'handoff', target: 'review_agent' },
        },
      ],
    });

    const outcome = await executor.invoke(registry.getOrThrow('write_agent'), 'write', session);

    expect(outcome).toMatchObject({ status: 'completed', decision: { kind: 'handoff', target: 'review_agent' } });
    expect(session.sharedState.reportContent).toBe('# Runtimes');
  });

  it('reports a timeout as an outcome', async () => {
    const specs = new AgentSpecRegistry([
      makeAgentSpec({ name: 'root_agent', role: 'manager', limits: { maxCalls: { 'web-search': 2, retrieval: 2 }, timeoutMs: 20 } }),
    ]);
    const { executor } = executorFor({ root_agent: [{ hang: true }] }, specs);

    const outcome = await executor.invoke(specs.getOrThrow('root_agent'), 'task', session, 2);

    expect(outcome).toEqual({ status: 'timed_out', timeoutMs: 20 });
    expect(session.transcript[0]).toMatchObject({
      kind: 'timed_out',
      output: 'Invocation exceeded 20ms',
      detail: { attempt: 2, timeoutMs: 20 },
    });
    expect(session.quotaFor('root_agent').invocations).toBe(1);
  });

  it('reports a backend failure as an outcome', async () => {
    const { executor } = executorFor({ root_agent: [{ throws: 'connection refused' }] });

    const outcome = await executor.invoke(registry.getOrThrow('root_agent'), 'task', session);

    expect(outcome).toEqual({ status: 'backend_error', message: 'connection refused' });
    expect(session.transcript[0]).toMatchObject({ kind: 'backend_error', output: 'connection refused' });
  });

  it('rethrows caller cancellation', async () => {
    const { executor } = executorFor({ root_agent: [{ hang: true }] });

    await expect(
      executor.invoke(registry.getOrThrow('root_agent'), 'task', session, 1, { signal: AbortSignal.abort() }),
    ).rejects.toMatchObject({ code: 'Cancelled' });
  });

  it('stops after the tool round limit with the last reply', async () => {
    const llm = new ScriptedLLM({ browser_agent: (_request, index) => turn.search(`query ${index}`) });
    const executor = new AgentExecutor({
      registry,
      tools,
      quota: new QuotaTracker(registry),
      resolveLLM: llm.resolver,
      maxToolRounds: 3,
    });

    const outcome = await executor.invoke(registry.getOrThrow('browser_agent'), 'find', session);

    expect(outcome).toEqual({ status: 'completed', output: '', decision: { kind: 'none' } });
    expect(llm.requestsFor('browser_agent')).toHaveLength(3);
  });
});
