import { describe, it, expect } from 'vitest';
import { AgentSpecRegistry } from '../../registry/agent-spec-registry.js';
import { HandoffRouter } from '../handoff-router.js';
import { makeConfig } from '../../testing.js';

const registry = AgentSpecRegistry.fromConfig(makeConfig());
const router = new HandoffRouter(registry, { maxHops: 20 });
const agent = (name: string) => registry.getOrThrow(name);

describe('HandoffRouter', () => {
  it('terminates on a no-handoff decision', () => {
    expect(router.route({ hops: 3 }, agent('review_agent'), { kind: 'none', approved: true })).toEqual({
      kind: 'terminate',
    });
  });

  it('routes to a declared target', () => {
    expect(router.route({ hops: 0 }, agent('root_agent'), { kind: 'handoff', target: 'browser_agent' })).toEqual({
      kind: 'next',
      target: 'browser_agent',
    });
  });

  it('matches target names canonically and returns the registry spelling', () => {
    expect(router.route({ hops: 0 }, agent('root_agent'), { kind: 'handoff', target: 'BrowserAgent' })).toEqual({
      kind: 'next',
      target: 'browser_agent',
    });
  });

  it('rejects a target outside can_handoff_to', () => {
    expect(router.route({ hops: 1 }, agent('browser_agent'), { kind: 'handoff', target: 'write_agent' })).toEqual({
      kind: 'rejected',
      reason: 'InvalidHandoffTarget',
      message: 'browser_agent cannot hand off to "write_agent" (allowed: root_agent, retriever_agent)',
    });
  });

  it('rejects an unknown agent without guessing a close match', () => {
    const result = router.route({ hops: 0 }, agent('root_agent'), { kind: 'handoff', target: 'browse_agent' });
    expect(result).toMatchObject({ kind: 'rejected', reason: 'InvalidHandoffTarget' });
  });

  it('rejects once the hop ceiling is reached', () => {
    expect(router.route({ hops: 20 }, agent('write_agent'), { kind: 'handoff', target: 'review_agent' })).toEqual({
      kind: 'rejected',
      reason: 'MaxHopsExceeded',
      message: 'Hop ceiling of 20 reached; handoff write_agent → review_agent refused',
    });
  });

  it('allows the last hop below the ceiling', () => {
    expect(router.route({ hops: 19 }, agent('write_agent'), { kind: 'handoff', target: 'review_agent' })).toEqual({
      kind: 'next',
      target: 'review_agent',
    });
  });

  it('reports an invalid target before the hop ceiling', () => {
    const result = router.route({ hops: 20 }, agent('browser_agent'), { kind: 'handoff', target: 'write_agent' });
    expect(result).toMatchObject({ kind: 'rejected', reason: 'InvalidHandoffTarget' });
  });

  it('defaults the ceiling to 20 hops', () => {
    expect(new HandoffRouter(registry).maxHops).toBe(20);
  });
});
