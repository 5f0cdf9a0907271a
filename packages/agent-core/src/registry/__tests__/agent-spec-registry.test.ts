import { describe, it, expect } from 'vitest';
import type { AgentSpec, ConfigIssue } from '@baton/agent-contracts';
import { ConfigInvalidError } from '@baton/agent-contracts';
import { AgentSpecRegistry } from '../agent-spec-registry.js';
import { createMockLogger, makeAgentSpec, makeConfig } from '../../testing.js';

function issuesOf(build: () => unknown): readonly ConfigIssue[] {
  try {
    build();
  } catch (error) {
    if (error instanceof ConfigInvalidError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('expected ConfigInvalidError');
}

const root = (canHandoffTo: string[]): AgentSpec =>
  makeAgentSpec({ name: 'root_agent', role: 'manager', canHandoffTo });

describe('AgentSpecRegistry', () => {
  describe('fromConfig', () => {
    it('builds specs in declaration order with the manager as entry agent', () => {
      const registry = AgentSpecRegistry.fromConfig(makeConfig());

      expect(registry.listNames()).toEqual([
        'root_agent',
        'browser_agent',
        'retriever_agent',
        'write_agent',
        'review_agent',
      ]);
      expect(registry.entryAgent.name).toBe('root_agent');
      expect(registry.getOrThrow('review_agent').role).toBe('terminal-reviewer');
    });

    it('logs warnings without rejecting the graph', () => {
      const logger = createMockLogger();
      AgentSpecRegistry.fromConfig(makeConfig(), { logger });

      expect(logger.warn).toHaveBeenCalledWith('Agent graph: terminal reviewer review_agent declares handoff targets', {
        code: 'ReviewerHasHandoffs',
        agent: 'review_agent',
      });
    });

    it('rejects a retriever without docs_folder', () => {
      const config = makeConfig({
        agents: [
          { name: 'root_agent', manager: true, can_handoff_to: ['retriever_agent'] },
          { name: 'retriever_agent' },
        ],
      });

      expect(issuesOf(() => AgentSpecRegistry.fromConfig(config))).toEqual([
        { path: 'retriever_agent.docs_folder', message: 'retriever agents require docs_folder' },
      ]);
    });
  });

  describe('lookup', () => {
    const registry = AgentSpecRegistry.fromConfig(makeConfig());

    it('resolves names canonically', () => {
      expect(registry.resolve('BrowserAgent')?.name).toBe('browser_agent');
      expect(registry.has('browser-agent')).toBe(true);
      expect(registry.resolve('ghost_agent')).toBeUndefined();
    });

    it('throws with the known agents for an unknown name', () => {
      expect(() => registry.getOrThrow('ghost_agent')).toThrow(
        'Agent not found: ghost_agent. Known agents: root_agent, browser_agent, retriever_agent, write_agent, review_agent',
      );
    });

    it('describes handoff targets for prompts', () => {
      expect(registry.describeHandoffTargets('root_agent')).toBe(
        '- browser_agent: Searches the web\n- retriever_agent: Searches local documents\n- write_agent: Writes the report',
      );
      expect(registry.handoffTargets('write_agent').map((s) => s.name)).toEqual(['review_agent']);
      expect(registry.handoffTargets('ghost_agent')).toEqual([]);
    });

    it('describes an agent without targets as (none)', () => {
      const single = new AgentSpecRegistry([root([])]);
      expect(single.describeHandoffTargets('root_agent')).toBe('(none)');
    });
  });

  describe('graph validation', () => {
    it('rejects a dangling handoff target', () => {
      const specs = [root(['browser_agent']), makeAgentSpec({ name: 'browser_agent', canHandoffTo: ['ghost_agent'] })];

      expect(issuesOf(() => new AgentSpecRegistry(specs))).toEqual([
        { path: 'browser_agent', message: 'browser_agent can_handoff_to unknown agent "ghost_agent"' },
      ]);
    });

    it('requires an entry agent', () => {
      expect(issuesOf(() => new AgentSpecRegistry([makeAgentSpec({ name: 'write_agent' })]))).toEqual([
        { path: 'agents', message: 'no agent has manager: true' },
      ]);
    });

    it('allows only one entry agent', () => {
      const specs = [root([]), makeAgentSpec({ name: 'boss_agent', role: 'manager' })];

      expect(issuesOf(() => new AgentSpecRegistry(specs))).toEqual([
        { path: 'agents', message: 'exactly one manager agent is allowed, found root_agent, boss_agent' },
      ]);
    });

    it('rejects names that differ only in spelling', () => {
      const specs = [root(['browser_agent']), makeAgentSpec({ name: 'browser_agent' }), makeAgentSpec({ name: 'BrowserAgent' })];

      expect(issuesOf(() => new AgentSpecRegistry(specs))).toEqual([
        { path: 'BrowserAgent', message: '"BrowserAgent" duplicates "browser_agent"' },
      ]);
    });

    it('accepts the cyclic write and review pair', () => {
      const specs = [
        root(['write_agent']),
        makeAgentSpec({ name: 'write_agent', canHandoffTo: ['review_agent'] }),
        makeAgentSpec({ name: 'review_agent', canHandoffTo: ['write_agent'] }),
      ];

      expect(new AgentSpecRegistry(specs).validateGraph()).toEqual([]);
    });

    it('warns about agents unreachable from the entry agent', () => {
      const registry = new AgentSpecRegistry([root([]), makeAgentSpec({ name: 'orphan_agent' })]);

      expect(registry.validateGraph()).toEqual([
        {
          severity: 'warning',
          code: 'UnreachableAgent',
          agent: 'orphan_agent',
          message: 'orphan_agent is not reachable from root_agent',
        },
      ]);
    });
  });
});
