/**
 * AgentSpec Registry
 *
 * Immutable, validated-at-load view of the handoff graph:
 * - Lookup by name (canonical, so `BrowserAgent` finds `browser_agent`)
 * - Graph validation: dangling targets, entry agent, duplicates, reachability
 * - Prompt helpers describing an agent's allowed handoff targets
 *
 * The graph is allowed to be cyclic (write ↔ review); runaway cycles are
 * bounded at runtime by the hop ceiling, not here.
 */

import type { AgentSpec, BatonConfig, ConfigIssue, ILogger } from '@baton/agent-contracts';
import { ConfigInvalidError, canonicalAgentName } from '@baton/agent-contracts';
import { buildAgentSpec } from './spec-builder.js';
import { createNoopLogger } from '../logging/logger.js';

export type GraphIssueCode =
  | 'DanglingHandoffTarget'
  | 'MissingEntryAgent'
  | 'MultipleEntryAgents'
  | 'DuplicateAgentName'
  | 'UnreachableAgent'
  | 'ReviewerHasHandoffs';

export interface GraphIssue {
  severity: 'error' | 'warning';
  code: GraphIssueCode;
  message: string;
  /** Agent the issue is about, when there is one */
  agent?: string;
}

export interface AgentSpecRegistryOptions {
  logger?: ILogger;
}

export class AgentSpecRegistry {
  private readonly byKey = new Map<string, AgentSpec>();
  private readonly specs: readonly AgentSpec[];
  private readonly logger: ILogger;

  /**
   * @throws ConfigInvalidError when the graph has error-severity issues
   */
  constructor(specs: readonly AgentSpec[], options: AgentSpecRegistryOptions = {}) {
    this.logger = options.logger ?? createNoopLogger();
    this.specs = Object.freeze([...specs]);
    for (const spec of this.specs) {
      const key = canonicalAgentName(spec.name);
      if (!this.byKey.has(key)) {
        this.byKey.set(key, spec);
      }
    }

    const issues = this.validateGraph();
    const errors = issues.filter((i) => i.severity === 'error');
    if (errors.length > 0) {
      throw new ConfigInvalidError(errors.map((e) => ({ path: e.agent ?? 'agents', message: e.message })));
    }
    for (const warning of issues) {
      this.logger.warn(`Agent graph: ${warning.message}`, { code: warning.code, agent: warning.agent });
    }
  }

  /**
   * Build a registry from a parsed configuration document
   *
   * @throws ConfigInvalidError listing every problem found
   */
  static fromConfig(config: BatonConfig, options: AgentSpecRegistryOptions = {}): AgentSpecRegistry {
    const issues: ConfigIssue[] = [];
    const specs = config.agents.map((agent) => {
      const built = buildAgentSpec(agent, config.search);
      issues.push(...built.issues);
      return built.spec;
    });
    if (issues.length > 0) {
      throw new ConfigInvalidError(issues);
    }
    return new AgentSpecRegistry(specs, options);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Lookup
  // ═══════════════════════════════════════════════════════════════════════

  resolve(name: string): AgentSpec | undefined {
    return this.byKey.get(canonicalAgentName(name));
  }

  getOrThrow(name: string): AgentSpec {
    const spec = this.resolve(name);
    if (!spec) {
      throw new Error(`Agent not found: ${name}. Known agents: ${this.listNames().join(', ')}`);
    }
    return spec;
  }

  has(name: string): boolean {
    return this.byKey.has(canonicalAgentName(name));
  }

  list(): readonly AgentSpec[] {
    return this.specs;
  }

  listNames(): string[] {
    return this.specs.map((s) => s.name);
  }

  /**
   * The single manager-role agent every session starts at
   */
  get entryAgent(): AgentSpec {
    const entry = this.specs.find((s) => s.role === 'manager');
    if (!entry) {
      // Unreachable: the constructor rejects graphs without an entry agent
      throw new Error('Registry has no entry agent');
    }
    return entry;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Validation
  // ═══════════════════════════════════════════════════════════════════════

  validateGraph(): GraphIssue[] {
    const issues: GraphIssue[] = [];

    const seen = new Map<string, string>();
    for (const spec of this.specs) {
      const key = canonicalAgentName(spec.name);
      const previous = seen.get(key);
      if (previous !== undefined) {
        issues.push({
          severity: 'error',
          code: 'DuplicateAgentName',
          agent: spec.name,
          message: `"${spec.name}" duplicates "${previous}"`,
        });
      } else {
        seen.set(key, spec.name);
      }
    }

    const managers = this.specs.filter((s) => s.role === 'manager');
    if (managers.length === 0) {
      issues.push({
        severity: 'error',
        code: 'MissingEntryAgent',
        message: 'no agent has manager: true',
      });
    } else if (managers.length > 1) {
      issues.push({
        severity: 'error',
        code: 'MultipleEntryAgents',
        message: `exactly one manager agent is allowed, found ${managers.map((m) => m.name).join(', ')}`,
      });
    }

    for (const spec of this.specs) {
      for (const target of spec.canHandoffTo) {
        if (!this.has(target)) {
          issues.push({
            severity: 'error',
            code: 'DanglingHandoffTarget',
            agent: spec.name,
            message: `${spec.name} can_handoff_to unknown agent "${target}"`,
          });
        }
      }
      if (spec.role === 'terminal-reviewer' && spec.canHandoffTo.length > 0) {
        issues.push({
          severity: 'warning',
          code: 'ReviewerHasHandoffs',
          agent: spec.name,
          message: `terminal reviewer ${spec.name} declares handoff targets`,
        });
      }
    }

    const [entry] = managers;
    if (managers.length === 1 && entry) {
      const reachable = this.reachableFrom(entry);
      for (const spec of this.specs) {
        if (!reachable.has(canonicalAgentName(spec.name))) {
          issues.push({
            severity: 'warning',
            code: 'UnreachableAgent',
            agent: spec.name,
            message: `${spec.name} is not reachable from ${entry.name}`,
          });
        }
      }
    }

    return issues;
  }

  private reachableFrom(start: AgentSpec): Set<string> {
    const visited = new Set<string>([canonicalAgentName(start.name)]);
    const stack: AgentSpec[] = [start];
    for (let current = stack.pop(); current; current = stack.pop()) {
      for (const target of current.canHandoffTo) {
        const next = this.resolve(target);
        const key = canonicalAgentName(target);
        if (next && !visited.has(key)) {
          visited.add(key);
          stack.push(next);
        }
      }
    }
    return visited;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Prompt helpers
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Allowed targets of `name`, resolved to registry specs in declaration order
   */
  handoffTargets(name: string): AgentSpec[] {
    const spec = this.resolve(name);
    if (!spec) {
      return [];
    }
    return spec.canHandoffTo.flatMap((target) => {
      const resolved = this.resolve(target);
      return resolved ? [resolved] : [];
    });
  }

  /**
   * Bullet list of allowed targets with descriptions, for prompts
   */
  describeHandoffTargets(name: string): string {
    const targets = this.handoffTargets(name);
    if (targets.length === 0) {
      return '(none)';
    }
    return targets
      .map((t) => (t.description ? `- ${t.name}: ${t.description}` : `- ${t.name}`))
      .join('\n');
  }
}
