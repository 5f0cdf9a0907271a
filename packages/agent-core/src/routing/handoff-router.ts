/**
 * Handoff Router
 *
 * Validates a handoff decision against the current agent's declared targets
 * and the session hop ceiling. Invalid targets are rejected, never
 * auto-corrected to the closest match.
 */

import type { AgentSpec, HandoffDecision, RouteResult } from '@baton/agent-contracts';
import { ORCHESTRATOR_DEFAULTS, sameAgent } from '@baton/agent-contracts';
import type { Session } from '../session/session.js';
import type { AgentSpecRegistry } from '../registry/agent-spec-registry.js';

export interface HandoffRouterOptions {
  /** Session-wide ceiling on transitions */
  maxHops?: number;
}

export class HandoffRouter {
  readonly maxHops: number;

  constructor(
    private readonly registry: Pick<AgentSpecRegistry, 'resolve'>,
    options: HandoffRouterOptions = {},
  ) {
    this.maxHops = options.maxHops ?? ORCHESTRATOR_DEFAULTS.maxHops;
  }

  route(session: Pick<Session, 'hops'>, currentAgent: AgentSpec, decision: HandoffDecision): RouteResult {
    if (decision.kind === 'none') {
      return { kind: 'terminate' };
    }

    const declared = currentAgent.canHandoffTo.find((name) => sameAgent(name, decision.target));
    const target = declared ? this.registry.resolve(declared) : undefined;
    if (!target) {
      const allowed = currentAgent.canHandoffTo.length > 0 ? currentAgent.canHandoffTo.join(', ') : 'none';
      return {
        kind: 'rejected',
        reason: 'InvalidHandoffTarget',
        message: `${currentAgent.name} cannot hand off to "${decision.target}" (allowed: ${allowed})`,
      };
    }

    if (session.hops >= this.maxHops) {
      return {
        kind: 'rejected',
        reason: 'MaxHopsExceeded',
        message: `Hop ceiling of ${this.maxHops} reached; handoff ${currentAgent.name} → ${target.name} refused`,
      };
    }

    return { kind: 'next', target: target.name };
  }
}
