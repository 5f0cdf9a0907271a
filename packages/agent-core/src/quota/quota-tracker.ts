/**
 * Quota Tracker
 *
 * Gates metered tool calls (web search, retrieval) per (session, agent):
 * 1. SearchLimitExceeded: the agent already used its allowance
 * 2. DuplicateQuery: the normalized query was already issued
 *
 * The check and the increment happen in one synchronous step, so a session
 * (single writer) can never overshoot its limits.
 */

import type {
  MeteredCapability,
  QuotaDecision,
  QuotaSnapshot,
} from '@baton/agent-contracts';
import type { Session } from '../session/session.js';
import type { AgentSpecRegistry } from '../registry/agent-spec-registry.js';

/**
 * Normalize a query for duplicate detection:
 * NFKC, lower-case, collapsed whitespace, no trailing `?`, `.` or `!`.
 */
export function normalizeQuery(query: string): string {
  return query
    .normalize('NFKC')
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/[?.!]+$/, '')
    .trim();
}

const CAPABILITY_NOUN: Record<MeteredCapability, string> = {
  'web-search': 'searches',
  retrieval: 'retrievals',
};

export class QuotaTracker {
  constructor(private readonly registry: Pick<AgentSpecRegistry, 'getOrThrow'>) {}

  /**
   * Check the call against the agent's limits and count it when allowed
   */
  checkAndIncrement(
    session: Session,
    agentName: string,
    queryText: string,
    capability: MeteredCapability = 'web-search',
  ): QuotaDecision {
    const agent = this.registry.getOrThrow(agentName);
    const quota = session.quotaFor(agent.name);
    const max = agent.limits.maxCalls[capability];
    const used = quota.calls[capability];

    if (used >= max) {
      return {
        allowed: false,
        reason: 'SearchLimitExceeded',
        message:
          `${agent.name} already used ${used}/${max} ${CAPABILITY_NOUN[capability]} in this session. ` +
          `No further ${CAPABILITY_NOUN[capability]} are allowed: work with what you have or hand off.`,
      };
    }

    const normalized = normalizeQuery(queryText);
    if (quota.seenQueries.has(normalized)) {
      return {
        allowed: false,
        reason: 'DuplicateQuery',
        message: `"${queryText}" was already issued by ${agent.name}; repeated queries are refused. Use the earlier results.`,
      };
    }

    quota.calls[capability] = used + 1;
    quota.seenQueries.add(normalized);
    return { allowed: true };
  }

  /**
   * Whether the agent has no calls of `capability` left
   */
  isExhausted(session: Session, agentName: string, capability: MeteredCapability): boolean {
    const agent = this.registry.getOrThrow(agentName);
    if (!session.hasQuota(agent.name)) {
      return agent.limits.maxCalls[capability] <= 0;
    }
    return session.quotaFor(agent.name).calls[capability] >= agent.limits.maxCalls[capability];
  }

  /**
   * Add invocation wall-clock time to the agent's quota
   */
  recordElapsed(session: Session, agentName: string, ms: number): void {
    const quota = session.quotaFor(agentName);
    quota.elapsedMs += ms;
    quota.invocations += 1;
  }

  snapshot(session: Session, agentName: string): QuotaSnapshot {
    return toSnapshot(session.quotaFor(agentName));
  }
}

export function toSnapshot(quota: {
  agent: string;
  calls: Record<MeteredCapability, number>;
  seenQueries: ReadonlySet<string>;
  elapsedMs: number;
  invocations: number;
}): QuotaSnapshot {
  return {
    agent: quota.agent,
    calls: { ...quota.calls },
    queries: Array.from(quota.seenQueries),
    elapsedMs: quota.elapsedMs,
    invocations: quota.invocations,
  };
}
