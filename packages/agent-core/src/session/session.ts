/**
 * Session: state of one task as it moves through the agent graph.
 *
 * A session exclusively owns its transcript, quota map and shared state;
 * nothing here is shared across sessions. Terminal states are absorbing:
 * once terminated, further transitions are ignored.
 */

import { randomUUID } from 'node:crypto';
import type {
  Quota,
  SessionFailure,
  SessionState,
  SharedState,
  TranscriptEntry,
  TranscriptEntryInit,
} from '@baton/agent-contracts';
import { INITIAL_SHARED_STATE, canonicalAgentName } from '@baton/agent-contracts';

export interface SessionOptions {
  id?: string;
  /** Clock, injectable for tests */
  now?: () => Date;
}

export class Session {
  readonly id: string;
  readonly task: string;
  readonly startedAt: Date;
  readonly sharedState: SharedState = { ...INITIAL_SHARED_STATE };

  /** Agent-to-agent transitions taken so far */
  hops = 0;
  /** Last completed invocation output */
  lastOutput = '';
  finishedAt?: Date;

  private currentState: SessionState = { status: 'idle' };
  private readonly entries: TranscriptEntry[] = [];
  /** canonical agent name → quota */
  private readonly quotas = new Map<string, Quota>();
  /** agent name → invocation count (visited multiset) */
  private readonly visits = new Map<string, number>();
  private readonly now: () => Date;

  constructor(task: string, options: SessionOptions = {}) {
    this.id = options.id ?? randomUUID();
    this.task = task;
    this.now = options.now ?? (() => new Date());
    this.startedAt = this.now();
  }

  // ═══════════════════════════════════════════════════════════════════════
  // State machine
  // ═══════════════════════════════════════════════════════════════════════

  get state(): SessionState {
    return this.currentState;
  }

  get currentAgent(): string | undefined {
    return this.currentState.status === 'running' ? this.currentState.agent : undefined;
  }

  get isTerminated(): boolean {
    return this.currentState.status === 'terminated';
  }

  /** idle → running(agent) */
  start(agent: string): void {
    if (this.currentState.status !== 'idle') {
      throw new Error(`Session ${this.id} already started (${this.currentState.status})`);
    }
    this.currentState = { status: 'running', agent };
  }

  /** running(a) → running(b), counting one hop */
  handoffTo(agent: string): void {
    if (this.currentState.status !== 'running') {
      throw new Error(`Session ${this.id} cannot hand off while ${this.currentState.status}`);
    }
    this.hops += 1;
    this.currentState = { status: 'running', agent };
  }

  /** → terminated(success). No-op once terminated. */
  succeed(agent: string): boolean {
    if (this.isTerminated) {
      return false;
    }
    this.currentState = { status: 'terminated', outcome: 'success', agent };
    this.finishedAt = this.now();
    return true;
  }

  /** → terminated(failure). No-op once terminated. */
  fail(failure: SessionFailure): boolean {
    if (this.isTerminated) {
      return false;
    }
    this.currentState = { status: 'terminated', outcome: 'failure', failure };
    this.finishedAt = this.now();
    return true;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Transcript
  // ═══════════════════════════════════════════════════════════════════════

  append(entry: TranscriptEntryInit): TranscriptEntry {
    const full: TranscriptEntry = {
      ...entry,
      seq: this.entries.length,
      timestamp: this.now().toISOString(),
    };
    this.entries.push(full);
    return full;
  }

  get transcript(): readonly TranscriptEntry[] {
    return this.entries;
  }

  recordVisit(agent: string): number {
    const count = (this.visits.get(agent) ?? 0) + 1;
    this.visits.set(agent, count);
    return count;
  }

  get visited(): ReadonlyMap<string, number> {
    return this.visits;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Quotas
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Quota of `agent`, created on first access
   */
  quotaFor(agent: string): Quota {
    const key = canonicalAgentName(agent);
    let quota = this.quotas.get(key);
    if (!quota) {
      quota = {
        agent,
        calls: { 'web-search': 0, retrieval: 0 },
        seenQueries: new Set<string>(),
        elapsedMs: 0,
        invocations: 0,
      };
      this.quotas.set(key, quota);
    }
    return quota;
  }

  hasQuota(agent: string): boolean {
    return this.quotas.has(canonicalAgentName(agent));
  }

  quotaList(): Quota[] {
    return Array.from(this.quotas.values());
  }
}
