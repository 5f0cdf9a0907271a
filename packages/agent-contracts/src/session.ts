/**
 * Session data model: transcript, quotas, state machine and final result.
 *
 * A Session exclusively owns its quota map and transcript. Nothing in here
 * is shared across sessions.
 */

import type { MeteredCapability } from './agent-spec.js';
import type { FailureCode } from './errors.js';

// ═══════════════════════════════════════════════════════════════════════
// Transcript
// ═══════════════════════════════════════════════════════════════════════

export type TranscriptEntryKind =
  | 'invocation'
  | 'tool_call'
  | 'tool_denied'
  | 'timed_out'
  | 'backend_error'
  | 'handoff'
  | 'rejected'
  | 'terminated';

export interface TranscriptEntry {
  /** 0-based position in the transcript */
  seq: number;
  agent: string;
  kind: TranscriptEntryKind;
  input: string;
  output: string;
  /** ISO-8601 */
  timestamp: string;
  /** Structured extras (tool name, denial reason, handoff target, ...) */
  detail?: Readonly<Record<string, unknown>>;
}

export type TranscriptEntryInit = Omit<TranscriptEntry, 'seq' | 'timestamp'>;

// ═══════════════════════════════════════════════════════════════════════
// Quota
// ═══════════════════════════════════════════════════════════════════════

/**
 * Mutable counters for one agent within one session.
 * Handing off and later returning to the same agent resumes these counters.
 */
export interface Quota {
  readonly agent: string;
  /** Allowed calls so far, per metered capability */
  calls: Record<MeteredCapability, number>;
  /** Normalized query strings already issued by this agent */
  readonly seenQueries: Set<string>;
  /** Cumulative wall-clock spent in invocations (ms) */
  elapsedMs: number;
  /** Completed or failed invocations of this agent */
  invocations: number;
}

export interface QuotaSnapshot {
  agent: string;
  calls: Record<MeteredCapability, number>;
  queries: string[];
  elapsedMs: number;
  invocations: number;
}

// ═══════════════════════════════════════════════════════════════════════
// Shared state (report + review)
// ═══════════════════════════════════════════════════════════════════════

export interface SharedState {
  reportContent: string;
  review: string;
}

export const INITIAL_SHARED_STATE: Readonly<SharedState> = {
  reportContent: 'Not written yet.',
  review: 'Review required.',
};

// ═══════════════════════════════════════════════════════════════════════
// State machine
// ═══════════════════════════════════════════════════════════════════════

export interface SessionFailure {
  code: FailureCode;
  message: string;
  /** Agent active when the failure happened */
  agent?: string;
}

export type SessionState =
  | { status: 'idle' }
  | { status: 'running'; agent: string }
  | { status: 'terminated'; outcome: 'success'; agent: string }
  | { status: 'terminated'; outcome: 'failure'; failure: SessionFailure };

// ═══════════════════════════════════════════════════════════════════════
// Result
// ═══════════════════════════════════════════════════════════════════════

export type SessionStatus = 'approved' | 'failed';

export interface SessionResult {
  sessionId: string;
  task: string;
  status: SessionStatus;
  /** Final text: the terminating agent's output (may be empty on failure) */
  output: string;
  failure?: SessionFailure;
  transcript: TranscriptEntry[];
  report: string;
  review: string;
  /** Agent-to-agent transitions taken */
  hops: number;
  /** Invocation count per agent (visited multiset) */
  visited: Record<string, number>;
  quotas: QuotaSnapshot[];
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}
