/**
 * Orchestrator Event System
 *
 * Typed pub/sub for passive observers (progress output, tracing).
 * Observers never affect execution flow; the orchestrator does not wait
 * on them and a throwing handler does not break the session.
 */

import type { QuotaDenialReason, RouteRejection } from './handoff.js';
import type { SessionStatus } from './session.js';
import type { FailureCode } from './errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// OrchestratorEvents: typed event map
// ─────────────────────────────────────────────────────────────────────────────

export interface OrchestratorEvents {
  'session:queued':  { sessionId: string; task: string; queueLength: number };
  'session:start':   { sessionId: string; task: string; entryAgent: string };
  'agent:start':     { sessionId: string; agent: string; attempt: number; input: string };
  'agent:end':       {
    sessionId: string;
    agent: string;
    status: 'completed' | 'timed_out' | 'backend_error';
    output: string;
    durationMs: number;
  };
  'tool:call':       { sessionId: string; agent: string; tool: string; input: Record<string, unknown> };
  'tool:result':     { sessionId: string; agent: string; tool: string; success: boolean; output: string };
  'tool:denied':     { sessionId: string; agent: string; tool: string; reason: QuotaDenialReason | 'CapabilityMissing'; message: string };
  'handoff':         { sessionId: string; from: string; to: string; hop: number; payload?: string };
  'handoff:rejected': { sessionId: string; from: string; target?: string; reason: RouteRejection; message: string };
  'session:end':     {
    sessionId: string;
    status: SessionStatus;
    output: string;
    report: string;
    review: string;
    failureCode?: FailureCode;
    durationMs: number;
  };
}

export type OrchestratorEventName = keyof OrchestratorEvents;

export type Unsubscribe = () => void;

export interface OrchestratorEventBus {
  emit<K extends OrchestratorEventName>(event: K, data: OrchestratorEvents[K]): void;

  on<K extends OrchestratorEventName>(
    event: K,
    handler: (data: OrchestratorEvents[K]) => void
  ): Unsubscribe;

  /** Remove all subscriptions */
  clear(): void;
}
