/**
 * @module @baton/progress-reporter/types
 * Type definitions for progress feedback.
 */

import type { FailureCode, OrchestratorEvents, SessionStatus } from "@baton/agent-contracts";

/**
 * Progress event types.
 */
export type ProgressEventType =
  | "session_queued"
  | "session_started"
  | "agent_started"
  | "agent_finished"
  | "tool_called"
  | "tool_result"
  | "tool_denied"
  | "handoff"
  | "handoff_rejected"
  | "session_completed";

/**
 * Base progress event.
 */
export interface BaseProgressEvent {
  type: ProgressEventType;
  sessionId: string;
  timestamp: number;
}

export interface SessionQueuedEvent extends BaseProgressEvent {
  type: "session_queued";
  data: {
    queueLength: number;
  };
}

export interface SessionStartedEvent extends BaseProgressEvent {
  type: "session_started";
  data: {
    task: string;
    entryAgent: string;
  };
}

export interface AgentStartedEvent extends BaseProgressEvent {
  type: "agent_started";
  data: {
    agent: string;
    attempt: number;
  };
}

export interface AgentFinishedEvent extends BaseProgressEvent {
  type: "agent_finished";
  data: {
    agent: string;
    status: OrchestratorEvents["agent:end"]["status"];
    durationMs: number;
  };
}

export interface ToolCalledEvent extends BaseProgressEvent {
  type: "tool_called";
  data: {
    agent: string;
    tool: string;
  };
}

export interface ToolResultEvent extends BaseProgressEvent {
  type: "tool_result";
  data: {
    agent: string;
    tool: string;
    success: boolean;
  };
}

export interface ToolDeniedEvent extends BaseProgressEvent {
  type: "tool_denied";
  data: {
    agent: string;
    tool: string;
    reason: OrchestratorEvents["tool:denied"]["reason"];
  };
}

export interface HandoffEvent extends BaseProgressEvent {
  type: "handoff";
  data: {
    from: string;
    to: string;
    hop: number;
  };
}

export interface HandoffRejectedEvent extends BaseProgressEvent {
  type: "handoff_rejected";
  data: {
    from: string;
    target?: string;
    reason: OrchestratorEvents["handoff:rejected"]["reason"];
  };
}

export interface SessionCompletedEvent extends BaseProgressEvent {
  type: "session_completed";
  data: {
    status: SessionStatus;
    failureCode?: FailureCode;
    totalDuration: number;
    report: string;
    review: string;
  };
}

/**
 * Union of all progress events.
 */
export type ProgressEvent =
  | SessionQueuedEvent
  | SessionStartedEvent
  | AgentStartedEvent
  | AgentFinishedEvent
  | ToolCalledEvent
  | ToolResultEvent
  | ToolDeniedEvent
  | HandoffEvent
  | HandoffRejectedEvent
  | SessionCompletedEvent;

/**
 * Progress callback function.
 */
export type ProgressCallback = (event: ProgressEvent) => void;
