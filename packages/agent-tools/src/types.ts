/**
 * Tool types and interfaces
 */

import type {
  AgentSpec,
  ToolDefinition,
  ToolPolicy,
  ToolResult,
  SharedState,
} from '@baton/agent-contracts';

/**
 * Per-call execution context, built by the Agent Executor.
 * Tools never see the Session itself, only what they may touch.
 */
export interface ToolExecCtx {
  sessionId: string;
  /** Calling agent */
  agent: AgentSpec;
  /** Aborted when the invocation times out */
  signal: AbortSignal;
  /** Session-wide report/review state, mutable by drafting and reviewing tools */
  sharedState: SharedState;
}

/**
 * Tool executor function
 */
export type ToolExecutor = (
  input: Record<string, unknown>,
  ctx: ToolExecCtx,
) => Promise<ToolResult> | ToolResult;

/**
 * Tool registration
 */
export interface Tool {
  definition: ToolDefinition;
  policy: ToolPolicy;
  executor: ToolExecutor;
}
