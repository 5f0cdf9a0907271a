/**
 * Model backend contract.
 *
 * The backend is a black box: one request/response call given a system
 * prompt, a conversation and the tools the agent may use. Any thrown error
 * is surfaced by the executor as `BackendError`.
 */

import type { ToolDefinition } from './tool-types.js';

export type LLMRole = 'user' | 'assistant' | 'tool';

export interface LLMToolCall {
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export type LLMMessage =
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string; toolCalls?: LLMToolCall[] }
  | { role: 'tool'; toolCallId: string; name: string; content: string };

/**
 * Structured handoff intent, when the backend reports one.
 *
 * - `handoff`: transfer control to `target` with an optional payload
 * - `finish`:  stop here; reviewers set `approved`
 */
export type HandoffIntent =
  | { type: 'handoff'; target: string; payload?: string }
  | { type: 'finish'; approved?: boolean; notes?: string };

export interface LLMRequest {
  model: string;
  systemPrompt: string;
  messages: LLMMessage[];
  tools: ToolDefinition[];
  /** Aborted when the invocation timeout elapses */
  signal: AbortSignal;
}

export interface LLMResponse {
  content: string;
  /** Capability tool calls requested by the model */
  toolCalls: LLMToolCall[];
  handoff?: HandoffIntent;
  usage?: { promptTokens: number; completionTokens: number };
}

export interface ILLM {
  complete(request: LLMRequest): Promise<LLMResponse>;
}
