/**
 * Tool System Types
 *
 * Defines types for tool discovery, execution, and results
 */

import type { Capability } from './agent-spec.js';

/**
 * JSON Schema for tool input
 *
 * This is the schema that LLM sees and uses to generate tool calls
 */
export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
  additionalProperties?: boolean;
}

/**
 * Tool definition (what LLM sees)
 */
export interface ToolDefinition {
  /** Unique tool name (e.g., "web_search", "retrieve_documents") */
  name: string;
  /** Human-readable description for LLM */
  description: string;
  /** JSON Schema for tool input */
  inputSchema: ToolInputSchema;
}

/**
 * How a tool is gated by the orchestrator
 */
export interface ToolPolicy {
  /** Capability the calling agent must hold */
  capability: Capability;
  /**
   * Input field holding the query text. When set, every call goes through
   * the Quota Tracker before it runs.
   */
  meteredInput?: string;
}

/**
 * Tool execution error
 */
export interface ToolError {
  /** Error code (e.g., "PROVIDER_ERROR", "INVALID_INPUT") */
  code: string;
  /** Error message */
  message: string;
  /** Additional error details */
  details?: unknown;
}

/**
 * Tool execution result
 */
export interface ToolResult {
  /** Whether tool execution succeeded */
  success: boolean;
  /** Tool output (if success = true) */
  output?: string;
  /** Error details (if success = false) */
  error?: ToolError;
  /** Execution metadata */
  metadata?: {
    /** Execution duration in milliseconds */
    durationMs?: number;
    [key: string]: unknown;
  };
}
