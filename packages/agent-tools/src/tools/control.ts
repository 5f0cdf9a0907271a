/**
 * Control tools: `handoff` and `finish`.
 *
 * These are never executed. They exist so that tool-calling backends can
 * express the handoff decision as a function call; the model adapter turns
 * such a call into a structured HandoffIntent.
 */

import { z } from 'zod';
import type { HandoffIntent, LLMToolCall, ToolDefinition } from '@baton/agent-contracts';
import { TOOL_NAMES } from '../config.js';

export interface HandoffTarget {
  name: string;
  description: string;
}

const HandoffArgsSchema = z.object({
  to_agent: z.string().min(1),
  payload: z.string().optional(),
});

const FinishArgsSchema = z.object({
  approved: z.boolean().optional(),
  notes: z.string().optional(),
});

export function createHandoffToolDefinition(targets: readonly HandoffTarget[]): ToolDefinition {
  const list = targets.map((t) => `- ${t.name}: ${t.description}`).join('\n');
  return {
    name: TOOL_NAMES.handoff,
    description: `Transfer control to another agent. Allowed targets:\n${list}`,
    inputSchema: {
      type: 'object',
      properties: {
        to_agent: {
          type: 'string',
          enum: targets.map((t) => t.name),
          description: 'Name of the agent to hand off to',
        },
        payload: {
          type: 'string',
          description: 'Condensed notes the next agent needs',
        },
      },
      required: ['to_agent'],
    },
  };
}

export function createFinishToolDefinition(reviewer: boolean): ToolDefinition {
  const properties: Record<string, unknown> = {
    notes: { type: 'string', description: 'Closing notes' },
  };
  if (reviewer) {
    properties.approved = {
      type: 'boolean',
      description: 'true to approve the report, false if it must not be accepted',
    };
  }
  return {
    name: TOOL_NAMES.finish,
    description: reviewer
      ? 'End the session with your verdict on the report.'
      : 'End the session with your current answer.',
    inputSchema: {
      type: 'object',
      properties,
      required: reviewer ? ['approved'] : [],
    },
  };
}

export function isControlTool(name: string): boolean {
  return name === TOOL_NAMES.handoff || name === TOOL_NAMES.finish;
}

/**
 * Turn the first control tool call into a HandoffIntent.
 * Malformed control calls yield undefined and are ignored.
 */
export function intentFromToolCalls(calls: readonly LLMToolCall[]): HandoffIntent | undefined {
  for (const call of calls) {
    if (call.name === TOOL_NAMES.handoff) {
      const args = HandoffArgsSchema.safeParse(call.input);
      if (args.success) {
        return { type: 'handoff', target: args.data.to_agent, payload: args.data.payload };
      }
    } else if (call.name === TOOL_NAMES.finish) {
      const args = FinishArgsSchema.safeParse(call.input);
      if (args.success) {
        return { type: 'finish', approved: args.data.approved, notes: args.data.notes };
      }
    }
  }
  return undefined;
}
