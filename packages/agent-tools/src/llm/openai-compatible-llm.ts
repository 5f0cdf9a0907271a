/**
 * OpenAI-compatible chat completions backend.
 *
 * Works against any server exposing `POST {apiBase}/chat/completions`
 * (LM Studio, vLLM, Ollama, OpenAI). Calls to the `handoff` / `finish`
 * control tools are lifted out of `toolCalls` into `LLMResponse.handoff`.
 */

import { z } from 'zod';
import type { ILLM, LLMMessage, LLMRequest, LLMResponse, LLMToolCall } from '@baton/agent-contracts';
import { BackendError, errorMessage } from '@baton/agent-contracts';
import { intentFromToolCalls, isControlTool } from '../tools/control.js';

export interface OpenAICompatibleLLMOptions {
  /** e.g. "http://localhost:1234/v1" */
  apiBase: string;
  apiKey?: string;
  temperature?: number;
  /** Injected for tests; defaults to the global fetch */
  fetch?: typeof fetch;
}

// ═══════════════════════════════════════════════════════════════════════
// Wire format
// ═══════════════════════════════════════════════════════════════════════

const WireToolCallSchema = z.object({
  id: z.string(),
  type: z.literal('function').optional(),
  function: z.object({
    name: z.string(),
    arguments: z.string(),
  }),
});

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
          tool_calls: z.array(WireToolCallSchema).optional(),
        }),
      }),
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
    })
    .optional(),
});

type WireMessage =
  | { role: 'system' | 'user'; content: string }
  | {
      role: 'assistant';
      content: string;
      tool_calls?: Array<{ id: string; type: 'function'; function: { name: string; arguments: string } }>;
    }
  | { role: 'tool'; tool_call_id: string; content: string };

function toWireMessage(message: LLMMessage): WireMessage {
  switch (message.role) {
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return {
        role: 'assistant',
        content: message.content,
        tool_calls: message.toolCalls?.length
          ? message.toolCalls.map((call) => ({
              id: call.id,
              type: 'function' as const,
              function: { name: call.name, arguments: JSON.stringify(call.input) },
            }))
          : undefined,
      };
    case 'tool':
      return { role: 'tool', tool_call_id: message.toolCallId, content: message.content };
  }
}

function parseArguments(raw: string): Record<string, unknown> {
  if (raw.trim() === '') {
    return {};
  }
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    throw new BackendError(`Tool call arguments are not valid JSON: ${errorMessage(error)}`, { cause: error });
  }
  const parsed = z.record(z.unknown()).safeParse(value);
  if (!parsed.success) {
    throw new BackendError('Tool call arguments must be a JSON object');
  }
  return parsed.data;
}

// ═══════════════════════════════════════════════════════════════════════
// Adapter
// ═══════════════════════════════════════════════════════════════════════

export class OpenAICompatibleLLM implements ILLM {
  private readonly endpoint: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: OpenAICompatibleLLMOptions) {
    this.endpoint = `${options.apiBase.replace(/\/+$/, '')}/chat/completions`;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    const body = {
      model: request.model,
      temperature: this.options.temperature ?? 0,
      messages: [
        { role: 'system', content: request.systemPrompt } satisfies WireMessage,
        ...request.messages.map(toWireMessage),
      ],
      tools: request.tools.length
        ? request.tools.map((tool) => ({
            type: 'function',
            function: { name: tool.name, description: tool.description, parameters: tool.inputSchema },
          }))
        : undefined,
    };

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.options.apiKey) {
      headers.Authorization = `Bearer ${this.options.apiKey}`;
    }

    let response: Response;
    try {
      response = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
        signal: request.signal,
      });
    } catch (error) {
      if (request.signal.aborted) {
        throw error;
      }
      throw new BackendError(`Request to ${this.endpoint} failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new BackendError(`Backend returned ${response.status}: ${text.slice(0, 500)}`, {
        status: response.status,
      });
    }

    const parsed = ChatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new BackendError(`Malformed completion payload: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }

    const [choice] = parsed.data.choices;
    const calls: LLMToolCall[] = (choice?.message.tool_calls ?? []).map((call) => ({
      id: call.id,
      name: call.function.name,
      input: parseArguments(call.function.arguments),
    }));

    const usage = parsed.data.usage;
    return {
      content: choice?.message.content ?? '',
      toolCalls: calls.filter((call) => !isControlTool(call.name)),
      handoff: intentFromToolCalls(calls),
      usage: usage ? { promptTokens: usage.prompt_tokens, completionTokens: usage.completion_tokens } : undefined,
    };
  }
}
