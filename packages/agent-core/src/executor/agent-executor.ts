/**
 * Agent Executor
 *
 * Runs one agent invocation:
 * 1. Build the system prompt (targets, shared state, quota constraints)
 * 2. Send prompt + tools to the model backend
 * 3. Gate each requested tool: capability check, then Quota Tracker for metered tools
 * 4. Execute allowed tools, feed results (and denials) back to the model
 * 5. Repeat until the model stops calling tools or `maxToolRounds` is reached
 * 6. Extract the handoff decision (structured intent, else text markers)
 *
 * The whole invocation is bounded by `spec.limits.timeoutMs`. Timeouts and
 * backend failures are returned as outcomes, never thrown.
 */

import type {
  AgentSpec,
  HandoffDecision,
  ILLM,
  ILogger,
  LLMMessage,
  LLMToolCall,
  MeteredCapability,
  OrchestratorEventBus,
  OrchestratorEvents,
  OrchestratorEventName,
  ToolDefinition,
} from '@baton/agent-contracts';
import {
  BatonError,
  METERED_CAPABILITIES,
  ORCHESTRATOR_DEFAULTS,
  TimedOutError,
  errorMessage,
  hasCapability,
  isMeteredCapability,
} from '@baton/agent-contracts';
import type { ToolExecCtx, ToolRegistry } from '@baton/agent-tools';
import {
  createFinishToolDefinition,
  createHandoffToolDefinition,
  formatToolResult,
  readMeteredInput,
  toolError,
} from '@baton/agent-tools';
import type { Session } from '../session/session.js';
import type { QuotaTracker } from '../quota/quota-tracker.js';
import type { AgentSpecRegistry } from '../registry/agent-spec-registry.js';
import { createNoopLogger } from '../logging/logger.js';
import { buildSystemPrompt } from './prompt-builder.js';
import { decisionFromIntent, parseHandoffMarkers } from './handoff-parser.js';
import { withAbort } from './abortable.js';

export type InvocationOutcome =
  | { status: 'completed'; output: string; decision: HandoffDecision }
  | { status: 'timed_out'; timeoutMs: number }
  | { status: 'backend_error'; message: string };

/** Picks the backend for an agent, typically from `spec.connection` */
export type LLMResolver = (spec: AgentSpec) => ILLM;

export interface AgentExecutorDeps {
  registry: AgentSpecRegistry;
  tools: ToolRegistry;
  quota: QuotaTracker;
  resolveLLM: LLMResolver;
  logger?: ILogger;
  events?: OrchestratorEventBus;
  /** Model round trips per invocation */
  maxToolRounds?: number;
}

export interface InvokeOptions {
  /** Caller cancellation; aborting rejects with a `Cancelled` BatonError */
  signal?: AbortSignal;
}

interface GateDenial {
  reason: OrchestratorEvents['tool:denied']['reason'];
  message: string;
}

export class AgentExecutor {
  private readonly logger: ILogger;
  private readonly maxToolRounds: number;

  constructor(private readonly deps: AgentExecutorDeps) {
    this.logger = deps.logger ?? createNoopLogger();
    this.maxToolRounds = deps.maxToolRounds ?? ORCHESTRATOR_DEFAULTS.maxToolRounds;
  }

  async invoke(
    spec: AgentSpec,
    input: string,
    session: Session,
    attempt = 1,
    options: InvokeOptions = {},
  ): Promise<InvocationOutcome> {
    const startedAt = Date.now();
    const timeoutMs = spec.limits.timeoutMs;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new TimedOutError(timeoutMs)), timeoutMs);
    const onCancel = (): void => controller.abort(new BatonError('Cancelled', 'Session cancelled by caller'));
    options.signal?.addEventListener('abort', onCancel, { once: true });
    if (options.signal?.aborted) {
      onCancel();
    }

    // First invocation creates the agent's quota
    session.quotaFor(spec.name);
    this.emit('agent:start', { sessionId: session.id, agent: spec.name, attempt, input });
    this.step(spec, 'Agent invocation started', { sessionId: session.id, attempt });

    try {
      const { output, decision } = await this.runRounds(spec, input, session, controller.signal);
      const durationMs = Date.now() - startedAt;

      session.append({
        agent: spec.name,
        kind: 'invocation',
        input,
        output,
        detail: { attempt, durationMs, decision: describeDecision(decision) },
      });
      this.emit('agent:end', { sessionId: session.id, agent: spec.name, status: 'completed', output, durationMs });
      this.step(spec, 'Agent invocation completed', { sessionId: session.id, decision: describeDecision(decision) });

      return { status: 'completed', output, decision };
    } catch (error) {
      const durationMs = Date.now() - startedAt;
      const reason: unknown = controller.signal.aborted ? controller.signal.reason : error;

      if (reason instanceof BatonError && reason.code === 'Cancelled') {
        throw reason;
      }

      if (reason instanceof TimedOutError) {
        session.append({
          agent: spec.name,
          kind: 'timed_out',
          input,
          output: reason.message,
          detail: { attempt, timeoutMs },
        });
        this.emit('agent:end', { sessionId: session.id, agent: spec.name, status: 'timed_out', output: '', durationMs });
        this.logger.warn('Agent invocation timed out', { sessionId: session.id, agent: spec.name, attempt, timeoutMs });
        return { status: 'timed_out', timeoutMs };
      }

      const message = errorMessage(error);
      session.append({
        agent: spec.name,
        kind: 'backend_error',
        input,
        output: message,
        detail: { attempt },
      });
      this.emit('agent:end', { sessionId: session.id, agent: spec.name, status: 'backend_error', output: '', durationMs });
      this.logger.warn('Agent backend failed', { sessionId: session.id, agent: spec.name, attempt, error: message });
      return { status: 'backend_error', message };
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onCancel);
      this.deps.quota.recordElapsed(session, spec.name, Date.now() - startedAt);
    }
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Tool round loop
  // ═══════════════════════════════════════════════════════════════════════

  private async runRounds(
    spec: AgentSpec,
    input: string,
    session: Session,
    signal: AbortSignal,
  ): Promise<{ output: string; decision: HandoffDecision }> {
    const llm = this.deps.resolveLLM(spec);
    const tools = this.toolDefinitions(spec);
    const messages: LLMMessage[] = [{ role: 'user', content: input }];
    const handoffTargets = this.deps.registry.describeHandoffTargets(spec.name);
    let lastContent = '';

    for (let round = 1; round <= this.maxToolRounds; round++) {
      const systemPrompt = buildSystemPrompt(spec, {
        handoffTargets,
        sharedState: session.sharedState,
        exhausted: this.exhaustedCapabilities(spec, session),
      });

      const response = await withAbort(
        llm.complete({ model: spec.connection.model, systemPrompt, messages, tools, signal }),
        signal,
      );
      lastContent = response.content;

      this.step(spec, 'Model replied', {
        sessionId: session.id,
        round,
        toolCalls: response.toolCalls.map((c) => c.name),
        handoff: response.handoff?.type,
      });

      if (response.toolCalls.length > 0) {
        messages.push({ role: 'assistant', content: response.content, toolCalls: response.toolCalls });
        for (const call of response.toolCalls) {
          const content = await this.runToolCall(spec, call, session, signal);
          messages.push({ role: 'tool', toolCallId: call.id, name: call.name, content });
        }
      }

      if (response.handoff) {
        return { output: response.content.trim(), decision: decisionFromIntent(response.handoff) };
      }
      if (response.toolCalls.length === 0) {
        return finalReply(response.content);
      }
    }

    this.logger.warn('Tool round limit reached', {
      sessionId: session.id,
      agent: spec.name,
      maxToolRounds: this.maxToolRounds,
    });
    return finalReply(lastContent);
  }

  private async runToolCall(spec: AgentSpec, call: LLMToolCall, session: Session, signal: AbortSignal): Promise<string> {
    const denial = this.gate(spec, call, session);
    if (denial) {
      session.append({
        agent: spec.name,
        kind: 'tool_denied',
        input: JSON.stringify(call.input),
        output: denial.message,
        detail: { tool: call.name, reason: denial.reason },
      });
      this.emit('tool:denied', {
        sessionId: session.id,
        agent: spec.name,
        tool: call.name,
        reason: denial.reason,
        message: denial.message,
      });
      this.step(spec, 'Tool call denied', { sessionId: session.id, tool: call.name, reason: denial.reason });
      return `DENIED (${denial.reason}): ${denial.message}`;
    }

    this.emit('tool:call', { sessionId: session.id, agent: spec.name, tool: call.name, input: call.input });
    const ctx: ToolExecCtx = { sessionId: session.id, agent: spec, signal, sharedState: session.sharedState };
    const startedAt = Date.now();

    let output: string;
    let success: boolean;
    try {
      const result = await withAbort(this.deps.tools.execute(call.name, call.input, ctx), signal);
      output = formatToolResult(result);
      success = result.success;
    } catch (error) {
      if (signal.aborted) {
        throw error;
      }
      output = formatToolResult(toolError({ code: 'TOOL_FAILED', message: errorMessage(error) }));
      success = false;
    }

    session.append({
      agent: spec.name,
      kind: 'tool_call',
      input: JSON.stringify(call.input),
      output,
      detail: { tool: call.name, success, durationMs: Date.now() - startedAt },
    });
    this.emit('tool:result', { sessionId: session.id, agent: spec.name, tool: call.name, success, output });
    return output;
  }

  /**
   * Capability gate, then quota gate for metered tools
   */
  private gate(spec: AgentSpec, call: LLMToolCall, session: Session): GateDenial | undefined {
    const tool = this.deps.tools.get(call.name);
    if (!tool || !hasCapability(spec, tool.policy.capability)) {
      return {
        reason: 'CapabilityMissing',
        message: `${spec.name} has no tool named "${call.name}". Available: ${this.toolNames(spec)}`,
      };
    }

    const { capability, meteredInput } = tool.policy;
    if (!meteredInput || !isMeteredCapability(capability)) {
      return undefined;
    }
    const query = readMeteredInput(call.input, meteredInput);
    if (query === undefined) {
      // Malformed input is rejected by the tool itself and costs nothing
      return undefined;
    }
    const decision = this.deps.quota.checkAndIncrement(session, spec.name, query, capability);
    return decision.allowed ? undefined : { reason: decision.reason, message: decision.message };
  }

  private toolDefinitions(spec: AgentSpec): ToolDefinition[] {
    const definitions = this.deps.tools.getDefinitions(spec.capabilities);
    const targets = this.deps.registry.handoffTargets(spec.name);
    if (targets.length > 0) {
      definitions.push(createHandoffToolDefinition(targets.map((t) => ({ name: t.name, description: t.description }))));
    }
    definitions.push(createFinishToolDefinition(spec.role === 'terminal-reviewer'));
    return definitions;
  }

  private toolNames(spec: AgentSpec): string {
    const names = this.deps.tools.forCapabilities(spec.capabilities).map((t) => t.definition.name);
    return names.length > 0 ? names.join(', ') : 'none';
  }

  private exhaustedCapabilities(spec: AgentSpec, session: Session): MeteredCapability[] {
    return METERED_CAPABILITIES.filter(
      (capability) => hasCapability(spec, capability) && this.deps.quota.isExhausted(session, spec.name, capability),
    );
  }

  // ── Private helpers ─────────────────────────────────────────────────

  private emit<K extends OrchestratorEventName>(event: K, data: OrchestratorEvents[K]): void {
    this.deps.events?.emit(event, data);
  }

  /** Step log: info for verbose agents, debug otherwise */
  private step(spec: AgentSpec, message: string, meta: Record<string, unknown>): void {
    const entry = { agent: spec.name, ...meta };
    if (spec.verbose) {
      this.logger.info(message, entry);
    } else {
      this.logger.debug(message, entry);
    }
  }
}

function finalReply(content: string): { output: string; decision: HandoffDecision } {
  const parsed = parseHandoffMarkers(content);
  return { output: parsed.response, decision: decisionFromIntent(parsed.intent) };
}

function describeDecision(decision: HandoffDecision): Record<string, unknown> {
  return decision.kind === 'handoff'
    ? { kind: 'handoff', target: decision.target, payload: decision.payload }
    : { kind: 'none', approved: decision.approved, notes: decision.notes };
}
