/**
 * Orchestration Loop
 *
 * Drives one session through the agent graph:
 *
 *   idle → running(entry) → running(next) … → terminated(success | failure)
 *
 * Each step runs the current agent through the Agent Executor and hands the
 * resulting decision to the Handoff Router. Timeouts and backend failures are
 * retried on the same agent; everything else that goes wrong ends the session
 * with a failure code. `submit` never throws: the caller always receives a
 * SessionResult.
 */

import type {
  AgentSpec,
  FailureCode,
  HandoffDecision,
  ILogger,
  OrchestratorEventBus,
  SessionFailure,
  SessionResult,
} from '@baton/agent-contracts';
import { BatonError, ORCHESTRATOR_DEFAULTS, errorMessage } from '@baton/agent-contracts';
import type { ToolRegistry } from '@baton/agent-tools';
import type { AgentSpecRegistry } from './registry/agent-spec-registry.js';
import { AgentExecutor, type InvocationOutcome, type LLMResolver } from './executor/agent-executor.js';
import { buildHandoffInput } from './executor/prompt-builder.js';
import { HandoffRouter } from './routing/handoff-router.js';
import { QuotaTracker } from './quota/quota-tracker.js';
import { Session } from './session/session.js';
import { SessionLimiter } from './session/session-limiter.js';
import { finalize } from './session/result-aggregator.js';
import { createEventBus } from './events/event-bus.js';
import { createNoopLogger } from './logging/logger.js';

/**
 * When a no-handoff decision counts as success:
 * - `reviewer`: only an approving terminal-reviewer
 * - `any-terminal`: any agent, unless it explicitly did not approve
 */
export type ApprovalPolicy = 'reviewer' | 'any-terminal';

export interface OrchestratorOptions {
  maxHops?: number;
  /** Retries of a timed-out / failed invocation on the same agent */
  maxRetries?: number;
  maxToolRounds?: number;
  maxConcurrentSessions?: number;
  maxQueuedSessions?: number;
  approvalPolicy?: ApprovalPolicy;
}

export interface OrchestratorDeps {
  registry: AgentSpecRegistry;
  tools: ToolRegistry;
  resolveLLM: LLMResolver;
  logger?: ILogger;
  events?: OrchestratorEventBus;
  /** Session clock, injectable for tests */
  now?: () => Date;
}

export interface SubmitOptions {
  /** Caller cancellation */
  signal?: AbortSignal;
  sessionId?: string;
}

type StepOutcome = Exclude<InvocationOutcome, { status: 'completed' }>;

const OUTCOME_FAILURE: Record<StepOutcome['status'], FailureCode> = {
  timed_out: 'TimedOut',
  backend_error: 'BackendError',
};

export class Orchestrator {
  readonly registry: AgentSpecRegistry;
  readonly events: OrchestratorEventBus;
  readonly quota: QuotaTracker;
  readonly router: HandoffRouter;

  private readonly executor: AgentExecutor;
  private readonly limiter: SessionLimiter;
  private readonly logger: ILogger;
  private readonly maxRetries: number;
  private readonly approvalPolicy: ApprovalPolicy;
  private readonly now?: () => Date;

  constructor(deps: OrchestratorDeps, options: OrchestratorOptions = {}) {
    this.registry = deps.registry;
    this.logger = deps.logger ?? createNoopLogger();
    this.events = deps.events ?? createEventBus({ logger: this.logger });
    this.now = deps.now;
    this.maxRetries = options.maxRetries ?? ORCHESTRATOR_DEFAULTS.maxRetries;
    this.approvalPolicy = options.approvalPolicy ?? ORCHESTRATOR_DEFAULTS.approvalPolicy;

    this.quota = new QuotaTracker(deps.registry);
    this.router = new HandoffRouter(deps.registry, { maxHops: options.maxHops });
    this.executor = new AgentExecutor({
      registry: deps.registry,
      tools: deps.tools,
      quota: this.quota,
      resolveLLM: deps.resolveLLM,
      logger: this.logger,
      events: this.events,
      maxToolRounds: options.maxToolRounds,
    });
    this.limiter = new SessionLimiter({
      maxConcurrent: options.maxConcurrentSessions ?? ORCHESTRATOR_DEFAULTS.maxConcurrentSessions,
      maxQueued: options.maxQueuedSessions ?? ORCHESTRATOR_DEFAULTS.maxQueuedSessions,
    });
  }

  get activeSessions(): number {
    return this.limiter.activeCount;
  }

  get queuedSessions(): number {
    return this.limiter.queuedCount;
  }

  /**
   * Run a task to a terminal state. Never throws.
   */
  async submit(task: string, options: SubmitOptions = {}): Promise<SessionResult> {
    const session = new Session(task, { id: options.sessionId, now: this.now });
    try {
      return await this.limiter.run(() => this.run(session, options.signal), {
        signal: options.signal,
        onQueued: (queueLength) => {
          this.events.emit('session:queued', { sessionId: session.id, task, queueLength });
          this.logger.debug('Session queued', { sessionId: session.id, queueLength });
        },
      });
    } catch (error) {
      // Rejected before the session ever started
      const code: FailureCode = error instanceof BatonError ? error.code : 'InternalError';
      this.terminate(session, { code, message: errorMessage(error) });
      return this.finish(session);
    }
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Loop
  // ═══════════════════════════════════════════════════════════════════════

  private async run(session: Session, signal?: AbortSignal): Promise<SessionResult> {
    const entry = this.registry.entryAgent;
    session.start(entry.name);
    this.events.emit('session:start', { sessionId: session.id, task: session.task, entryAgent: entry.name });
    this.logger.info('Session started', { sessionId: session.id, entryAgent: entry.name });

    let agent: AgentSpec = entry;
    let input = session.task;

    try {
      while (!session.isTerminated) {
        if (signal?.aborted) {
          throw new BatonError('Cancelled', 'Session cancelled by caller');
        }

        session.recordVisit(agent.name);
        const outcome = await this.invokeWithRetry(agent, input, session, signal);
        if (outcome.status !== 'completed') {
          this.terminate(session, {
            code: OUTCOME_FAILURE[outcome.status],
            message:
              outcome.status === 'timed_out'
                ? `${agent.name} timed out after ${outcome.timeoutMs}ms (${this.maxRetries + 1} attempts)`
                : `${agent.name} backend failed: ${outcome.message}`,
            agent: agent.name,
          });
          break;
        }

        session.lastOutput = outcome.output;
        const route = this.router.route(session, agent, outcome.decision);

        switch (route.kind) {
          case 'next': {
            const next = this.registry.getOrThrow(route.target);
            const payload = outcome.decision.kind === 'handoff' ? outcome.decision.payload : undefined;
            session.handoffTo(next.name);
            session.append({
              agent: agent.name,
              kind: 'handoff',
              input: payload ?? '',
              output: next.name,
              detail: { from: agent.name, to: next.name, hop: session.hops },
            });
            this.events.emit('handoff', {
              sessionId: session.id,
              from: agent.name,
              to: next.name,
              hop: session.hops,
              payload,
            });
            this.logger.info('Handoff', { sessionId: session.id, from: agent.name, to: next.name, hop: session.hops });

            input = buildHandoffInput(session.task, agent.name, payload ?? outcome.output);
            agent = next;
            break;
          }

          case 'terminate':
            this.settle(session, agent, outcome.decision, outcome.output);
            break;

          case 'rejected': {
            const target = outcome.decision.kind === 'handoff' ? outcome.decision.target : undefined;
            session.append({
              agent: agent.name,
              kind: 'rejected',
              input: target ?? '',
              output: route.message,
              detail: { reason: route.reason, target },
            });
            this.events.emit('handoff:rejected', {
              sessionId: session.id,
              from: agent.name,
              target,
              reason: route.reason,
              message: route.message,
            });
            this.terminate(session, { code: route.reason, message: route.message, agent: agent.name });
            break;
          }
        }
      }
    } catch (error) {
      if (error instanceof BatonError && error.code === 'Cancelled') {
        this.terminate(session, { code: 'Cancelled', message: error.message, agent: session.currentAgent });
      } else {
        this.logger.error('Session loop failed', { sessionId: session.id, error: errorMessage(error) });
        this.terminate(session, {
          code: 'InternalError',
          message: errorMessage(error),
          agent: session.currentAgent,
        });
      }
    }

    return this.finish(session);
  }

  private async invokeWithRetry(
    agent: AgentSpec,
    input: string,
    session: Session,
    signal?: AbortSignal,
  ): Promise<InvocationOutcome> {
    let outcome = await this.executor.invoke(agent, input, session, 1, { signal });
    for (let attempt = 2; outcome.status !== 'completed' && attempt <= this.maxRetries + 1; attempt++) {
      this.logger.warn('Retrying agent invocation', {
        sessionId: session.id,
        agent: agent.name,
        attempt,
        previous: outcome.status,
      });
      outcome = await this.executor.invoke(agent, input, session, attempt, { signal });
    }
    return outcome;
  }

  /**
   * Terminal decision of a no-handoff reply
   */
  private settle(session: Session, agent: AgentSpec, decision: HandoffDecision, output: string): void {
    const approved = decision.kind === 'none' ? decision.approved : undefined;
    const accepted =
      this.approvalPolicy === 'any-terminal'
        ? approved !== false
        : agent.role === 'terminal-reviewer' && approved === true;

    if (accepted) {
      session.succeed(agent.name);
      session.append({
        agent: agent.name,
        kind: 'terminated',
        input: '',
        output,
        detail: { outcome: 'success' },
      });
      return;
    }

    let message: string;
    if (approved === false) {
      const notes = decision.kind === 'none' && decision.notes ? `: ${decision.notes}` : '';
      message = `${agent.name} did not approve the result${notes}`;
    } else if (agent.role === 'terminal-reviewer') {
      message = `${agent.name} ended without a verdict`;
    } else {
      message = `${agent.name} ended the session without reviewer approval`;
    }
    this.terminate(session, { code: 'NotApproved', message, agent: agent.name });
  }

  private terminate(session: Session, failure: SessionFailure): void {
    if (!session.fail(failure)) {
      return;
    }
    session.append({
      agent: failure.agent ?? '',
      kind: 'terminated',
      input: '',
      output: failure.message,
      detail: { outcome: 'failure', code: failure.code },
    });
    this.logger.warn('Session failed', { sessionId: session.id, code: failure.code, message: failure.message });
  }

  private finish(session: Session): SessionResult {
    const result = finalize(session);
    this.events.emit('session:end', {
      sessionId: result.sessionId,
      status: result.status,
      output: result.output,
      report: result.report,
      review: result.review,
      failureCode: result.failure?.code,
      durationMs: result.durationMs,
    });
    this.logger.info('Session finished', {
      sessionId: result.sessionId,
      status: result.status,
      hops: result.hops,
      failure: result.failure?.code,
    });
    return result;
  }
}
