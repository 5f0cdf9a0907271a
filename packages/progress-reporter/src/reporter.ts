/**
 * @module @baton/progress-reporter/reporter
 * Progress reporter for orchestration sessions.
 *
 * UX-only component: it listens to the orchestrator event bus and never
 * influences routing, quotas or termination.
 */

import type { ILogger, OrchestratorEventBus, OrchestratorEvents, Unsubscribe } from '@baton/agent-contracts';
import type { ProgressCallback, ProgressEvent } from './types.js';

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

/**
 * Progress reporter - turns orchestrator events into log lines and
 * UX-only progress events.
 *
 * @example
 * ```typescript
 * import { createOrchestrator, createLogger } from '@baton/agent-core';
 * import { ProgressReporter } from '@baton/progress-reporter';
 *
 * const orchestrator = createOrchestrator(config, { search });
 * const reporter = new ProgressReporter(createLogger(), (event) => {
 *   // Stream to a UI via WebSocket/SSE
 *   ws.send(JSON.stringify(event));
 * });
 * const detach = reporter.attach(orchestrator.events);
 *
 * await orchestrator.submit('Compare async runtimes');
 * detach();
 * ```
 */
export class ProgressReporter {
  private events: ProgressEvent[] = [];

  constructor(
    private logger: ILogger,
    private onProgress?: ProgressCallback
  ) {}

  /**
   * Subscribe to every orchestrator event this reporter renders.
   *
   * @returns Function removing all subscriptions
   */
  attach(bus: OrchestratorEventBus): Unsubscribe {
    const subscriptions = [
      bus.on('session:queued', (e) => this.sessionQueued(e)),
      bus.on('session:start', (e) => this.sessionStarted(e)),
      bus.on('agent:start', (e) => this.agentStarted(e)),
      bus.on('agent:end', (e) => this.agentFinished(e)),
      bus.on('tool:call', (e) => this.toolCalled(e)),
      bus.on('tool:result', (e) => this.toolResult(e)),
      bus.on('tool:denied', (e) => this.toolDenied(e)),
      bus.on('handoff', (e) => this.handoff(e)),
      bus.on('handoff:rejected', (e) => this.handoffRejected(e)),
      bus.on('session:end', (e) => this.sessionCompleted(e)),
    ];
    return () => {
      for (const unsubscribe of subscriptions) {
        unsubscribe();
      }
    };
  }

  sessionQueued(e: OrchestratorEvents['session:queued']): void {
    this.emit({
      type: 'session_queued',
      sessionId: e.sessionId,
      timestamp: Date.now(),
      data: { queueLength: e.queueLength },
    });
    this.logger.info(`⏳ Session queued (position ${e.queueLength})`);
  }

  sessionStarted(e: OrchestratorEvents['session:start']): void {
    this.emit({
      type: 'session_started',
      sessionId: e.sessionId,
      timestamp: Date.now(),
      data: { task: e.task, entryAgent: e.entryAgent },
    });
    this.logger.info(`🎯 Session started: ${e.task}`);
  }

  agentStarted(e: OrchestratorEvents['agent:start']): void {
    this.emit({
      type: 'agent_started',
      sessionId: e.sessionId,
      timestamp: Date.now(),
      data: { agent: e.agent, attempt: e.attempt },
    });
    const retry = e.attempt > 1 ? ` (attempt ${e.attempt})` : '';
    this.logger.info(`🤖 ${e.agent} working${retry}`);
  }

  agentFinished(e: OrchestratorEvents['agent:end']): void {
    this.emit({
      type: 'agent_finished',
      sessionId: e.sessionId,
      timestamp: Date.now(),
      data: { agent: e.agent, status: e.status, durationMs: e.durationMs },
    });

    switch (e.status) {
      case 'completed':
        this.logger.info(`✅ ${e.agent} done in ${seconds(e.durationMs)}`);
        if (e.output.trim()) {
          this.logger.info(`💬 ${e.agent}: ${e.output.trim()}`);
        }
        break;
      case 'timed_out':
        this.logger.warn(`⏱️  ${e.agent} timed out after ${seconds(e.durationMs)}`);
        break;
      case 'backend_error':
        this.logger.error(`❌ ${e.agent} backend error`);
        break;
    }
  }

  toolCalled(e: OrchestratorEvents['tool:call']): void {
    this.emit({
      type: 'tool_called',
      sessionId: e.sessionId,
      timestamp: Date.now(),
      data: { agent: e.agent, tool: e.tool },
    });
    this.logger.info(`🔧 ${e.agent} → ${e.tool}`);
  }

  toolResult(e: OrchestratorEvents['tool:result']): void {
    this.emit({
      type: 'tool_result',
      sessionId: e.sessionId,
      timestamp: Date.now(),
      data: { agent: e.agent, tool: e.tool, success: e.success },
    });
    if (e.success) {
      this.logger.info(`📎 ${e.tool} → ${e.agent}:\n${e.output}`);
    } else {
      this.logger.warn(`⚠️  ${e.tool} failed for ${e.agent}: ${e.output}`);
    }
  }

  toolDenied(e: OrchestratorEvents['tool:denied']): void {
    this.emit({
      type: 'tool_denied',
      sessionId: e.sessionId,
      timestamp: Date.now(),
      data: { agent: e.agent, tool: e.tool, reason: e.reason },
    });
    this.logger.warn(`🚫 ${e.agent}: ${e.tool} denied (${e.reason})`);
  }

  handoff(e: OrchestratorEvents['handoff']): void {
    this.emit({
      type: 'handoff',
      sessionId: e.sessionId,
      timestamp: Date.now(),
      data: { from: e.from, to: e.to, hop: e.hop },
    });
    this.logger.info(`🔀 [hop ${e.hop}] ${e.from} → ${e.to}`);
  }

  handoffRejected(e: OrchestratorEvents['handoff:rejected']): void {
    this.emit({
      type: 'handoff_rejected',
      sessionId: e.sessionId,
      timestamp: Date.now(),
      data: { from: e.from, target: e.target, reason: e.reason },
    });
    this.logger.warn(`⚠️  ${e.from} → ${e.target ?? '?'} rejected: ${e.reason}`);
  }

  sessionCompleted(e: OrchestratorEvents['session:end']): void {
    this.emit({
      type: 'session_completed',
      sessionId: e.sessionId,
      timestamp: Date.now(),
      data: {
        status: e.status,
        failureCode: e.failureCode,
        totalDuration: e.durationMs,
        report: e.report,
        review: e.review,
      },
    });

    if (e.status === 'approved') {
      this.logger.info(`✅ Session approved in ${seconds(e.durationMs)}`);
    } else {
      this.logger.error(`❌ Session failed (${e.failureCode ?? 'unknown'}) in ${seconds(e.durationMs)}`);
    }
    if (e.report) {
      this.logger.info(`📝 Final report:\n${e.report}`);
    }
    if (e.review) {
      this.logger.info(`🧐 Review: ${e.review}`);
    }
  }

  /**
   * Get all emitted events (for debugging/testing).
   */
  getEvents(): readonly ProgressEvent[] {
    return [...this.events];
  }

  /**
   * Clear all events.
   */
  clear(): void {
    this.events = [];
  }

  /**
   * Emit event to callback and store in history.
   */
  private emit(event: ProgressEvent): void {
    this.events.push(event);
    if (this.onProgress) {
      this.onProgress(event);
    }
  }
}
