/**
 * @module @baton/progress-reporter
 * UX-only progress feedback for orchestration sessions.
 *
 * Events are invisible to orchestrator logic.
 *
 * @example
 * ```typescript
 * import { ProgressReporter } from '@baton/progress-reporter';
 * import { createLogger } from '@baton/agent-core';
 *
 * // CLI usage
 * const reporter = new ProgressReporter(createLogger());
 * reporter.attach(orchestrator.events);
 *
 * // UI usage (with callback)
 * const reporter = new ProgressReporter(logger, (event) => {
 *   ws.send(JSON.stringify(event));
 * });
 * ```
 */

export { ProgressReporter } from './reporter.js';

export type {
  ProgressEvent,
  ProgressEventType,
  ProgressCallback,
  SessionQueuedEvent,
  SessionStartedEvent,
  AgentStartedEvent,
  AgentFinishedEvent,
  ToolCalledEvent,
  ToolDeniedEvent,
  HandoffEvent,
  HandoffRejectedEvent,
  SessionCompletedEvent,
} from './types.js';
