/**
 * @baton/agent-core
 *
 * Orchestration loop, agent registry, quota tracking and handoff routing
 */

// Wiring
export { createOrchestrator, loadOrchestrator } from './create-orchestrator.js';
export type { CreateOrchestratorDeps } from './create-orchestrator.js';

// Orchestration loop
export { Orchestrator } from './orchestrator.js';
export type { ApprovalPolicy, OrchestratorOptions, OrchestratorDeps, SubmitOptions } from './orchestrator.js';

// Registry
export { AgentSpecRegistry } from './registry/agent-spec-registry.js';
export type { GraphIssue, GraphIssueCode, AgentSpecRegistryOptions } from './registry/agent-spec-registry.js';
export { buildAgentSpec, inferAgentKind } from './registry/spec-builder.js';
export type { SpecBuildResult } from './registry/spec-builder.js';

// Session
export { Session } from './session/session.js';
export type { SessionOptions } from './session/session.js';
export { SessionLimiter } from './session/session-limiter.js';
export type { SessionLimiterConfig, RunHooks } from './session/session-limiter.js';
export { finalize } from './session/result-aggregator.js';

// Quota & routing
export { QuotaTracker, normalizeQuery, toSnapshot } from './quota/quota-tracker.js';
export { HandoffRouter } from './routing/handoff-router.js';
export type { HandoffRouterOptions } from './routing/handoff-router.js';

// Executor
export { AgentExecutor } from './executor/agent-executor.js';
export type { AgentExecutorDeps, InvocationOutcome, InvokeOptions, LLMResolver } from './executor/agent-executor.js';
export { parseHandoffMarkers, decisionFromIntent } from './executor/handoff-parser.js';
export type { ParsedReply } from './executor/handoff-parser.js';
export { buildSystemPrompt, buildHandoffInput } from './executor/prompt-builder.js';
export type { SystemPromptContext } from './executor/prompt-builder.js';
export { withAbort } from './executor/abortable.js';

// Events
export { createEventBus } from './events/event-bus.js';

// Replay
export { ReplayBackend, createReplayBackend, replayStepsFrom } from './replay/replay-backend.js';

// Configuration & logging
export { validateConfig, parseConfig, parseConfigText, loadConfig, getConfigValue } from './config/config-loader.js';
export { createLogger, createNoopLogger, fromPino, resolveLogLevel } from './logging/logger.js';
export type { LogLevel, CreateLoggerOptions } from './logging/logger.js';
