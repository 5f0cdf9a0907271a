/**
 * @baton/agent-contracts
 *
 * Shared types, schemas and interfaces. No runtime dependencies beyond zod.
 */

// Agent specs
export type {
  Capability,
  MeteredCapability,
  AgentRole,
  AgentKind,
  ManagerParams,
  BrowserParams,
  RetrieverParams,
  WriterParams,
  ReviewerParams,
  CustomParams,
  AgentParams,
  AgentLimits,
  AgentConnection,
  AgentSpec,
} from './agent-spec.js';
export {
  CAPABILITIES,
  METERED_CAPABILITIES,
  isMeteredCapability,
  hasCapability,
  canonicalAgentName,
  sameAgent,
} from './agent-spec.js';

// Decisions
export type {
  HandoffDecision,
  RouteRejection,
  RouteResult,
  QuotaDenialReason,
  QuotaDecision,
} from './handoff.js';
export { NO_HANDOFF } from './handoff.js';

// Session
export type {
  TranscriptEntryKind,
  TranscriptEntry,
  TranscriptEntryInit,
  Quota,
  QuotaSnapshot,
  SharedState,
  SessionFailure,
  SessionState,
  SessionStatus,
  SessionResult,
} from './session.js';
export { INITIAL_SHARED_STATE } from './session.js';

// Errors
export type { FailureCode, ConfigIssue } from './errors.js';
export {
  BatonError,
  ConfigInvalidError,
  BackendError,
  TimedOutError,
  errorMessage,
} from './errors.js';

// Model backend
export type {
  LLMRole,
  LLMToolCall,
  LLMMessage,
  HandoffIntent,
  LLMRequest,
  LLMResponse,
  ILLM,
} from './llm.js';

// Tools
export type {
  ToolInputSchema,
  ToolDefinition,
  ToolPolicy,
  ToolError,
  ToolResult,
} from './tool-types.js';

// Providers
export type {
  ILogger,
  SearchResult,
  SearchOptions,
  ISearchProvider,
  ScrapeOptions,
  IScrapeProvider,
  RetrievedChunk,
  RetrieveOptions,
  IRetrievalProvider,
  Article,
  FetchArticlesOptions,
  IArticleSource,
} from './providers.js';

// Events
export type {
  OrchestratorEvents,
  OrchestratorEventName,
  Unsubscribe,
  OrchestratorEventBus,
} from './events.js';

// Configuration
export { AGENT_DEFAULTS, SEARCH_DEFAULTS, ORCHESTRATOR_DEFAULTS } from './defaults.js';
export type {
  AgentConfig,
  SearchSettings,
  OrchestratorSettings,
  BatonConfig,
  BatonConfigInput,
} from './agent-schemas.js';
export {
  CapabilitySchema,
  AgentKindSchema,
  AgentRoleSchema,
  SearchSettingsSchema,
  OrchestratorSettingsSchema,
  AgentLimitsSchema,
  AgentConfigSchema,
  BatonConfigSchema,
  parseBatonConfig,
  validateBatonConfig,
} from './agent-schemas.js';
