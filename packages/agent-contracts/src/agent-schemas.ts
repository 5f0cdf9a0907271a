/**
 * Zod Schemas for Orchestrator Configuration Validation
 *
 * Provides runtime validation for the configuration document (JSON or YAML).
 * The document is snake_case; the spec builder in agent-core maps it onto
 * camelCase AgentSpecs.
 */

import { z } from 'zod';
import { AGENT_DEFAULTS, ORCHESTRATOR_DEFAULTS, SEARCH_DEFAULTS } from './defaults.js';

/**
 * Capability enum
 */
export const CapabilitySchema = z.enum(['web-search', 'retrieval', 'drafting', 'reviewing']);

/**
 * Agent kind enum (selects the role-specific parameter block)
 */
export const AgentKindSchema = z.enum(['manager', 'browser', 'retriever', 'writer', 'reviewer', 'custom']);

export const AgentRoleSchema = z.enum(['manager', 'worker', 'terminal-reviewer']);

/**
 * Global search settings schema
 */
export const SearchSettingsSchema = z
  .object({
    timeout: z.number().int().positive().default(SEARCH_DEFAULTS.timeoutMs),
    wait_time: z.number().int().nonnegative().default(SEARCH_DEFAULTS.waitTimeMs),
    max_articles_per_site: z.number().int().positive().default(SEARCH_DEFAULTS.maxArticlesPerSite),
    web: z
      .object({
        sites: z.array(z.string().min(1)).default([]),
      })
      .default({}),
  })
  .default({});

/**
 * Orchestrator limits schema
 */
export const OrchestratorSettingsSchema = z
  .object({
    max_hops: z.number().int().positive().default(ORCHESTRATOR_DEFAULTS.maxHops),
    max_retries: z.number().int().nonnegative().default(ORCHESTRATOR_DEFAULTS.maxRetries),
    max_tool_rounds: z.number().int().positive().default(ORCHESTRATOR_DEFAULTS.maxToolRounds),
    max_concurrent_sessions: z
      .number()
      .int()
      .positive()
      .default(ORCHESTRATOR_DEFAULTS.maxConcurrentSessions),
    max_queued_sessions: z
      .number()
      .int()
      .nonnegative()
      .default(ORCHESTRATOR_DEFAULTS.maxQueuedSessions),
    approval_policy: z
      .enum(['reviewer', 'any-terminal'])
      .default(ORCHESTRATOR_DEFAULTS.approvalPolicy),
  })
  .default({});

/**
 * Per-agent capability limits schema
 */
export const AgentLimitsSchema = z.object({
  max_searches: z.number().int().positive().optional(),
  max_retrievals: z.number().int().positive().optional(),
});

/**
 * Agent entry schema
 */
export const AgentConfigSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().optional(),
    system_prompt: z.string().optional(),
    model: z.string().min(1).default(AGENT_DEFAULTS.model),
    api_base: z.string().url().default(AGENT_DEFAULTS.apiBase),
    /** Seconds */
    timeout: z
      .number()
      .positive()
      .max(AGENT_DEFAULTS.maxTimeoutSeconds, {
        message: `timeout must be at most ${AGENT_DEFAULTS.maxTimeoutSeconds} seconds`,
      })
      .refine((seconds) => Math.round(seconds * 1000) >= 1, { message: 'timeout must be at least 1 ms' })
      .default(AGENT_DEFAULTS.timeoutSeconds),
    verbose: z.boolean().default(AGENT_DEFAULTS.verbose),
    manager: z.boolean().default(false),
    can_handoff_to: z.array(z.string().min(1)).default([]),
    type: AgentKindSchema.optional(),
    role: AgentRoleSchema.optional(),
    capabilities: z.array(CapabilitySchema).optional(),
    limits: AgentLimitsSchema.optional(),
    // retriever
    docs_folder: z.string().min(1).optional(),
    tokenizer_embedding_model: z.string().min(1).optional(),
    chunk_size: z.number().int().positive().optional(),
    chunk_overlap: z.number().int().nonnegative().optional(),
    // browser
    agentql_api_key: z.string().optional(),
  })
  .superRefine((agent, ctx) => {
    const size = agent.chunk_size ?? AGENT_DEFAULTS.chunkSize;
    const overlap = agent.chunk_overlap ?? AGENT_DEFAULTS.chunkOverlap;
    if (overlap >= size) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['chunk_overlap'],
        message: `chunk_overlap (${overlap}) must be smaller than chunk_size (${size})`,
      });
    }
  });

/**
 * Complete configuration document schema
 */
export const BatonConfigSchema = z.object({
  search: SearchSettingsSchema,
  orchestrator: OrchestratorSettingsSchema,
  agents: z.array(AgentConfigSchema).min(1),
});

export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type SearchSettings = z.infer<typeof SearchSettingsSchema>;
export type OrchestratorSettings = z.infer<typeof OrchestratorSettingsSchema>;
export type BatonConfig = z.infer<typeof BatonConfigSchema>;
/** Document shape before defaults are applied */
export type BatonConfigInput = z.input<typeof BatonConfigSchema>;

/**
 * Parse configuration from unknown data
 *
 * @param data - Raw data (e.g., from YAML.parse)
 * @returns Parsed and validated configuration with defaults applied
 * @throws ZodError if validation fails
 */
export function parseBatonConfig(data: unknown): BatonConfig {
  return BatonConfigSchema.parse(data);
}

/**
 * Validate configuration (returns success/error)
 *
 * @param data - Raw data to validate
 * @returns Validation result with data or error
 */
export function validateBatonConfig(data: unknown): {
  success: boolean;
  data?: BatonConfig;
  error?: z.ZodError;
} {
  const result = BatonConfigSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  } else {
    return { success: false, error: result.error };
  }
}
