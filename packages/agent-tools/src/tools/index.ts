/**
 * Tool registration and exports
 */

import type { IRetrievalProvider, IScrapeProvider, ISearchProvider } from '@baton/agent-contracts';
import { ToolRegistry } from '../registry.js';

import { createWebSearchTool } from './web-search.js';
import { createScrapeTool } from './scrape.js';
import { createRetrieveTool } from './retrieve.js';
import { createRecordReportTool, createReviewReportTool } from './report.js';

export { createWebSearchTool } from './web-search.js';
export { createScrapeTool } from './scrape.js';
export { createRetrieveTool } from './retrieve.js';
export { createRecordReportTool, createReviewReportTool } from './report.js';
export {
  createHandoffToolDefinition,
  createFinishToolDefinition,
  isControlTool,
  intentFromToolCalls,
  type HandoffTarget,
} from './control.js';
export { toolError, formatToolResult } from './tool-error.js';

/**
 * External collaborators the capability tools call into.
 * A tool is registered only when its provider is present.
 */
export interface ToolProviders {
  search?: ISearchProvider;
  scrape?: IScrapeProvider;
  retrieval?: IRetrievalProvider;
}

/**
 * Create a registry with every tool the given providers support.
 * Drafting and reviewing tools need no provider and are always present.
 */
export function createToolRegistry(providers: ToolProviders = {}): ToolRegistry {
  const registry = new ToolRegistry();

  if (providers.search) {
    registry.register(createWebSearchTool(providers.search));
  }
  if (providers.scrape) {
    registry.register(createScrapeTool(providers.scrape));
  }
  if (providers.retrieval) {
    registry.register(createRetrieveTool(providers.retrieval));
  }

  registry.register(createRecordReportTool());
  registry.register(createReviewReportTool());

  return registry;
}
