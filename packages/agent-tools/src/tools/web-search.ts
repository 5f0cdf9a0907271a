/**
 * Web search tool (capability: web-search, metered)
 */

import { z } from 'zod';
import type { ISearchProvider, SearchResult } from '@baton/agent-contracts';
import { SEARCH_DEFAULTS, errorMessage } from '@baton/agent-contracts';
import type { Tool } from '../types.js';
import { SEARCH_TOOL_CONFIG, TOOL_NAMES } from '../config.js';
import { toolError } from './tool-error.js';
import { truncateText } from '../utils.js';

const WebSearchInputSchema = z.object({
  query: z.string().trim().min(1),
});

function renderResults(query: string, results: SearchResult[]): string {
  if (results.length === 0) {
    return `No results for "${query}".`;
  }
  return results
    .map((r, i) => {
      const snippet = truncateText(r.snippet, SEARCH_TOOL_CONFIG.maxSnippetChars).text;
      return `${i + 1}. ${r.title}\n   ${r.url}\n   ${snippet}`;
    })
    .join('\n');
}

export function createWebSearchTool(provider: ISearchProvider): Tool {
  return {
    definition: {
      name: TOOL_NAMES.webSearch,
      description:
        'Search the web. Each distinct query counts against your search quota; repeated queries are refused.',
      inputSchema: {
        type: 'object',
        properties: {
          query: { type: 'string', description: 'Search query' },
        },
        required: ['query'],
      },
    },
    policy: { capability: 'web-search', meteredInput: 'query' },
    executor: async (input, ctx) => {
      const parsed = WebSearchInputSchema.safeParse(input);
      if (!parsed.success) {
        return toolError({ code: 'INVALID_INPUT', message: 'query must be a non-empty string' });
      }

      const params = ctx.agent.params;
      const browser = params.kind === 'browser' ? params : undefined;
      const startedAt = Date.now();

      try {
        const results = await provider.search(parsed.data.query, {
          maxResults: browser?.maxArticlesPerSite ?? SEARCH_TOOL_CONFIG.defaultMaxResults,
          sites: browser?.sites ?? [],
          timeoutMs: browser?.searchTimeoutMs ?? SEARCH_DEFAULTS.timeoutMs,
          apiKey: browser?.apiKey,
          signal: ctx.signal,
        });
        return {
          success: true,
          output: renderResults(parsed.data.query, results),
          metadata: { durationMs: Date.now() - startedAt, resultCount: results.length },
        };
      } catch (error) {
        if (ctx.signal.aborted) {
          throw error;
        }
        return toolError({
          code: 'PROVIDER_ERROR',
          message: `Search failed: ${errorMessage(error)}`,
          retryable: true,
        });
      }
    },
  };
}
