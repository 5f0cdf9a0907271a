/**
 * Page scraping tool (capability: web-search, not metered)
 */

import { z } from 'zod';
import type { IScrapeProvider } from '@baton/agent-contracts';
import { errorMessage } from '@baton/agent-contracts';
import type { Tool } from '../types.js';
import { SCRAPE_TOOL_CONFIG, TOOL_NAMES } from '../config.js';
import { toolError } from './tool-error.js';
import { truncateText } from '../utils.js';

const ScrapeInputSchema = z.object({
  url: z.string().url(),
  prompt: z.string().min(1).optional(),
});

export function createScrapeTool(provider: IScrapeProvider): Tool {
  return {
    definition: {
      name: TOOL_NAMES.scrapeUrl,
      description: 'Open a specific URL and extract the content described by the prompt.',
      inputSchema: {
        type: 'object',
        properties: {
          url: { type: 'string', description: 'Absolute URL to visit' },
          prompt: { type: 'string', description: 'What to extract from the page' },
        },
        required: ['url'],
      },
    },
    policy: { capability: 'web-search' },
    executor: async (input, ctx) => {
      const parsed = ScrapeInputSchema.safeParse(input);
      if (!parsed.success) {
        return toolError({ code: 'INVALID_INPUT', message: 'url must be an absolute URL' });
      }

      const params = ctx.agent.params;
      const browser = params.kind === 'browser' ? params : undefined;

      try {
        const text = await provider.scrape(parsed.data.url, {
          prompt: parsed.data.prompt,
          waitTimeMs: browser?.waitTimeMs ?? SCRAPE_TOOL_CONFIG.defaultWaitTimeMs,
          apiKey: browser?.apiKey,
          signal: ctx.signal,
        });
        const capped = truncateText(text, SCRAPE_TOOL_CONFIG.maxOutputChars, '\n[truncated]');
        return {
          success: true,
          output: capped.text,
          metadata: { truncated: capped.truncated },
        };
      } catch (error) {
        if (ctx.signal.aborted) {
          throw error;
        }
        return toolError({
          code: 'PROVIDER_ERROR',
          message: `Scrape of ${parsed.data.url} failed: ${errorMessage(error)}`,
        });
      }
    },
  };
}
