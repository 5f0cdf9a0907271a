/**
 * Document retrieval tool (capability: retrieval, metered)
 */

import { z } from 'zod';
import type { IRetrievalProvider, RetrievedChunk } from '@baton/agent-contracts';
import { errorMessage } from '@baton/agent-contracts';
import type { Tool } from '../types.js';
import { RETRIEVAL_CONFIG, TOOL_NAMES } from '../config.js';
import { toolError } from './tool-error.js';

const RetrieveInputSchema = z.object({
  query: z.string().trim().min(1),
});

function renderChunks(query: string, chunks: RetrievedChunk[]): string {
  if (chunks.length === 0) {
    return `No documents matched "${query}".`;
  }
  return chunks
    .map((c, i) => `[${i + 1}] ${c.source} (score ${c.score.toFixed(2)})\n${c.text}`)
    .join('\n\n');
}

export function createRetrieveTool(provider: IRetrievalProvider): Tool {
  return {
    definition: {
      name: TOOL_NAMES.retrieveDocuments,
      description:
        'Search the local knowledge base and return the most relevant passages. Counts against your retrieval quota.',
      inputSchema: {
        type: 'object',
        properties: {
          query: { type: 'string', description: 'What to look for in the documents' },
        },
        required: ['query'],
      },
    },
    policy: { capability: 'retrieval', meteredInput: 'query' },
    executor: async (input, ctx) => {
      const parsed = RetrieveInputSchema.safeParse(input);
      if (!parsed.success) {
        return toolError({ code: 'INVALID_INPUT', message: 'query must be a non-empty string' });
      }

      const params = ctx.agent.params;
      if (params.kind !== 'retriever') {
        return toolError({
          code: 'NOT_CONFIGURED',
          message: `Agent ${ctx.agent.name} has no docs folder configured`,
        });
      }

      try {
        const chunks = await provider.retrieve(parsed.data.query, {
          docsFolder: params.docsFolder,
          topK: RETRIEVAL_CONFIG.topK,
          chunking: { chunkSize: params.chunkSize, chunkOverlap: params.chunkOverlap },
          embeddingModel: params.tokenizerEmbeddingModel,
          signal: ctx.signal,
        });
        return {
          success: true,
          output: renderChunks(parsed.data.query, chunks),
          metadata: { chunkCount: chunks.length },
        };
      } catch (error) {
        if (ctx.signal.aborted) {
          throw error;
        }
        return toolError({
          code: 'PROVIDER_ERROR',
          message: `Retrieval failed: ${errorMessage(error)}`,
          retryable: true,
        });
      }
    },
  };
}
