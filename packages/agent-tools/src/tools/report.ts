/**
 * Shared-state tools: the writer records the report, the reviewer records
 * its review. Both mutate ToolExecCtx.sharedState only.
 */

import { z } from 'zod';
import type { Tool } from '../types.js';
import { TOOL_NAMES } from '../config.js';
import { toolError } from './tool-error.js';

const RecordReportInputSchema = z.object({
  report: z.string().min(1),
});

const ReviewReportInputSchema = z.object({
  review: z.string().min(1),
});

export function createRecordReportTool(): Tool {
  return {
    definition: {
      name: TOOL_NAMES.recordReport,
      description: 'Store the full text of the report you wrote. Replaces any previous draft.',
      inputSchema: {
        type: 'object',
        properties: {
          report: { type: 'string', description: 'Complete report text (markdown)' },
        },
        required: ['report'],
      },
    },
    policy: { capability: 'drafting' },
    executor: (input, ctx) => {
      const parsed = RecordReportInputSchema.safeParse(input);
      if (!parsed.success) {
        return toolError({ code: 'INVALID_INPUT', message: 'report must be a non-empty string' });
      }
      ctx.sharedState.reportContent = parsed.data.report;
      return { success: true, output: 'Report recorded.' };
    },
  };
}

export function createReviewReportTool(): Tool {
  return {
    definition: {
      name: TOOL_NAMES.reviewReport,
      description: 'Store your review feedback for the current report.',
      inputSchema: {
        type: 'object',
        properties: {
          review: { type: 'string', description: 'Review feedback' },
        },
        required: ['review'],
      },
    },
    policy: { capability: 'reviewing' },
    executor: (input, ctx) => {
      const parsed = ReviewReportInputSchema.safeParse(input);
      if (!parsed.success) {
        return toolError({ code: 'INVALID_INPUT', message: 'review must be a non-empty string' });
      }
      ctx.sharedState.review = parsed.data.review;
      return { success: true, output: 'Report reviewed.' };
    },
  };
}
