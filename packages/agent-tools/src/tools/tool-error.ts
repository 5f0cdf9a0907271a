import type { ToolResult } from '@baton/agent-contracts';

export function toolError(input: {
  code: string;
  message: string;
  retryable?: boolean;
  hint?: string;
  details?: Record<string, unknown>;
}): ToolResult {
  const hintBlock = input.hint ? `\n\nHint: ${input.hint}` : '';
  return {
    success: false,
    error: {
      code: input.code,
      message: `${input.message}${hintBlock}`,
      details: input.details,
    },
    metadata: {
      errorCode: input.code,
      retryable: input.retryable ?? false,
      ...(input.details || {}),
    },
  };
}

/**
 * Render a ToolResult as the text the model sees
 */
export function formatToolResult(result: ToolResult): string {
  if (result.success) {
    return result.output ?? '';
  }
  const code = result.error?.code ?? 'TOOL_ERROR';
  const message = result.error?.message ?? 'Tool failed';
  return `${code}: ${message}`;
}
