/**
 * Shared utilities for agent tool implementations.
 */

/**
 * Cap text at `maxChars`, appending `marker` when anything was cut.
 *
 * @example
 * truncateText(page, SCRAPE_TOOL_CONFIG.maxOutputChars, '\n[truncated]');
 */
export function truncateText(
  text: string,
  maxChars: number,
  marker = '…',
): { text: string; truncated: boolean } {
  if (text.length <= maxChars) {
    return { text, truncated: false };
  }
  return { text: `${text.slice(0, Math.max(0, maxChars))}${marker}`, truncated: true };
}

/**
 * Read the metered query field from a tool input.
 * Returns undefined unless it is a non-blank string.
 */
export function readMeteredInput(input: Record<string, unknown>, field: string): string | undefined {
  const value = input[field];
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}
