import { describe, it, expect, vi } from 'vitest';
import type { BrowserParams, ISearchProvider } from '@baton/agent-contracts';
import { SEARCH_DEFAULTS } from '@baton/agent-contracts';
import { createWebSearchTool } from '../web-search.js';
import { createScrapeTool } from '../scrape.js';
import { formatToolResult } from '../tool-error.js';
import { makeAgent, makeCtx } from './helpers.js';

const browserParams: BrowserParams = {
  kind: 'browser',
  sites: ['example.com'],
  maxArticlesPerSite: 5,
  searchTimeoutMs: 1500,
  waitTimeMs: 10,
};
const browser = makeAgent(browserParams, ['web-search']);

describe('web_search', () => {
  it('renders ranked results', async () => {
    const provider: ISearchProvider = {
      search: vi.fn(async () => [
        { title: 'Solar basics', url: 'https://example.com/solar', snippet: 'How panels work' },
        { title: 'Grid storage', url: 'https://example.com/grid', snippet: 'Batteries' },
      ]),
    };
    const tool = createWebSearchTool(provider);

    const result = await tool.executor({ query: 'solar power' }, makeCtx(browser));

    expect(result.success).toBe(true);
    expect(result.output).toBe(
      '1. Solar basics\n   https://example.com/solar\n   How panels work\n' +
        '2. Grid storage\n   https://example.com/grid\n   Batteries',
    );
  });

  it('passes browser params to the provider', async () => {
    const search = vi.fn(async () => []);
    const tool = createWebSearchTool({ search });
    const ctx = makeCtx(browser);

    await tool.executor({ query: 'solar power' }, ctx);

    expect(search).toHaveBeenCalledWith('solar power', {
      maxResults: 5,
      sites: ['example.com'],
      timeoutMs: 1500,
      signal: ctx.signal,
    });
  });

  it('forwards the browsing credential of the agent', async () => {
    const search = vi.fn(async () => []);
    const tool = createWebSearchTool({ search });
    const ctx = makeCtx(makeAgent({ ...browserParams, apiKey: 'test-secret' }, ['web-search']));

    await tool.executor({ query: 'solar power' }, ctx);

    expect(search).toHaveBeenCalledWith('solar power', {
      maxResults: 5,
      sites: ['example.com'],
      timeoutMs: 1500,
      apiKey: 'test-secret',
      signal: ctx.signal,
    });
  });

  it('falls back to defaults for non-browser agents', async () => {
    const search = vi.fn(async () => []);
    const tool = createWebSearchTool({ search });
    const agent = makeAgent({ kind: 'custom' }, ['web-search']);

    const result = await tool.executor({ query: 'tides' }, makeCtx(agent));

    expect(result.output).toBe('No results for "tides".');
    expect(search).toHaveBeenCalledWith('tides', expect.objectContaining({
      maxResults: 10,
      sites: [],
      timeoutMs: SEARCH_DEFAULTS.timeoutMs,
    }));
  });

  it('truncates long snippets', async () => {
    const tool = createWebSearchTool({
      search: async () => [{ title: 'T', url: 'https://example.com', snippet: 'x'.repeat(400) }],
    });

    const result = await tool.executor({ query: 'long' }, makeCtx(browser));

    expect(result.output).toBe(`1. T\n   https://example.com\n   ${'x'.repeat(300)}…`);
  });

  it('rejects an empty query', async () => {
    const search = vi.fn(async () => []);
    const tool = createWebSearchTool({ search });

    const result = await tool.executor({ query: '  ' }, makeCtx(browser));

    expect(formatToolResult(result)).toBe('INVALID_INPUT: query must be a non-empty string');
    expect(search).not.toHaveBeenCalled();
  });

  it('turns provider failures into tool errors', async () => {
    const tool = createWebSearchTool({
      search: async () => {
        throw new Error('boom');
      },
    });

    const result = await tool.executor({ query: 'solar' }, makeCtx(browser));

    expect(result.success).toBe(false);
    expect(formatToolResult(result)).toBe('PROVIDER_ERROR: Search failed: boom');
    expect(result.metadata?.retryable).toBe(true);
  });

  it('rethrows when the invocation was aborted', async () => {
    const controller = new AbortController();
    const tool = createWebSearchTool({
      search: async () => {
        controller.abort();
        throw new Error('aborted');
      },
    });

    await expect(tool.executor({ query: 'solar' }, makeCtx(browser, controller.signal))).rejects.toThrow('aborted');
  });

  it('is metered on its query field', () => {
    const tool = createWebSearchTool({ search: async () => [] });
    expect(tool.policy).toEqual({ capability: 'web-search', meteredInput: 'query' });
  });
});

describe('scrape_url', () => {
  it('returns the scraped text with the agent wait time', async () => {
    const scrape = vi.fn(async () => 'Page body');
    const tool = createScrapeTool({ scrape });
    const ctx = makeCtx(browser);

    const result = await tool.executor({ url: 'https://example.com/a', prompt: 'prices' }, ctx);

    expect(result).toEqual({ success: true, output: 'Page body', metadata: { truncated: false } });
    expect(scrape).toHaveBeenCalledWith('https://example.com/a', {
      prompt: 'prices',
      waitTimeMs: 10,
      signal: ctx.signal,
    });
  });

  it('forwards the browsing credential of the agent', async () => {
    const scrape = vi.fn(async () => 'Page body');
    const tool = createScrapeTool({ scrape });
    const ctx = makeCtx(makeAgent({ ...browserParams, apiKey: 'test-secret' }, ['web-search']));

    await tool.executor({ url: 'https://example.com/a' }, ctx);

    expect(scrape).toHaveBeenCalledWith('https://example.com/a', {
      prompt: undefined,
      waitTimeMs: 10,
      apiKey: 'test-secret',
      signal: ctx.signal,
    });
  });

  it('truncates long pages', async () => {
    const tool = createScrapeTool({ scrape: async () => 'y'.repeat(8_010) });

    const result = await tool.executor({ url: 'https://example.com/a' }, makeCtx(browser));

    expect(result.output).toBe(`${'y'.repeat(8_000)}\n[truncated]`);
    expect(result.metadata?.truncated).toBe(true);
  });

  it('rejects relative urls', async () => {
    const tool = createScrapeTool({ scrape: async () => '' });

    const result = await tool.executor({ url: '/relative' }, makeCtx(browser));

    expect(formatToolResult(result)).toBe('INVALID_INPUT: url must be an absolute URL');
  });
});
