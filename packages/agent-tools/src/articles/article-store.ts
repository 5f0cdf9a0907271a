/**
 * ArticleStore: catalogue of articles fetched from the configured sites.
 *
 * Layout under `dataFolder`:
 *   articles.json  one record per stored article, keyed by URL
 *   docs/          one text file per article, indexed by LocalDocsRetriever
 *
 * Every `update()` clears the `isNew` flag of earlier records, so
 * `newArticles()` lists what the latest update added.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { Article, IArticleSource, ILogger, SearchSettings } from '@baton/agent-contracts';
import { ConfigInvalidError, SEARCH_DEFAULTS, errorMessage } from '@baton/agent-contracts';
import { ARTICLE_STORE_CONFIG } from '../config.js';

const ArticleRecordSchema = z.object({
  url: z.string().min(1),
  filePath: z.string(),
  title: z.string(),
  source: z.string(),
  publishDate: z.string(),
  hasText: z.boolean(),
  isNew: z.boolean(),
});

export type ArticleRecord = z.infer<typeof ArticleRecordSchema>;

export interface ArticleStoreOptions {
  dataFolder: string;
  sites: readonly string[];
  maxArticlesPerSite?: number;
  timeoutMs?: number;
  waitTimeMs?: number;
  logger?: ILogger;
}

const RESERVED_NAMES = new Set([
  'CON',
  'PRN',
  'AUX',
  'NUL',
  ...Array.from({ length: 9 }, (_, i) => `COM${i + 1}`),
  ...Array.from({ length: 9 }, (_, i) => `LPT${i + 1}`),
]);

/**
 * File name safe on every common filesystem: printable ASCII only,
 * no reserved characters or device names, `_` for spaces and hyphens.
 */
export function safeFilename(name: string): string {
  let result = name
    .replace(/[<>:"/\\|?*]/g, '')
    .replace(/[^\x20-\x7e]/g, '')
    .replace(/[ -]/g, '_');

  const dot = result.lastIndexOf('.');
  const base = dot > 0 ? result.slice(0, dot) : result;
  if (RESERVED_NAMES.has(base.toUpperCase())) {
    result = dot > 0 ? `${base}_${result.slice(dot)}` : `${result}_`;
  }

  result = result.replace(/^[ .]+|[ .]+$/g, '');
  return result || 'unnamed_file';
}

function renderDocument(article: Article): string {
  const header = [article.title, `Source: ${article.source}`];
  if (article.publishDate) {
    header.push(`Published: ${article.publishDate}`);
  }
  header.push(`URL: ${article.url}`);
  return `${header.join('\n')}\n\n${article.text ?? ''}`;
}

async function readRecords(path: string): Promise<ArticleRecord[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new ConfigInvalidError([{ path, message: `Failed to parse: ${errorMessage(error)}` }]);
  }
  const parsed = z.array(ArticleRecordSchema).safeParse(data);
  if (!parsed.success) {
    throw new ConfigInvalidError(
      parsed.error.issues.map((issue) => ({ path: `${path}#${issue.path.join('.')}`, message: issue.message })),
    );
  }
  return parsed.data;
}

export class ArticleStore {
  readonly docsFolder: string;
  private readonly recordsPath: string;

  private constructor(
    private readonly options: ArticleStoreOptions,
    private records: ArticleRecord[],
  ) {
    this.docsFolder = join(options.dataFolder, ARTICLE_STORE_CONFIG.docsDir);
    this.recordsPath = join(options.dataFolder, ARTICLE_STORE_CONFIG.recordsFile);
  }

  /**
   * Open (or create) the store under `dataFolder`
   *
   * @throws ConfigInvalidError when no site is configured or the catalogue is corrupt
   */
  static async open(options: ArticleStoreOptions): Promise<ArticleStore> {
    if (options.sites.length === 0) {
      throw new ConfigInvalidError([
        { path: 'search.web.sites', message: 'at least one site is required for the article store' },
      ]);
    }
    await mkdir(join(options.dataFolder, ARTICLE_STORE_CONFIG.docsDir), { recursive: true });
    const records = await readRecords(join(options.dataFolder, ARTICLE_STORE_CONFIG.recordsFile));
    return new ArticleStore(options, records);
  }

  /** Open the store with the site list and limits of the `search` config block */
  static fromSettings(search: SearchSettings, dataFolder: string, logger?: ILogger): Promise<ArticleStore> {
    return ArticleStore.open({
      dataFolder,
      sites: search.web.sites,
      maxArticlesPerSite: search.max_articles_per_site,
      timeoutMs: search.timeout,
      waitTimeMs: search.wait_time,
      logger,
    });
  }

  has(url: string): boolean {
    return this.records.some((r) => r.url === url);
  }

  newArticles(): ArticleRecord[] {
    return this.records.filter((r) => r.isNew).map((r) => ({ ...r }));
  }

  allArticles(): ArticleRecord[] {
    return this.records.map((r) => ({ ...r }));
  }

  /**
   * Fetch every configured site and store the articles not seen before.
   * A failing site is logged and skipped.
   *
   * @returns Number of articles added
   */
  async refresh(source: IArticleSource, signal?: AbortSignal): Promise<number> {
    const maxArticles = this.options.maxArticlesPerSite ?? SEARCH_DEFAULTS.maxArticlesPerSite;
    const knownUrls = new Set(this.records.map((r) => r.url));
    const fetched: Article[] = [];

    for (const site of this.options.sites) {
      try {
        const articles = await source.fetchArticles(site, {
          maxArticles,
          timeoutMs: this.options.timeoutMs ?? SEARCH_DEFAULTS.timeoutMs,
          waitTimeMs: this.options.waitTimeMs ?? SEARCH_DEFAULTS.waitTimeMs,
          knownUrls,
          signal,
        });
        fetched.push(...articles.slice(0, maxArticles));
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }
        this.options.logger?.warn('Article source failed', { site, error: errorMessage(error) });
      }
    }

    return this.update(fetched);
  }

  /**
   * Store articles whose URL is not yet known and write their documents.
   * Articles without a URL are skipped.
   *
   * @returns Number of articles added
   */
  async update(articles: readonly Article[]): Promise<number> {
    this.records = this.records.map((r) => ({ ...r, isNew: false }));

    let added = 0;
    for (const article of articles) {
      if (!article.url || this.has(article.url)) {
        continue;
      }
      const filePath = this.documentPath(article);
      await writeFile(filePath, renderDocument(article), 'utf-8');
      this.records.push({
        url: article.url,
        filePath,
        title: article.title,
        source: article.source,
        publishDate: article.publishDate ?? '',
        hasText: Boolean(article.text),
        isNew: true,
      });
      added++;
    }

    await writeFile(this.recordsPath, JSON.stringify(this.records, null, 2), 'utf-8');

    if (added > 0) {
      this.options.logger?.info('Article store updated', { added, total: this.records.length });
    } else {
      this.options.logger?.debug('Article store already up to date', { total: this.records.length });
    }
    return added;
  }

  private documentPath(article: Article): string {
    const base = safeFilename(`${article.title}_${article.source}_${article.publishDate ?? ''}`).toLowerCase();
    const taken = new Set(this.records.map((r) => r.filePath));
    let candidate = join(this.docsFolder, `${base}.txt`);
    for (let n = 2; taken.has(candidate); n++) {
      candidate = join(this.docsFolder, `${base}_${n}.txt`);
    }
    return candidate;
  }
}
