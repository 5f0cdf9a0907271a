/**
 * LocalDocsRetriever: keyword retrieval over a folder of text documents.
 *
 * Documents (`.txt`, `.md`) are split into overlapping word windows
 * (`chunkSize` words, stepping `chunkSize - chunkOverlap`) and ranked by
 * how often the query terms occur in each window. The index is built lazily
 * per (folder, chunking) and cached until `invalidate()`. Ranking is
 * lexical, so `embeddingModel` has no effect here.
 */

import { readFile } from 'node:fs/promises';
import { relative } from 'node:path';
import { glob } from 'glob';
import type { IRetrievalProvider, RetrievedChunk, RetrieveOptions } from '@baton/agent-contracts';
import { AGENT_DEFAULTS } from '@baton/agent-contracts';
import { RETRIEVAL_CONFIG } from '../config.js';

interface IndexedChunk {
  source: string;
  position: number;
  text: string;
  /** Lower-cased term → occurrence count */
  terms: Map<string, number>;
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((t) => t.length >= RETRIEVAL_CONFIG.minTermLength);
}

/**
 * Split text into overlapping windows of words.
 */
export function chunkWords(text: string, chunkSize: number, chunkOverlap: number): string[] {
  const words = text.split(/\s+/).filter((w) => w.length > 0);
  if (words.length === 0) {
    return [];
  }
  const step = Math.max(1, chunkSize - chunkOverlap);
  const chunks: string[] = [];
  for (let start = 0; start < words.length; start += step) {
    chunks.push(words.slice(start, start + chunkSize).join(' '));
    if (start + chunkSize >= words.length) {
      break;
    }
  }
  return chunks;
}

function countTerms(text: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const term of tokenize(text)) {
    counts.set(term, (counts.get(term) ?? 0) + 1);
  }
  return counts;
}

export class LocalDocsRetriever implements IRetrievalProvider {
  private readonly indexes = new Map<string, Promise<IndexedChunk[]>>();

  async retrieve(query: string, options: RetrieveOptions): Promise<RetrievedChunk[]> {
    const chunkSize = options.chunking?.chunkSize ?? AGENT_DEFAULTS.chunkSize;
    const chunkOverlap = options.chunking?.chunkOverlap ?? AGENT_DEFAULTS.chunkOverlap;
    const chunks = await this.getIndex(options.docsFolder, chunkSize, chunkOverlap);
    options.signal.throwIfAborted();

    const queryTerms = Array.from(new Set(tokenize(query)));
    if (queryTerms.length === 0) {
      return [];
    }

    const scored = chunks
      .map((chunk) => {
        let score = 0;
        for (const term of queryTerms) {
          score += chunk.terms.get(term) ?? 0;
        }
        return { chunk, score };
      })
      .filter((s) => s.score > 0);

    scored.sort(
      (a, b) =>
        b.score - a.score ||
        a.chunk.source.localeCompare(b.chunk.source) ||
        a.chunk.position - b.chunk.position,
    );

    return scored.slice(0, options.topK).map(({ chunk, score }) => ({
      source: chunk.source,
      text: chunk.text,
      score,
    }));
  }

  /**
   * Drop cached indexes so the next retrieval re-reads the folder
   */
  invalidate(docsFolder?: string): void {
    if (!docsFolder) {
      this.indexes.clear();
      return;
    }
    for (const key of Array.from(this.indexes.keys())) {
      if (key.startsWith(`${docsFolder}\u0000`)) {
        this.indexes.delete(key);
      }
    }
  }

  private getIndex(docsFolder: string, chunkSize: number, chunkOverlap: number): Promise<IndexedChunk[]> {
    const key = `${docsFolder}\u0000${chunkSize}\u0000${chunkOverlap}`;
    let index = this.indexes.get(key);
    if (!index) {
      index = this.buildIndex(docsFolder, chunkSize, chunkOverlap);
      this.indexes.set(key, index);
      // A failed build must not stay cached
      index.catch(() => this.indexes.delete(key));
    }
    return index;
  }

  private async buildIndex(docsFolder: string, chunkSize: number, chunkOverlap: number): Promise<IndexedChunk[]> {
    const files = await glob(RETRIEVAL_CONFIG.patterns, { cwd: docsFolder, absolute: true, nodir: true });
    files.sort();

    const chunks: IndexedChunk[] = [];
    for (const file of files) {
      const content = await readFile(file, 'utf-8');
      const source = relative(docsFolder, file);
      chunkWords(content, chunkSize, chunkOverlap).forEach((text, position) => {
        chunks.push({ source, position, text, terms: countTerms(text) });
      });
    }
    return chunks;
  }
}
