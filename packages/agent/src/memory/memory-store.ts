/**
 * In-Memory Long-term Store
 *
 * Keyword-matching long-term memory used as the retrieval source in
 * development and tests. Also reports the memory count that drives
 * profile auto-selection.
 */

import {
  SECTION_HEADERS,
  type MemoryVolumeSource,
  type RetrievalQuery,
  type RetrievalSource,
} from '@tiered-context/core';
import { ulid } from 'ulid';

export type MemoryType = 'episode' | 'fact' | 'event';

export interface MemoryRecord {
  id: string;
  content: string;
  type: MemoryType;
  /** 0.0 - 1.0, set on retrieval */
  relevanceScore: number;
  createdAt: string;
}

/** Index lines are cut to this many characters */
export const INDEX_PREVIEW_LENGTH = 48;

/** Told about additions (with the new record) and clears (without one) */
export type MemoryChangeListener = (added?: MemoryRecord) => void;

/**
 * Lowercase words of a query with punctuation removed
 */
export function queryTerms(query: string): string[] {
  return query
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, '')
    .split(/\s+/)
    .filter(Boolean);
}

function preview(content: string): string {
  const chars = Array.from(content);
  if (chars.length <= INDEX_PREVIEW_LENGTH) return content;
  return `${chars.slice(0, INDEX_PREVIEW_LENGTH).join('')}...`;
}

export class InMemoryStore implements RetrievalSource, MemoryVolumeSource {
  private records: MemoryRecord[] = [];
  private readonly listeners = new Set<MemoryChangeListener>();

  addMemory(
    content: string,
    type: MemoryType = 'episode',
    createdAt: string = new Date().toISOString()
  ): MemoryRecord {
    const record: MemoryRecord = {
      id: ulid(),
      content,
      type,
      relevanceScore: 0,
      createdAt,
    };
    this.records.push(record);
    this.notify(record);
    return record;
  }

  /**
   * Records containing at least one query term, best match first.
   * Score is the share of terms found; ties keep insertion order.
   */
  retrieveRelevant(terms: string[], limit = 5): MemoryRecord[] {
    if (terms.length === 0 || limit <= 0) return [];

    return this.records
      .map((record) => {
        const contentLower = record.content.toLowerCase();
        const matchCount = terms.filter((term) =>
          contentLower.includes(term)
        ).length;
        return {
          ...record,
          relevanceScore: matchCount / terms.length,
        };
      })
      .filter((r) => r.relevanceScore > 0)
      .sort((a, b) => b.relevanceScore - a.relevanceScore)
      .slice(0, limit);
  }

  /**
   * Retrieval text for the prompt. Uses the query keywords, or the
   * request content when no keywords were given. Empty when nothing matches.
   */
  async retrieve(query: RetrievalQuery): Promise<string> {
    const terms =
      query.keywords.length > 0
        ? queryTerms(query.keywords.join(' '))
        : queryTerms(query.request.content ?? '');

    const limit = query.useIndex
      ? Math.max(query.indexCount, query.fulltextCount)
      : query.fulltextCount;
    const matches = this.retrieveRelevant(terms, limit);
    if (matches.length === 0) return '';

    const parts: string[] = [SECTION_HEADERS.MEMORIES];

    if (query.useIndex) {
      parts.push('Index:');
      matches.slice(0, query.indexCount).forEach((record, i) => {
        parts.push(`${i + 1}. [${record.createdAt.slice(0, 10)}] ${preview(record.content)}`);
      });
      parts.push('Full text:');
    }

    for (const record of matches.slice(0, query.fulltextCount)) {
      parts.push(`- ${record.content}`);
    }

    return parts.join('\n');
  }

  countMemories(): number {
    return this.records.length;
  }

  onChange(listener: MemoryChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  clear(): void {
    this.records = [];
    this.notify();
  }

  private notify(added?: MemoryRecord): void {
    for (const listener of this.listeners) {
      listener(added);
    }
  }
}
