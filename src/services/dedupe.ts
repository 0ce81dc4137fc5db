import { DEDUPE } from '../config/search/constants';
import type { Chunk, Source } from '../types';

export function sourceKey(source: Source): string {
  if (source.itemKey) return `item:${source.itemKey}`;
  const citation = source.citation.trim().toLowerCase();
  if (citation) return `citation:${citation}`;
  return `title:${source.title.trim().toLowerCase()}|${source.year ?? ''}`;
}

/** Stable: equal relevance keeps the incoming order. */
export function sortByRelevance<T extends Chunk>(chunks: readonly T[]): T[] {
  return [...chunks].sort((a, b) => b.relevanceScore - a.relevanceScore);
}

export function sortBySimilarity<T extends Chunk>(chunks: readonly T[]): T[] {
  return [...chunks].sort((a, b) => b.similarityScore - a.similarityScore);
}

/**
 * Keeps at most `perSource` of the most relevant chunks from each work, so a
 * single paper cannot crowd out the result set, and returns them by relevance.
 */
export function dedupeBySource<T extends Chunk>(chunks: readonly T[], perSource = DEDUPE.maxChunksPerSource): T[] {
  const kept: T[] = [];
  const counts = new Map<string, number>();
  for (const chunk of sortByRelevance(chunks)) {
    const key = sourceKey(chunk.source);
    const count = counts.get(key) ?? 0;
    if (count >= perSource) continue;
    counts.set(key, count + 1);
    kept.push(chunk);
  }
  return kept;
}
