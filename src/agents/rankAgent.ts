import { z } from 'zod';
import { PREVIEW_LENGTH } from '../config/search/constants';
import { MalformedAgentOutputError } from '../lib/errors';
import type { GenerativeClient } from '../services/generativeClient';
import type { Chunk } from '../types';
import { BaseAgent } from './base';

const rankSchema = z.object({
  ranked_ids: z.array(z.number()),
  reasoning: z.string().optional()
});

export interface RankOutcome {
  /** Input indices, best first. Always a permutation of 0..n-1. */
  order: number[];
  fallback: boolean;
  reasoning: string;
}

export function identityOrder(length: number): number[] {
  return Array.from({ length }, (_, i) => i);
}

export function isPermutation(ids: readonly number[], length: number): boolean {
  if (ids.length !== length) return false;
  const seen = new Set<number>();
  for (const id of ids) {
    if (!Number.isInteger(id) || id < 0 || id >= length || seen.has(id)) return false;
    seen.add(id);
  }
  return true;
}

export function buildRankPrompt(query: string, context: string | null, chunks: readonly Chunk[]): string {
  const summary = chunks.map((chunk, id) => ({
    id,
    text_preview: chunk.text.slice(0, PREVIEW_LENGTH),
    source: chunk.source.title,
    year: chunk.source.year,
    similarity_score: chunk.similarityScore
  }));
  return [
    'You rank citation passages by how useful they are for the query.',
    '',
    `Query: ${query}`,
    context ? `Context: ${context}` : null,
    '',
    'Passages:',
    JSON.stringify(summary, null, 2),
    '',
    'Rank by direct relevance first, then strength of evidence, source credibility and recency.',
    'Every id must appear exactly once.',
    '',
    'Respond ONLY with JSON of the form:',
    '{"ranked_ids": [2, 0, 1], "reasoning": "brief explanation"}'
  ]
    .filter((line): line is string => line !== null)
    .join('\n');
}

export class RankAgent extends BaseAgent {
  constructor(client: GenerativeClient) {
    super('rank', client, { temperature: 0.2, maxOutputTokens: 500 });
  }

  async rank(query: string, context: string | null, chunks: readonly Chunk[], signal?: AbortSignal): Promise<RankOutcome> {
    if (chunks.length <= 1) {
      return { order: identityOrder(chunks.length), fallback: false, reasoning: '' };
    }

    const raw = await this.generate(buildRankPrompt(query, context, chunks), signal);
    try {
      const result = this.parseJson(raw, rankSchema);
      if (!isPermutation(result.ranked_ids, chunks.length)) {
        throw new MalformedAgentOutputError(
          `rank agent returned ${result.ranked_ids.length} ids that are not a permutation of ${chunks.length} chunks`,
          'rank',
          raw.slice(0, 200)
        );
      }
      return { order: result.ranked_ids, fallback: false, reasoning: result.reasoning ?? '' };
    } catch (err) {
      if (!(err instanceof MalformedAgentOutputError)) throw err;
      this.log.warn({ raw: err.raw }, `${err.message}; keeping input order`);
      return { order: identityOrder(chunks.length), fallback: true, reasoning: '' };
    }
  }
}
