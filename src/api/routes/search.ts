import type { FastifyInstance } from 'fastify';
import { SEARCH_ROUTE_RATE_LIMIT } from '../../config/system/constants';
import { errorMessage } from '../../lib/errors';
import type { ServiceContainer } from '../../services/container';
import { parseSearchBody } from '../../services/queryValidation';
import type { RankedChunk, SearchResult } from '../../types';

export interface ChunkResponse {
  id: string;
  text: string;
  source: {
    title: string;
    authors: readonly string[];
    year: number | null;
    citation: string;
    item_key?: string;
  };
  relevance_score: number;
  agent_filtered: boolean;
  agent_rank: number;
}

export interface SearchResponse {
  query: string;
  results_count: number;
  processing_time_ms: number;
  formatted_output: string;
  degraded_mode: SearchResult['degradedMode'];
  diagnostics: string[];
  chunks: ChunkResponse[];
}

function toChunkResponse(chunk: RankedChunk): ChunkResponse {
  return {
    id: chunk.id,
    text: chunk.text,
    source: {
      title: chunk.source.title,
      authors: chunk.source.authors,
      year: chunk.source.year,
      citation: chunk.source.citation,
      ...(chunk.source.itemKey ? { item_key: chunk.source.itemKey } : {})
    },
    relevance_score: chunk.relevanceScore,
    agent_filtered: chunk.agentFiltered,
    agent_rank: chunk.rank
  };
}

export function toSearchResponse(result: SearchResult): SearchResponse {
  return {
    query: result.query,
    results_count: result.resultsCount,
    processing_time_ms: result.processingTimeMs,
    formatted_output: result.formattedOutput,
    degraded_mode: result.degradedMode,
    diagnostics: result.diagnostics,
    chunks: result.chunks.map(toChunkResponse)
  };
}

export async function registerSearchRoutes(app: FastifyInstance, services: ServiceContainer): Promise<void> {
  const { config, coordinator, searchLogs } = services;

  app.post('/api/search', { config: { rateLimit: SEARCH_ROUTE_RATE_LIMIT } }, async (req, reply) => {
    const query = parseSearchBody(req.body, {
      maxResults: config.DEFAULT_MAX_RESULTS,
      minRelevance: config.DEFAULT_MIN_RELEVANCE
    });

    const result = await coordinator.execute(query);

    try {
      await searchLogs.record({
        query: result.query,
        resultsCount: result.resultsCount,
        durationMs: result.processingTimeMs,
        degradedMode: result.degradedMode,
        citationStyle: query.citationStyle
      });
    } catch (err) {
      req.log.warn({ err: errorMessage(err) }, 'Failed to record search log');
    }

    return reply.send(toSearchResponse(result));
  });
}
