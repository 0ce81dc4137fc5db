import { z } from 'zod';
import { UpstreamPermanentError, UpstreamTransientError, errorMessage } from '../lib/errors';
import type { Chunk, SearchMode } from '../types';

export interface SearchRequestParams {
  query: string;
  limit: number;
}

/** Anything that returns candidate chunks for a query; the coordinator depends only on this. */
export interface SearchBackend {
  search(params: SearchRequestParams, signal?: AbortSignal): Promise<Chunk[]>;
}

export interface SearchClientOptions {
  baseUrl: string;
  apiKey?: string;
  searchMode: SearchMode;
}

const DEPENDENCY = 'search';

const sourceSchema = z.object({
  title: z.string().default('Unknown'),
  authors: z.array(z.string()).default([]),
  year: z.number().int().nullable().default(null),
  citation: z.string().default(''),
  item_key: z.string().nullish()
});

const resultSchema = z.object({
  chunk_id: z.union([z.string(), z.number()]).transform(String),
  text: z.string(),
  score: z.number().default(0),
  source: sourceSchema.default({})
});

const responseSchema = z.object({
  results: z.array(resultSchema).default([])
});

type SearchHit = z.infer<typeof resultSchema>;

function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}

export function toChunk(hit: SearchHit): Chunk {
  const { source } = hit;
  return {
    id: hit.chunk_id,
    text: hit.text,
    source: {
      title: source.title,
      authors: source.authors,
      year: source.year,
      citation: source.citation,
      ...(source.item_key ? { itemKey: source.item_key } : {})
    },
    similarityScore: hit.score,
    relevanceScore: clamp01(hit.score),
    agentFiltered: false,
    verified: false
  };
}

async function fetchJson(url: string, options: RequestInit): Promise<unknown> {
  let res: Response;
  try {
    res = await fetch(url, options);
  } catch (err) {
    throw new UpstreamTransientError(`search request failed: ${errorMessage(err)}`, DEPENDENCY);
  }

  if (!res.ok) {
    const text = await res.text().catch(() => '');
    const message = `search failed (${res.status}): ${text.slice(0, 200)}`;
    if (res.status >= 500 || res.status === 429) {
      throw new UpstreamTransientError(message, DEPENDENCY, res.status);
    }
    throw new UpstreamPermanentError(message, DEPENDENCY, res.status);
  }

  try {
    return await res.json();
  } catch (err) {
    throw new UpstreamPermanentError(`search returned invalid JSON: ${errorMessage(err)}`, DEPENDENCY, res.status);
  }
}

export class SearchServiceClient implements SearchBackend {
  constructor(private readonly options: SearchClientOptions) {}

  async search(params: SearchRequestParams, signal?: AbortSignal): Promise<Chunk[]> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.options.apiKey) {
      headers.Authorization = `Bearer ${this.options.apiKey}`;
    }

    const data = await fetchJson(`${this.options.baseUrl.replace(/\/$/, '')}/api/v1/search`, {
      method: 'POST',
      headers,
      body: JSON.stringify({ query: params.query, limit: params.limit, search_mode: this.options.searchMode }),
      signal
    });

    const parsed = responseSchema.safeParse(data);
    if (!parsed.success) {
      throw new UpstreamPermanentError('Unsupported search response shape', DEPENDENCY);
    }
    return parsed.data.results.slice(0, params.limit).map(toChunk);
  }
}
