import { buildConfig, envSchema, type AppConfig } from '../src/config/env';
import type { CompletionRequest, GenerativeClient } from '../src/services/generativeClient';
import type { SearchBackend, SearchRequestParams } from '../src/services/searchClient';
import type { AgentStage, Chunk, Query, Source } from '../src/types';

export function makeSource(overrides: Partial<Source> = {}): Source {
  return {
    title: 'Pretrial Detention and Recidivism',
    authors: ['A. Author'],
    year: 2020,
    citation: '',
    ...overrides
  };
}

export function makeChunk(id: string, similarityScore: number, overrides: Partial<Chunk> = {}): Chunk {
  return {
    id,
    text: `Passage ${id} about bail reform outcomes.`,
    source: makeSource({ itemKey: `item-${id}` }),
    similarityScore,
    relevanceScore: Math.max(0, Math.min(1, similarityScore)),
    agentFiltered: false,
    verified: false,
    ...overrides
  };
}

export function makeQuery(overrides: Partial<Query> = {}): Query {
  return {
    query: 'bail reform recidivism',
    context: null,
    maxResults: 10,
    citationStyle: 'APA',
    filterEnabled: true,
    minRelevance: 0.7,
    includeContext: true,
    ...overrides
  };
}

export function stageOf(prompt: string): AgentStage {
  if (prompt.startsWith('You judge')) return 'filter';
  if (prompt.startsWith('You rank')) return 'rank';
  return 'format';
}

/** Pulls the passage id out of a filter prompt built from `makeChunk` text. */
export function passageId(prompt: string): string {
  const match = /Passage (\S+) about/.exec(prompt);
  return match ? match[1] : '';
}

type Responder = (request: CompletionRequest, signal?: AbortSignal) => string | Promise<string>;

export class FakeGenerativeClient implements GenerativeClient {
  readonly model = 'fake-model';
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly respond: Responder) {}

  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<string> {
    this.requests.push(request);
    return this.respond(request, signal);
  }

  callsFor(stage: AgentStage): number {
    return this.requests.filter((r) => stageOf(r.prompt) === stage).length;
  }
}

export class FakeSearchBackend implements SearchBackend {
  readonly calls: SearchRequestParams[] = [];

  constructor(private readonly respond: (params: SearchRequestParams) => Chunk[] | Promise<Chunk[]>) {}

  async search(params: SearchRequestParams): Promise<Chunk[]> {
    this.calls.push(params);
    const chunks = await this.respond(params);
    return chunks.slice(0, params.limit).map((chunk) => ({ ...chunk, source: { ...chunk.source } }));
  }
}

export const noSleep = async (): Promise<void> => {};

export function testConfig(env: Record<string, string> = {}): AppConfig {
  return buildConfig(
    envSchema.parse({
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      CORS_ORIGINS: '',
      ...env
    })
  );
}

/** A clock tests move by hand. */
export class ManualClock {
  constructor(public current = 1_700_000_000_000) {}

  now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}
