import { FilterAgent } from '../agents/filterAgent';
import { FormatAgent } from '../agents/formatAgent';
import { RankAgent } from '../agents/rankAgent';
import { createStageCaches, type StageCaches } from '../cache/cacheStore';
import type { AppConfig } from '../config/env';
import { HEALTH_CHECK_TIMEOUT_MS } from '../config/system/constants';
import { createDatabase } from '../db/db';
import { errorMessage } from '../lib/errors';
import { moduleLogger } from '../lib/logger';
import { ResilienceController } from '../resilience/resilienceController';
import { OpenAIGenerativeClient, type GenerativeClient } from './generativeClient';
import { SearchCoordinator } from './searchCoordinator';
import { SearchServiceClient, type SearchBackend } from './searchClient';
import { MemorySearchLogStore, PgSearchLogStore, type SearchLogStore } from './searchLogService';

const log = moduleLogger('container');

export type ProbeStatus = 'ok' | 'error' | 'degraded' | 'disabled';

export interface HealthProbes {
  search(): Promise<ProbeStatus>;
  generative(): Promise<ProbeStatus>;
}

export interface ServiceContainer {
  config: AppConfig;
  coordinator: SearchCoordinator;
  resilience: ResilienceController;
  caches: StageCaches;
  searchLogs: SearchLogStore;
  /** Null when the generative service is not configured. */
  generativeModel: string | null;
  probes: HealthProbes;
  close(): Promise<void>;
}

/** Seams for tests: anything left out is built from the config. */
export interface ContainerOverrides {
  search?: SearchBackend;
  generative?: GenerativeClient | null;
  searchLogs?: SearchLogStore;
  probes?: Partial<HealthProbes>;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

async function checkHttp(url: string): Promise<ProbeStatus> {
  try {
    const res = await fetch(url, { signal: AbortSignal.timeout(HEALTH_CHECK_TIMEOUT_MS) });
    return res.ok ? 'ok' : 'error';
  } catch (err) {
    log.debug({ url, err: errorMessage(err) }, 'Health probe failed');
    return 'error';
  }
}

export function createServices(config: AppConfig, overrides: ContainerOverrides = {}): ServiceContainer {
  const now = overrides.now ?? Date.now;

  const search =
    overrides.search ??
    new SearchServiceClient({
      baseUrl: config.SEARCH_SERVICE_URL,
      apiKey: config.SEARCH_SERVICE_API_KEY,
      searchMode: config.SEARCH_MODE
    });

  const generative =
    overrides.generative !== undefined
      ? overrides.generative
      : config.GENERATIVE_API_KEY
        ? new OpenAIGenerativeClient({
            apiKey: config.GENERATIVE_API_KEY,
            baseURL: config.GENERATIVE_BASE_URL,
            model: config.GENERATIVE_MODEL,
            timeoutMs: config.AGENT_TIMEOUT_MS
          })
        : null;

  const resilience = new ResilienceController({
    retry: {
      attempts: config.RETRY_MAX_ATTEMPTS,
      baseDelayMs: config.RETRY_BASE_DELAY_MS,
      maxDelayMs: config.RETRY_MAX_DELAY_MS
    },
    breaker: {
      failureThreshold: config.BREAKER_FAILURE_THRESHOLD,
      windowMs: config.BREAKER_WINDOW_MS,
      cooldownMs: config.BREAKER_COOLDOWN_MS
    },
    defaultTimeoutMs: config.AGENT_TIMEOUT_MS,
    now,
    sleep: overrides.sleep,
    random: overrides.random
  });

  const caches = createStageCaches({
    enabled: config.CACHE_ENABLED,
    maxEntries: config.CACHE_MAX_ENTRIES,
    ttlMs: {
      search: config.CACHE_TTL_SEARCH_MS,
      filter: config.CACHE_TTL_FILTER_MS,
      rank: config.CACHE_TTL_RANK_MS,
      format: config.CACHE_TTL_FORMAT_MS,
      response: config.CACHE_TTL_RESPONSE_MS
    },
    now
  });

  const coordinator = new SearchCoordinator({
    search,
    agents: generative
      ? { filter: new FilterAgent(generative), rank: new RankAgent(generative), format: new FormatAgent(generative) }
      : null,
    resilience,
    caches,
    settings: {
      agentConcurrency: config.AGENT_MAX_CHUNKS,
      agentTimeoutMs: config.AGENT_TIMEOUT_MS,
      filterStageTimeoutMs: config.FILTER_STAGE_TIMEOUT_MS,
      requestDeadlineMs: config.REQUEST_DEADLINE_MS,
      searchTimeoutMs: config.SEARCH_TIMEOUT_MS,
      searchMode: config.SEARCH_MODE
    },
    now
  });

  const database = overrides.searchLogs || !config.DATABASE_URL ? null : createDatabase(config.DATABASE_URL);
  const searchLogs =
    overrides.searchLogs ?? (database ? new PgSearchLogStore(database) : new MemorySearchLogStore(undefined, now));

  const probes: HealthProbes = {
    search: overrides.probes?.search ?? (() => checkHttp(`${config.SEARCH_SERVICE_URL.replace(/\/$/, '')}/health`)),
    generative:
      overrides.probes?.generative ??
      (async () => {
        if (!generative) return 'disabled';
        const states = resilience.states();
        return states.filter === 'OPEN' || states.rank === 'OPEN' || states.format === 'OPEN' ? 'degraded' : 'ok';
      })
  };

  log.info(
    { agentsEnabled: generative !== null, searchLogs: searchLogs.kind, cacheEnabled: config.CACHE_ENABLED },
    'Services initialised'
  );

  return {
    config,
    coordinator,
    resilience,
    caches,
    searchLogs,
    generativeModel: generative ? generative.model : null,
    probes,
    close: async () => {
      if (database) await database.close();
    }
  };
}
