import { fallbackVerdict, type FilterAgent } from '../agents/filterAgent';
import type { FormatAgent } from '../agents/formatAgent';
import { isPermutation, type RankAgent } from '../agents/rankAgent';
import { renderCitations } from '../agents/citationRenderer';
import { buildCacheKey, type StageCaches } from '../cache/cacheStore';
import { RESULT_MESSAGES, SEARCH_LIMITS } from '../config/search/constants';
import { DeadlineExceededError, SearchUnavailableError, errorMessage } from '../lib/errors';
import { fanOut } from '../lib/fanOut';
import { createTimer, logSearchMetrics, logStageMetrics, moduleLogger, type Logger } from '../lib/logger';
import { DegradationPolicy } from '../resilience/degradationPolicy';
import type { ResilienceController } from '../resilience/resilienceController';
import type { AgentStage, AgentVerdict, Chunk, DegradedMode, Query, RankedChunk, SearchMode, SearchResult } from '../types';
import { dedupeBySource, sortBySimilarity } from './dedupe';
import { assertValidQuery } from './queryValidation';
import type { SearchBackend } from './searchClient';

export interface SearchAgents {
  filter: FilterAgent;
  rank: RankAgent;
  format: FormatAgent;
}

export interface CoordinatorSettings {
  /** Max simultaneous filter calls per request. */
  agentConcurrency: number;
  agentTimeoutMs: number;
  filterStageTimeoutMs: number;
  requestDeadlineMs: number;
  searchTimeoutMs: number;
  searchMode: SearchMode;
}

export interface SearchCoordinatorDeps {
  search: SearchBackend;
  /** Null when no generative service is configured. */
  agents: SearchAgents | null;
  resilience: ResilienceController;
  caches: StageCaches;
  settings: CoordinatorSettings;
  policy?: DegradationPolicy;
  now?: () => number;
  logger?: Logger;
}

interface RunState {
  readonly deadline: number;
  mode: DegradedMode;
  diagnostics: string[];
  cacheable: boolean;
}

export class SearchCoordinator {
  private readonly policy: DegradationPolicy;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(private readonly deps: SearchCoordinatorDeps) {
    this.policy = deps.policy ?? new DegradationPolicy();
    this.now = deps.now ?? Date.now;
    this.log = deps.logger ?? moduleLogger('search-coordinator');
  }

  get agentsEnabled(): boolean {
    return this.deps.agents !== null;
  }

  async execute(query: Query): Promise<SearchResult> {
    assertValidQuery(query);
    const timer = createTimer(this.now);
    const { caches } = this.deps;

    const responseKey = buildCacheKey('response', query.query, {
      context: query.context,
      maxResults: query.maxResults,
      citationStyle: query.citationStyle,
      filterEnabled: query.filterEnabled,
      minRelevance: query.minRelevance,
      includeContext: query.includeContext
    });
    const cached = caches.response.get(responseKey);
    if (cached) {
      const result = { ...cached, query: query.query.trim(), processingTimeMs: timer.elapsed() };
      this.logResult(result, true);
      return result;
    }

    const state: RunState = {
      deadline: this.now() + this.deps.settings.requestDeadlineMs,
      mode: 'NONE',
      diagnostics: [],
      cacheable: true
    };

    const candidates = await this.fetchCandidates(query, state);
    if (candidates.length === 0) {
      return this.finish(query, state, [], RESULT_MESSAGES.noResults, timer.elapsed(), responseKey);
    }

    let survivors = candidates;
    if (query.filterEnabled) {
      const agents = this.admitStage(state, 'filter');
      if (agents) {
        survivors = await this.runFilter(agents.filter, query, candidates, state);
        if (survivors.length === 0) {
          return this.finish(query, state, [], RESULT_MESSAGES.nothingRelevant, timer.elapsed(), responseKey);
        }
      }
    }

    const deduped = dedupeBySource(survivors);

    let ordered: Chunk[] = deduped;
    if (deduped.length > 1) {
      const agents = this.admitStage(state, 'rank');
      ordered = agents ? await this.runRank(agents.rank, query, deduped, state) : sortBySimilarity(deduped);
    }

    const ranked: RankedChunk[] = ordered.slice(0, query.maxResults).map((chunk, i) => ({ ...chunk, rank: i + 1 }));

    const agents = this.admitStage(state, 'format');
    const formatted = agents
      ? await this.runFormat(agents.format, query, ranked, state)
      : renderCitations(ranked, query.includeContext);

    return this.finish(query, state, ranked, formatted, timer.elapsed(), responseKey);
  }

  private async fetchCandidates(query: Query, state: RunState): Promise<Chunk[]> {
    const { caches, resilience, search, settings } = this.deps;
    const decision = this.policy.decide({ states: resilience.states(), agentsEnabled: this.agentsEnabled }, 'search');
    if (decision.plan === 'SEARCH_ONLY_FAILED') {
      throw new SearchUnavailableError('Search service is temporarily unavailable', { reason: decision.reason });
    }

    const limit = query.maxResults * SEARCH_LIMITS.candidateMultiplier;
    const key = buildCacheKey('search', query.query, { limit, mode: settings.searchMode });
    const timer = createTimer(this.now);
    const cached = caches.search.get(key);
    if (cached) {
      logStageMetrics(this.log, { stage: 'search', durationMs: timer.elapsed(), inputCount: 0, outputCount: cached.length, cacheHit: true });
      return cached;
    }

    try {
      const chunks = await resilience.execute('search', (signal) => search.search({ query: query.query, limit }, signal), {
        timeoutMs: settings.searchTimeoutMs,
        deadline: state.deadline
      });
      caches.search.set(key, chunks);
      logStageMetrics(this.log, { stage: 'search', durationMs: timer.elapsed(), inputCount: 0, outputCount: chunks.length, cacheHit: false });
      return chunks;
    } catch (err) {
      this.log.error({ err: errorMessage(err) }, 'Search service call failed');
      throw new SearchUnavailableError('Search service is unavailable', { reason: errorMessage(err) });
    }
  }

  /** Returns the agents when the stage may run; otherwise records why the pipeline degraded. */
  private admitStage(state: RunState, stage: AgentStage): SearchAgents | null {
    if (state.mode !== 'NONE') return null;
    if (this.now() >= state.deadline) {
      this.degrade(state, 'NO_AGENTS', `Request deadline reached before the ${stage} stage; fallbacks were used`);
      return null;
    }
    const decision = this.policy.decide(
      { states: this.deps.resilience.states(), agentsEnabled: this.agentsEnabled },
      stage
    );
    if (decision.plan === 'FULL' && this.deps.agents) return this.deps.agents;
    if (decision.reason === 'agents-disabled') {
      this.degrade(state, 'SEARCH_ONLY', 'Generative agents are not configured; results use search order and template formatting');
    } else {
      this.degrade(state, 'NO_AGENTS', `The ${stage} stage is unavailable (circuit open); fallbacks were used`);
    }
    return null;
  }

  private degrade(state: RunState, mode: Exclude<DegradedMode, 'NONE'>, message: string): void {
    if (state.mode === 'NONE') state.mode = mode;
    if (mode === 'NO_AGENTS') state.cacheable = false;
    state.diagnostics.push(message);
    this.log.warn({ mode, deadlineInMs: state.deadline - this.now() }, message);
  }

  private async runFilter(agent: FilterAgent, query: Query, candidates: Chunk[], state: RunState): Promise<Chunk[]> {
    const { settings } = this.deps;
    const timer = createTimer(this.now);
    const stageDeadline = Math.min(state.deadline, this.now() + settings.filterStageTimeoutMs);

    const outcomes = await fanOut(candidates, (chunk) => this.evaluateChunk(agent, query, chunk, stageDeadline), {
      concurrency: settings.agentConcurrency,
      deadline: stageDeadline,
      now: this.now,
      onTimeout: () => new DeadlineExceededError('filter')
    });

    const failures = outcomes.filter((o) => !o.ok).length;
    if (failures === candidates.length) {
      const first = outcomes.find((o) => !o.ok);
      const reason = first && !first.ok ? errorMessage(first.error) : 'unknown error';
      this.degrade(state, 'NO_AGENTS', `Filter stage failed for every candidate (${reason}); results are unfiltered`);
      return candidates;
    }

    const kept: Chunk[] = [];
    let unusable = 0;
    candidates.forEach((chunk, i) => {
      const outcome = outcomes[i];
      const verdict: AgentVerdict = outcome.ok ? outcome.value : fallbackVerdict(`Evaluation failed: ${errorMessage(outcome.error)}`);
      if (!verdict.verified) {
        if (outcome.ok) unusable += 1;
        chunk.verified = false;
        chunk.agentFiltered = false;
        chunk.filterReasoning = verdict.reasoning;
        kept.push(chunk);
        return;
      }
      if (verdict.relevant && verdict.confidence >= query.minRelevance) {
        chunk.verified = true;
        chunk.agentFiltered = true;
        chunk.relevanceScore = verdict.confidence;
        chunk.filterReasoning = verdict.reasoning;
        kept.push(chunk);
      }
    });

    if (failures > 0) {
      state.cacheable = false;
      state.diagnostics.push(`${failures} of ${candidates.length} filter evaluations failed; those chunks were kept unverified`);
    }
    if (unusable > 0) {
      state.cacheable = false;
      state.diagnostics.push(`${unusable} of ${candidates.length} filter answers were unusable; those chunks were kept unverified`);
    }
    logStageMetrics(this.log, {
      stage: 'filter',
      durationMs: timer.elapsed(),
      inputCount: candidates.length,
      outputCount: kept.length,
      cacheHit: false,
      fallback: failures + unusable > 0
    });
    return kept;
  }

  private async evaluateChunk(agent: FilterAgent, query: Query, chunk: Chunk, deadline: number): Promise<AgentVerdict> {
    const { caches, resilience, settings } = this.deps;
    const key = buildCacheKey('filter', query.query, {
      context: query.context,
      minRelevance: query.minRelevance,
      chunkId: chunk.id
    });
    const cached = caches.filter.get(key);
    if (cached) return cached;

    const verdict = await resilience.execute(
      'filter',
      (signal) => agent.evaluate(query.query, query.context, chunk, signal),
      { timeoutMs: settings.agentTimeoutMs, deadline }
    );
    if (verdict.verified) caches.filter.set(key, verdict);
    return verdict;
  }

  private async runRank(agent: RankAgent, query: Query, chunks: Chunk[], state: RunState): Promise<Chunk[]> {
    const { caches, resilience, settings } = this.deps;
    const timer = createTimer(this.now);
    const key = buildCacheKey('rank', query.query, { context: query.context, ids: chunks.map((c) => c.id) });

    let order = caches.rank.get(key);
    const cacheHit = order !== undefined && isPermutation(order, chunks.length);
    if (!order || !cacheHit) {
      try {
        const outcome = await resilience.execute(
          'rank',
          (signal) => agent.rank(query.query, query.context, chunks, signal),
          { timeoutMs: settings.agentTimeoutMs, deadline: state.deadline }
        );
        order = outcome.order;
        if (outcome.fallback) {
          state.cacheable = false;
          state.diagnostics.push('Rank agent output was unusable; relevance order was kept');
        } else {
          caches.rank.set(key, order);
        }
      } catch (err) {
        this.degrade(state, 'NO_AGENTS', `Rank stage failed (${errorMessage(err)}); results are ordered by similarity`);
        return sortBySimilarity(chunks);
      }
    }

    logStageMetrics(this.log, { stage: 'rank', durationMs: timer.elapsed(), inputCount: chunks.length, outputCount: order.length, cacheHit });
    return order.map((index) => chunks[index]);
  }

  private async runFormat(agent: FormatAgent, query: Query, chunks: RankedChunk[], state: RunState): Promise<string> {
    const { caches, resilience, settings } = this.deps;
    const timer = createTimer(this.now);
    const key = buildCacheKey('format', query.query, {
      citationStyle: query.citationStyle,
      includeContext: query.includeContext,
      chunks: chunks.map((c) => [c.id, c.rank, Number(c.relevanceScore.toFixed(4))])
    });

    const cached = caches.format.get(key);
    if (cached !== undefined) {
      logStageMetrics(this.log, { stage: 'format', durationMs: timer.elapsed(), inputCount: chunks.length, outputCount: 1, cacheHit: true });
      return cached;
    }

    try {
      const outcome = await resilience.execute(
        'format',
        (signal) => agent.format(chunks, query.citationStyle, query.includeContext, signal),
        { timeoutMs: settings.agentTimeoutMs, deadline: state.deadline }
      );
      if (outcome.fallback) {
        state.cacheable = false;
        state.diagnostics.push('Format agent output was empty; template formatting was used');
      } else {
        caches.format.set(key, outcome.text);
      }
      logStageMetrics(this.log, {
        stage: 'format',
        durationMs: timer.elapsed(),
        inputCount: chunks.length,
        outputCount: 1,
        cacheHit: false,
        fallback: outcome.fallback
      });
      return outcome.text;
    } catch (err) {
      this.degrade(state, 'NO_AGENTS', `Format stage failed (${errorMessage(err)}); template formatting was used`);
      return renderCitations(chunks, query.includeContext);
    }
  }

  private finish(
    query: Query,
    state: RunState,
    chunks: RankedChunk[],
    formattedOutput: string,
    processingTimeMs: number,
    responseKey: string
  ): SearchResult {
    const result: SearchResult = {
      query: query.query.trim(),
      resultsCount: chunks.length,
      chunks,
      formattedOutput,
      processingTimeMs,
      degradedMode: state.mode,
      diagnostics: state.diagnostics
    };
    if (state.cacheable) {
      this.deps.caches.response.set(responseKey, result);
    }
    this.logResult(result, false);
    return result;
  }

  private logResult(result: SearchResult, responseCacheHit: boolean): void {
    logSearchMetrics(this.log, {
      query: result.query,
      durationMs: result.processingTimeMs,
      resultsCount: result.resultsCount,
      degradedMode: result.degradedMode,
      responseCacheHit
    });
  }
}
