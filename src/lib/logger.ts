import pino from 'pino';
import type { DegradedMode } from '../types';

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  formatters: {
    level: (label) => ({ level: label })
  },
  timestamp: pino.stdTimeFunctions.isoTime
});

export type Logger = pino.Logger;

export function moduleLogger(module: string): Logger {
  return logger.child({ module });
}

interface StageMetrics {
  stage: string;
  durationMs: number;
  inputCount: number;
  outputCount: number;
  cacheHit: boolean;
  fallback?: boolean;
}

interface SearchMetrics {
  query: string;
  durationMs: number;
  resultsCount: number;
  degradedMode: DegradedMode;
  responseCacheHit: boolean;
}

export function logStageMetrics(log: Logger, metrics: StageMetrics): void {
  log.debug({ type: 'stage_metrics', ...metrics }, `Stage ${metrics.stage} finished in ${metrics.durationMs}ms`);
}

export function logSearchMetrics(log: Logger, metrics: SearchMetrics): void {
  log.info(
    { type: 'search_metrics', ...metrics },
    `Search completed with ${metrics.resultsCount} results in ${metrics.durationMs}ms`
  );
}

export function createTimer(now: () => number = Date.now) {
  const start = now();
  return {
    elapsed: () => now() - start
  };
}
