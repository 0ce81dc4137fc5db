import { CircuitOpenError, DeadlineExceededError, UpstreamTransientError, errorMessage } from '../lib/errors';
import { moduleLogger, type Logger } from '../lib/logger';
import type { Dependency } from '../types';
import {
  CircuitBreakerRegistry,
  DEFAULT_BREAKER_OPTIONS,
  type CircuitBreakerOptions,
  type CircuitSnapshot,
  type CircuitState
} from './circuitBreaker';
import { pause, withRetry } from './retry';

export interface ResilienceOptions {
  retry: {
    attempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
  breaker: CircuitBreakerOptions;
  /** Per-attempt timeout used when a call does not set its own. */
  defaultTimeoutMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  logger?: Logger;
}

export interface CallOptions {
  timeoutMs?: number;
  /** Absolute epoch ms shared by every attempt of the call. */
  deadline?: number;
}

export type RemoteCall<T> = (signal: AbortSignal) => Promise<T>;

export const DEPENDENCIES: readonly Dependency[] = ['search', 'filter', 'rank', 'format'];

export const DEFAULT_RESILIENCE_OPTIONS: ResilienceOptions = {
  retry: { attempts: 3, baseDelayMs: 200, maxDelayMs: 2_000 },
  breaker: DEFAULT_BREAKER_OPTIONS,
  defaultTimeoutMs: 5_000
};

/**
 * Applies timeout, retry and circuit breaking to one remote call. Retries run
 * inside the breaker, so one exhausted call counts as one failure.
 */
export class ResilienceController {
  readonly breakers: CircuitBreakerRegistry;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(private readonly options: ResilienceOptions = DEFAULT_RESILIENCE_OPTIONS) {
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? moduleLogger('resilience');
    this.breakers = new CircuitBreakerRegistry({ ...options.breaker, now: this.now, logger: this.log });
  }

  async execute<T>(dependency: Dependency, call: RemoteCall<T>, callOptions: CallOptions = {}): Promise<T> {
    const breaker = this.breakers.get(dependency);
    if (!breaker.tryAcquire()) {
      throw new CircuitOpenError(dependency);
    }

    try {
      const result = await withRetry(() => this.attempt(dependency, call, callOptions), {
        ...this.options.retry,
        deadline: callOptions.deadline,
        now: this.now,
        sleep: this.options.sleep ?? pause,
        random: this.options.random,
        onRetry: (err, attempt, delayMs) => {
          this.log.warn({ dependency, attempt, delayMs, err: errorMessage(err) }, `Retrying ${dependency}`);
        }
      });
      breaker.recordSuccess();
      return result;
    } catch (err) {
      breaker.recordFailure(err);
      throw err;
    }
  }

  /** Higher-order form of `execute` for callers that want a reusable wrapped function. */
  wrap<A extends unknown[], T>(
    dependency: Dependency,
    fn: (signal: AbortSignal, ...args: A) => Promise<T>,
    callOptions: CallOptions = {}
  ): (...args: A) => Promise<T> {
    return (...args: A) => this.execute(dependency, (signal) => fn(signal, ...args), callOptions);
  }

  state(dependency: Dependency): CircuitState {
    return this.breakers.state(dependency);
  }

  states(): Record<Dependency, CircuitState> {
    return {
      search: this.state('search'),
      filter: this.state('filter'),
      rank: this.state('rank'),
      format: this.state('format')
    };
  }

  /** Every dependency, including those never called yet. */
  snapshot(): CircuitSnapshot[] {
    return DEPENDENCIES.map((dependency) => this.breakers.get(dependency).snapshot());
  }

  private attempt<T>(dependency: Dependency, call: RemoteCall<T>, callOptions: CallOptions): Promise<T> {
    const timeoutMs = callOptions.timeoutMs ?? this.options.defaultTimeoutMs;
    const remaining = callOptions.deadline === undefined ? Infinity : callOptions.deadline - this.now();
    if (remaining <= 0) {
      return Promise.reject(new DeadlineExceededError(dependency));
    }

    const deadlineBound = remaining < timeoutMs;
    const budget = Math.min(timeoutMs, remaining);
    const controller = new AbortController();

    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        controller.abort();
        reject(
          deadlineBound
            ? new DeadlineExceededError(dependency)
            : new UpstreamTransientError(`${dependency} timed out after ${budget}ms`, dependency)
        );
      }, budget);

      call(controller.signal).then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (err: unknown) => {
          clearTimeout(timer);
          reject(err);
        }
      );
    });
  }
}
