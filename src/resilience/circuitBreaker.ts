/**
 * Circuit breaker keyed by dependency name.
 *
 * States:
 * - CLOSED: calls pass; consecutive failures inside the window are counted
 * - OPEN: calls are rejected without touching the dependency until the cooldown ends
 * - HALF_OPEN: exactly one trial call is admitted; its outcome closes or reopens
 */

import type { Logger } from '../lib/logger';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerOptions {
  /** Consecutive failures that trip the breaker (default: 5) */
  failureThreshold: number;
  /** Failures older than this no longer extend the streak (default: 60s) */
  windowMs: number;
  /** Time spent OPEN before a trial call is allowed (default: 30s) */
  cooldownMs: number;
  now?: () => number;
  logger?: Logger;
}

export interface CircuitSnapshot {
  name: string;
  state: CircuitState;
  consecutiveFailures: number;
  openedAt: number | null;
  lastFailureAt: number | null;
  lastError: string | null;
}

export const DEFAULT_BREAKER_OPTIONS: CircuitBreakerOptions = {
  failureThreshold: 5,
  windowMs: 60_000,
  cooldownMs: 30_000
};

export class CircuitBreaker {
  private current: CircuitState = 'CLOSED';
  private consecutiveFailures = 0;
  private streakStartedAt: number | null = null;
  private openedAt: number | null = null;
  private lastFailureAt: number | null = null;
  private lastError: string | null = null;
  private trialInFlight = false;
  private readonly now: () => number;

  constructor(
    readonly name: string,
    private readonly options: CircuitBreakerOptions = DEFAULT_BREAKER_OPTIONS
  ) {
    this.now = options.now ?? Date.now;
  }

  get state(): CircuitState {
    if (this.current === 'OPEN' && this.openedAt !== null && this.now() - this.openedAt >= this.options.cooldownMs) {
      this.transition('HALF_OPEN');
      this.trialInFlight = false;
    }
    return this.current;
  }

  /** Returns false when the call must be rejected without reaching the dependency. */
  tryAcquire(): boolean {
    switch (this.state) {
      case 'CLOSED':
        return true;
      case 'OPEN':
        return false;
      case 'HALF_OPEN':
        if (this.trialInFlight) return false;
        this.trialInFlight = true;
        return true;
    }
  }

  recordSuccess(): void {
    // A straggler admitted before the breaker opened does not close it.
    if (this.current === 'OPEN') return;
    if (this.current === 'HALF_OPEN') {
      this.transition('CLOSED');
    }
    this.reset();
  }

  recordFailure(error?: unknown): void {
    const now = this.now();
    this.lastFailureAt = now;
    this.lastError = error instanceof Error ? error.message : error === undefined ? null : String(error);

    if (this.current === 'HALF_OPEN') {
      this.open(now);
      return;
    }
    if (this.current === 'OPEN') return;

    if (this.streakStartedAt === null || now - this.streakStartedAt > this.options.windowMs) {
      this.streakStartedAt = now;
      this.consecutiveFailures = 0;
    }
    this.consecutiveFailures += 1;

    if (this.consecutiveFailures >= this.options.failureThreshold) {
      this.open(now);
    }
  }

  snapshot(): CircuitSnapshot {
    return {
      name: this.name,
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      openedAt: this.openedAt,
      lastFailureAt: this.lastFailureAt,
      lastError: this.lastError
    };
  }

  private open(now: number): void {
    this.transition('OPEN');
    this.openedAt = now;
    this.trialInFlight = false;
  }

  private reset(): void {
    this.consecutiveFailures = 0;
    this.streakStartedAt = null;
    this.openedAt = null;
    this.trialInFlight = false;
  }

  private transition(next: CircuitState): void {
    if (next === this.current) return;
    const previous = this.current;
    this.current = next;
    const log = this.options.logger;
    if (!log) return;
    const payload = { breaker: this.name, from: previous, to: next, failures: this.consecutiveFailures };
    if (next === 'OPEN') {
      log.warn({ ...payload, lastError: this.lastError }, `Circuit ${this.name}: ${previous} -> ${next}`);
    } else {
      log.info(payload, `Circuit ${this.name}: ${previous} -> ${next}`);
    }
  }
}

export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();

  constructor(private readonly options: CircuitBreakerOptions = DEFAULT_BREAKER_OPTIONS) {}

  get(name: string): CircuitBreaker {
    let breaker = this.breakers.get(name);
    if (!breaker) {
      breaker = new CircuitBreaker(name, this.options);
      this.breakers.set(name, breaker);
    }
    return breaker;
  }

  state(name: string): CircuitState {
    return this.breakers.get(name)?.state ?? 'CLOSED';
  }

  snapshot(): CircuitSnapshot[] {
    return [...this.breakers.values()].map((b) => b.snapshot());
  }
}
