import { describe, expect, it } from 'vitest';
import { CircuitBreaker, CircuitBreakerRegistry } from '../src/resilience/circuitBreaker';
import { ManualClock } from './fixtures';

function breaker(clock: ManualClock) {
  return new CircuitBreaker('filter', { failureThreshold: 3, windowMs: 10_000, cooldownMs: 5_000, now: clock.now });
}

describe('CircuitBreaker', () => {
  it('opens after the threshold of consecutive failures', () => {
    const clock = new ManualClock();
    const cb = breaker(clock);

    cb.recordFailure(new Error('one'));
    cb.recordFailure(new Error('two'));
    expect(cb.state).toBe('CLOSED');
    cb.recordFailure(new Error('three'));

    expect(cb.state).toBe('OPEN');
    expect(cb.tryAcquire()).toBe(false);
    expect(cb.snapshot().lastError).toBe('three');
  });

  it('a success resets the streak', () => {
    const clock = new ManualClock();
    const cb = breaker(clock);

    cb.recordFailure();
    cb.recordFailure();
    cb.recordSuccess();
    cb.recordFailure();
    cb.recordFailure();

    expect(cb.state).toBe('CLOSED');
    expect(cb.snapshot().consecutiveFailures).toBe(2);
  });

  it('failures spread beyond the window start a new streak', () => {
    const clock = new ManualClock();
    const cb = breaker(clock);

    cb.recordFailure();
    cb.recordFailure();
    clock.advance(10_001);
    cb.recordFailure();

    expect(cb.state).toBe('CLOSED');
    expect(cb.snapshot().consecutiveFailures).toBe(1);
  });

  it('admits exactly one trial after the cooldown', () => {
    const clock = new ManualClock();
    const cb = breaker(clock);
    for (let i = 0; i < 3; i += 1) cb.recordFailure();

    clock.advance(4_999);
    expect(cb.tryAcquire()).toBe(false);

    clock.advance(1);
    expect(cb.state).toBe('HALF_OPEN');
    expect(cb.tryAcquire()).toBe(true);
    expect(cb.tryAcquire()).toBe(false);
  });

  it('closes when the trial succeeds and reopens when it fails', () => {
    const clock = new ManualClock();
    const cb = breaker(clock);
    for (let i = 0; i < 3; i += 1) cb.recordFailure();
    clock.advance(5_000);

    expect(cb.tryAcquire()).toBe(true);
    cb.recordFailure(new Error('still down'));
    expect(cb.state).toBe('OPEN');
    expect(cb.snapshot().openedAt).toBe(clock.current);

    clock.advance(5_000);
    expect(cb.tryAcquire()).toBe(true);
    cb.recordSuccess();
    expect(cb.state).toBe('CLOSED');
    expect(cb.snapshot().consecutiveFailures).toBe(0);
  });

  it('ignores a late success while open', () => {
    const clock = new ManualClock();
    const cb = breaker(clock);
    for (let i = 0; i < 3; i += 1) cb.recordFailure();

    cb.recordSuccess();

    expect(cb.state).toBe('OPEN');
  });
});

describe('CircuitBreakerRegistry', () => {
  it('reports CLOSED for breakers never used and keeps one breaker per name', () => {
    const registry = new CircuitBreakerRegistry({ failureThreshold: 1, windowMs: 1_000, cooldownMs: 1_000 });

    expect(registry.state('rank')).toBe('CLOSED');
    registry.get('rank').recordFailure();

    expect(registry.get('rank')).toBe(registry.get('rank'));
    expect(registry.state('rank')).toBe('OPEN');
    expect(registry.snapshot().map((s) => s.name)).toEqual(['rank']);
  });
});
