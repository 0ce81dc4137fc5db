import { describe, expect, it } from 'vitest';
import {
  CircuitOpenError,
  DeadlineExceededError,
  UpstreamPermanentError,
  UpstreamTransientError
} from '../src/lib/errors';
import { ResilienceController, type ResilienceOptions } from '../src/resilience/resilienceController';
import { ManualClock, noSleep } from './fixtures';

function controller(overrides: Partial<ResilienceOptions> = {}): ResilienceController {
  return new ResilienceController({
    retry: { attempts: 3, baseDelayMs: 1, maxDelayMs: 1 },
    breaker: { failureThreshold: 2, windowMs: 60_000, cooldownMs: 1_000 },
    defaultTimeoutMs: 1_000,
    sleep: noSleep,
    ...overrides
  });
}

const never = () => new Promise<never>(() => {});

describe('ResilienceController', () => {
  it('passes an abort signal and returns the result', async () => {
    const rc = controller();
    let received: AbortSignal | undefined;

    const value = await rc.execute('search', async (signal) => {
      received = signal;
      return 42;
    });

    expect(value).toBe(42);
    expect(received?.aborted).toBe(false);
    expect(rc.state('search')).toBe('CLOSED');
  });

  it('retries transient failures inside one breaker call', async () => {
    const rc = controller();
    let calls = 0;

    const value = await rc.execute('rank', async () => {
      calls += 1;
      if (calls < 3) throw new UpstreamTransientError('503', 'rank', 503);
      return 'ranked';
    });

    expect(value).toBe('ranked');
    expect(calls).toBe(3);
    expect(rc.snapshot().find((s) => s.name === 'rank')?.consecutiveFailures).toBe(0);
  });

  it('counts an exhausted call as a single failure', async () => {
    const rc = controller();
    let calls = 0;

    await expect(
      rc.execute('filter', async () => {
        calls += 1;
        throw new UpstreamTransientError('timeout', 'filter');
      })
    ).rejects.toBeInstanceOf(UpstreamTransientError);

    expect(calls).toBe(3);
    expect(rc.snapshot().find((s) => s.name === 'filter')?.consecutiveFailures).toBe(1);
  });

  it('fails fast without invoking the dependency once the breaker is open', async () => {
    const rc = controller({ retry: { attempts: 1, baseDelayMs: 1, maxDelayMs: 1 } });
    let calls = 0;
    const failing = async () => {
      calls += 1;
      throw new UpstreamPermanentError('400', 'format', 400);
    };

    await expect(rc.execute('format', failing)).rejects.toBeInstanceOf(UpstreamPermanentError);
    await expect(rc.execute('format', failing)).rejects.toBeInstanceOf(UpstreamPermanentError);
    await expect(rc.execute('format', failing)).rejects.toBeInstanceOf(CircuitOpenError);

    expect(calls).toBe(2);
    expect(rc.states()).toEqual({ search: 'CLOSED', filter: 'CLOSED', rank: 'CLOSED', format: 'OPEN' });
  });

  it('admits exactly one trial call after the cooldown', async () => {
    const clock = new ManualClock();
    const rc = controller({
      now: clock.now,
      retry: { attempts: 1, baseDelayMs: 1, maxDelayMs: 1 },
      breaker: { failureThreshold: 1, windowMs: 60_000, cooldownMs: 1_000 }
    });
    await expect(
      rc.execute('search', async () => {
        throw new UpstreamTransientError('down', 'search');
      })
    ).rejects.toBeInstanceOf(UpstreamTransientError);
    expect(rc.state('search')).toBe('OPEN');

    clock.advance(1_000);
    let release: (value: string) => void = () => {};
    const trial = rc.execute('search', () => new Promise<string>((resolve) => (release = resolve)));
    await expect(rc.execute('search', async () => 'second')).rejects.toBeInstanceOf(CircuitOpenError);

    release('recovered');
    await expect(trial).resolves.toBe('recovered');
    expect(rc.state('search')).toBe('CLOSED');
  });

  it('turns an attempt timeout into a transient error and aborts the call', async () => {
    const rc = controller({ retry: { attempts: 1, baseDelayMs: 1, maxDelayMs: 1 } });
    let received: AbortSignal | undefined;

    await expect(
      rc.execute(
        'rank',
        (signal) => {
          received = signal;
          return never();
        },
        { timeoutMs: 10 }
      )
    ).rejects.toThrow('rank timed out after 10ms');
    expect(received?.aborted).toBe(true);
  });

  it('raises DeadlineExceeded without retrying when the deadline is the tighter bound', async () => {
    const rc = controller();
    let calls = 0;

    await expect(
      rc.execute(
        'filter',
        () => {
          calls += 1;
          return never();
        },
        { timeoutMs: 1_000, deadline: Date.now() + 20 }
      )
    ).rejects.toBeInstanceOf(DeadlineExceededError);
    expect(calls).toBe(1);
  });

  it('rejects a call whose deadline already passed and counts it as a failure', async () => {
    const clock = new ManualClock();
    const rc = controller({ now: clock.now });
    let calls = 0;

    await expect(
      rc.execute(
        'filter',
        async () => {
          calls += 1;
          return 'late';
        },
        { deadline: clock.current - 1 }
      )
    ).rejects.toBeInstanceOf(DeadlineExceededError);

    expect(calls).toBe(0);
    expect(rc.snapshot().find((s) => s.name === 'filter')?.consecutiveFailures).toBe(1);
  });

  it('wrap binds a dependency to a reusable function', async () => {
    const rc = controller();
    const lookup = rc.wrap('search', async (_signal: AbortSignal, term: string) => term.toUpperCase());

    await expect(lookup('bail')).resolves.toBe('BAIL');
  });

  it('snapshots every dependency', () => {
    expect(controller().snapshot().map((s) => s.name)).toEqual(['search', 'filter', 'rank', 'format']);
  });
});
