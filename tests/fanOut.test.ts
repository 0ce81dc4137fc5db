import { describe, expect, it } from 'vitest';
import { DeadlineExceededError } from '../src/lib/errors';
import { fanOut } from '../src/lib/fanOut';

const wait = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('fanOut', () => {
  it('keeps input order and never exceeds the concurrency bound', async () => {
    let inFlight = 0;
    let peak = 0;

    const outcomes = await fanOut(
      [30, 5, 20, 1, 10],
      async (ms, index) => {
        inFlight += 1;
        peak = Math.max(peak, inFlight);
        await wait(ms);
        inFlight -= 1;
        return index * 10;
      },
      { concurrency: 2, deadline: Date.now() + 5_000 }
    );

    expect(outcomes).toEqual([0, 10, 20, 30, 40].map((value) => ({ ok: true, value })));
    expect(peak).toBe(2);
  });

  it('captures failures per task', async () => {
    const outcomes = await fanOut(
      ['ok', 'boom'],
      async (item) => {
        if (item === 'boom') throw new Error('boom');
        return item;
      },
      { concurrency: 5, deadline: Date.now() + 5_000 }
    );

    expect(outcomes[0]).toEqual({ ok: true, value: 'ok' });
    expect(outcomes[1].ok).toBe(false);
  });

  it('joins at the deadline and reports unfinished tasks as timeouts', async () => {
    const outcomes = await fanOut(
      ['fast', 'stuck'],
      (item) => (item === 'fast' ? Promise.resolve(item) : new Promise<string>(() => {})),
      { concurrency: 5, deadline: Date.now() + 20, onTimeout: () => new DeadlineExceededError('filter') }
    );

    expect(outcomes[0]).toEqual({ ok: true, value: 'fast' });
    const stuck = outcomes[1];
    expect(stuck.ok).toBe(false);
    if (!stuck.ok) expect(stuck.error).toBeInstanceOf(DeadlineExceededError);
  });
});
