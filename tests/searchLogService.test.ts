import { describe, expect, it } from 'vitest';
import type { Database } from '../src/db/db';
import { MemorySearchLogStore, PgSearchLogStore, type SearchLogEntry } from '../src/services/searchLogService';
import { ManualClock } from './fixtures';

class FakeDatabase implements Database {
  readonly statements: Array<{ text: string; params?: unknown[] }> = [];

  constructor(private readonly rows: unknown[] = []) {}

  async query(text: string, params?: unknown[]): Promise<{ rows: unknown[] }> {
    this.statements.push({ text, params });
    return { rows: this.rows };
  }

  async close(): Promise<void> {}
}

const entry = (query: string): SearchLogEntry => ({
  query,
  resultsCount: 3,
  durationMs: 41.6,
  degradedMode: 'NONE',
  citationStyle: 'APA'
});

describe('PgSearchLogStore', () => {
  it('inserts one row per search', async () => {
    const db = new FakeDatabase();
    await new PgSearchLogStore(db).record(entry('bail reform'));

    expect(db.statements[0].text).toContain('INSERT INTO search_logs');
    expect(db.statements[0].params).toEqual(['bail reform', 3, 42, 'NONE', 'APA']);
  });

  it('maps stored rows to records', async () => {
    const db = new FakeDatabase([
      {
        id: '7',
        query: 'bail reform',
        results_count: 3,
        duration_ms: 42,
        degraded_mode: 'NO_AGENTS',
        citation_style: 'MLA',
        created_at: new Date('2024-03-01T12:00:00.000Z')
      }
    ]);

    const records = await new PgSearchLogStore(db).recent(5);

    expect(db.statements[0].params).toEqual([5]);
    expect(records).toEqual([
      {
        id: 7,
        query: 'bail reform',
        resultsCount: 3,
        durationMs: 42,
        degradedMode: 'NO_AGENTS',
        citationStyle: 'MLA',
        createdAt: '2024-03-01T12:00:00.000Z'
      }
    ]);
  });

  it('rejects rows it does not understand', async () => {
    const db = new FakeDatabase([{ id: 1, query: 'q', degraded_mode: 'SOMETIMES' }]);
    await expect(new PgSearchLogStore(db).recent(5)).rejects.toThrow();
  });
});

describe('MemorySearchLogStore', () => {
  it('returns the newest records first', async () => {
    const clock = new ManualClock(Date.UTC(2024, 0, 1));
    const store = new MemorySearchLogStore(10, clock.now);
    await store.record(entry('first'));
    clock.advance(1_000);
    await store.record(entry('second'));

    const records = await store.recent(10);

    expect(records.map((r) => [r.id, r.query, r.createdAt])).toEqual([
      [2, 'second', '2024-01-01T00:00:01.000Z'],
      [1, 'first', '2024-01-01T00:00:00.000Z']
    ]);
  });

  it('keeps only the newest entries up to its capacity', async () => {
    const store = new MemorySearchLogStore(2);
    for (const query of ['a', 'b', 'c']) await store.record(entry(query));

    expect((await store.recent(10)).map((r) => r.query)).toEqual(['c', 'b']);
    expect((await store.recent(1)).map((r) => r.query)).toEqual(['c']);
  });
});
