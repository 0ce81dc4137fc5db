import { z } from 'zod';
import { CITATION_STYLES } from '../config/search/constants';
import { SEARCH_LOG_MEMORY_SIZE } from '../config/system/constants';
import type { Database } from '../db/db';
import type { CitationStyle, DegradedMode } from '../types';

export interface SearchLogEntry {
  query: string;
  resultsCount: number;
  durationMs: number;
  degradedMode: DegradedMode;
  citationStyle: CitationStyle;
}

export interface SearchLogRecord extends SearchLogEntry {
  id: number;
  createdAt: string;
}

export interface SearchLogStore {
  readonly kind: 'postgres' | 'memory';
  record(entry: SearchLogEntry): Promise<void>;
  /** Newest first. */
  recent(limit: number): Promise<SearchLogRecord[]>;
}

// BIGSERIAL ids arrive as strings from pg.
const searchLogRowSchema = z.object({
  id: z.coerce.number(),
  query: z.string(),
  results_count: z.coerce.number(),
  duration_ms: z.coerce.number(),
  degraded_mode: z.enum(['NONE', 'NO_AGENTS', 'SEARCH_ONLY']),
  citation_style: z.enum(CITATION_STYLES),
  created_at: z.union([z.date(), z.string()]).transform((value) => new Date(value).toISOString())
});

export class PgSearchLogStore implements SearchLogStore {
  readonly kind = 'postgres';

  constructor(private readonly db: Database) {}

  async record(entry: SearchLogEntry): Promise<void> {
    await this.db.query(
      `
      INSERT INTO search_logs (query, results_count, duration_ms, degraded_mode, citation_style)
      VALUES ($1, $2, $3, $4, $5);
      `,
      [entry.query, entry.resultsCount, Math.round(entry.durationMs), entry.degradedMode, entry.citationStyle]
    );
  }

  async recent(limit: number): Promise<SearchLogRecord[]> {
    const { rows } = await this.db.query(
      `
      SELECT id, query, results_count, duration_ms, degraded_mode, citation_style, created_at
      FROM search_logs
      ORDER BY created_at DESC
      LIMIT $1;
      `,
      [limit]
    );
    return z
      .array(searchLogRowSchema)
      .parse(rows)
      .map((row) => ({
        id: row.id,
        query: row.query,
        resultsCount: row.results_count,
        durationMs: row.duration_ms,
        degradedMode: row.degraded_mode,
        citationStyle: row.citation_style,
        createdAt: row.created_at
      }));
  }
}

/** Bounded ring used when no database is configured. */
export class MemorySearchLogStore implements SearchLogStore {
  readonly kind = 'memory';
  private readonly records: SearchLogRecord[] = [];
  private nextId = 1;

  constructor(
    private readonly capacity = SEARCH_LOG_MEMORY_SIZE,
    private readonly now: () => number = Date.now
  ) {}

  async record(entry: SearchLogEntry): Promise<void> {
    this.records.push({ ...entry, id: this.nextId++, createdAt: new Date(this.now()).toISOString() });
    if (this.records.length > this.capacity) {
      this.records.splice(0, this.records.length - this.capacity);
    }
  }

  async recent(limit: number): Promise<SearchLogRecord[]> {
    return this.records.slice(-limit).reverse();
  }
}
