import { z } from 'zod';
import { CITATION_STYLES, STOP_WORDS } from '../config/search/constants';
import { SEARCH_RULES } from '../config/search/validationRules';
import { ValidationError } from '../lib/errors';
import type { Query } from '../types';

export interface QueryDefaults {
  maxResults: number;
  minRelevance: number;
}

export const searchBodySchema = z.object({
  query: z.string().trim().min(SEARCH_RULES.queryMinLength).max(SEARCH_RULES.queryMaxLength),
  context: z.string().trim().max(SEARCH_RULES.contextMaxLength).nullish(),
  max_results: z.number().int().min(SEARCH_RULES.maxResultsMin).max(SEARCH_RULES.maxResultsMax).optional(),
  citation_style: z.enum(CITATION_STYLES).optional(),
  filter: z.boolean().optional(),
  min_relevance: z.number().min(SEARCH_RULES.minRelevanceMin).max(SEARCH_RULES.minRelevanceMax).optional(),
  include_context: z.boolean().optional()
});

export function contentTerms(text: string): string[] {
  const tokens = text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
  return tokens.filter((t) => !STOP_WORDS.has(t));
}

/** Checks a Query built anywhere in the code base, not only from HTTP input. */
export function assertValidQuery(query: Query): void {
  const text = query.query.trim();
  if (text.length < SEARCH_RULES.queryMinLength || text.length > SEARCH_RULES.queryMaxLength) {
    throw new ValidationError(
      `query must be between ${SEARCH_RULES.queryMinLength} and ${SEARCH_RULES.queryMaxLength} characters`,
      { field: 'query' }
    );
  }
  if (contentTerms(text).length === 0) {
    throw new ValidationError('query must contain at least one meaningful term', { field: 'query' });
  }
  if (query.context !== null && query.context.length > SEARCH_RULES.contextMaxLength) {
    throw new ValidationError(`context must be at most ${SEARCH_RULES.contextMaxLength} characters`, {
      field: 'context'
    });
  }
  if (
    !Number.isInteger(query.maxResults) ||
    query.maxResults < SEARCH_RULES.maxResultsMin ||
    query.maxResults > SEARCH_RULES.maxResultsMax
  ) {
    throw new ValidationError(
      `max_results must be an integer between ${SEARCH_RULES.maxResultsMin} and ${SEARCH_RULES.maxResultsMax}`,
      { field: 'max_results' }
    );
  }
  if (
    !Number.isFinite(query.minRelevance) ||
    query.minRelevance < SEARCH_RULES.minRelevanceMin ||
    query.minRelevance > SEARCH_RULES.minRelevanceMax
  ) {
    throw new ValidationError('min_relevance must be between 0 and 1', { field: 'min_relevance' });
  }
  if (!CITATION_STYLES.includes(query.citationStyle)) {
    throw new ValidationError(`citation_style must be one of ${CITATION_STYLES.join(', ')}`, {
      field: 'citation_style'
    });
  }
}

/** Turns an HTTP body into a validated Query, applying configured defaults. */
export function parseSearchBody(body: unknown, defaults: QueryDefaults): Query {
  const parsed = searchBodySchema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError('Invalid search request', parsed.error.flatten());
  }
  const payload = parsed.data;
  const query: Query = {
    query: payload.query,
    context: payload.context ? payload.context : null,
    maxResults: payload.max_results ?? defaults.maxResults,
    citationStyle: payload.citation_style ?? 'APA',
    filterEnabled: payload.filter ?? true,
    minRelevance: payload.min_relevance ?? defaults.minRelevance,
    includeContext: payload.include_context ?? true
  };
  assertValidQuery(query);
  return query;
}
