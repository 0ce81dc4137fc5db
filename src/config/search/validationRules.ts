import { SEARCH_LIMITS, SEARCH_VALIDATION } from './constants';

export const SEARCH_RULES = {
  queryMinLength: 1,
  queryMaxLength: SEARCH_VALIDATION.queryMaxLength,
  contextMaxLength: SEARCH_VALIDATION.contextMaxLength,
  maxResultsMin: 1,
  maxResultsMax: SEARCH_LIMITS.maxResults,
  minRelevanceMin: 0,
  minRelevanceMax: 1
} as const;
