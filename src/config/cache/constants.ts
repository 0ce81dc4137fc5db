export const CACHE_STAGES = ['search', 'filter', 'rank', 'format', 'response'] as const;

export type CacheStage = (typeof CACHE_STAGES)[number];

export const CACHE_KEY_HASH_LENGTH = 32;
