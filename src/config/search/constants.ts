export const SEARCH_LIMITS = {
  maxResults: 50,
  candidateMultiplier: 2
};

export const SEARCH_VALIDATION = {
  queryMaxLength: 1000,
  contextMaxLength: 2000
};

export const CITATION_STYLES = ['APA', 'MLA', 'Chicago', 'Bluebook'] as const;

export const DEDUPE = {
  maxChunksPerSource: 3
};

export const PREVIEW_LENGTH = 200;

export const RESULT_MESSAGES = {
  noResults: 'No results found.',
  nothingRelevant: 'No relevant citations found after filtering. Try broadening your query.',
  noCitations: 'No citations found.'
};

// Closed-class English words; a query made only of these carries no searchable content.
export const STOP_WORDS: ReadonlySet<string> = new Set([
  'a', 'an', 'the', 'and', 'or', 'but', 'nor', 'of', 'to', 'in', 'on', 'at', 'by', 'for',
  'with', 'from', 'as', 'is', 'are', 'was', 'were', 'be', 'been', 'it', 'its', 'this',
  'that', 'these', 'those', 'i', 'me', 'my', 'we', 'you', 'he', 'she', 'they', 'them',
  'do', 'does', 'did', 'so', 'if', 'then', 'than', 'not', 'no'
]);
