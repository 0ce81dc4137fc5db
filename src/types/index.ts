import { CITATION_STYLES } from '../config/search/constants';

export type CitationStyle = (typeof CITATION_STYLES)[number];
export type SearchMode = 'chunks' | 'summaries' | 'both';
export type DegradedMode = 'NONE' | 'NO_AGENTS' | 'SEARCH_ONLY';
export type AgentStage = 'filter' | 'rank' | 'format';
export type Dependency = 'search' | AgentStage;

export interface Query {
  readonly query: string;
  readonly context: string | null;
  readonly maxResults: number;
  readonly citationStyle: CitationStyle;
  readonly filterEnabled: boolean;
  readonly minRelevance: number;
  readonly includeContext: boolean;
}

export interface Source {
  readonly title: string;
  readonly authors: readonly string[];
  readonly year: number | null;
  readonly citation: string;
  readonly itemKey?: string;
}

export interface Chunk {
  readonly id: string;
  readonly text: string;
  readonly source: Source;
  readonly similarityScore: number;
  relevanceScore: number;
  agentFiltered: boolean;
  verified: boolean;
  filterReasoning?: string;
}

export interface RankedChunk extends Chunk {
  rank: number;
}

export interface AgentVerdict {
  relevant: boolean;
  confidence: number;
  reasoning: string;
  verified: boolean;
}

export interface SearchResult {
  query: string;
  resultsCount: number;
  chunks: RankedChunk[];
  formattedOutput: string;
  processingTimeMs: number;
  degradedMode: DegradedMode;
  diagnostics: string[];
}
