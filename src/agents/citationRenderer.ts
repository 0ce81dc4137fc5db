import { PREVIEW_LENGTH, RESULT_MESSAGES } from '../config/search/constants';
import { SERVICE_NAME } from '../config/system/constants';
import type { RankedChunk, Source } from '../types';

const RULE = '━'.repeat(48);

export function wrapOutput(content: string, count: number): string {
  return [
    RULE,
    `CITATION RESULTS (${count} ${count === 1 ? 'citation' : 'citations'})`,
    RULE,
    '',
    content.trim(),
    '',
    RULE,
    `Generated by ${SERVICE_NAME}`,
    RULE
  ].join('\n');
}

export function citationFor(source: Source): string {
  if (source.citation.trim()) return source.citation.trim();
  return `${source.title} (${source.year ?? 'n.d.'})`;
}

export function excerpt(text: string, maxLength = PREVIEW_LENGTH): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > maxLength ? `${flat.slice(0, maxLength - 1).trimEnd()}…` : flat;
}

export function renderLine(chunk: RankedChunk, includeContext: boolean): string {
  const parts = [`[${chunk.rank}] ${citationFor(chunk.source)}`, `relevance ${chunk.relevanceScore.toFixed(2)}`];
  if (includeContext) {
    parts.push(`"${excerpt(chunk.text)}"`);
  }
  return parts.join(' | ');
}

/**
 * Template rendering used whenever the format agent is skipped or fails.
 * One line per chunk, in rank order.
 */
export function renderCitations(chunks: readonly RankedChunk[], includeContext: boolean): string {
  if (chunks.length === 0) return RESULT_MESSAGES.noCitations;
  const lines = chunks.map((chunk) => renderLine(chunk, includeContext));
  return wrapOutput(lines.join('\n'), chunks.length);
}
