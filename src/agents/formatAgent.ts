import { RESULT_MESSAGES } from '../config/search/constants';
import type { GenerativeClient } from '../services/generativeClient';
import type { CitationStyle, RankedChunk } from '../types';
import { BaseAgent } from './base';
import { renderCitations, wrapOutput } from './citationRenderer';

export interface FormatOutcome {
  text: string;
  fallback: boolean;
}

export function buildFormatPrompt(chunks: readonly RankedChunk[], style: CitationStyle, includeContext: boolean): string {
  const payload = chunks.map((chunk) => ({
    rank: chunk.rank,
    text: chunk.text,
    source: {
      title: chunk.source.title,
      authors: chunk.source.authors,
      year: chunk.source.year,
      citation: chunk.source.citation
    },
    relevance: Number(chunk.relevanceScore.toFixed(2))
  }));
  return [
    'You format research passages as citations ready to paste into a document.',
    '',
    `Citation style: ${style}`,
    `Include quoted excerpts: ${includeContext ? 'yes' : 'no'}`,
    '',
    'Passages (already ranked):',
    JSON.stringify(payload, null, 2),
    '',
    `Keep the given rank order, use correct ${style} formatting, group passages from the same work,`,
    'show relevance with stars (★★★★★ high to ★☆☆☆☆ low) and separate entries with a line of ─ characters.',
    'Output plain text only.'
  ].join('\n');
}

export class FormatAgent extends BaseAgent {
  constructor(client: GenerativeClient) {
    super('format', client, { temperature: 0.3, maxOutputTokens: 2000 });
  }

  async format(
    chunks: readonly RankedChunk[],
    style: CitationStyle,
    includeContext: boolean,
    signal?: AbortSignal
  ): Promise<FormatOutcome> {
    if (chunks.length === 0) {
      return { text: RESULT_MESSAGES.noCitations, fallback: false };
    }

    const raw = await this.generate(buildFormatPrompt(chunks, style, includeContext), signal);
    const text = raw.trim();
    if (!text) {
      this.log.warn({ count: chunks.length }, 'format agent returned empty output; using template rendering');
      return { text: renderCitations(chunks, includeContext), fallback: true };
    }
    return { text: wrapOutput(text, chunks.length), fallback: false };
  }
}
