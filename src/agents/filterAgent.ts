import { z } from 'zod';
import { MalformedAgentOutputError } from '../lib/errors';
import type { GenerativeClient } from '../services/generativeClient';
import type { AgentVerdict, Chunk } from '../types';
import { BaseAgent } from './base';

const verdictSchema = z.object({
  relevant: z.boolean(),
  confidence: z.coerce.number(),
  reasoning: z.string().optional()
});

export const FALLBACK_CONFIDENCE = 0.5;

export function fallbackVerdict(reason: string): AgentVerdict {
  return { relevant: true, confidence: FALLBACK_CONFIDENCE, reasoning: reason, verified: false };
}

export function buildFilterPrompt(query: string, context: string | null, chunk: Chunk): string {
  const { source } = chunk;
  return [
    "You judge whether a passage is a good citation for a writer's query.",
    '',
    `Query: ${query}`,
    context ? `Context: ${context}` : null,
    '',
    'Passage:',
    chunk.text,
    '',
    `Source: ${source.title} (${source.year ?? 'n.d.'})`,
    '',
    'Consider whether the passage addresses the query directly and with substance,',
    'and whether it would support a claim about the query topic.',
    '',
    'Respond ONLY with JSON of the form:',
    '{"relevant": true, "confidence": 0.95, "reasoning": "brief explanation"}'
  ]
    .filter((line): line is string => line !== null)
    .join('\n');
}

export class FilterAgent extends BaseAgent {
  constructor(client: GenerativeClient) {
    super('filter', client, { temperature: 0.1, maxOutputTokens: 200 });
  }

  /**
   * Judges one chunk. Transport failures propagate; an unusable answer
   * becomes the permissive fallback verdict so no data is lost.
   */
  async evaluate(query: string, context: string | null, chunk: Chunk, signal?: AbortSignal): Promise<AgentVerdict> {
    const raw = await this.generate(buildFilterPrompt(query, context, chunk), signal);
    try {
      const result = this.parseJson(raw, verdictSchema);
      return {
        relevant: result.relevant,
        confidence: Math.max(0, Math.min(1, result.confidence)),
        reasoning: result.reasoning ?? '',
        verified: true
      };
    } catch (err) {
      if (!(err instanceof MalformedAgentOutputError)) throw err;
      this.log.warn({ chunkId: chunk.id, raw: err.raw }, err.message);
      return fallbackVerdict(`Unverified: ${err.message}`);
    }
  }
}
