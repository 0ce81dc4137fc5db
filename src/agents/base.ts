import type { z } from 'zod';
import { MalformedAgentOutputError } from '../lib/errors';
import { moduleLogger, type Logger } from '../lib/logger';
import type { GenerativeClient } from '../services/generativeClient';
import type { AgentStage } from '../types';

export interface GenerationSettings {
  temperature: number;
  maxOutputTokens: number;
}

/** Removes a surrounding Markdown code fence, which models often add around JSON. */
export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith('```')) return trimmed;
  return trimmed
    .split('\n')
    .filter((line) => !line.trim().startsWith('```'))
    .join('\n')
    .trim();
}

/**
 * Shared plumbing for the three agents. An agent issues exactly one
 * generative request per invocation and keeps no state between calls.
 */
export abstract class BaseAgent {
  protected readonly log: Logger;

  protected constructor(
    readonly stage: AgentStage,
    protected readonly client: GenerativeClient,
    protected readonly settings: GenerationSettings
  ) {
    this.log = moduleLogger(`${stage}-agent`);
  }

  protected generate(prompt: string, signal?: AbortSignal): Promise<string> {
    return this.client.complete({ prompt, ...this.settings }, signal);
  }

  protected parseJson<T>(raw: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
    let data: unknown;
    try {
      data = JSON.parse(stripCodeFences(raw));
    } catch {
      throw new MalformedAgentOutputError(`${this.stage} agent returned non-JSON output`, this.stage, raw.slice(0, 200));
    }
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new MalformedAgentOutputError(
        `${this.stage} agent output has the wrong shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
        this.stage,
        raw.slice(0, 200)
      );
    }
    return parsed.data;
  }
}
