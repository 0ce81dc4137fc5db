import OpenAI, { APIConnectionError, APIError, APIUserAbortError } from 'openai';
import { UpstreamPermanentError, UpstreamTransientError, errorMessage } from '../lib/errors';

export interface CompletionRequest {
  prompt: string;
  temperature: number;
  maxOutputTokens: number;
}

/** One stateless text-completion request; no conversation memory is kept between calls. */
export interface GenerativeClient {
  readonly model: string;
  complete(request: CompletionRequest, signal?: AbortSignal): Promise<string>;
}

export interface OpenAIClientOptions {
  apiKey: string;
  model: string;
  baseURL?: string;
  timeoutMs: number;
}

const DEPENDENCY = 'generative';

export function classifyGenerativeError(err: unknown): Error {
  // APIUserAbortError and APIConnectionError both extend APIError; check them first.
  if (err instanceof APIUserAbortError) {
    return new UpstreamTransientError('Generative request aborted', DEPENDENCY);
  }
  if (err instanceof APIConnectionError) {
    return new UpstreamTransientError(`Generative service unreachable: ${err.message}`, DEPENDENCY);
  }
  if (err instanceof APIError) {
    const status = err.status;
    if (status === undefined || status === 429 || status >= 500) {
      return new UpstreamTransientError(`Generative service error (${status ?? 'unknown'})`, DEPENDENCY, status);
    }
    return new UpstreamPermanentError(`Generative service rejected request (${status})`, DEPENDENCY, status);
  }
  return new UpstreamTransientError(`Generative request failed: ${errorMessage(err)}`, DEPENDENCY);
}

/** Chat-completions client for any OpenAI-compatible endpoint. Retries are left to the resilience layer. */
export class OpenAIGenerativeClient implements GenerativeClient {
  readonly model: string;
  private readonly client: OpenAI;

  constructor(options: OpenAIClientOptions) {
    this.model = options.model;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      timeout: options.timeoutMs,
      maxRetries: 0
    });
  }

  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<string> {
    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [{ role: 'user', content: request.prompt }],
          temperature: request.temperature,
          max_tokens: request.maxOutputTokens
        },
        { signal }
      );
      return completion.choices[0]?.message?.content ?? '';
    } catch (err) {
      throw classifyGenerativeError(err);
    }
  }
}
