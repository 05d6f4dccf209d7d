/**
 * Anthropic Client Wrapper
 *
 * Sends one prompt to the Messages API and returns the reply text. The
 * caller's AbortSignal and timeout are passed to the SDK, and SDK retries
 * are off: the quiz round owns the retry policy (one general fallback).
 *
 * Usage:
 * ```typescript
 * const client = new AnthropicClient();
 * const response = await client.complete(
 *   { prompt: buildSyllabusGenerationPrompt(params) },
 *   { signal, timeoutMs: 30_000 }
 * );
 * if (response.truncated) console.warn('reply hit the token limit');
 * ```
 */

import Anthropic, {
  APIError,
  APIConnectionError,
  APIConnectionTimeoutError,
  APIUserAbortError,
  AuthenticationError,
  RateLimitError,
  BadRequestError,
  InternalServerError,
} from '@anthropic-ai/sdk';
import { config as appConfig, getAnthropicApiKey } from '../config';
import {
  LLMError,
  type CompletionRequest,
  type LLMClientConfig,
  type LLMErrorType,
  type LLMResponse,
  type RequestOptions,
} from './types';

const DEFAULT_TEMPERATURE = 0.4;

export class AnthropicClient {
  private readonly client: Anthropic;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;

  /**
   * @throws LLMError ('authentication') when no API key is configured
   */
  constructor(config: LLMClientConfig = {}) {
    const apiKey = config.apiKey ?? getAnthropicApiKey();
    if (!apiKey) {
      throw new LLMError(
        'ANTHROPIC_API_KEY is not set. Quiz and syllabus generation need it; ' +
          'reports, grading and explicit syllabi work without it.',
        'authentication'
      );
    }

    this.client = new Anthropic({ apiKey });
    this.model = config.model ?? appConfig.anthropic.model;
    this.maxTokens = config.maxTokens ?? appConfig.anthropic.maxTokens;
    this.temperature = config.temperature ?? DEFAULT_TEMPERATURE;
  }

  /**
   * @throws LLMError on any API failure, 'cancelled' when the signal aborts
   */
  async complete(request: CompletionRequest, options: RequestOptions = {}): Promise<LLMResponse> {
    try {
      const response = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: request.maxTokens ?? this.maxTokens,
          temperature: request.temperature ?? this.temperature,
          system: request.system,
          messages: [{ role: 'user', content: request.prompt }],
        },
        {
          signal: options.signal,
          timeout: options.timeoutMs,
          maxRetries: 0,
        }
      );

      return {
        text: response.content
          .filter((block): block is Anthropic.Messages.TextBlock => block.type === 'text')
          .map((block) => block.text)
          .join(''),
        truncated: response.stop_reason === 'max_tokens',
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
      };
    } catch (error) {
      throw toLLMError(error);
    }
  }
}

function toLLMError(error: unknown): LLMError {
  if (error instanceof APIUserAbortError) {
    return new LLMError('Generation request was cancelled.', 'cancelled', error);
  }
  // APIConnectionTimeoutError extends APIConnectionError
  if (error instanceof APIConnectionTimeoutError) {
    return new LLMError('Generation request timed out.', 'timeout', error);
  }
  if (error instanceof APIConnectionError) {
    return new LLMError('Could not reach the Anthropic API.', 'network', error);
  }
  if (error instanceof APIError) {
    return new LLMError(error.message, errorTypeOf(error), error);
  }
  const message = error instanceof Error ? error.message : 'Unknown error occurred';
  return new LLMError(message, 'unknown', error);
}

function errorTypeOf(error: APIError): LLMErrorType {
  if (error instanceof AuthenticationError) return 'authentication';
  if (error instanceof RateLimitError) return 'rate_limit';
  if (error instanceof BadRequestError) return 'invalid_request';
  if (error instanceof InternalServerError) return 'server_error';
  return 'unknown';
}
