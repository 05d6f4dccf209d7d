/**
 * LLM Types
 *
 * Request, response and error types for the completion client. Every
 * generation in this project is a single prompt answered with one JSON
 * document, so there is no conversation state here.
 */

/**
 * Client-wide settings. Unset fields fall back to the environment
 * configuration (ANTHROPIC_API_KEY, ANTHROPIC_MODEL, ANTHROPIC_MAX_TOKENS).
 */
export interface LLMClientConfig {
  apiKey?: string;
  model?: string;
  maxTokens?: number;
  /** Defaults to 0.4; output is structured */
  temperature?: number;
}

/**
 * One completion request.
 */
export interface CompletionRequest {
  prompt: string;
  /** Optional system instruction sent alongside the prompt */
  system?: string;
  /** Overrides the client's token limit for this request */
  maxTokens?: number;
  temperature?: number;
}

/**
 * Per-request transport options.
 */
export interface RequestOptions {
  /** Aborting this signal cancels the in-flight request */
  signal?: AbortSignal;
  /** Upper bound for this request in milliseconds */
  timeoutMs?: number;
}

export interface LLMResponse {
  /** Concatenated text blocks of the reply */
  text: string;
  /** The reply stopped at the token limit; any JSON in it is probably cut off */
  truncated: boolean;
  usage: {
    inputTokens: number;
    outputTokens: number;
  } | null;
}

export type LLMErrorType =
  | 'authentication' // missing or rejected API key
  | 'rate_limit'
  | 'invalid_request'
  | 'server_error'
  | 'network'
  | 'timeout'
  | 'cancelled' // caller aborted
  | 'unknown';

/**
 * Error raised by the completion client, tagged with its failure mode.
 */
export class LLMError extends Error {
  readonly type: LLMErrorType;

  constructor(message: string, type: LLMErrorType, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'LLMError';
    this.type = type;
  }
}
