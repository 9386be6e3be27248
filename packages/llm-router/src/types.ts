/**
 * @fileoverview TypeScript types for the LLM completion layer
 * @description Message, option, response and error shapes shared by providers
 */

/**
 * Providers reachable through the OpenAI-compatible chat completions API
 */
export type LLMProvider = 'groq' | 'openai';

/**
 * Groq-hosted models known to work for classification prompts
 */
export type GroqModel =
  | 'llama-3.1-8b-instant'     // Fast + cheap, default
  | 'llama-3.3-70b-versatile'  // Better reasoning
  | 'gemma2-9b-it'
  ;

/**
 * Any model id; unknown ids are passed through and rejected by the provider
 */
export type LLMModel = GroqModel | (string & {});

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

export interface LLMCallOptions {
  /** Maximum tokens to generate */
  maxTokens?: number;
  /** Temperature for randomness (0-1) */
  temperature?: number;
  /** Force a specific model for this call */
  modelOverride?: LLMModel;
}

export interface LLMUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface LLMResponse {
  content: string;
  provider: LLMProvider;
  model: LLMModel;
  usage: LLMUsage;
  latencyMs: number;
  timestamp: string;
}

/**
 * Configuration for an OpenAI-compatible provider
 */
export interface ProviderConfig {
  provider: LLMProvider;
  apiKey: string;
  baseURL?: string;
  defaultModel: LLMModel;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
}

/**
 * Anything that can turn a list of messages into a completion
 */
export interface CompletionProvider {
  readonly provider: LLMProvider;
  readonly defaultModel: LLMModel;
  complete(messages: ChatMessage[], options?: LLMCallOptions): Promise<LLMResponse>;
}

export enum LLMErrorType {
  RATE_LIMIT = 'rate_limit',
  API_ERROR = 'api_error',
  AUTH_ERROR = 'auth_error',
  TIMEOUT = 'timeout',
  INVALID_REQUEST = 'invalid_request',
  INSUFFICIENT_QUOTA = 'insufficient_quota',
  MODEL_UNAVAILABLE = 'model_unavailable',
  NETWORK_ERROR = 'network_error',
  EMPTY_RESPONSE = 'empty_response',
}

export class LLMError extends Error {
  readonly provider: LLMProvider;
  readonly model: LLMModel;
  readonly errorType: LLMErrorType;
  readonly retryable: boolean;
  readonly status?: number;
  readonly originalError?: unknown;

  constructor(
    message: string,
    details: {
      provider: LLMProvider;
      model: LLMModel;
      errorType: LLMErrorType;
      retryable?: boolean;
      status?: number;
      originalError?: unknown;
    }
  ) {
    super(message);
    this.name = 'LLMError';
    this.provider = details.provider;
    this.model = details.model;
    this.errorType = details.errorType;
    this.retryable = details.retryable ?? false;
    this.status = details.status;
    this.originalError = details.originalError;
  }
}
