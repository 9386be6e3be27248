/**
 * @fileoverview OpenAI-compatible chat completions provider
 * @description Calls Groq (or OpenAI itself) through the official openai client and converts failures to LLMError
 */

import OpenAI from 'openai';
import {
  ChatMessage,
  CompletionProvider,
  LLMCallOptions,
  LLMError,
  LLMErrorType,
  LLMModel,
  LLMProvider,
  LLMResponse,
  ProviderConfig,
} from '../types';

export const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';

const DEFAULT_TIMEOUT_MS = 15_000;

/**
 * Request body accepted by a completion backend
 */
export interface CompletionRequest {
  model: string;
  messages: OpenAI.ChatCompletionMessageParam[];
  temperature: number;
  max_tokens: number;
}

/**
 * The subset of a chat completion the provider reads
 */
export interface CompletionPayload {
  model: string;
  choices: Array<{ message: { content: string | null } }>;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  } | null;
}

/**
 * Transport for chat completions. Defaults to `client.chat.completions.create`.
 */
export interface CompletionBackend {
  create(request: CompletionRequest): Promise<CompletionPayload>;
}

/**
 * OpenAI-compatible provider implementation
 *
 * One request per call: the client's own retries are disabled so a failing
 * model surfaces immediately and the caller can fall back.
 */
export class OpenAICompatibleProvider implements CompletionProvider {
  readonly provider: LLMProvider;
  readonly defaultModel: LLMModel;
  private backend: CompletionBackend;

  constructor(config: ProviderConfig, backend?: CompletionBackend) {
    if (!config.apiKey && !backend) {
      throw new Error(`API key is required for provider ${config.provider}`);
    }

    this.provider = config.provider;
    this.defaultModel = config.defaultModel;

    if (backend) {
      this.backend = backend;
    } else {
      const client = new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseURL ?? (config.provider === 'groq' ? GROQ_BASE_URL : undefined),
        timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        maxRetries: 0,
      });
      this.backend = {
        create: (request) => client.chat.completions.create(request),
      };
    }
  }

  /**
   * Send a chat completion request
   *
   * @throws LLMError on transport failures and on an empty answer
   */
  async complete(messages: ChatMessage[], options: LLMCallOptions = {}): Promise<LLMResponse> {
    const model = options.modelOverride ?? this.defaultModel;
    const startTime = Date.now();

    let payload: CompletionPayload;
    try {
      payload = await this.backend.create({
        model,
        messages: messages.map(toMessageParam),
        temperature: options.temperature ?? 0.2,
        max_tokens: options.maxTokens ?? 1000,
      });
    } catch (error) {
      const latencyMs = Date.now() - startTime;
      console.error(`[llm] ${this.provider}/${model} call failed (${latencyMs}ms):`, describe(error));
      throw this.handleError(error, model);
    }

    const latencyMs = Date.now() - startTime;
    const content = payload.choices[0]?.message.content?.trim() ?? '';
    if (!content) {
      throw new LLMError(`${this.provider} returned no completion content`, {
        provider: this.provider,
        model,
        errorType: LLMErrorType.EMPTY_RESPONSE,
      });
    }

    return {
      content,
      provider: this.provider,
      model: payload.model || model,
      usage: {
        inputTokens: payload.usage?.prompt_tokens ?? 0,
        outputTokens: payload.usage?.completion_tokens ?? 0,
        totalTokens: payload.usage?.total_tokens ?? 0,
      },
      latencyMs,
      timestamp: new Date().toISOString(),
    };
  }

  /**
   * Handle API errors and convert to LLMError
   */
  private handleError(error: unknown, model: LLMModel): LLMError {
    const { status, code, message } = errorFields(error);
    let errorType = LLMErrorType.API_ERROR;
    let retryable = false;

    if (status !== undefined) {
      switch (status) {
        case 400:
          errorType = LLMErrorType.INVALID_REQUEST;
          break;
        case 401:
        case 403:
          errorType = LLMErrorType.AUTH_ERROR;
          break;
        case 404:
          errorType = LLMErrorType.MODEL_UNAVAILABLE;
          break;
        case 429:
          errorType = LLMErrorType.RATE_LIMIT;
          retryable = true;
          break;
        case 500:
        case 502:
        case 503:
        case 504:
          retryable = true;
          break;
      }
    }

    switch (code) {
      case 'insufficient_quota':
        errorType = LLMErrorType.INSUFFICIENT_QUOTA;
        retryable = false;
        break;
      case 'model_not_found':
      case 'model_decommissioned':
        errorType = LLMErrorType.MODEL_UNAVAILABLE;
        retryable = false;
        break;
      case 'rate_limit_exceeded':
        errorType = LLMErrorType.RATE_LIMIT;
        retryable = true;
        break;
    }

    if (error instanceof OpenAI.APIConnectionTimeoutError || code === 'ETIMEDOUT' || /timed? ?out/i.test(message)) {
      errorType = LLMErrorType.TIMEOUT;
      retryable = true;
    } else if (error instanceof OpenAI.APIConnectionError || code === 'ECONNRESET' || code === 'ENOTFOUND' || code === 'ECONNREFUSED') {
      errorType = LLMErrorType.NETWORK_ERROR;
      retryable = true;
    }

    return new LLMError(message || `${this.provider} API error`, {
      provider: this.provider,
      model,
      errorType,
      retryable,
      status,
      originalError: error,
    });
  }
}

function toMessageParam(message: ChatMessage): OpenAI.ChatCompletionMessageParam {
  return message.role === 'system'
    ? { role: 'system', content: message.content }
    : { role: 'user', content: message.content };
}

function errorFields(error: unknown): { status?: number; code?: string; message: string } {
  if (typeof error !== 'object' || error === null) {
    return { message: String(error) };
  }
  const status = 'status' in error && typeof error.status === 'number' ? error.status : undefined;
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  const message = error instanceof Error ? error.message : '';
  return { status, code, message };
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
