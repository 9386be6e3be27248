/**
 * @fileoverview LLM Router Module
 * @description OpenAI-compatible completion provider and typed LLM errors
 */

export * from './types';
export {
  OpenAICompatibleProvider,
  GROQ_BASE_URL,
  CompletionBackend,
  CompletionPayload,
  CompletionRequest,
} from './providers/openai';
