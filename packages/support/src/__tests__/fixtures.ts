import { CompletionProvider, LLMResponse } from '@triage/llm-router';
import { KnowledgeBase, KBEntry } from '../knowledge-base';

export const KB_ENTRIES: KBEntry[] = [
  {
    id: 'ISSUE-001',
    title: 'Payment failure during checkout',
    description: 'Payment step errors out',
    category: 'Payment',
    severity: 'High',
    symptoms: ['payment failed', 'checkout', 'card declined'],
    recommended_action: 'Check the payment gateway logs.',
  },
  {
    id: 'ISSUE-002',
    title: 'Login problem',
    description: 'Users cannot sign in',
    category: 'Authentication',
    severity: 'High',
    symptoms: ['login', 'password', 'locked out'],
    recommended_action: 'Reset the password and unlock the account.',
  },
  {
    id: 'ISSUE-003',
    title: 'Slow page loads',
    description: 'Pages respond slowly',
    category: 'Performance',
    severity: 'Medium',
    symptoms: ['slow', 'timeout'],
    recommended_action: 'Check latency dashboards.',
  },
];

export function testKnowledgeBase(): KnowledgeBase {
  return new KnowledgeBase(KB_ENTRIES);
}

export function modelResponse(content: string): LLMResponse {
  return {
    content,
    provider: 'groq',
    model: 'llama-3.1-8b-instant',
    usage: { inputTokens: 100, outputTokens: 40, totalTokens: 140 },
    latencyMs: 12,
    timestamp: '2026-01-01T00:00:00.000Z',
  };
}

export function fakeProvider(complete: CompletionProvider['complete']): CompletionProvider {
  return { provider: 'groq', defaultModel: 'llama-3.1-8b-instant', complete };
}

export function silenceConsole(): void {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
}
