import { LLMError, LLMErrorType } from '@triage/llm-router';
import { buildTriageMessages, DEFAULT_NEXT_STEP, TicketClassifier } from '../ai-triage';
import { NEW_ISSUES, SEVERITIES } from '../ticket-model';
import { fakeProvider, modelResponse, silenceConsole, testKnowledgeBase } from './fixtures';

function classifierWithModel(content: string, defaultSeverity: 'Low' | 'Medium' = 'Medium') {
  const complete = jest.fn().mockResolvedValue(modelResponse(content));
  const classifier = new TicketClassifier({
    knowledgeBase: testKnowledgeBase(),
    provider: fakeProvider(complete),
    defaultSeverity,
  });
  return { classifier, complete };
}

describe('TicketClassifier', () => {
  beforeEach(() => silenceConsole());
  afterEach(() => jest.restoreAllMocks());

  describe('with a model answer', () => {
    it('uses the model classification and its KB pick', async () => {
      const { classifier } = classifierWithModel(JSON.stringify({
        summary: '  Card   payment fails at checkout ',
        category: 'Payment',
        severity: 'critical',
        kb_issue_id: 'issue-001',
        kb_issue_title: 'Payment failure during checkout',
        next_step: 'Escalate to the payments team.',
      }));

      const result = await classifier.classify('My card payment fails every time', 'acme');

      expect(result).toEqual({
        client_id: 'acme',
        summary: 'Card payment fails at checkout',
        full_summary: 'Card payment fails at checkout',
        full_text: 'My card payment fails every time',
        category: 'Payment',
        severity: 'Critical',
        kb_match: 'ISSUE-001',
        next_step: 'Escalate to the payments team.',
        analysis_source: 'llm+kb',
        llm_raw: {
          summary: '  Card   payment fails at checkout ',
          category: 'Payment',
          severity: 'critical',
          kb_issue_id: 'issue-001',
          kb_issue_title: 'Payment failure during checkout',
          next_step: 'Escalate to the payments team.',
        },
      });
    });

    it('falls back to the keyword scan when the model picks an unknown id', async () => {
      const { classifier } = classifierWithModel('{"kb_issue_id":"NEW_ISSUE","severity":"low","summary":"Locked out"}');

      const result = await classifier.classify('I am locked out after a password reset', 'acme');

      expect(result.kb_match).toBe('ISSUE-002');
      expect(result.severity).toBe('Low');
      expect(result.category).toBe('Authentication');
      expect(result.next_step).toBe('Reset the password and unlock the account.');
      expect(result.analysis_source).toBe('llm+kb');
    });

    it('marks model-only answers when nothing matches the KB', async () => {
      const { classifier } = classifierWithModel('{"category":"Shipping","severity":"Medium","summary":"Parcel late"}');

      const result = await classifier.classify('My parcel has not arrived yet', 'acme');

      expect(result.kb_match).toBe(NEW_ISSUES);
      expect(result.category).toBe('Shipping');
      expect(result.next_step).toBe(DEFAULT_NEXT_STEP);
      expect(result.analysis_source).toBe('llm');
    });

    it('normalises unexpected model severities', async () => {
      const { classifier } = classifierWithModel('{"severity":"SEV-1 world ending","category":"Payment"}');

      const result = await classifier.classify('payment failed', 'acme');

      expect(result.severity).toBe('Medium');
    });

    it('repairs sloppy JSON from the model', async () => {
      const { classifier } = classifierWithModel("```json\n{'category': 'Payment', 'severity': 'High',}\n```");

      const result = await classifier.classify('payment failed at checkout', 'acme');

      expect(result.category).toBe('Payment');
      expect(result.severity).toBe('High');
      expect(result.analysis_source).toBe('llm+kb');
    });

    it('sends the KB context and the ticket in the prompt', async () => {
      const { classifier, complete } = classifierWithModel('{}');

      await classifier.classify('Checkout broken', 'acme');

      const messages = complete.mock.calls[0][0];
      expect(messages).toEqual(buildTriageMessages('Checkout broken', testKnowledgeBase()));
      expect(messages[1].content).toContain('ISSUE-002: Login problem');
      expect(messages[1].content).toContain('Ticket to Analyze:\nCheckout broken');
    });
  });

  describe('without a usable model answer', () => {
    it('uses heuristics when no model is configured', async () => {
      const classifier = new TicketClassifier({ knowledgeBase: testKnowledgeBase() });

      const result = await classifier.classify('Payment failed with error 500 during checkout', 'test-client');

      expect(result.kb_match).toBe('ISSUE-001');
      expect(result.category).toBe('Payment');
      expect(result.severity).toBe('High');
      expect(result.summary).toBe('Payment failure during checkout');
      expect(result.full_summary).toBeNull();
      expect(result.next_step).toBe('Check the payment gateway logs.');
      expect(result.analysis_source).toBe('heuristics');
      expect(result.llm_raw).toBeNull();
    });

    it('uses the sentinel and the configured default severity without keyword overlap', async () => {
      const classifier = new TicketClassifier({ knowledgeBase: testKnowledgeBase(), defaultSeverity: 'Low' });
      const text = 'Please update the postal address on my account to the new office';

      const result = await classifier.classify(text, 'test-client');

      expect(result.kb_match).toBe(NEW_ISSUES);
      expect(result.severity).toBe('Low');
      expect(result.category).toBe('General');
      expect(result.summary).toBe(text.slice(0, 80));
      expect(result.next_step).toBe(DEFAULT_NEXT_STEP);
    });

    it('falls back when the model call fails', async () => {
      const complete = jest.fn().mockRejectedValue(
        new LLMError('model decommissioned', {
          provider: 'groq',
          model: 'mixtral-8x7b-32768',
          errorType: LLMErrorType.MODEL_UNAVAILABLE,
        })
      );
      const classifier = new TicketClassifier({ knowledgeBase: testKnowledgeBase(), provider: fakeProvider(complete) });

      const result = await classifier.classify('The site is painfully slow', 'acme');

      expect(result.analysis_source).toBe('heuristics');
      expect(result.kb_match).toBe('ISSUE-003');
      expect(result.severity).toBe('Medium');
    });

    it('falls back when the model returns prose', async () => {
      const { classifier } = classifierWithModel('I think this is a payment issue.');

      const result = await classifier.classify('card declined', 'acme');

      expect(result.analysis_source).toBe('heuristics');
      expect(result.llm_raw).toBeNull();
      expect(result.kb_match).toBe('ISSUE-001');
    });

    it('treats an empty JSON object as no answer', async () => {
      const { classifier } = classifierWithModel('{}');

      const result = await classifier.classify('something odd happened', 'acme');

      expect(result.analysis_source).toBe('heuristics');
    });
  });

  it('defaults a missing client id', async () => {
    const classifier = new TicketClassifier({ knowledgeBase: testKnowledgeBase() });
    expect((await classifier.classify('hello', null)).client_id).toBe('unknown-client');
    expect((await classifier.classify('hello', '   ')).client_id).toBe('unknown-client');
  });

  it('always returns a severity from the fixed scale', async () => {
    const answers = ['{"severity": 7}', '{"severity": ""}', '{"severity": "meh"}', 'garbage', '{"severity": null}'];
    for (const answer of answers) {
      const { classifier } = classifierWithModel(answer);
      const result = await classifier.classify('anything at all', 'acme');
      expect(SEVERITIES).toContain(result.severity);
    }
  });
});
