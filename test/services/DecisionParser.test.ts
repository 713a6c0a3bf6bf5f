import { extractJsonObject, findBalancedObject, parseDecision } from '../../src/services/DecisionParser';

describe('DecisionParser', () => {
  describe('extractJsonObject', () => {
    it('should parse a plain JSON object', () => {
      expect(extractJsonObject('{"mode":"onboarding"}')).toEqual({ mode: 'onboarding' });
    });

    it('should read the body of a json code fence', () => {
      const raw = 'Here you go:\n```json\n{"reply": "Hi"}\n```\nThanks';
      expect(extractJsonObject(raw)).toEqual({ reply: 'Hi' });
    });

    it('should read an unlabelled code fence', () => {
      expect(extractJsonObject('```\n{"done": true}\n```')).toEqual({ done: true });
    });

    it('should fall back to the first balanced object in surrounding prose', () => {
      const raw = 'Sure! {"reply": "Quote ready", "api_calls": []} Let me know.';
      expect(extractJsonObject(raw)).toEqual({ reply: 'Quote ready', api_calls: [] });
    });

    it('should return null for text without an object', () => {
      expect(extractJsonObject('Just a friendly sentence.')).toBeNull();
    });

    it('should return null for arrays', () => {
      expect(extractJsonObject('[1, 2, 3]')).toBeNull();
    });
  });

  describe('findBalancedObject', () => {
    it('should ignore braces inside strings', () => {
      const text = 'prefix {"reply": "use {curly} braces", "n": 1} suffix';
      expect(findBalancedObject(text)).toBe('{"reply": "use {curly} braces", "n": 1}');
    });

    it('should ignore escaped quotes inside strings', () => {
      const text = '{"reply": "she said \\"}\\" loudly"} trailing }';
      expect(findBalancedObject(text)).toBe('{"reply": "she said \\"}\\" loudly"}');
    });

    it('should handle nested objects', () => {
      expect(findBalancedObject('x {"a": {"b": {}}} y')).toBe('{"a": {"b": {}}}');
    });

    it('should return null when the object never closes', () => {
      expect(findBalancedObject('{"a": {"b": 1}')).toBeNull();
    });
  });

  describe('parseDecision', () => {
    it('should map a full decision', () => {
      const raw = JSON.stringify({
        mode: 'Onboarding',
        reply: 'Great, let us start.',
        next_question: 'What is your full name?',
        extracted: { age: 30 },
        store_update: { personalDetails: { age: 30 } },
        api_calls: [{ name: 'plan_comparison', params: {} }, { params: {} }, 'junk'],
        reasoning: 'wants to buy',
        done: false,
      });

      const outcome = parseDecision(raw);

      expect(outcome.parsed).toBe(true);
      expect(outcome.raw).toBe(raw);
      expect(outcome.decision).toEqual({
        mode: 'onboarding',
        reply: 'Great, let us start.',
        nextQuestion: 'What is your full name?',
        extracted: { age: 30 },
        storeUpdate: { personalDetails: { age: 30 } },
        operations: [{ name: 'plan_comparison', params: {} }],
        reasoning: 'wants to buy',
        done: false,
      });
    });

    it('should default fields that are missing or malformed', () => {
      const outcome = parseDecision('{"mode": "shouting", "reply": 42, "api_calls": {"name": "x"}}');

      expect(outcome.parsed).toBe(true);
      expect(outcome.decision).toEqual({
        mode: 'conversational',
        reply: '',
        nextQuestion: null,
        extracted: {},
        storeUpdate: {},
        operations: [],
        reasoning: '',
        done: false,
      });
    });

    it('should give operations without params an empty params object', () => {
      const outcome = parseDecision('{"api_calls": [{"name": " policy_documents "}]}');
      expect(outcome.decision.operations).toEqual([{ name: 'policy_documents', params: {} }]);
    });

    it('should degrade unparsable output to a conversational reply', () => {
      const raw = 'Our plans start at a few hundred rupees a month.';
      const outcome = parseDecision(raw);

      expect(outcome.parsed).toBe(false);
      expect(outcome.decision.mode).toBe('conversational');
      expect(outcome.decision.reply).toBe(raw);
      expect(outcome.decision.extracted).toEqual({});
      expect(outcome.decision.operations).toEqual([]);
    });
  });
});
