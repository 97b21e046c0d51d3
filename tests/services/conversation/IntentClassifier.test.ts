import { describe, it, expect } from 'vitest';
import {
  IntentClassifier,
  classifyByKeywords,
  formatHistory,
  matchKeywords,
} from '../../../src/services/conversation/IntentClassifier';
import { createMessage } from '../../../src/models/session.model';
import { MockBackend } from '../../mocks/MockBackend';
import { RecordingLogger } from '../../mocks/RecordingLogger';

describe('classifyByKeywords', () => {
  it('should classify calculation keywords', () => {
    expect(classifyByKeywords("What's the sum of January and February sales?")).toEqual({
      type: 'calculation',
      confidence: 0.7,
      reasoning: 'Matched calculation keywords: sum',
    });
  });

  it('should give summarization priority over calculation', () => {
    const intent = classifyByKeywords('Summarize the total');

    expect(intent.type).toBe('summarization');
    expect(intent.reasoning).toBe('Matched summarization keywords: summarize');
  });

  it('should default to qa when nothing matches', () => {
    expect(classifyByKeywords('Who signed the contract?')).toEqual({
      type: 'qa',
      confidence: 0.7,
      reasoning: 'No summarization or calculation keywords matched; defaulting to question answering.',
    });
  });

  it('should match whole words only', () => {
    expect(matchKeywords('please summarize', ['sum'])).toEqual([]);
    expect(matchKeywords('address book', ['add'])).toEqual([]);
    expect(classifyByKeywords('Give me an address').type).toBe('qa');
  });

  it('should be idempotent', () => {
    const input = 'Calculate the average revenue';

    expect(classifyByKeywords(input)).toEqual(classifyByKeywords(input));
  });
});

describe('IntentClassifier', () => {
  const history = [
    createMessage('user', 'first'),
    createMessage('assistant', 'second'),
    createMessage('user', 'third'),
    createMessage('assistant', 'fourth'),
    createMessage('user', 'fifth'),
    createMessage('assistant', 'sixth'),
  ];

  it('should use the keyword rules without a backend', async () => {
    const classifier = new IntentClassifier({ logger: new RecordingLogger() });

    const result = await classifier.classify('Give me an overview', [], null);

    expect(result.route).toBe('summarization');
    expect(result.intent.confidence).toBe(0.7);
  });

  it('should ask the backend with the input and the last five messages', async () => {
    const backend = new MockBackend().queueStructured({
      intent_type: 'calculation',
      confidence: 0.95,
      reasoning: 'asks for a total',
    });
    const classifier = new IntentClassifier({ logger: new RecordingLogger() });

    const result = await classifier.classify('Total of Q1?', history, backend);

    expect(result).toEqual({
      intent: { type: 'calculation', confidence: 0.95, reasoning: 'asks for a total' },
      route: 'calculation',
    });
    const prompt = backend.structuredCalls[0].input;
    expect(typeof prompt).toBe('string');
    expect(prompt).toContain('User Input: Total of Q1?');
    expect(prompt).toContain('assistant: second\nuser: third\nassistant: fourth\nuser: fifth\nassistant: sixth');
    expect(prompt).not.toContain('user: first');
  });

  it('should map an unrecognized backend intent to unknown and route it to qa', async () => {
    const backend = new MockBackend().queueStructured({ intent_type: 'translation', confidence: 0.4, reasoning: '' });
    const logger = new RecordingLogger();
    const classifier = new IntentClassifier({ logger });

    const result = await classifier.classify('Translate this', [], backend);

    expect(result.intent.type).toBe('unknown');
    expect(result.route).toBe('qa');
    expect(logger.messages('warn')).toEqual(["Backend returned unrecognized intent type 'translation'"]);
  });

  it('should propagate backend failures', async () => {
    const backend = new MockBackend().queueStructured(new Error('rate limited'));
    const classifier = new IntentClassifier({ logger: new RecordingLogger() });

    await expect(classifier.classify('hi', [], backend)).rejects.toThrow('rate limited');
  });
});

describe('formatHistory', () => {
  it('should fall back to the given text for an empty history', () => {
    expect(formatHistory([], 5, 'No previous conversation.')).toBe('No previous conversation.');
  });
});
