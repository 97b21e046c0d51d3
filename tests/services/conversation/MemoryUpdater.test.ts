import { describe, it, expect } from 'vitest';
import { MemoryUpdater } from '../../../src/services/conversation/MemoryUpdater';
import { createAnswerResponse, createCalculationResponse } from '../../../src/models/response.model';
import { createMessage } from '../../../src/models/session.model';
import { MockBackend } from '../../mocks/MockBackend';
import { RecordingLogger } from '../../mocks/RecordingLogger';

describe('MemoryUpdater', () => {
  const answer = createAnswerResponse({ question: 'q', answer: 'Revenue was flat.', sources: [], confidence: 0.9 });

  it('should echo the user input without a backend', async () => {
    const memory = new MemoryUpdater({ logger: new RecordingLogger() });

    expect(await memory.update('What is the revenue?', [], answer, null)).toEqual({
      conversationSummary: 'User asked: What is the revenue?',
      activeDocuments: [],
    });
  });

  it('should return the backend summary as is', async () => {
    const backend = new MockBackend().queueStructured({
      summary: 'The user asked about revenue.',
      active_documents: ['q2-report.md'],
    });
    const memory = new MemoryUpdater({ logger: new RecordingLogger() });

    expect(await memory.update('What is the revenue?', [], answer, backend)).toEqual({
      conversationSummary: 'The user asked about revenue.',
      activeDocuments: ['q2-report.md'],
    });
  });

  it('should embed the last ten messages and the current exchange', async () => {
    const prior = Array.from({ length: 12 }, (_, i) => createMessage('user', `message ${i + 1}`));
    const backend = new MockBackend().queueStructured({ summary: 's' });
    const calculation = createCalculationResponse({
      expression: '2 + 2',
      result: 4,
      explanation: 'Added two and two.',
      sources: [],
      confidence: 0.9,
    });

    const result = await new MemoryUpdater({ logger: new RecordingLogger() }).update('Add 2 and 2', prior, calculation, backend);

    const prompt = backend.structuredCalls[0].input;
    expect(prompt).toContain('user: message 3\n');
    expect(prompt).not.toContain('user: message 2\n');
    expect(prompt).toContain('User: Add 2 and 2\nAssistant: Added two and two. Result: 4');
    expect(result.activeDocuments).toEqual([]);
  });
});
