import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { DocumentAssistant } from '../../src/services/DocumentAssistant';
import { NOT_CONFIGURED_MESSAGE } from '../../src/services/conversation/handlers';
import { MockBackend } from '../mocks/MockBackend';
import { RecordingLogger } from '../mocks/RecordingLogger';

describe('DocumentAssistant', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'assistant-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should answer without a backend and persist both messages', async () => {
    const assistant = new DocumentAssistant({ backend: null, sessionDir: dir, logger: new RecordingLogger() });
    assistant.addDocument('January Sales: $50,000', 'january.txt');

    const outcome = await assistant.processMessage('What is in the January report?');

    expect(outcome.answer).toBe(NOT_CONFIGURED_MESSAGE);
    expect(outcome.result?.response.confidence).toBe(0);
    expect(assistant.getSessionHistory().map((m) => [m.role, m.content])).toEqual([
      ['user', 'What is in the January report?'],
      ['assistant', NOT_CONFIGURED_MESSAGE],
    ]);
    expect(assistant.listSessions()).toHaveLength(1);
  });

  it('should show the calculation result in the reply', async () => {
    const backend = new MockBackend()
      .queueStructured({ intent_type: 'calculation', confidence: 0.9, reasoning: 'sum' })
      .queueText('', [{ id: 'c1', name: 'calculator', arguments: { expression: '50000 + 60000' } }])
      .queueStructured({ expression: '50000 + 60000', result: 110000, explanation: 'January plus February.', units: 'USD' })
      .queueStructured({ summary: 'Sales total requested.' });
    const assistant = new DocumentAssistant({ backend, sessionDir: dir, logger: new RecordingLogger() });

    const outcome = await assistant.processMessage('Sum January and February sales');

    expect(outcome.answer).toBe('January plus February.\n\nResult: 110000 USD');
  });

  it('should turn a failed turn into an error reply and still save the session', async () => {
    const backend = new MockBackend().queueStructured(new Error('connection reset'));
    const assistant = new DocumentAssistant({ backend, sessionDir: dir, logger: new RecordingLogger() });
    const sessionId = assistant.startSession('failing');

    const outcome = await assistant.processMessage('Hello?');

    expect(outcome).toEqual({
      answer: 'Error processing query: connection reset',
      saved: true,
      error: 'connection reset',
    });
    const saved = JSON.parse(fs.readFileSync(path.join(dir, `${sessionId}.json`), 'utf-8'));
    expect(saved.messages.map((m: { content: string }) => m.content)).toEqual([
      'Hello?',
      'Error processing query: connection reset',
    ]);
  });

  it('should report and log a turn whose snapshot could not be written', async () => {
    const blocker = path.join(dir, 'not-a-directory');
    fs.writeFileSync(blocker, 'occupied');
    const logger = new RecordingLogger();
    const assistant = new DocumentAssistant({ backend: null, sessionDir: path.join(blocker, 'sessions'), logger });
    assistant.startSession('unsaved');

    const outcome = await assistant.processMessage('Anything there?');

    expect(outcome.saved).toBe(false);
    expect(outcome.answer).toBe(NOT_CONFIGURED_MESSAGE);
    expect(logger.entries.filter((entry) => entry.message === 'Turn was not persisted')).toEqual([
      { level: 'warn', message: 'Turn was not persisted', meta: { sessionId: 'unsaved' } },
    ]);
  });

  it('should pass prior messages to the next turn', async () => {
    const backend = new MockBackend()
      .queueStructured({ intent_type: 'qa', confidence: 0.9, reasoning: 'question' })
      .queueText('first draft')
      .queueText('First answer.')
      .queueStructured({ summary: 'one' })
      .queueStructured({ intent_type: 'qa', confidence: 0.9, reasoning: 'question' })
      .queueText('second draft')
      .queueText('Second answer.')
      .queueStructured({ summary: 'two' });
    const assistant = new DocumentAssistant({ backend, sessionDir: dir, logger: new RecordingLogger() });

    await assistant.processMessage('First question?');
    await assistant.processMessage('Second question?');

    const secondTurnMessages = backend.textCalls[2].messages.map((m) => m.content);
    expect(secondTurnMessages.slice(1)).toEqual(['First question?', 'First answer.', 'Second question?']);
  });

  it('should report stats and start a fresh session on clear', async () => {
    const assistant = new DocumentAssistant({ backend: null, sessionDir: dir, logger: new RecordingLogger() });
    assistant.addDocument('one');
    assistant.startSession('stats');
    await assistant.processMessage('Summarize everything');

    expect(assistant.getStats()).toEqual({ documents: 1, sessions: 1, currentSessionId: 'stats', messages: 2 });

    const fresh = assistant.clearSession();

    expect(fresh).not.toBe('stats');
    expect(assistant.getStats()).toEqual({ documents: 1, sessions: 1, currentSessionId: fresh, messages: 0 });
    expect(assistant.loadSession('stats')).toBe(true);
    expect(assistant.getSessionHistory()).toHaveLength(2);
  });
});
