import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { DocumentAssistant } from '../src/services/DocumentAssistant';
import { HELP_TEXT, SerialQueue, UNSAVED_WARNING, handleInput } from '../src/cli-commands';
import { RecordingLogger } from './mocks/RecordingLogger';

describe('handleInput', () => {
  let dir: string;
  let assistant: DocumentAssistant;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cli-'));
    assistant = new DocumentAssistant({
      backend: null,
      sessionDir: path.join(dir, 'sessions'),
      logger: new RecordingLogger(),
    });
    assistant.startSession('cli-test');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should exit on /quit and /exit', async () => {
    expect(await handleInput(assistant, '/quit')).toEqual({ output: '', exit: true });
    expect(await handleInput(assistant, '/EXIT')).toEqual({ output: '', exit: true });
  });

  it('should show help', async () => {
    expect((await handleInput(assistant, '/help')).output).toBe(HELP_TEXT);
  });

  it('should ignore blank lines', async () => {
    expect(await handleInput(assistant, '   ')).toEqual({ output: '', exit: false });
  });

  it('should load documents and report stats', async () => {
    const docs = path.join(dir, 'docs');
    fs.mkdirSync(docs);
    fs.writeFileSync(path.join(docs, 'report.txt'), 'Q2 revenue');

    expect((await handleInput(assistant, `/load ${docs}`)).output).toBe(`Loaded 1 document(s) from ${docs}`);
    expect((await handleInput(assistant, '/stats')).output).toBe(
      'Documents loaded: 1\nSessions saved: 0\nCurrent session: cli-test\nMessages in session: 0',
    );
  });

  it('should send plain text to the assistant', async () => {
    expect((await handleInput(assistant, 'What is the revenue?')).output).toBe(
      'Assistant: LLM not configured. Please configure an LLM to use this feature.',
    );
  });

  it('should warn when the turn could not be saved', async () => {
    const blocker = path.join(dir, 'blocker');
    fs.writeFileSync(blocker, 'occupied');
    const unsaved = new DocumentAssistant({
      backend: null,
      sessionDir: path.join(blocker, 'sessions'),
      logger: new RecordingLogger(),
    });

    expect((await handleInput(unsaved, 'Hello?')).output).toBe(
      `Assistant: LLM not configured. Please configure an LLM to use this feature.\n${UNSAVED_WARNING}`,
    );
  });

  it('should list and resume sessions', async () => {
    await handleInput(assistant, 'hello');

    expect((await handleInput(assistant, '/sessions')).output).toBe('Saved sessions:\n- cli-test (current)');

    await handleInput(assistant, '/clear');
    expect((await handleInput(assistant, '/resume cli-test')).output).toBe('Resumed session cli-test (2 messages)');
    expect((await handleInput(assistant, '/resume nope')).output).toBe('Could not load session nope');
  });

  it('should print usage for commands missing their argument', async () => {
    expect((await handleInput(assistant, '/load')).output).toBe('Usage: /load <path>');
    expect((await handleInput(assistant, '/resume')).output).toBe('Usage: /resume <id>');
  });

  it('should reject unknown commands', async () => {
    expect((await handleInput(assistant, '/dance')).output).toBe('Unknown command: /dance. Type /help for the list of commands.');
  });
});

describe('SerialQueue', () => {
  it('should run one task at a time in push order', async () => {
    const events: string[] = [];
    let inFlight = 0;
    let maxInFlight = 0;
    const queue = new SerialQueue(() => undefined);

    for (const name of ['q1', 'q2', 'q3']) {
      queue.push(async () => {
        inFlight += 1;
        maxInFlight = Math.max(maxInFlight, inFlight);
        events.push(`start ${name}`);
        await new Promise((resolve) => setTimeout(resolve, 5));
        events.push(`end ${name}`);
        inFlight -= 1;
      });
    }
    await queue.drain();

    expect(maxInFlight).toBe(1);
    expect(events).toEqual(['start q1', 'end q1', 'start q2', 'end q2', 'start q3', 'end q3']);
  });

  it('should report a failing task and keep going', async () => {
    const errors: unknown[] = [];
    const ran: string[] = [];
    const queue = new SerialQueue((error) => {
      errors.push(error);
    });

    queue.push(async () => {
      throw new Error('disk full');
    });
    queue.push(async () => {
      ran.push('after');
    });
    await queue.drain();

    expect(errors).toEqual([new Error('disk full')]);
    expect(ran).toEqual(['after']);
  });

  it('should keep each question next to its answer when lines arrive together', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cli-queue-'));
    try {
      const assistant = new DocumentAssistant({ backend: null, sessionDir: dir, logger: new RecordingLogger() });
      assistant.startSession('queued');
      const queue = new SerialQueue(() => undefined);

      for (const line of ['q1', 'q2', 'q3']) {
        queue.push(async () => {
          await handleInput(assistant, line);
        });
      }
      await queue.drain();

      const answer = 'LLM not configured. Please configure an LLM to use this feature.';
      expect(assistant.getSessionHistory().map((m) => m.content)).toEqual(['q1', answer, 'q2', answer, 'q3', answer]);
      const saved = JSON.parse(fs.readFileSync(path.join(dir, 'queued.json'), 'utf-8'));
      expect(saved.messages).toHaveLength(6);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
