// src/cli-commands.ts

import { DocumentAssistant } from './services/DocumentAssistant';

export interface CommandOutcome {
    output: string;
    exit: boolean;
}

export const HELP_TEXT = [
    'Commands:',
    '  /load <path>    Load a document file or directory',
    '  /stats          Show document and session statistics',
    '  /sessions       List saved sessions',
    '  /resume <id>    Continue a saved session',
    '  /clear          Start a new session',
    '  /help           Show this help',
    '  /quit, /exit    Leave the assistant',
    'Anything else is sent to the assistant as a question.',
].join('\n');

export const UNSAVED_WARNING = '[Warning] This turn could not be saved to disk.';

const reply = (output: string): CommandOutcome => ({ output, exit: false });

export function formatStats(assistant: DocumentAssistant): string {
    const stats = assistant.getStats();
    return [
        `Documents loaded: ${stats.documents}`,
        `Sessions saved: ${stats.sessions}`,
        `Current session: ${stats.currentSessionId ?? 'none'}`,
        `Messages in session: ${stats.messages}`,
    ].join('\n');
}

/**
 * Runs pushed tasks one after another, in push order. A task that throws is
 * reported to `onError` and the next one still runs.
 */
export class SerialQueue {
    private tail: Promise<void> = Promise.resolve();

    constructor(private readonly onError: (error: unknown) => void) {}

    public push(task: () => Promise<void>): void {
        this.tail = this.tail.then(task).catch(this.onError);
    }

    /** Resolves once every task pushed so far has settled. */
    public drain(): Promise<void> {
        return this.tail;
    }
}

/** Interprets one line of REPL input. */
export async function handleInput(assistant: DocumentAssistant, line: string): Promise<CommandOutcome> {
    const input = line.trim();
    if (!input) return reply('');

    if (!input.startsWith('/')) {
        const { answer, saved } = await assistant.processMessage(input);
        return reply(saved ? `Assistant: ${answer}` : `Assistant: ${answer}\n${UNSAVED_WARNING}`);
    }

    const [command, ...rest] = input.split(/\s+/);
    const argument = rest.join(' ');

    switch (command.toLowerCase()) {
        case '/quit':
        case '/exit':
            return { output: '', exit: true };
        case '/help':
            return reply(HELP_TEXT);
        case '/stats':
            return reply(formatStats(assistant));
        case '/load': {
            if (!argument) return reply('Usage: /load <path>');
            const loaded = await assistant.loadDocuments(argument);
            return reply(`Loaded ${loaded} document(s) from ${argument}`);
        }
        case '/sessions': {
            const sessions = assistant.listSessions();
            if (sessions.length === 0) return reply('No saved sessions.');
            const current = assistant.getStats().currentSessionId;
            const lines = sessions.map((id) => `- ${id}${id === current ? ' (current)' : ''}`);
            return reply(`Saved sessions:\n${lines.join('\n')}`);
        }
        case '/resume': {
            if (!argument) return reply('Usage: /resume <id>');
            if (!assistant.loadSession(argument)) return reply(`Could not load session ${argument}`);
            return reply(`Resumed session ${argument} (${assistant.getSessionHistory().length} messages)`);
        }
        case '/clear':
            return reply(`Started new session ${assistant.clearSession()}`);
        default:
            return reply(`Unknown command: ${command}. Type /help for the list of commands.`);
    }
}
