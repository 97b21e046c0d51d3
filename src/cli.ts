#!/usr/bin/env node

import path from 'path';
import readline from 'readline';
import { CONFIG } from './config';
import { buildBackend } from './services/llm';
import { DocumentAssistant } from './services/DocumentAssistant';
import { HELP_TEXT, SerialQueue, handleInput } from './cli-commands';
import { errorMessage } from './utils/errors';

async function main(): Promise<void> {
    const assistant = new DocumentAssistant({
        backend: buildBackend(CONFIG),
        sessionDir: path.resolve(CONFIG.SESSION_DIR),
    });

    // --- Documents ---
    const documentPath = process.argv[2] || CONFIG.DOCUMENT_PATH;
    if (documentPath) {
        const loaded = await assistant.loadDocuments(documentPath);
        console.log(`Loaded ${loaded} document(s) from ${documentPath}`);
    }

    const sessionId = assistant.startSession();
    console.log('------------------------------------------');
    console.log(`Session ID: ${sessionId}`);
    if (!assistant.hasBackend) {
        console.log('GROQ_API_KEY is not set: running without an LLM.');
    }
    console.log(HELP_TEXT);
    console.log('------------------------------------------');

    const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
        prompt: 'You: ',
    });

    // Buffered lines (piped input) arrive back to back; turns must not overlap.
    const turns = new SerialQueue((error: unknown) => {
        console.error(`[Error] ${errorMessage(error)}`);
    });
    let exiting = false;

    rl.on('line', (line) => {
        turns.push(async () => {
            if (exiting) return;
            const outcome = await handleInput(assistant, line);
            if (outcome.output) console.log(outcome.output);
            if (outcome.exit) {
                exiting = true;
                rl.close();
                return;
            }
            rl.prompt();
        });
    });

    rl.on('SIGINT', () => rl.close());
    // End of input closes the interface before queued turns finish.
    rl.on('close', () => {
        turns
            .drain()
            .then(() => {
                console.log('\nGoodbye!');
                process.exit(0);
            })
            .catch((error: unknown) => {
                console.error(`FATAL: ${errorMessage(error)}`);
                process.exit(1);
            });
    });

    rl.prompt();
}

main().catch((error: unknown) => {
    console.error(`FATAL: ${errorMessage(error)}`);
    process.exit(1);
});
