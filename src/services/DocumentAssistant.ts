// src/services/DocumentAssistant.ts

import { BaseService } from './base/BaseService';
import { ServiceConfig } from './base/types';
import { DocumentStore } from './document/DocumentStore';
import { LLMBackend } from './llm/types';
import { SessionStore } from './session/SessionStore';
import { ToolRegistry, createAgentTools } from './tool/tool.registry';
import { IntentClassifier } from './conversation/IntentClassifier';
import { MemoryUpdater } from './conversation/MemoryUpdater';
import { TurnOrchestrator } from './conversation/TurnOrchestrator';
import { CalculationHandler, QAHandler, SummarizationHandler } from './conversation/handlers';
import { TurnResult } from './conversation/types';
import { createDocument } from '../models/document.model';
import { formatResponseForDisplay } from '../models/response.model';
import { Message, createMessage } from '../models/session.model';
import { createLogger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

export interface DocumentAssistantOptions {
    backend: LLMBackend | null;
    sessionDir: string;
    documents?: DocumentStore;
    logger?: ServiceConfig['logger'];
}

export interface ProcessMessageResult {
    answer: string;
    /** False when the session snapshot could not be written. */
    saved: boolean;
    result?: TurnResult;
    error?: string;
}

export interface AssistantStats {
    documents: number;
    sessions: number;
    currentSessionId: string | null;
    messages: number;
}

export class DocumentAssistant extends BaseService {
    public readonly documents: DocumentStore;
    public readonly tools: ToolRegistry;
    public readonly sessions: SessionStore;

    private readonly backend: LLMBackend | null;
    private readonly orchestrator: TurnOrchestrator;

    constructor(options: DocumentAssistantOptions) {
        super({ logger: options.logger ?? createLogger('DocumentAssistant') });
        this.backend = options.backend;
        this.documents = options.documents ?? new DocumentStore();
        this.tools = createAgentTools(this.documents);
        this.sessions = new SessionStore(options.sessionDir);
        this.orchestrator = new TurnOrchestrator({
            classifier: new IntentClassifier(),
            handlers: {
                qa: new QAHandler(this.tools),
                summarization: new SummarizationHandler(this.tools),
                calculation: new CalculationHandler(this.tools),
            },
            memory: new MemoryUpdater(),
            backend: this.backend,
        });

        this.logger.info('DocumentAssistant initialized', {
            backend: this.backend ? this.backend.name : 'none',
            tools: this.tools.names(),
        });
    }

    public get hasBackend(): boolean {
        return this.backend !== null;
    }

    public loadDocuments(targetPath: string): Promise<number> {
        return this.documents.load(targetPath);
    }

    public addDocument(content: string, source?: string, metadata: Record<string, unknown> = {}): void {
        this.documents.add(createDocument(content, source, metadata));
    }

    public startSession(sessionId?: string): string {
        return this.sessions.start(sessionId).sessionId;
    }

    public loadSession(sessionId: string): boolean {
        return this.sessions.load(sessionId);
    }

    public saveSession(): boolean {
        return this.sessions.save();
    }

    /** Drops the current session and starts a fresh one. */
    public clearSession(): string {
        this.sessions.clear();
        return this.startSession();
    }

    public listSessions(): string[] {
        return this.sessions.list();
    }

    public getSessionHistory(): Message[] {
        return [...(this.sessions.current()?.messages ?? [])];
    }

    public getStats(): AssistantStats {
        const current = this.sessions.current();
        return {
            documents: this.documents.count(),
            sessions: this.sessions.list().length,
            currentSessionId: current?.sessionId ?? null,
            messages: current?.messages.length ?? 0,
        };
    }

    /**
     * Runs one turn. Failures become the assistant's reply; the user message
     * is recorded and the session saved either way.
     */
    public async processMessage(text: string): Promise<ProcessMessageResult> {
        const session = this.sessions.current() ?? this.sessions.start();
        const priorMessages = [...session.messages];
        this.sessions.append(createMessage('user', text));

        let outcome: Omit<ProcessMessageResult, 'saved'>;
        try {
            const result = await this.orchestrator.run({
                userInput: text,
                messages: priorMessages,
                sessionId: session.sessionId,
            });
            outcome = { answer: formatResponseForDisplay(result.response), result };
            this.logger.info('Turn completed', {
                sessionId: session.sessionId,
                intent: result.intent.type,
                toolsUsed: result.toolsUsed,
            });
        } catch (error) {
            const reason = errorMessage(error);
            this.logger.error('Turn failed', { sessionId: session.sessionId, error: reason });
            outcome = { answer: `Error processing query: ${reason}`, error: reason };
        }

        this.sessions.append(createMessage('assistant', outcome.answer));
        const saved = this.sessions.save();
        if (!saved) {
            this.logger.warn('Turn was not persisted', { sessionId: session.sessionId });
        }
        return { ...outcome, saved };
    }
}
