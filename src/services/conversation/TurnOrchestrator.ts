// src/services/conversation/TurnOrchestrator.ts

import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { LLMBackend } from '../llm/types';
import { IntentRoute } from '../../models/intent.model';
import { Message } from '../../models/session.model';
import { IntentClassifier } from './IntentClassifier';
import { MemoryUpdater } from './MemoryUpdater';
import { IntentHandler } from './handlers';
import { StateUpdate, TurnResult, TurnState } from './types';
import { createLogger } from '../../utils/logger';

export interface TurnOrchestratorDeps {
    classifier: IntentClassifier;
    handlers: Record<IntentRoute, IntentHandler>;
    memory: MemoryUpdater;
    backend: LLMBackend | null;
}

export interface TurnInput {
    userInput: string;
    messages: Message[];
    sessionId?: string | null;
}

export function createInitialTurnState({ userInput, messages, sessionId = null }: TurnInput): TurnState {
    return {
        userInput,
        messages,
        intent: null,
        nextStep: 'classify',
        conversationSummary: '',
        activeDocuments: [],
        currentResponse: null,
        toolsUsed: [],
        actionsTaken: [],
        sessionId,
    };
}

/** Accumulators concatenate; every other field takes the latest value. */
export function reduceTurnState(state: TurnState, update: StateUpdate): TurnState {
    return {
        ...state,
        ...update,
        toolsUsed: [...state.toolsUsed, ...(update.toolsUsed ?? [])],
        actionsTaken: [...state.actionsTaken, ...(update.actionsTaken ?? [])],
    };
}

/**
 * classify -> {qa | summarization | calculation} -> update_memory -> done.
 * Linear per turn; a failing step fails the whole turn.
 */
export class TurnOrchestrator extends BaseService {
    constructor(
        private readonly deps: TurnOrchestratorDeps,
        config: ServiceConfig = { logger: createLogger('TurnOrchestrator') },
    ) {
        super(config);
    }

    public async run(input: TurnInput): Promise<TurnResult> {
        let state = createInitialTurnState(input);

        while (state.nextStep !== 'done') {
            this.logger.debug(`Running step ${state.nextStep}`, { sessionId: state.sessionId });
            state = reduceTurnState(state, await this.step(state));
        }

        if (!state.intent || !state.currentResponse) {
            throw new Error('Turn finished without an intent and a response');
        }

        return {
            response: state.currentResponse,
            intent: state.intent,
            toolsUsed: state.toolsUsed,
            actionsTaken: state.actionsTaken,
            conversationSummary: state.conversationSummary,
            activeDocuments: state.activeDocuments,
        };
    }

    private async step(state: TurnState): Promise<StateUpdate> {
        const { backend } = this.deps;

        switch (state.nextStep) {
            case 'classify': {
                const { intent, route } = await this.deps.classifier.classify(state.userInput, state.messages, backend);
                return { intent, nextStep: route, actionsTaken: ['classify_intent'] };
            }
            case 'qa':
            case 'summarization':
            case 'calculation': {
                const handler = this.deps.handlers[state.nextStep];
                const { response, toolsUsed } = await handler.handle(state.userInput, state.messages, backend);
                return {
                    currentResponse: response,
                    toolsUsed,
                    nextStep: 'update_memory',
                    actionsTaken: [`${handler.route}_agent`],
                };
            }
            case 'update_memory': {
                if (!state.currentResponse) {
                    throw new Error('Cannot update memory before a response exists');
                }
                const memory = await this.deps.memory.update(state.userInput, state.messages, state.currentResponse, backend);
                return { ...memory, nextStep: 'done', actionsTaken: ['update_memory'] };
            }
            case 'done':
                return {};
        }
    }
}
