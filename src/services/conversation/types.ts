// src/services/conversation/types.ts

import { Intent, IntentRoute } from '../../models/intent.model';
import { AssistantResponse } from '../../models/response.model';
import { Message } from '../../models/session.model';

export type TurnStep = 'classify' | IntentRoute | 'update_memory' | 'done';

/** Everything one turn carries between steps. Discarded once the turn ends. */
export interface TurnState {
    userInput: string;
    /** Prior session messages; the current input is not among them. */
    messages: Message[];
    intent: Intent | null;
    nextStep: TurnStep;
    conversationSummary: string;
    activeDocuments: string[];
    currentResponse: AssistantResponse | null;
    toolsUsed: string[];
    actionsTaken: string[];
    sessionId: string | null;
}

/** What a step returns: only the fields it changes. */
export type StateUpdate = Partial<Omit<TurnState, 'userInput' | 'messages' | 'sessionId'>>;

export interface ClassificationResult {
    intent: Intent;
    route: IntentRoute;
}

export interface HandlerResult<R extends AssistantResponse = AssistantResponse> {
    response: R;
    toolsUsed: string[];
}

export interface MemoryUpdate {
    conversationSummary: string;
    activeDocuments: string[];
}

export interface TurnResult extends MemoryUpdate {
    response: AssistantResponse;
    intent: Intent;
    toolsUsed: string[];
    actionsTaken: string[];
}
