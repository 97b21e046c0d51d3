// src/services/conversation/MemoryUpdater.ts

import { z } from 'zod';
import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { LLMBackend } from '../llm/types';
import { AssistantResponse, getResponseText } from '../../models/response.model';
import { Message } from '../../models/session.model';
import { MemoryUpdate } from './types';
import { formatHistory } from './IntentClassifier';
import { MEMORY_SUMMARY_PROMPT_TEMPLATE, fillTemplate } from './prompts';
import { createLogger } from '../../utils/logger';

const MEMORY_WINDOW = 10;

export const ConversationSummarySchema = z.object({
    summary: z.string(),
    active_documents: z.array(z.string()).default([]),
});

/**
 * Folds the latest exchange into the rolling conversation summary.
 * Always the last step of a turn.
 */
export class MemoryUpdater extends BaseService {
    constructor(config: ServiceConfig = { logger: createLogger('MemoryUpdater') }) {
        super(config);
    }

    public async update(
        userInput: string,
        priorMessages: Message[],
        response: AssistantResponse,
        backend: LLMBackend | null,
    ): Promise<MemoryUpdate> {
        if (!backend) {
            return { conversationSummary: `User asked: ${userInput}`, activeDocuments: [] };
        }

        const prompt = fillTemplate(MEMORY_SUMMARY_PROMPT_TEMPLATE, {
            RECENT_MESSAGES: formatHistory(priorMessages, MEMORY_WINDOW, 'No previous messages'),
            USER_INPUT: userInput,
            ASSISTANT_RESPONSE: getResponseText(response),
        });

        const summary = await backend.generateStructured(prompt, {
            name: 'conversation summary',
            instructions: 'You maintain a running summary of a conversation between a user and a document assistant.',
            schema: ConversationSummarySchema,
        });

        this.logger.debug('Conversation summary updated', { activeDocuments: summary.active_documents });
        return { conversationSummary: summary.summary, activeDocuments: summary.active_documents };
    }
}
