// src/services/conversation/IntentClassifier.ts

import { z } from 'zod';
import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { LLMBackend } from '../llm/types';
import { ConfidenceSchema, Intent, IntentType, IntentTypeSchema, createIntent, routeForIntent } from '../../models/intent.model';
import { Message } from '../../models/session.model';
import { ClassificationResult } from './types';
import { INTENT_CLASSIFICATION_PROMPT_TEMPLATE, fillTemplate } from './prompts';
import { createLogger } from '../../utils/logger';

const SUMMARIZATION_KEYWORDS = ['summarize', 'summarization', 'summary', 'overview'];
const CALCULATION_KEYWORDS = ['calculate', 'sum', 'total', 'average', 'multiply', 'divide', 'subtract', 'add'];

const RULE_BASED_CONFIDENCE = 0.7;
const HISTORY_WINDOW = 5;

const ClassifiedIntentSchema = z.object({
    intent_type: z.string(),
    confidence: ConfidenceSchema,
    reasoning: z.string().default(''),
});

/** Keywords from `keywords` that occur in `input` as whole words, case-insensitively. */
export function matchKeywords(input: string, keywords: string[]): string[] {
    const lowered = input.toLowerCase();
    return keywords.filter((keyword) => new RegExp(`\\b${keyword}\\b`).test(lowered));
}

export function classifyByKeywords(userInput: string): Intent {
    // summarization wins when both families match, e.g. "summarize the total"
    const summarization = matchKeywords(userInput, SUMMARIZATION_KEYWORDS);
    if (summarization.length > 0) {
        return createIntent('summarization', RULE_BASED_CONFIDENCE, `Matched summarization keywords: ${summarization.join(', ')}`);
    }

    const calculation = matchKeywords(userInput, CALCULATION_KEYWORDS);
    if (calculation.length > 0) {
        return createIntent('calculation', RULE_BASED_CONFIDENCE, `Matched calculation keywords: ${calculation.join(', ')}`);
    }

    return createIntent('qa', RULE_BASED_CONFIDENCE, 'No summarization or calculation keywords matched; defaulting to question answering.');
}

export function formatHistory(history: Message[], window: number, emptyText: string): string {
    const recent = history.slice(-window);
    if (recent.length === 0) return emptyText;
    return recent.map((message) => `${message.role}: ${message.content}`).join('\n');
}

export class IntentClassifier extends BaseService {
    constructor(config: ServiceConfig = { logger: createLogger('IntentClassifier') }) {
        super(config);
    }

    public async classify(userInput: string, history: Message[], backend: LLMBackend | null): Promise<ClassificationResult> {
        const intent = backend
            ? await this.classifyWithBackend(userInput, history, backend)
            : classifyByKeywords(userInput);
        const route = routeForIntent(intent.type);

        this.logger.info('Intent classified', {
            intent: intent.type,
            confidence: intent.confidence,
            route,
            mode: backend ? backend.name : 'keywords',
        });
        return { intent, route };
    }

    private async classifyWithBackend(userInput: string, history: Message[], backend: LLMBackend): Promise<Intent> {
        const prompt = fillTemplate(INTENT_CLASSIFICATION_PROMPT_TEMPLATE, {
            USER_INPUT: userInput,
            CONVERSATION_HISTORY: formatHistory(history, HISTORY_WINDOW, 'No previous conversation.'),
        });

        const classified = await backend.generateStructured(prompt, {
            name: 'intent classification',
            instructions: 'You classify user requests for a document assistant.',
            schema: ClassifiedIntentSchema,
        });

        const parsedType = IntentTypeSchema.safeParse(classified.intent_type.trim().toLowerCase());
        const type: IntentType = parsedType.success ? parsedType.data : 'unknown';
        if (!parsedType.success) {
            this.logger.warn(`Backend returned unrecognized intent type '${classified.intent_type}'`);
        }
        return createIntent(type, classified.confidence, classified.reasoning);
    }
}
