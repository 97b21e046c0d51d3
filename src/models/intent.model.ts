// src/models/intent.model.ts

import { z } from 'zod';

export const INTENT_TYPES = ['qa', 'summarization', 'calculation', 'unknown'] as const;

export const IntentTypeSchema = z.enum(INTENT_TYPES);
export type IntentType = z.infer<typeof IntentTypeSchema>;

export const ConfidenceSchema = z.number().min(0).max(1);

export const IntentSchema = z.object({
    type: IntentTypeSchema,
    confidence: ConfidenceSchema,
    reasoning: z.string(),
});

export type Intent = z.infer<typeof IntentSchema>;

/** Handler states the classifier can route a turn to. */
export type IntentRoute = 'qa' | 'summarization' | 'calculation';

export function createIntent(type: IntentType, confidence: number, reasoning: string): Intent {
    return IntentSchema.parse({ type, confidence, reasoning });
}

export function routeForIntent(type: string): IntentRoute {
    switch (type) {
        case 'summarization':
            return 'summarization';
        case 'calculation':
            return 'calculation';
        default:
            return 'qa';
    }
}
