// src/models/response.model.ts

import { z } from 'zod';
import { ConfidenceSchema } from './intent.model';

export const AnswerResponseSchema = z.object({
    kind: z.literal('answer'),
    question: z.string(),
    answer: z.string(),
    sources: z.array(z.string()),
    confidence: ConfidenceSchema,
    timestamp: z.string(),
});

export const CalculationResponseSchema = z.object({
    kind: z.literal('calculation'),
    expression: z.string(),
    result: z.number().nullable(),
    explanation: z.string(),
    units: z.string().optional(),
    sources: z.array(z.string()),
    confidence: ConfidenceSchema,
    timestamp: z.string(),
});

export const SummarizationResponseSchema = z.object({
    kind: z.literal('summarization'),
    summary: z.string(),
    keyPoints: z.array(z.string()),
    originalLength: z.number().int().nonnegative().optional(),
    documentIds: z.array(z.string()),
    confidence: ConfidenceSchema,
    timestamp: z.string(),
});

export const AssistantResponseSchema = z.discriminatedUnion('kind', [
    AnswerResponseSchema,
    CalculationResponseSchema,
    SummarizationResponseSchema,
]);

export type AnswerResponse = z.infer<typeof AnswerResponseSchema>;
export type CalculationResponse = z.infer<typeof CalculationResponseSchema>;
export type SummarizationResponse = z.infer<typeof SummarizationResponseSchema>;
export type AssistantResponse = z.infer<typeof AssistantResponseSchema>;

type ResponseFields<T> = Omit<T, 'kind' | 'timestamp'>;

// Factories validate on construction: a confidence outside [0, 1] throws.
export function createAnswerResponse(fields: ResponseFields<AnswerResponse>): AnswerResponse {
    return AnswerResponseSchema.parse({ ...fields, kind: 'answer', timestamp: new Date().toISOString() });
}

export function createCalculationResponse(fields: ResponseFields<CalculationResponse>): CalculationResponse {
    return CalculationResponseSchema.parse({ ...fields, kind: 'calculation', timestamp: new Date().toISOString() });
}

export function createSummarizationResponse(fields: ResponseFields<SummarizationResponse>): SummarizationResponse {
    return SummarizationResponseSchema.parse({ ...fields, kind: 'summarization', timestamp: new Date().toISOString() });
}

/**
 * Text the memory step folds into the conversation summary.
 */
export function getResponseText(response: AssistantResponse): string {
    switch (response.kind) {
        case 'answer':
            return response.answer;
        case 'calculation':
            return `${response.explanation} Result: ${response.result ?? 'n/a'}`;
        case 'summarization':
            return response.summary;
        default: {
            const unreachable: never = response;
            return unreachable;
        }
    }
}

/**
 * Text shown to the user as the assistant's reply for the turn.
 */
export function formatResponseForDisplay(response: AssistantResponse): string {
    switch (response.kind) {
        case 'answer':
            return response.answer;
        case 'calculation': {
            if (response.result === null) return response.explanation;
            const units = response.units ? ` ${response.units}` : '';
            return `${response.explanation}\n\nResult: ${response.result}${units}`;
        }
        case 'summarization': {
            if (response.keyPoints.length === 0) return response.summary;
            const points = response.keyPoints.map((point) => `- ${point}`).join('\n');
            return `${response.summary}\n\nKey points:\n${points}`;
        }
        default: {
            const unreachable: never = response;
            return unreachable;
        }
    }
}
