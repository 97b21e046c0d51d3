// src/services/conversation/handlers/CalculationHandler.ts

import { z } from 'zod';
import { ServiceConfig } from '../../base/types';
import { ToolRegistry } from '../../tool/tool.registry';
import { CALCULATOR_TOOL, DOCUMENT_READER_TOOL, ToolInvocationRecord } from '../../tool/tool.types';
import { ConfidenceSchema } from '../../../models/intent.model';
import { CalculationResponse, createCalculationResponse } from '../../../models/response.model';
import {
    CALCULATION_FINALIZATION_PROMPT,
    CALCULATION_SYSTEM_PROMPT,
    STRUCTURED_REQUEST_PROMPT_TEMPLATE,
    fillTemplate,
} from '../prompts';
import { BaseIntentHandler, FinalizationContext, NOT_CONFIGURED_MESSAGE, formatToolResults } from './BaseIntentHandler';
import { NO_TOOL_RESULTS, backfillConfidence, backfillList } from './structuredDefaults';
import { createLogger } from '../../../utils/logger';

const AMOUNT_NOISE = /[,$\s]/g;

/** Accepts `110000`, `"110,000"` or `"$110,000"`; missing or blank means no result. */
export const DraftResultSchema = z
    .union([z.number(), z.string()])
    .nullish()
    .transform((value, ctx): number | null => {
        if (value === null || value === undefined) return null;
        if (typeof value === 'number') return value;
        const cleaned = value.replace(AMOUNT_NOISE, '');
        if (cleaned === '') return null;
        const parsed = Number(cleaned);
        if (!Number.isFinite(parsed)) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Result is not a number: ${value}` });
            return z.NEVER;
        }
        return parsed;
    });

export const CalculationDraftSchema = z.object({
    expression: z.string().default(''),
    result: DraftResultSchema,
    explanation: z.string(),
    units: z.string().nullish(),
    sources: z.array(z.string()).default([]),
    confidence: ConfidenceSchema.nullish(),
});

function lastCalculatorExpression(invocations: ToolInvocationRecord[]): string {
    const calls = invocations.filter((inv) => inv.name === CALCULATOR_TOOL);
    const expression = calls[calls.length - 1]?.arguments.expression;
    return typeof expression === 'string' ? expression : '';
}

const CALCULATOR_RESULT_PREFIX = 'Result: ';

function lastCalculatorResult(invocations: ToolInvocationRecord[]): number | null {
    const results = invocations
        .filter((inv) => inv.name === CALCULATOR_TOOL && inv.result.startsWith(CALCULATOR_RESULT_PREFIX))
        .map((inv) => Number(inv.result.slice(CALCULATOR_RESULT_PREFIX.length)))
        .filter((value) => Number.isFinite(value));
    return results.length > 0 ? results[results.length - 1] : null;
}

export class CalculationHandler extends BaseIntentHandler<CalculationResponse> {
    public readonly route = 'calculation';

    protected readonly systemPrompt = CALCULATION_SYSTEM_PROMPT;

    constructor(tools: ToolRegistry, config: ServiceConfig = { logger: createLogger('CalculationHandler') }) {
        super(tools.subset([CALCULATOR_TOOL, DOCUMENT_READER_TOOL]), config);
    }

    protected notConfiguredResponse(): CalculationResponse {
        return createCalculationResponse({
            expression: '',
            result: null,
            explanation: NOT_CONFIGURED_MESSAGE,
            sources: [],
            confidence: 0,
        });
    }

    protected async finalize({ userInput, invocations, toolsUsed, backend }: FinalizationContext): Promise<CalculationResponse> {
        const request = fillTemplate(STRUCTURED_REQUEST_PROMPT_TEMPLATE, {
            USER_INPUT: userInput,
            TOOL_RESULTS: formatToolResults(invocations) || NO_TOOL_RESULTS,
        });

        const draft = await backend.generateStructured(request, {
            name: 'calculation response',
            instructions: CALCULATION_FINALIZATION_PROMPT,
            schema: CalculationDraftSchema,
        });

        return createCalculationResponse({
            expression: draft.expression.trim() || lastCalculatorExpression(invocations),
            result: draft.result ?? lastCalculatorResult(invocations),
            explanation: draft.explanation,
            units: draft.units ?? undefined,
            sources: backfillList(draft.sources, toolsUsed),
            confidence: backfillConfidence(draft.confidence, toolsUsed),
        });
    }
}
