// src/services/conversation/handlers/SummarizationHandler.ts

import { z } from 'zod';
import { ServiceConfig } from '../../base/types';
import { ToolRegistry } from '../../tool/tool.registry';
import { DOCUMENT_READER_TOOL } from '../../tool/tool.types';
import { ConfidenceSchema } from '../../../models/intent.model';
import { SummarizationResponse, createSummarizationResponse } from '../../../models/response.model';
import {
    STRUCTURED_REQUEST_PROMPT_TEMPLATE,
    SUMMARIZATION_FINALIZATION_PROMPT,
    SUMMARIZATION_SYSTEM_PROMPT,
    fillTemplate,
} from '../prompts';
import { BaseIntentHandler, FinalizationContext, NOT_CONFIGURED_MESSAGE, formatToolResults } from './BaseIntentHandler';
import { NO_TOOL_RESULTS, backfillConfidence, backfillList } from './structuredDefaults';
import { createLogger } from '../../../utils/logger';

export const SummarizationDraftSchema = z.object({
    summary: z.string(),
    key_points: z.array(z.string()).default([]),
    original_length: z.number().int().nonnegative().nullish(),
    document_ids: z.array(z.string()).default([]),
    confidence: ConfidenceSchema.nullish(),
});

export class SummarizationHandler extends BaseIntentHandler<SummarizationResponse> {
    public readonly route = 'summarization';

    protected readonly systemPrompt = SUMMARIZATION_SYSTEM_PROMPT;

    constructor(tools: ToolRegistry, config: ServiceConfig = { logger: createLogger('SummarizationHandler') }) {
        super(tools.subset([DOCUMENT_READER_TOOL]), config);
    }

    protected notConfiguredResponse(): SummarizationResponse {
        return createSummarizationResponse({ summary: NOT_CONFIGURED_MESSAGE, keyPoints: [], documentIds: [], confidence: 0 });
    }

    protected async finalize({ userInput, invocations, toolsUsed, backend }: FinalizationContext): Promise<SummarizationResponse> {
        const request = fillTemplate(STRUCTURED_REQUEST_PROMPT_TEMPLATE, {
            USER_INPUT: userInput,
            TOOL_RESULTS: formatToolResults(invocations) || NO_TOOL_RESULTS,
        });

        const draft = await backend.generateStructured(request, {
            name: 'summarization response',
            instructions: SUMMARIZATION_FINALIZATION_PROMPT,
            schema: SummarizationDraftSchema,
        });

        const retrievedLength = invocations.reduce((total, inv) => total + inv.result.length, 0);

        return createSummarizationResponse({
            summary: draft.summary,
            keyPoints: draft.key_points,
            originalLength: draft.original_length ?? retrievedLength,
            documentIds: backfillList(draft.document_ids, toolsUsed),
            confidence: backfillConfidence(draft.confidence, toolsUsed),
        });
    }
}
