// src/services/conversation/handlers/QAHandler.ts

import { ServiceConfig } from '../../base/types';
import { ChatMessage } from '../../llm/types';
import { ToolRegistry } from '../../tool/tool.registry';
import { CALCULATOR_TOOL, DOCUMENT_READER_TOOL } from '../../tool/tool.types';
import { AnswerResponse, createAnswerResponse } from '../../../models/response.model';
import { QA_FINAL_ANSWER_PROMPT_TEMPLATE, QA_SYSTEM_PROMPT, fillTemplate } from '../prompts';
import { BaseIntentHandler, FinalizationContext, NOT_CONFIGURED_MESSAGE, formatToolResults } from './BaseIntentHandler';
import { createLogger } from '../../../utils/logger';

const EMPTY_ANSWER = "I couldn't generate an answer.";

export class QAHandler extends BaseIntentHandler<AnswerResponse> {
    public readonly route = 'qa';

    protected readonly systemPrompt = QA_SYSTEM_PROMPT;

    constructor(tools: ToolRegistry, config: ServiceConfig = { logger: createLogger('QAHandler') }) {
        super(tools.subset([CALCULATOR_TOOL, DOCUMENT_READER_TOOL]), config);
    }

    protected notConfiguredResponse(userInput: string): AnswerResponse {
        return createAnswerResponse({ question: userInput, answer: NOT_CONFIGURED_MESSAGE, sources: [], confidence: 0 });
    }

    // Plain-text finalization: the final call is unbound, so no new tool calls can appear.
    protected async finalize({ userInput, conversation, invocations, toolsUsed, backend }: FinalizationContext): Promise<AnswerResponse> {
        const messages: ChatMessage[] =
            invocations.length > 0
                ? [
                      { role: 'system', content: this.systemPrompt },
                      {
                          role: 'user',
                          content: fillTemplate(QA_FINAL_ANSWER_PROMPT_TEMPLATE, {
                              TOOL_RESULTS: formatToolResults(invocations),
                              USER_INPUT: userInput,
                          }),
                      },
                  ]
                : conversation;

        const final = await backend.generateText(messages);
        const answer = final.content.trim() || EMPTY_ANSWER;

        return createAnswerResponse({
            question: userInput,
            answer,
            sources: toolsUsed,
            confidence: toolsUsed.length > 0 ? 0.9 : 0.5,
        });
    }
}
