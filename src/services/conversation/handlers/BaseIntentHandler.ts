// src/services/conversation/handlers/BaseIntentHandler.ts

import { BaseService } from '../../base/BaseService';
import { ServiceConfig } from '../../base/types';
import { ChatMessage, LLMBackend } from '../../llm/types';
import { ToolRegistry } from '../../tool/tool.registry';
import { ToolCallRequest, ToolInvocationRecord } from '../../tool/tool.types';
import { IntentRoute } from '../../../models/intent.model';
import { AssistantResponse } from '../../../models/response.model';
import { Message } from '../../../models/session.model';
import { HandlerResult } from '../types';
import { errorMessage } from '../../../utils/errors';

export const NOT_CONFIGURED_MESSAGE = 'LLM not configured. Please configure an LLM to use this feature.';

const HISTORY_WINDOW = 5;

export interface IntentHandler {
    readonly route: IntentRoute;
    handle(userInput: string, history: Message[], backend: LLMBackend | null): Promise<HandlerResult>;
}

export interface FinalizationContext {
    userInput: string;
    /** The Phase 1 message list: system prompt, filtered history, user input. */
    conversation: ChatMessage[];
    invocations: ToolInvocationRecord[];
    toolsUsed: string[];
    backend: LLMBackend;
}

/**
 * Keeps the last few prior messages, minus anything that would leave a tool
 * exchange half-open for the backend.
 */
export function filterHistory(history: ChatMessage[], window: number = HISTORY_WINDOW): ChatMessage[] {
    return history
        .slice(-window)
        .filter((message) => message.role !== 'tool')
        .filter((message) => !(message.role === 'assistant' && message.toolCalls && message.toolCalls.length > 0));
}

export function toChatMessages(messages: Message[]): ChatMessage[] {
    return messages.map((message): ChatMessage =>
        message.role === 'assistant'
            ? { role: 'assistant', content: message.content }
            : { role: message.role, content: message.content },
    );
}

export function formatToolResults(invocations: ToolInvocationRecord[]): string {
    if (invocations.length === 0) return '';
    return `Tool Results:\n\n${invocations.map((inv) => `[${inv.name}]\n${inv.result}`).join('\n\n')}`;
}

/**
 * Tool-call-then-finalize protocol shared by every intent handler:
 * ask the tool-bound backend what to call, run the calls, then let the
 * subclass build the final typed response.
 */
export abstract class BaseIntentHandler<R extends AssistantResponse> extends BaseService implements IntentHandler {
    public abstract readonly route: IntentRoute;

    protected abstract readonly systemPrompt: string;

    protected constructor(protected readonly tools: ToolRegistry, config: ServiceConfig) {
        super(config);
    }

    public async handle(userInput: string, history: Message[], backend: LLMBackend | null): Promise<HandlerResult<R>> {
        if (!backend) {
            this.logger.info('No backend configured; returning placeholder response', { route: this.route });
            return { response: this.notConfiguredResponse(userInput), toolsUsed: [] };
        }

        const conversation: ChatMessage[] = [
            { role: 'system', content: this.systemPrompt },
            ...filterHistory(toChatMessages(history)),
            { role: 'user', content: userInput },
        ];

        const elicitation = await backend.bindTools(this.tools.definitions()).generateText(conversation);
        this.logger.debug('Tool elicitation finished', {
            route: this.route,
            requestedTools: elicitation.toolCalls.map((tc) => tc.name),
        });

        const invocations = await this.executeToolCalls(elicitation.toolCalls);
        const toolsUsed = Array.from(new Set(invocations.map((inv) => inv.name)));

        const response = await this.finalize({ userInput, conversation, invocations, toolsUsed, backend });
        return { response, toolsUsed };
    }

    /** Runs every call concurrently; results come back in request order. */
    protected async executeToolCalls(calls: ToolCallRequest[]): Promise<ToolInvocationRecord[]> {
        const results = await Promise.all(
            calls.map(async (call): Promise<ToolInvocationRecord | null> => {
                const tool = this.tools.get(call.name);
                if (!tool) {
                    this.logger.warn(`Skipping unknown tool '${call.name}'`, {
                        toolCallId: call.id,
                        available: this.tools.names(),
                    });
                    return null;
                }
                try {
                    const result = await tool.invoke(call.arguments);
                    return { ...call, result };
                } catch (error) {
                    this.logger.error(`Tool '${call.name}' failed`, { toolCallId: call.id, error: errorMessage(error) });
                    return null;
                }
            }),
        );
        return results.filter((record): record is ToolInvocationRecord => record !== null);
    }

    protected abstract notConfiguredResponse(userInput: string): R;

    protected abstract finalize(context: FinalizationContext): Promise<R>;
}
