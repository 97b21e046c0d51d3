// src/services/llm/GroqBackend.ts

import Groq from 'groq-sdk';
import {
    ChatCompletionCreateParamsNonStreaming,
    ChatCompletionMessageParam,
    ChatCompletionTool,
} from 'groq-sdk/resources/chat/completions';
import { BaseService } from '../base/BaseService';
import { Logger } from '../base/types';
import { ToolCallRequest, ToolDefinition } from '../tool/tool.types';
import { ChatMessage, LLMBackend, LLMResponse, OutputSchema } from './types';
import { BackendResponseError } from '../../utils/errors';
import { createLogger } from '../../utils/logger';

export interface GroqBackendConfig {
    apiKey: string;
    model: string;
    maxTokens: number;
    temperature: number;
}

interface CompletionToolCall {
    id: string;
    function: { name: string; arguments: string };
}

interface CompletionLike {
    choices: Array<{
        message: {
            content: string | null;
            tool_calls?: CompletionToolCall[];
        };
    }>;
}

/** The slice of the Groq client this backend calls. */
export interface ChatCompletionsClient {
    chat: {
        completions: {
            create(body: ChatCompletionCreateParamsNonStreaming): Promise<CompletionLike>;
        };
    };
}

export class GroqBackend extends BaseService implements LLMBackend {
    readonly name = 'groq';

    private readonly client: ChatCompletionsClient;
    private readonly tools: ToolDefinition[];

    constructor(
        private readonly config: GroqBackendConfig,
        options: { client?: ChatCompletionsClient; logger?: Logger; tools?: ToolDefinition[] } = {},
    ) {
        super({ logger: options.logger ?? createLogger('GroqBackend') });
        if (!config.apiKey && !options.client) throw new Error('Groq API key is missing.');
        this.client = options.client ?? new Groq({ apiKey: config.apiKey.trim() });
        this.tools = options.tools ?? [];
    }

    public bindTools(tools: ToolDefinition[]): GroqBackend {
        return new GroqBackend(this.config, { client: this.client, logger: this.logger, tools });
    }

    public async generateText(messages: ChatMessage[]): Promise<LLMResponse> {
        const body: ChatCompletionCreateParamsNonStreaming = {
            model: this.config.model,
            messages: messages.map(toGroqMessage),
            max_tokens: this.config.maxTokens,
            temperature: this.config.temperature,
        };
        if (this.tools.length > 0) {
            body.tools = this.tools.map(toGroqTool);
            body.tool_choice = 'auto';
        }

        this.logger.debug('Calling Groq for text', {
            model: this.config.model,
            messageCount: messages.length,
            toolCount: this.tools.length,
        });

        const completion = await this.client.chat.completions.create(body);
        const message = completion.choices[0]?.message;
        if (!message) {
            throw new BackendResponseError('Groq returned no choices');
        }

        return {
            content: message.content ?? '',
            toolCalls: this.parseToolCalls(message.tool_calls ?? []),
        };
    }

    public async generateStructured<T>(input: string | ChatMessage[], output: OutputSchema<T>): Promise<T> {
        const conversation: ChatMessage[] = typeof input === 'string' ? [{ role: 'user', content: input }] : input;
        const messages: ChatMessage[] = [
            {
                role: 'system',
                content: `${output.instructions}\n\nRespond ONLY with a JSON object describing the ${output.name}. No markdown, no prose outside the JSON.`,
            },
            ...conversation,
        ];

        const completion = await this.client.chat.completions.create({
            model: this.config.model,
            messages: messages.map(toGroqMessage),
            max_tokens: this.config.maxTokens,
            temperature: this.config.temperature,
            response_format: { type: 'json_object' },
        });

        const raw = completion.choices[0]?.message?.content;
        if (!raw) {
            throw new BackendResponseError(`Groq returned an empty ${output.name}`);
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch {
            throw new BackendResponseError(`Groq returned invalid JSON for ${output.name}`, raw);
        }

        const result = output.schema.safeParse(parsed);
        if (!result.success) {
            const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
            throw new BackendResponseError(`Invalid ${output.name}: ${issues.join('; ')}`, raw);
        }
        return result.data;
    }

    private parseToolCalls(toolCalls: CompletionToolCall[]): ToolCallRequest[] {
        const parsed: ToolCallRequest[] = [];
        for (const tc of toolCalls) {
            if (!tc.id || !tc.function.name) continue;
            try {
                const args: unknown = JSON.parse(tc.function.arguments || '{}');
                if (!args || typeof args !== 'object' || Array.isArray(args)) {
                    throw new Error('arguments are not an object');
                }
                parsed.push({ id: tc.id, name: tc.function.name, arguments: { ...args } });
            } catch (e) {
                this.logger.error('Failed to parse tool arguments', {
                    name: tc.function.name,
                    args: tc.function.arguments,
                    error: e instanceof Error ? e.message : String(e),
                });
            }
        }
        return parsed;
    }
}

function toGroqMessage(message: ChatMessage): ChatCompletionMessageParam {
    switch (message.role) {
        case 'system':
            return { role: 'system', content: message.content };
        case 'user':
            return { role: 'user', content: message.content };
        case 'assistant':
            return message.toolCalls && message.toolCalls.length > 0
                ? {
                      role: 'assistant',
                      content: message.content || null,
                      tool_calls: message.toolCalls.map((tc) => ({
                          id: tc.id,
                          type: 'function' as const,
                          function: { name: tc.name, arguments: JSON.stringify(tc.arguments) },
                      })),
                  }
                : { role: 'assistant', content: message.content };
        case 'tool':
            return { role: 'tool', content: message.content, tool_call_id: message.toolCallId };
    }
}

function toGroqTool(tool: ToolDefinition): ChatCompletionTool {
    return {
        type: 'function',
        function: { name: tool.name, description: tool.description, parameters: tool.parameters },
    };
}
