// src/services/llm/types.ts

import { z } from 'zod';
import { ToolCallRequest, ToolDefinition } from '../tool/tool.types';

export type ChatMessage =
    | { role: 'system' | 'user'; content: string }
    | { role: 'assistant'; content: string; toolCalls?: ToolCallRequest[] }
    | { role: 'tool'; content: string; toolCallId: string };

export interface LLMResponse {
    content: string;
    toolCalls: ToolCallRequest[];
}

/**
 * Shape a structured generation must satisfy. `instructions` is shown to the
 * model, `schema` validates what comes back.
 */
export interface OutputSchema<T> {
    name: string;
    instructions: string;
    schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

/**
 * The generation capability the assistant depends on. Transport, auth and
 * endpoint details stay inside implementations.
 */
export interface LLMBackend {
    readonly name: string;
    generateStructured<T>(input: string | ChatMessage[], output: OutputSchema<T>): Promise<T>;
    generateText(messages: ChatMessage[]): Promise<LLMResponse>;
    /** Returns a backend whose text generations may request the given tools. */
    bindTools(tools: ToolDefinition[]): LLMBackend;
}
