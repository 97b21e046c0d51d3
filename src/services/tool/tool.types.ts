// src/services/tool/tool.types.ts

export type ToolParameterProperty = {
    type: string;
    description?: string;
    enum?: string[];
};

export type ToolInputSchema = {
    type: 'object';
    properties: Record<string, ToolParameterProperty>;
    required?: string[];
};

/** What the backend is told about a callable tool. */
export interface ToolDefinition {
    name: string;
    description: string;
    parameters: ToolInputSchema;
}

export interface AgentTool extends ToolDefinition {
    invoke(args: Record<string, unknown>): Promise<string>;
}

/** A tool call requested by the backend. */
export interface ToolCallRequest {
    id: string;
    name: string;
    arguments: Record<string, unknown>;
}

export interface ToolInvocationRecord extends ToolCallRequest {
    result: string;
}

export const CALCULATOR_TOOL = 'calculator';
export const DOCUMENT_READER_TOOL = 'document_reader';
