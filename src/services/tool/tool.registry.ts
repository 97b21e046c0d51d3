// src/services/tool/tool.registry.ts

import { Logger } from '../base/types';
import { DocumentStore } from '../document/DocumentStore';
import { AgentTool, ToolDefinition } from './tool.types';
import { createCalculatorTool } from './calculator.tool';
import { createDocumentReaderTool } from './document-reader.tool';
import { createLogger } from '../../utils/logger';

/**
 * Name-keyed set of the tools the assistant can call. Lookups are by exact name.
 */
export class ToolRegistry {
    private readonly tools = new Map<string, AgentTool>();

    constructor(tools: AgentTool[] = []) {
        tools.forEach((tool) => this.register(tool));
    }

    public register(tool: AgentTool): void {
        this.tools.set(tool.name, tool);
    }

    public get(name: string): AgentTool | undefined {
        return this.tools.get(name);
    }

    public has(name: string): boolean {
        return this.tools.has(name);
    }

    public names(): string[] {
        return Array.from(this.tools.keys());
    }

    public definitions(): ToolDefinition[] {
        return Array.from(this.tools.values()).map(({ name, description, parameters }) => ({
            name,
            description,
            parameters,
        }));
    }

    /** A registry restricted to the given names; unknown names are ignored. */
    public subset(names: string[]): ToolRegistry {
        return new ToolRegistry(
            names.map((name) => this.tools.get(name)).filter((tool): tool is AgentTool => Boolean(tool)),
        );
    }
}

export function createAgentTools(store: DocumentStore, logger: Logger = createLogger('tools')): ToolRegistry {
    return new ToolRegistry([
        createCalculatorTool(logger),
        createDocumentReaderTool(store, logger),
    ]);
}
