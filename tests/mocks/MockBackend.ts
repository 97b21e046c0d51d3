/**
 * Scripted in-process LLMBackend. Responses are consumed in queue order;
 * bound copies share the same script and call log.
 */

import type { ChatMessage, LLMBackend, LLMResponse, OutputSchema } from '../../src/services/llm/types';
import type { ToolCallRequest, ToolDefinition } from '../../src/services/tool/tool.types';

export interface TextCall {
  messages: ChatMessage[];
  boundTools: string[];
}

export interface StructuredCall {
  input: string | ChatMessage[];
  name: string;
  instructions: string;
}

interface Script {
  text: Array<LLMResponse | Error>;
  structured: unknown[];
  textCalls: TextCall[];
  structuredCalls: StructuredCall[];
  bindCalls: string[][];
}

export class MockBackend implements LLMBackend {
  readonly name = 'mock';

  constructor(
    private readonly script: Script = { text: [], structured: [], textCalls: [], structuredCalls: [], bindCalls: [] },
    private readonly tools: ToolDefinition[] = [],
  ) {}

  queueText(content: string, toolCalls: ToolCallRequest[] = []): this {
    this.script.text.push({ content, toolCalls });
    return this;
  }

  queueTextError(error: Error): this {
    this.script.text.push(error);
    return this;
  }

  /** An Error instance makes the matching call reject with it. */
  queueStructured(value: unknown): this {
    this.script.structured.push(value);
    return this;
  }

  get textCalls(): TextCall[] {
    return this.script.textCalls;
  }

  get structuredCalls(): StructuredCall[] {
    return this.script.structuredCalls;
  }

  get bindCalls(): string[][] {
    return this.script.bindCalls;
  }

  bindTools(tools: ToolDefinition[]): LLMBackend {
    this.script.bindCalls.push(tools.map((tool) => tool.name));
    return new MockBackend(this.script, tools);
  }

  async generateText(messages: ChatMessage[]): Promise<LLMResponse> {
    this.script.textCalls.push({ messages, boundTools: this.tools.map((tool) => tool.name) });
    const next = this.script.text.shift();
    if (!next) throw new Error('MockBackend: no text response queued');
    if (next instanceof Error) throw next;
    return next;
  }

  async generateStructured<T>(input: string | ChatMessage[], output: OutputSchema<T>): Promise<T> {
    this.script.structuredCalls.push({ input, name: output.name, instructions: output.instructions });
    if (this.script.structured.length === 0) throw new Error('MockBackend: no structured response queued');
    const next = this.script.structured.shift();
    if (next instanceof Error) throw next;
    return output.schema.parse(next);
  }
}
