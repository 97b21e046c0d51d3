// src/index.ts

export { CONFIG, getEnvVar } from './config';
export type { AppConfig } from './config';

export * from './models/document.model';
export * from './models/intent.model';
export * from './models/response.model';
export * from './models/session.model';

export { DocumentStore, countOccurrences } from './services/document/DocumentStore';
export { ToolRegistry, createAgentTools } from './services/tool/tool.registry';
export { calculate, createCalculatorTool } from './services/tool/calculator.tool';
export { readDocuments, createDocumentReaderTool, NO_DOCUMENTS_FOUND } from './services/tool/document-reader.tool';
export { evaluateExpression, CalculatorError, DivisionByZeroError, ExpressionSyntaxError } from './services/tool/arithmetic';
export * from './services/tool/tool.types';

export type { ChatMessage, LLMBackend, LLMResponse, OutputSchema } from './services/llm/types';
export { GroqBackend } from './services/llm/GroqBackend';
export { buildBackend } from './services/llm';

export { IntentClassifier, classifyByKeywords } from './services/conversation/IntentClassifier';
export { MemoryUpdater } from './services/conversation/MemoryUpdater';
export { TurnOrchestrator, reduceTurnState } from './services/conversation/TurnOrchestrator';
export * from './services/conversation/handlers';
export type * from './services/conversation/types';

export { SessionStore } from './services/session/SessionStore';
export { DocumentAssistant } from './services/DocumentAssistant';
export type { AssistantStats, ProcessMessageResult } from './services/DocumentAssistant';
