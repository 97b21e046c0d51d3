// src/services/llm/index.ts

import type { AppConfig } from '../../config';
import { GroqBackend } from './GroqBackend';
import { LLMBackend } from './types';

/** No API key means no backend: the assistant then runs its backend-free paths. */
export function buildBackend(config: Pick<AppConfig, 'GROQ_API_KEY' | 'MODEL_NAME' | 'MAX_TOKENS' | 'TEMPERATURE'>): LLMBackend | null {
    if (!config.GROQ_API_KEY) {
        return null;
    }

    return new GroqBackend({
        apiKey: config.GROQ_API_KEY,
        model: config.MODEL_NAME,
        maxTokens: config.MAX_TOKENS,
        temperature: config.TEMPERATURE,
    });
}
