// src/services/tool/tool.logger.ts

import { Logger } from '../base/types';

export function logToolUsage(logger: Logger, toolName: string, input: unknown, output: string): void {
    logger.info(`Tool: ${toolName}`, { tool: toolName, input, output });
}
