// src/utils/logger.ts

import winston from 'winston';

/**
 * Module-scoped winston logger. Every line is timestamped JSON tagged with the
 * owning service; `LOG_SILENT=true` mutes all output.
 */
export function createLogger(service: string): winston.Logger {
    return winston.createLogger({
        level: process.env.LOG_LEVEL || 'info',
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
        defaultMeta: { service },
        silent: process.env.LOG_SILENT === 'true',
        transports: [new winston.transports.Console()],
    });
}
