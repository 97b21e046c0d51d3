// src/config/index.ts
import dotenv from 'dotenv';
import path from 'path';
import { createLogger } from '../utils/logger';

const logger = createLogger('config');

const nodeEnv = process.env.NODE_ENV || 'development';

// src/config or dist/src/config -> project root
const twoUp = path.resolve(__dirname, '../..');
const projectRoot = path.basename(twoUp) === 'dist' ? path.dirname(twoUp) : twoUp;
const projectRootEnvPath = path.join(projectRoot, '.env');
const dotenvResult = dotenv.config({ path: projectRootEnvPath });

if (dotenvResult.error) {
    logger.debug(`No .env file loaded from ${projectRootEnvPath}; relying on the process environment.`);
} else {
    logger.debug(`.env file loaded from ${projectRootEnvPath}.`);
}

export const getEnvVar = (key: string, defaultValue?: string, isCritical: boolean = false): string => {
    const value = process.env[key];
    if (value === undefined || value === '') {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        if (isCritical) {
            const errorMessage = `Environment variable ${key} is missing or empty and has no default.`;
            logger.error(errorMessage);
            throw new Error(errorMessage);
        }
        return '';
    }
    return value;
};

const getNumberVar = (key: string, defaultValue: number): number => {
    const parsed = Number(getEnvVar(key, String(defaultValue)));
    if (!Number.isFinite(parsed)) {
        logger.warn(`Environment variable ${key} is not a number, using default value: ${defaultValue}`);
        return defaultValue;
    }
    return parsed;
};

export interface AppConfig {
    GROQ_API_KEY: string;
    MODEL_NAME: string;
    MAX_TOKENS: number;
    TEMPERATURE: number;
    SESSION_DIR: string;
    DOCUMENT_PATH: string;
    LOG_LEVEL: string;
    NODE_ENV: string;
}

export const CONFIG: Readonly<AppConfig> = Object.freeze({
    GROQ_API_KEY: getEnvVar('GROQ_API_KEY'), // optional: without it the assistant runs backend-free
    MODEL_NAME: getEnvVar('MODEL_NAME', 'llama-3.3-70b-versatile'),
    MAX_TOKENS: getNumberVar('MAX_TOKENS', 1000),
    TEMPERATURE: getNumberVar('TEMPERATURE', 0),
    SESSION_DIR: getEnvVar('SESSION_DIR', 'sessions'),
    DOCUMENT_PATH: getEnvVar('DOCUMENT_PATH'),
    LOG_LEVEL: getEnvVar('LOG_LEVEL', 'info'),
    NODE_ENV: nodeEnv,
});
