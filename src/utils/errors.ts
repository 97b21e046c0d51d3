// src/utils/errors.ts

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    if (typeof error === 'string') return error;
    return 'Unknown error';
}

/** Raised when the generation backend returns output that cannot be used. */
export class BackendResponseError extends Error {
    constructor(message: string, public readonly raw?: string) {
        super(message);
        this.name = 'BackendResponseError';
    }
}
