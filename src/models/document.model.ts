// src/models/document.model.ts

import { z } from 'zod';

export const DocumentSchema = z.object({
    content: z.string(),
    source: z.string().optional(),
    metadata: z.record(z.unknown()).default({}),
    // assigned on retrieval copies only
    score: z.number().optional(),
});

export type Document = z.infer<typeof DocumentSchema>;

export interface Query {
    text: string;
    filters?: Record<string, unknown>;
}

export const SUPPORTED_DOCUMENT_EXTENSIONS: readonly string[] = ['.txt', '.md', '.json', '.csv'];

export function createDocument(content: string, source?: string, metadata: Record<string, unknown> = {}): Document {
    return DocumentSchema.parse({ content, source, metadata });
}
