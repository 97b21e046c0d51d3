// src/services/tool/document-reader.tool.ts

import { Logger } from '../base/types';
import { DocumentStore } from '../document/DocumentStore';
import { AgentTool, DOCUMENT_READER_TOOL } from './tool.types';
import { logToolUsage } from './tool.logger';
import { errorMessage } from '../../utils/errors';

export const NO_DOCUMENTS_FOUND = 'No relevant documents found.';

const READER_TOP_K = 3;

export function readDocuments(store: DocumentStore, query: string): string {
    const documents = store.retrieve({ text: query }, READER_TOP_K);
    if (documents.length === 0) {
        return NO_DOCUMENTS_FOUND;
    }

    return documents
        .map((doc, i) => `[Document ${i + 1}] (Source: ${doc.source ?? 'Unknown'})\n${doc.content}\n`)
        .join('\n');
}

export function createDocumentReaderTool(store: DocumentStore, logger: Logger): AgentTool {
    return {
        name: DOCUMENT_READER_TOOL,
        description:
            'Search the loaded documents and return the content of the most relevant ones. ' +
            'Use it to find facts, figures or passages before answering.',
        parameters: {
            type: 'object',
            properties: {
                query: {
                    type: 'string',
                    description: 'Keywords describing the information to look for.',
                },
            },
            required: ['query'],
        },
        async invoke(args: Record<string, unknown>): Promise<string> {
            const query = typeof args.query === 'string' ? args.query : String(args.query ?? '');
            try {
                const output = readDocuments(store, query);
                logToolUsage(logger, DOCUMENT_READER_TOOL, query, output);
                return output;
            } catch (error) {
                const output = `Error retrieving documents: ${errorMessage(error)}`;
                logToolUsage(logger, DOCUMENT_READER_TOOL, query, output);
                return output;
            }
        },
    };
}
