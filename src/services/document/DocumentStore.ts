// src/services/document/DocumentStore.ts

import { Dirent, Stats } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { Document, Query, SUPPORTED_DOCUMENT_EXTENSIONS, createDocument } from '../../models/document.model';
import { createLogger } from '../../utils/logger';
import { errorMessage } from '../../utils/errors';

/**
 * In-memory corpus with a lexical term-frequency ranker.
 *
 * Scoring is a plain substring count per query term over the lower-cased
 * content: no stemming, no tokenization, so "cat" also counts inside
 * "category". Documents that score 0 are never returned.
 */
export class DocumentStore extends BaseService {
    private documents: Document[] = [];

    constructor(config: ServiceConfig = { logger: createLogger('DocumentStore') }) {
        super(config);
    }

    public add(document: Document): void {
        this.documents.push(document);
    }

    public clear(): void {
        this.documents = [];
    }

    public count(): number {
        return this.documents.length;
    }

    public list(): readonly Document[] {
        return this.documents;
    }

    public retrieve(query: Query, topK: number = 5): Document[] {
        const terms = query.text.toLowerCase().split(/\s+/).filter(Boolean);
        if (terms.length === 0 || topK <= 0) return [];

        const scored: Document[] = [];
        for (const doc of this.documents) {
            if (query.filters && !matchesFilters(doc, query.filters)) continue;

            const score = scoreContent(doc.content.toLowerCase(), terms);
            if (score > 0) {
                scored.push({ ...doc, metadata: { ...doc.metadata }, score });
            }
        }

        // Array.prototype.sort is stable, so ties keep insertion order.
        scored.sort((a, b) => (b.score ?? 0) - (a.score ?? 0));
        return scored.slice(0, topK);
    }

    /**
     * Loads a single file or every supported file under a directory.
     * Returns the number of documents added by this call.
     */
    public async load(targetPath: string): Promise<number> {
        let stats: Stats;
        try {
            stats = await fs.stat(targetPath);
        } catch (error) {
            this.logger.warn(`Document path not found: ${targetPath}`, { error: errorMessage(error) });
            return 0;
        }

        if (stats.isFile()) {
            return (await this.loadFile(targetPath)) ? 1 : 0;
        }
        if (stats.isDirectory()) {
            return this.loadDirectory(targetPath);
        }
        return 0;
    }

    private async loadDirectory(dirPath: string): Promise<number> {
        let entries: Dirent[];
        try {
            entries = await fs.readdir(dirPath, { withFileTypes: true });
        } catch (error) {
            this.logger.error(`Error reading directory ${dirPath}`, { error: errorMessage(error) });
            return 0;
        }

        let loaded = 0;
        const sorted = [...entries].sort((a, b) => a.name.localeCompare(b.name));
        for (const entry of sorted) {
            const entryPath = path.join(dirPath, entry.name);
            if (entry.isDirectory()) {
                loaded += await this.loadDirectory(entryPath);
            } else if (entry.isFile() && SUPPORTED_DOCUMENT_EXTENSIONS.includes(path.extname(entry.name))) {
                if (await this.loadFile(entryPath)) loaded += 1;
            }
        }
        return loaded;
    }

    private async loadFile(filePath: string): Promise<boolean> {
        try {
            const content = await fs.readFile(filePath, 'utf-8');
            this.add(createDocument(content, filePath, {
                filename: path.basename(filePath),
                extension: path.extname(filePath),
            }));
            this.logger.debug(`Loaded document ${filePath}`, { length: content.length });
            return true;
        } catch (error) {
            this.logger.error(`Error loading file ${filePath}`, { error: errorMessage(error) });
            return false;
        }
    }
}

function scoreContent(content: string, terms: string[]): number {
    let score = 0;
    for (const term of terms) {
        score += countOccurrences(content, term);
    }
    return score;
}

// Non-overlapping, left to right.
export function countOccurrences(haystack: string, needle: string): number {
    if (!needle) return 0;
    let count = 0;
    let index = haystack.indexOf(needle);
    while (index !== -1) {
        count += 1;
        index = haystack.indexOf(needle, index + needle.length);
    }
    return count;
}

function matchesFilters(doc: Document, filters: Record<string, unknown>): boolean {
    return Object.entries(filters).every(([key, value]) => doc.metadata[key] === value);
}
