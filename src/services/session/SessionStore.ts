// src/services/session/SessionStore.ts

import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { Message, Session, SessionSchema } from '../../models/session.model';
import { createLogger } from '../../utils/logger';
import { errorMessage } from '../../utils/errors';

const SESSION_ID_PATTERN = /^[A-Za-z0-9._-]+$/;
const SESSION_FILE_EXTENSION = '.json';

export function isValidSessionId(sessionId: string): boolean {
    return SESSION_ID_PATTERN.test(sessionId) && !sessionId.startsWith('.');
}

/**
 * Holds the current session and snapshots it to `<sessionDir>/<id>.json`.
 * Each save rewrites the whole file; the last writer wins.
 */
export class SessionStore extends BaseService {
    private session: Session | null = null;

    constructor(
        private readonly sessionDir: string,
        config: ServiceConfig = { logger: createLogger('SessionStore') },
    ) {
        super(config);
    }

    public start(sessionId: string = uuidv4()): Session {
        if (!isValidSessionId(sessionId)) {
            throw new Error(`Invalid session id: ${sessionId}`);
        }
        this.session = {
            sessionId,
            messages: [],
            metadata: { createdAt: new Date().toISOString() },
        };
        this.logger.info(`Started session ${sessionId}`);
        return this.session;
    }

    public current(): Session | null {
        return this.session;
    }

    public append(message: Message): void {
        if (!this.session) {
            throw new Error('No active session');
        }
        this.session.messages.push(message);
    }

    public clear(): void {
        this.session = null;
    }

    /** Replaces the current session only when the snapshot reads and validates. */
    public load(sessionId: string): boolean {
        if (!isValidSessionId(sessionId)) {
            this.logger.warn(`Refusing to load invalid session id: ${sessionId}`);
            return false;
        }

        const filePath = this.filePath(sessionId);
        try {
            const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
            const parsed = SessionSchema.safeParse(raw);
            if (!parsed.success) {
                this.logger.error(`Session file ${filePath} is malformed`, { issues: parsed.error.issues.length });
                return false;
            }
            if (parsed.data.sessionId !== sessionId) {
                this.logger.error(`Session file ${filePath} belongs to another session`, {
                    storedId: parsed.data.sessionId,
                });
                return false;
            }
            this.session = parsed.data;
            this.logger.info(`Loaded session ${sessionId}`, { messages: parsed.data.messages.length });
            return true;
        } catch (error) {
            this.logger.error(`Error loading session ${sessionId}`, { error: errorMessage(error) });
            return false;
        }
    }

    public save(): boolean {
        if (!this.session) {
            this.logger.warn('No active session to save');
            return false;
        }

        const filePath = this.filePath(this.session.sessionId);
        const tempPath = `${filePath}.${process.pid}.tmp`;
        try {
            fs.mkdirSync(this.sessionDir, { recursive: true });
            fs.writeFileSync(tempPath, JSON.stringify(this.session, null, 2), 'utf-8');
            fs.renameSync(tempPath, filePath);
            return true;
        } catch (error) {
            this.logger.error(`Error saving session ${this.session.sessionId}`, { error: errorMessage(error) });
            try {
                fs.rmSync(tempPath, { force: true });
            } catch (cleanupError) {
                this.logger.warn(`Could not remove temp file ${tempPath}`, { error: errorMessage(cleanupError) });
            }
            return false;
        }
    }

    public list(): string[] {
        if (!fs.existsSync(this.sessionDir)) {
            return [];
        }
        return fs
            .readdirSync(this.sessionDir)
            .filter((name) => name.endsWith(SESSION_FILE_EXTENSION))
            .map((name) => name.slice(0, -SESSION_FILE_EXTENSION.length))
            .sort();
    }

    private filePath(sessionId: string): string {
        return path.join(this.sessionDir, `${sessionId}${SESSION_FILE_EXTENSION}`);
    }
}
