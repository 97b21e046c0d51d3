// src/models/session.model.ts

import { z } from 'zod';

export const MessageRoleSchema = z.enum(['user', 'assistant', 'system']);
export type MessageRole = z.infer<typeof MessageRoleSchema>;

export const MessageSchema = z.object({
    role: MessageRoleSchema,
    content: z.string(),
    timestamp: z.string(),
});

export type Message = z.infer<typeof MessageSchema>;

export const SessionSchema = z.object({
    sessionId: z.string().min(1),
    messages: z.array(MessageSchema),
    metadata: z.record(z.unknown()).default({}),
});

export type Session = z.infer<typeof SessionSchema>;

export function createMessage(role: MessageRole, content: string, timestamp: Date = new Date()): Message {
    return { role, content, timestamp: timestamp.toISOString() };
}
