import { z } from 'zod';

// Runtime enforcement at the host seam: collaborators (hand tracking, chat
// backend, history backend, bundled data) must hand the core validated data.

export const GestureEventSchema = z.object({
    gestureType: z.string().min(1),
    confidence: z.number().min(0).max(1),
});

export const HandPresenceSchema = z.object({
    detected: z.boolean(),
});

export const OrbActivationSchema = z.object({
    orbIndex: z.number().int().nonnegative(),
});

export const ChatReplySchema = z.object({
    reply: z.string(),
});

export const HistoryEntrySchema = z.object({
    date: z.string(),
    time: z.string(),
    anxiety_level: z.string(),
    anxiety_score: z.number(),
    expression: z.string(),
});

export const HistoryEntriesSchema = z.array(HistoryEntrySchema);

export const TaskListSchema = z.array(z.string().min(1)).min(1);

export type GestureEventPayload = z.infer<typeof GestureEventSchema>;
export type HandPresencePayload = z.infer<typeof HandPresenceSchema>;
export type OrbActivationPayload = z.infer<typeof OrbActivationSchema>;
export type ChatReply = z.infer<typeof ChatReplySchema>;
export type HistoryEntry = z.infer<typeof HistoryEntrySchema>;
