import { z } from 'zod';

import { ConversationThread } from '../common/interfaces';

export const CHECKPOINT_STORE = 'CHECKPOINT_STORE';

/**
 * Durable thread state. `save` is all-or-nothing and only succeeds when the
 * stored version still equals `expectedVersion`; read-modify-write cycles
 * for one thread are serialized with `withThreadLock`.
 */
export interface CheckpointStore {
  load(threadId: string): Promise<ConversationThread>;
  save(
    thread: ConversationThread,
    expectedVersion: number
  ): Promise<ConversationThread>;
  withThreadLock<T>(threadId: string, fn: () => Promise<T>): Promise<T>;
}

export function emptyThread(threadId: string): ConversationThread {
  return {
    threadId,
    ownerId: null,
    messages: [],
    plan: null,
    version: 0,
    updatedAt: null
  };
}

const messageSchema = z.object({
  role: z.enum(['user', 'agent', 'tool']),
  content: z.string(),
  attachments: z
    .array(
      z.object({
        kind: z.literal('tool_call'),
        toolName: z.string(),
        success: z.boolean(),
        durationMs: z.number()
      })
    )
    .optional(),
  createdAt: z.string()
});

export const conversationThreadSchema = z.object({
  threadId: z.string(),
  ownerId: z.string().nullable(),
  messages: z.array(messageSchema),
  plan: z.string().nullable(),
  version: z.number().int().min(0),
  updatedAt: z.string().nullable()
});
