import {
  CheckpointStore,
  conversationThreadSchema,
  emptyThread
} from '../app/checkpoint/checkpoint.store';
import { CheckpointConflictError } from '../app/common/agent.errors';
import { ConversationThread } from '../app/common/interfaces';

/** Process-local checkpoint store with a promise-chain mutex per thread. */
export class InMemoryCheckpointStore implements CheckpointStore {
  readonly saves: ConversationThread[] = [];
  private readonly threads = new Map<string, string>();
  private readonly locks = new Map<string, Promise<void>>();

  async load(threadId: string): Promise<ConversationThread> {
    const raw = this.threads.get(threadId);
    return raw
      ? conversationThreadSchema.parse(JSON.parse(raw))
      : emptyThread(threadId);
  }

  async save(
    thread: ConversationThread,
    expectedVersion: number
  ): Promise<ConversationThread> {
    const current = await this.load(thread.threadId);
    if (current.version !== expectedVersion) {
      throw new CheckpointConflictError(thread.threadId, expectedVersion);
    }
    const next = {
      ...thread,
      version: expectedVersion + 1,
      updatedAt: new Date().toISOString()
    };
    this.threads.set(thread.threadId, JSON.stringify(next));
    this.saves.push(next);
    return next;
  }

  async withThreadLock<T>(threadId: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(threadId) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.locks.set(threadId, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.locks.get(threadId) === tail) this.locks.delete(threadId);
    }
  }
}
