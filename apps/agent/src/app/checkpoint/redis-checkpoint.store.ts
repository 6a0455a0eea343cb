/**
 * Redis-backed checkpoint store.
 *
 * Key scheme:
 *   Thread : checkpoint:thread:{threadId}  (String, JSON ConversationThread)
 *   Lock   : checkpoint:lock:{threadId}    (String, owner token, PX expiry)
 *
 * A save replaces the whole thread document in a single Lua call that first
 * checks the stored version, so a turn either lands completely or not at all.
 */
import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import type Redis from 'ioredis';

import {
  AgentCoreError,
  CheckpointConflictError,
  StoreUnavailableError,
  ThreadBusyError
} from '../common/agent.errors';
import { ConversationThread } from '../common/interfaces';
import { safeParseJson } from '../common/json.util';
import { REDIS_CLIENT } from '../redis/redis.constants';
import {
  CheckpointStore,
  conversationThreadSchema,
  emptyThread
} from './checkpoint.store';

const LOCK_POLL_MS = 50;

/** KEYS[1] thread key; ARGV expectedVersion, json, ttlSeconds. Returns 1 on write. */
export const CAS_SAVE_SCRIPT = `
local current = redis.call('GET', KEYS[1])
local version = 0
if current then
  version = tonumber(cjson.decode(current)['version']) or 0
end
if version ~= tonumber(ARGV[1]) then
  return 0
end
redis.call('SET', KEYS[1], ARGV[2], 'EX', tonumber(ARGV[3]))
return 1
`;

/** KEYS[1] lock key; ARGV[1] owner token. Deletes only the caller's own lock. */
export const RELEASE_LOCK_SCRIPT = `
if redis.call('GET', KEYS[1]) == ARGV[1] then
  return redis.call('DEL', KEYS[1])
end
return 0
`;

export function threadKey(threadId: string): string {
  return `checkpoint:thread:${threadId}`;
}

export function lockKey(threadId: string): string {
  return `checkpoint:lock:${threadId}`;
}

const sleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

@Injectable()
export class RedisCheckpointStore implements CheckpointStore {
  private readonly logger = new Logger(RedisCheckpointStore.name);

  constructor(
    @Inject(REDIS_CLIENT) private readonly redis: Redis,
    private readonly configService: ConfigService
  ) {}

  async load(threadId: string): Promise<ConversationThread> {
    const raw = await this._call(() => this.redis.get(threadKey(threadId)));
    if (raw === null) return emptyThread(threadId);

    const parsed = conversationThreadSchema.safeParse(
      safeParseJson(raw, null)
    );
    if (!parsed.success) {
      throw new StoreUnavailableError(
        'checkpoint',
        new Error(`Stored thread ${threadId} is not a valid checkpoint`)
      );
    }
    return parsed.data;
  }

  async save(
    thread: ConversationThread,
    expectedVersion: number
  ): Promise<ConversationThread> {
    const next: ConversationThread = {
      ...thread,
      version: expectedVersion + 1,
      updatedAt: new Date().toISOString()
    };
    const ttl = this.configService.get<number>('CHECKPOINT_TTL_SECONDS', 604800);

    const written = await this._call(() =>
      this.redis.eval(
        CAS_SAVE_SCRIPT,
        1,
        threadKey(thread.threadId),
        String(expectedVersion),
        JSON.stringify(next),
        String(ttl)
      )
    );
    if (written !== 1) {
      throw new CheckpointConflictError(thread.threadId, expectedVersion);
    }
    return next;
  }

  async withThreadLock<T>(threadId: string, fn: () => Promise<T>): Promise<T> {
    const key = lockKey(threadId);
    const token = randomUUID();
    const ttl = this.configService.get<number>('CHECKPOINT_LOCK_TTL_MS', 120000);
    const maxWait = this.configService.get<number>(
      'CHECKPOINT_LOCK_WAIT_MS',
      60000
    );

    const start = Date.now();
    for (;;) {
      const acquired = await this._call(() =>
        this.redis.set(key, token, 'PX', ttl, 'NX')
      );
      if (acquired === 'OK') break;

      const waited = Date.now() - start;
      if (waited >= maxWait) throw new ThreadBusyError(threadId, waited);
      await sleep(LOCK_POLL_MS);
    }

    try {
      return await fn();
    } finally {
      try {
        await this.redis.eval(RELEASE_LOCK_SCRIPT, 1, key, token);
      } catch (err) {
        // The PX expiry frees the lock eventually
        this.logger.warn(`Failed to release lock for thread ${threadId}: ${err}`);
      }
    }
  }

  private async _call<T>(op: () => Promise<T>): Promise<T> {
    try {
      return await op();
    } catch (err) {
      if (err instanceof AgentCoreError) throw err;
      throw new StoreUnavailableError('checkpoint', err);
    }
  }
}
