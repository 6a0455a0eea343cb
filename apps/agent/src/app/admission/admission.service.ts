import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type Redis from 'ioredis';

import { errorMessage } from '../common/agent.errors';
import { REDIS_CLIENT } from '../redis/redis.constants';
import { AdmissionDecision, AdmissionScope } from './admission.types';

export const WINDOW_MS = 60_000;

/** History reads are cheaper than runs, so they get twice the budget. */
const SCOPE_MULTIPLIER: Record<AdmissionScope, number> = {
  agent_run: 1,
  agent_history: 2,
  agent_evaluation: 1
};

export function rateLimitKey(
  scope: AdmissionScope,
  identity: string,
  windowStart: number
): string {
  return `ratelimit:${scope}:${identity}:${windowStart}`;
}

/**
 * Fixed-window request budget per identity and scope, counted in Redis.
 * When Redis cannot be reached the gate admits and warns once until it
 * recovers.
 */
@Injectable()
export class AdmissionService {
  private readonly logger = new Logger(AdmissionService.name);
  private degraded = false;

  constructor(
    @Inject(REDIS_CLIENT) private readonly redis: Redis,
    private readonly configService: ConfigService
  ) {}

  get enabled(): boolean {
    return this.configService.get<boolean>('RATE_LIMIT_ENABLED', true);
  }

  limitFor(scope: AdmissionScope): number {
    const perMinute = this.configService.get<number>('RATE_LIMIT_PER_MINUTE', 60);
    return perMinute * SCOPE_MULTIPLIER[scope];
  }

  async admit(
    identity: string,
    scope: AdmissionScope,
    now = Date.now()
  ): Promise<AdmissionDecision> {
    const limit = this.limitFor(scope);
    const windowStart = Math.floor(now / WINDOW_MS) * WINDOW_MS;
    const resetAt = windowStart + WINDOW_MS;
    if (!this.enabled) {
      return { allowed: true, limit, remaining: limit, resetAt };
    }

    let count: number;
    try {
      count = await this._increment(rateLimitKey(scope, identity, windowStart));
    } catch (err) {
      if (!this.degraded) {
        this.logger.warn(
          `Rate limiting bypassed, Redis unavailable: ${errorMessage(err)}`
        );
        this.degraded = true;
      }
      return { allowed: true, limit, remaining: limit, resetAt };
    }
    if (this.degraded) {
      this.logger.log('Rate limiting restored');
      this.degraded = false;
    }

    if (count > limit) {
      return {
        allowed: false,
        limit,
        retryAfterSeconds: Math.max(1, Math.ceil((resetAt - now) / 1000)),
        resetAt
      };
    }
    return { allowed: true, limit, remaining: limit - count, resetAt };
  }

  private async _increment(key: string): Promise<number> {
    const results = await this.redis
      .multi()
      .incr(key)
      .pexpire(key, WINDOW_MS)
      .exec();
    const [err, value] = results?.[0] ?? [new Error('transaction aborted'), null];
    if (err) throw err;
    if (typeof value !== 'number') {
      throw new Error(`unexpected INCR reply: ${String(value)}`);
    }
    return value;
  }
}
